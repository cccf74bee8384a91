import crypto from 'crypto';

export class TextProcessor {
  /**
   * Normalize text extracted from a document file before chunking.
   */
  static cleanDocumentText(text: string): string {
    if (!text) {
      return '';
    }

    return text
      .normalize('NFKC')
      .replace(/\u00A0/g, ' ')
      // Running page markers, e.g. "Page 3 of 12"
      .replace(/page\s+\d+(\s+of\s+\d+)?/gi, '')
      .replace(/[ \t]+/g, ' ')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  /**
   * Normalize text extracted from an HTML page.
   */
  static cleanWebText(text: string): string {
    return text
      .replace(/\r\n?/g, '\n')
      .replace(/[ \t]+\n/g, '\n')
      .replace(/\n{2,}/g, '\n\n')
      .trim();
  }

  /**
   * Collapse every whitespace run to a single space.
   */
  static collapseWhitespace(text: string): string {
    return text.split(/\s+/).filter(Boolean).join(' ');
  }

  static sha1(content: string): string {
    return crypto.createHash('sha1').update(content, 'utf8').digest('hex');
  }

  static truncate(text: string, maxLength: number): string {
    return text.length <= maxLength ? text : text.slice(0, maxLength);
  }

  /**
   * Title-case each run of letters: "ndis_price guide" -> "Ndis Price Guide".
   */
  static titleCase(text: string): string {
    return text.replace(/[A-Za-z]+/g, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
  }
}
