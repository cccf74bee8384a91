import * as pdfjsLib from 'pdfjs-dist';
import { DocumentLoader, TextSection } from '../types/loader.js';

const PDF_MAGIC = '%PDF-';

/**
 * PDF text through pdfjs-dist, one section per page.
 */
export class PdfLoader implements DocumentLoader {
  getSupportedExtensions(): string[] {
    return ['.pdf'];
  }

  hasValidHeader(buffer: Buffer): boolean {
    return buffer.subarray(0, PDF_MAGIC.length).toString('latin1') === PDF_MAGIC;
  }

  async load(buffer: Buffer): Promise<TextSection[]> {
    // pdfjs refuses Buffer instances; hand it a plain copy
    const pdf = await pdfjsLib.getDocument({ data: new Uint8Array(buffer), isEvalSupported: false }).promise;
    const sections: TextSection[] = [];

    try {
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();
        const text = content.items
          .map(item => ('str' in item ? item.str + (item.hasEOL ? '\n' : ' ') : ''))
          .join('');
        sections.push({ text, page: pageNumber });
      }
    } finally {
      await pdf.destroy();
    }

    return sections;
  }
}
