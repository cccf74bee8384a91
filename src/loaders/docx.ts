import mammoth from 'mammoth';
import { DocumentLoader, TextSection } from '../types/loader.js';

/** Zip local file header `PK\x03\x04`, shared by .docx and .xlsx */
export function hasZipSignature(buffer: Buffer): boolean {
  return buffer.length >= 4 && buffer[0] === 0x50 && buffer[1] === 0x4b && buffer[2] === 0x03 && buffer[3] === 0x04;
}

/**
 * Word documents through mammoth's raw-text extraction.
 */
export class DocxLoader implements DocumentLoader {
  getSupportedExtensions(): string[] {
    return ['.docx'];
  }

  hasValidHeader(buffer: Buffer): boolean {
    return hasZipSignature(buffer);
  }

  async load(buffer: Buffer): Promise<TextSection[]> {
    const { value } = await mammoth.extractRawText({ buffer });
    const paragraphs = value
      .split('\n')
      .map(line => line.trim())
      .filter(Boolean);
    return [{ text: paragraphs.join('\n') }];
  }
}
