import * as XLSX from 'xlsx';
import { DocumentLoader, TextSection } from '../types/loader.js';
import { hasZipSignature } from './docx.js';

/**
 * Spreadsheets as text: each sheet with at least one data row becomes
 * `[Sheet: name]` followed by its CSV. Only the zip-based `.xlsx` format.
 */
export class XlsxLoader implements DocumentLoader {
  getSupportedExtensions(): string[] {
    return ['.xlsx'];
  }

  hasValidHeader(buffer: Buffer): boolean {
    return hasZipSignature(buffer);
  }

  async load(buffer: Buffer): Promise<TextSection[]> {
    const workbook = XLSX.read(buffer, { type: 'buffer' });
    const parts: string[] = [];

    for (const name of workbook.SheetNames) {
      const sheet = workbook.Sheets[name];
      if (!sheet) {
        continue;
      }
      const csv = XLSX.utils.sheet_to_csv(sheet, { blankrows: false, strip: true }).trim();
      // header row alone counts as empty
      if (csv.split('\n').length < 2) {
        continue;
      }
      parts.push(`[Sheet: ${name}]\n${csv}`);
    }

    return [{ text: parts.join('\n\n') }];
  }
}
