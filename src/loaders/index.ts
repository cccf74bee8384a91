import { DocumentLoader } from '../types/loader.js';
import { CsvLoader } from './csv.js';
import { DocxLoader } from './docx.js';
import { PdfLoader } from './pdf.js';
import { XlsxLoader } from './xlsx.js';

export { CsvLoader, DocxLoader, PdfLoader, XlsxLoader };

export function defaultLoaders(): DocumentLoader[] {
  return [new PdfLoader(), new DocxLoader(), new XlsxLoader(), new CsvLoader()];
}
