import csv from 'csv-parser';
import { Readable } from 'stream';
import { DocumentLoader, TextSection } from '../types/loader.js';

/**
 * CSV rows rendered as `column: value` lines, one row per line.
 */
export class CsvLoader implements DocumentLoader {
  getSupportedExtensions(): string[] {
    return ['.csv'];
  }

  hasValidHeader(buffer: Buffer): boolean {
    return !buffer.subarray(0, 1024).includes(0);
  }

  load(buffer: Buffer): Promise<TextSection[]> {
    return new Promise<TextSection[]>((resolve, reject) => {
      const rows: string[] = [];
      Readable.from([buffer])
        .pipe(csv())
        .on('data', (row: Record<string, string>) => {
          const line = Object.entries(row)
            .filter(([, value]) => value.trim().length > 0)
            .map(([column, value]) => `${column.trim()}: ${value.trim()}`)
            .join(', ');
          if (line) {
            rows.push(line);
          }
        })
        .on('end', () => resolve([{ text: rows.join('\n') }]))
        .on('error', reject);
    });
  }
}
