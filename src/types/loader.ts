/**
 * A run of extracted text. `page` is set when the format has pages.
 */
export interface TextSection {
  text: string;
  page?: number;
}

export interface DocumentLoader {
  /** Lower-case extensions including the dot, e.g. `.pdf` */
  getSupportedExtensions(): string[];
  /** Cheap header check; a false result skips the file without parsing */
  hasValidHeader(buffer: Buffer): boolean;
  load(buffer: Buffer): Promise<TextSection[]>;
}
