import { ChunkSettings } from '../types/config.js';
import { ValidationError } from './errors.js';

export type ChunkingOptions = ChunkSettings;

export interface TextChunk {
  text: string;
  startPosition: number;
  endPosition: number;
  /** 1-based, assigned after empty windows are dropped */
  index: number;
}

/**
 * Split text into fixed-size character windows that overlap by `overlap`
 * characters. Windows are trimmed and empty ones dropped.
 */
export function splitText(text: string, chunkSize: number, overlap: number): string[] {
  return new TextChunker({ chunkSize, overlap }).chunk(text).map(chunk => chunk.text);
}

export class TextChunker {
  private options: ChunkingOptions;

  constructor(options: ChunkingOptions) {
    TextChunker.validateOptions(options);
    this.options = options;
  }

  chunk(text: string): TextChunk[] {
    const { chunkSize, overlap } = this.options;
    const chunks: TextChunk[] = [];

    // An overlap as large as the window would never move forward
    const step = chunkSize - overlap > 0 ? chunkSize - overlap : chunkSize;

    for (let startPosition = 0; startPosition < text.length; startPosition += step) {
      const endPosition = Math.min(startPosition + chunkSize, text.length);
      const chunkText = text.slice(startPosition, endPosition).trim();

      if (chunkText.length > 0) {
        chunks.push({
          text: chunkText,
          startPosition,
          endPosition,
          index: chunks.length + 1,
        });
      }
    }

    return chunks;
  }

  static validateOptions(options: ChunkingOptions): void {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new ValidationError('Chunk size must be a positive integer');
    }

    if (!Number.isInteger(options.overlap) || options.overlap < 0) {
      throw new ValidationError('Overlap must be a non-negative integer');
    }
  }
}
