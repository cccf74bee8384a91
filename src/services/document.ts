import { promises as fs } from 'fs';
import path from 'path';
import { defaultLoaders } from '../loaders/index.js';
import { ChunkSettings } from '../types/config.js';
import { DocumentLoader, TextSection } from '../types/loader.js';
import { CorpusRecord } from '../types/record.js';
import { TextChunker } from '../utils/chunking.js';
import { writeCorpus } from '../utils/corpus-file.js';
import { FileError, errorMessage } from '../utils/errors.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { fileRecordId } from '../utils/record-identity.js';
import { TextProcessor } from '../utils/text-processing.js';
import { ContentDeduplicator, computeFingerprint } from './deduplicator.js';

export interface IngestionOptions {
  chunking: ChunkSettings;
  loaders?: DocumentLoader[];
  logger?: Logger;
  onFile?: (filePath: string, recordCount: number) => void;
}

export interface IngestionStats {
  filesFound: number;
  filesParsed: number;
  filesSkipped: number;
  recordsWritten: number;
}

export interface IngestionResult {
  records: CorpusRecord[];
  stats: IngestionStats;
}

/**
 * Dotfiles and macOS AppleDouble (`._name`) companions.
 */
export function isHiddenFile(fileName: string): boolean {
  return fileName.startsWith('.');
}

/**
 * Builds the file-derived corpus: walk a directory, extract text with the
 * loader for each extension, normalize, chunk and fingerprint. A file that
 * cannot be parsed is logged and skipped.
 */
export class DocumentIngestion {
  private chunker: TextChunker;
  private loaders = new Map<string, DocumentLoader>();
  private logger: Logger;
  private onFile: IngestionOptions['onFile'];

  constructor(options: IngestionOptions) {
    this.chunker = new TextChunker(options.chunking);
    this.logger = options.logger ?? silentLogger;
    this.onFile = options.onFile;
    for (const loader of options.loaders ?? defaultLoaders()) {
      for (const extension of loader.getSupportedExtensions()) {
        this.loaders.set(extension.toLowerCase(), loader);
      }
    }
  }

  get supportedExtensions(): string[] {
    return [...this.loaders.keys()];
  }

  /**
   * Supported, non-hidden files under `dataDir`, sorted for a stable order.
   */
  async findFiles(dataDir: string): Promise<string[]> {
    const root = path.resolve(dataDir);
    let entries: string[];
    try {
      entries = await fs.readdir(root, { recursive: true });
    } catch (error) {
      throw new FileError(`Cannot read data directory ${dataDir}: ${errorMessage(error)}`);
    }

    const files: string[] = [];
    for (const entry of entries.sort()) {
      const fullPath = path.join(root, entry);
      const segments = entry.split(path.sep);
      if (segments.some(isHiddenFile) || !this.loaders.has(path.extname(entry).toLowerCase())) {
        continue;
      }
      try {
        const stat = await fs.stat(fullPath);
        if (stat.isFile()) {
          files.push(fullPath);
        }
      } catch (error) {
        this.logger.warn(`skip ${fullPath}: ${errorMessage(error)}`);
      }
    }
    return files;
  }

  /**
   * Records for one file, or an empty list when it yields no text.
   */
  async processFile(filePath: string): Promise<CorpusRecord[]> {
    const sourceLocator = path.resolve(filePath);
    const fileName = path.basename(sourceLocator);
    const fileType = path.extname(fileName).toLowerCase();
    const loader = this.loaders.get(fileType);
    if (!loader) {
      return [];
    }

    let buffer: Buffer;
    try {
      buffer = await fs.readFile(sourceLocator);
    } catch (error) {
      this.logger.warn(`skip unreadable file ${filePath}: ${errorMessage(error)}`);
      return [];
    }
    if (!loader.hasValidHeader(buffer)) {
      this.logger.warn(`skip ${fileType.slice(1)}: bad file header: ${filePath}`);
      return [];
    }

    let sections: TextSection[];
    try {
      sections = await loader.load(buffer);
    } catch (error) {
      this.logger.error(`failed to parse ${filePath}`, error);
      return [];
    }

    const pieces: Array<{ text: string; page?: number }> = [];
    for (const section of sections) {
      const cleaned = TextProcessor.cleanDocumentText(section.text);
      for (const chunk of cleaned ? this.chunker.chunk(cleaned) : []) {
        pieces.push(section.page === undefined ? { text: chunk.text } : { text: chunk.text, page: section.page });
      }
    }

    return pieces.map((piece, position) => {
      const chunkIndex = position + 1;
      const record: CorpusRecord = {
        id: fileRecordId(sourceLocator, chunkIndex),
        sourceType: 'document-file',
        sourceLocator,
        fileName,
        fileType,
        text: piece.text,
        contentFingerprint: computeFingerprint('document-file', sourceLocator, piece.text),
        chunkIndex,
        totalChunks: pieces.length,
        sizeBytes: buffer.length,
      };
      if (piece.page !== undefined) record.page = piece.page;
      return record;
    });
  }

  async ingest(dataDir: string, outPath?: string): Promise<IngestionResult> {
    const files = await this.findFiles(dataDir);
    this.logger.info(`found ${files.length} supported files under ${dataDir}`);

    const deduplicator = new ContentDeduplicator();
    const records: CorpusRecord[] = [];
    const stats: IngestionStats = { filesFound: files.length, filesParsed: 0, filesSkipped: 0, recordsWritten: 0 };

    for (const file of files) {
      const fileRecords = await this.processFile(file);
      if (fileRecords.length === 0) {
        stats.filesSkipped++;
      } else {
        stats.filesParsed++;
        for (const record of fileRecords) {
          if (deduplicator.accept(record)) {
            records.push(record);
          }
        }
      }
      this.onFile?.(file, fileRecords.length);
    }

    stats.recordsWritten = outPath ? await writeCorpus(outPath, records) : records.length;
    this.logger.info(`records=${stats.recordsWritten}, files_skipped=${stats.filesSkipped}`);

    return { records, stats };
  }
}
