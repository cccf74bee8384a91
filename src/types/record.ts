export type SourceType = 'document-file' | 'web-page';

/**
 * One chunk of source text. Created once during ingestion; only
 * `embedding` is attached afterwards.
 */
export interface CorpusRecord {
  id: string;
  sourceType: SourceType;
  sourceLocator: string;
  fileName: string;
  fileType: string;
  title?: string;
  page?: number;
  text: string;
  contentFingerprint: string;
  chunkIndex: number;
  totalChunks: number;
  sizeBytes?: number;
  embedding?: number[];
}

export interface EmbeddedRecord extends CorpusRecord {
  embedding: number[];
}

/**
 * The shape uploaded to the vector index. `text` becomes `content` here and
 * nowhere else.
 */
export interface IndexDocument {
  id: string;
  content: string;
  source: string;
  sourceType: SourceType;
  title?: string;
  page?: number;
  embedding: number[];
}
