import { EmbeddedRecord, IndexDocument } from '../types/record.js';
import { VectorStore } from '../types/vector-store.js';
import { readCorpus, writeCorpus } from '../utils/corpus-file.js';
import { DimensionMismatchError, IndexUploadError, ValidationError, errorMessage } from '../utils/errors.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { DEFAULT_MAX_KEY_LENGTH, sanitizeId } from '../utils/record-identity.js';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../utils/retry.js';
import { CorpusMerger, MergeStats } from './corpus-merger.js';
import { EmbeddingBatcher } from './embedding.js';
import { IndexLifecycle } from './index-lifecycle.js';

export type BuildStage = 'merge' | 'embed' | 'reset' | 'upload' | 'count';

export interface IndexBuilderOptions {
  indexName: string;
  uploadBatchSize: number;
  maxKeyLength: number;
  maxContentChars: number;
  retry: RetryPolicy;
  logger?: Logger;
  onStage?: (stage: BuildStage) => void;
}

export interface BuildInputs {
  /** Corpora merged in order; missing files are skipped */
  inputs: string[];
  combinedPath?: string;
  embeddedPath: string;
}

export interface UploadStats {
  uploaded: number;
  batches: number;
  documentCount: number;
}

export interface BuildStats extends UploadStats {
  merge: MergeStats;
  embedded: number;
}

const DEFAULT_OPTIONS: Omit<IndexBuilderOptions, 'indexName'> = {
  uploadBatchSize: 500,
  maxKeyLength: DEFAULT_MAX_KEY_LENGTH,
  maxContentChars: 32766,
  retry: DEFAULT_RETRY_POLICY,
};

/**
 * Maps an embedded record to the document uploaded to the index. This is
 * where `text` becomes `content` and the id is made key-safe.
 */
export function toIndexDocument(
  record: EmbeddedRecord,
  limits: { maxKeyLength: number; maxContentChars: number } = { maxKeyLength: DEFAULT_MAX_KEY_LENGTH, maxContentChars: 32766 }
): IndexDocument {
  const document: IndexDocument = {
    id: sanitizeId(record.id, limits.maxKeyLength),
    content: record.text.slice(0, limits.maxContentChars),
    source: record.sourceLocator || record.fileName || 'local',
    sourceType: record.sourceType,
    embedding: record.embedding,
  };
  if (record.title) document.title = record.title;
  if (record.page !== undefined) document.page = record.page;
  return document;
}

/**
 * Full rebuild of the vector index from the corpus files. Every record is
 * embedded before the index is touched, so a failed run leaves the previous
 * index generation in place.
 */
export class IndexBuilder {
  private merger: CorpusMerger;
  private batcher: EmbeddingBatcher;
  private lifecycle: IndexLifecycle;
  private store: VectorStore;
  private options: IndexBuilderOptions;
  private logger: Logger;

  constructor(
    collaborators: { batcher: EmbeddingBatcher; lifecycle: IndexLifecycle; store: VectorStore; merger?: CorpusMerger },
    options: Partial<IndexBuilderOptions> & { indexName: string }
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = options.logger ?? silentLogger;
    this.batcher = collaborators.batcher;
    this.lifecycle = collaborators.lifecycle;
    this.store = collaborators.store;
    this.merger = collaborators.merger ?? new CorpusMerger({ logger: this.logger });
  }

  async build(inputs: BuildInputs): Promise<BuildStats> {
    this.options.onStage?.('merge');
    const { records, stats: merge } = await this.merger.mergeFiles(inputs.inputs, inputs.combinedPath);
    this.logger.info(`merged ${merge.written} records (${merge.duplicates} duplicates, ${merge.malformed} malformed lines)`);

    this.options.onStage?.('embed');
    const embedded = await this.batcher.embedBatches(records);
    if (embedded.length === 0) {
      throw new ValidationError('No records with text to index; refusing to replace the index with an empty one');
    }

    await writeCorpus(inputs.embeddedPath, embedded);
    this.logger.info(`wrote ${embedded.length} embedded records -> ${inputs.embeddedPath}`);

    const upload = await this.replaceIndex(embedded);
    return { merge, embedded: embedded.length, ...upload };
  }

  /**
   * Rebuild the index from an existing embedded corpus without re-embedding.
   */
  async uploadEmbedded(embeddedPath: string): Promise<UploadStats> {
    const { records, malformed } = await readCorpus(embeddedPath, { required: true });
    const embedded: EmbeddedRecord[] = [];
    for (const record of records) {
      if (record.embedding && record.embedding.length > 0 && record.text) {
        embedded.push({ ...record, embedding: record.embedding });
      }
    }

    const skipped = records.length - embedded.length + malformed;
    if (skipped > 0) {
      throw new ValidationError(
        `${embeddedPath} has ${skipped} line(s) without text or embedding; refusing to replace the index with a partial one`
      );
    }
    if (embedded.length === 0) {
      throw new ValidationError(`No embedded records in ${embeddedPath}`);
    }

    return this.replaceIndex(embedded);
  }

  private async replaceIndex(records: EmbeddedRecord[]): Promise<UploadStats> {
    const { dimensions } = this.lifecycle;
    for (const record of records) {
      if (record.embedding.length !== dimensions) {
        throw new DimensionMismatchError(dimensions, record.embedding.length, `record ${record.id}`);
      }
    }

    this.options.onStage?.('reset');
    await this.lifecycle.recreate();

    this.options.onStage?.('upload');
    const documents = records.map(record => toIndexDocument(record, this.options));
    const collisions = documents.length - new Set(documents.map(document => document.id)).size;
    if (collisions > 0) {
      this.logger.warn(`${collisions} document(s) share a key with an earlier one after sanitizing; later ones replace earlier ones`);
    }
    const { uploadBatchSize, indexName } = this.options;
    const failedKeys: string[] = [];
    let batches = 0;

    for (let start = 0; start < documents.length; start += uploadBatchSize) {
      const batch = documents.slice(start, start + uploadBatchSize);
      batches++;
      const results = await withRetry(() => this.store.uploadDocuments(indexName, batch), this.options.retry, {
        onRetry: (error, attempt) => this.logger.warn(`upload batch ${batches} attempt ${attempt} failed: ${errorMessage(error)}`),
      });
      for (const result of results) {
        if (!result.succeeded) {
          failedKeys.push(result.key);
        }
      }
    }

    if (failedKeys.length > 0) {
      throw new IndexUploadError(`${failedKeys.length} of ${documents.length} documents failed to upload`, failedKeys);
    }
    this.logger.info(`uploaded ${documents.length} docs in ${batches} batch(es)`);

    this.options.onStage?.('count');
    const documentCount = await this.store.getDocumentCount(indexName);
    this.logger.info(`${documentCount} docs in index`);
    if (documentCount !== documents.length) {
      this.logger.warn(`index holds ${documentCount} docs after uploading ${documents.length}`);
    }

    return { uploaded: documents.length, batches, documentCount };
  }
}
