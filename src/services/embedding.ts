import { EmbeddingProvider } from '../types/provider.js';
import { CorpusRecord, EmbeddedRecord } from '../types/record.js';
import { DimensionMismatchError, EmbeddingBatchError, ValidationError, errorMessage } from '../utils/errors.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../utils/retry.js';

export interface EmbeddingOptions {
  batchSize: number;
  dimensions: number;
  /** Batches in flight at once; 1 runs them strictly in order */
  concurrency: number;
  retry: RetryPolicy;
  logger?: Logger;
  onProgress?: (progress: EmbeddingProgress) => void;
}

export interface EmbeddingProgress {
  batchNumber: number;
  totalBatches: number;
  completedBatches: number;
  embeddedRecords: number;
  totalRecords: number;
}

interface Batch {
  number: number;
  start: number;
  records: CorpusRecord[];
}

const DEFAULT_OPTIONS: EmbeddingOptions = {
  batchSize: 16,
  dimensions: 1536,
  concurrency: 1,
  retry: DEFAULT_RETRY_POLICY,
};

/**
 * Attaches embeddings to records in fixed-size batches. One provider call
 * per batch; vectors are paired back by position. A batch that still fails
 * after its retries aborts the whole run.
 */
export class EmbeddingBatcher {
  private provider: EmbeddingProvider;
  private options: EmbeddingOptions;
  private logger: Logger;

  constructor(provider: EmbeddingProvider, options: Partial<EmbeddingOptions> = {}) {
    EmbeddingBatcher.validateOptions(options);
    this.provider = provider;
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Embed `records`, returning only those with text, in input order.
   */
  async embedBatches(records: CorpusRecord[], batchSize: number = this.options.batchSize): Promise<EmbeddedRecord[]> {
    EmbeddingBatcher.validateOptions({ batchSize });

    const embeddable = records.filter(record => record.text.trim().length > 0);
    const skipped = records.length - embeddable.length;
    if (skipped > 0) {
      this.logger.warn(`skipping ${skipped} record(s) without text`);
    }

    const batches = this.partition(embeddable, batchSize);
    this.logger.info(`${embeddable.length} records in ${batches.length} batches`);

    const results: EmbeddedRecord[][] = batches.map(() => []);
    let completedBatches = 0;
    let embeddedRecords = 0;

    const runBatch = async (batch: Batch): Promise<void> => {
      results[batch.number - 1] = await this.embedBatch(batch, batches.length);
      completedBatches++;
      embeddedRecords += batch.records.length;
      this.options.onProgress?.({
        batchNumber: batch.number,
        totalBatches: batches.length,
        completedBatches,
        embeddedRecords,
        totalRecords: embeddable.length,
      });
    };

    const concurrency = Math.max(1, this.options.concurrency);
    if (concurrency === 1) {
      for (const batch of batches) {
        await runBatch(batch);
      }
    } else {
      let next = 0;
      let failed = false;
      const worker = async (): Promise<void> => {
        while (!failed && next < batches.length) {
          const batch = batches[next++];
          if (!batch) {
            break;
          }
          try {
            await runBatch(batch);
          } catch (error) {
            failed = true;
            throw error;
          }
        }
      };
      await Promise.all(Array.from({ length: Math.min(concurrency, batches.length) }, () => worker()));
    }

    return results.flat();
  }

  private partition(records: CorpusRecord[], batchSize: number): Batch[] {
    const batches: Batch[] = [];
    for (let start = 0; start < records.length; start += batchSize) {
      batches.push({
        number: batches.length + 1,
        start,
        records: records.slice(start, start + batchSize),
      });
    }
    return batches;
  }

  private async embedBatch(batch: Batch, totalBatches: number): Promise<EmbeddedRecord[]> {
    const range: [number, number] = [batch.start, batch.start + batch.records.length];
    const texts = batch.records.map(record => record.text);

    let vectors: number[][];
    try {
      vectors = await withRetry(
        signal => this.provider.batchGenerateEmbeddings(texts, { signal }),
        this.options.retry,
        {
          onRetry: (error, attempt, delayMs) => {
            this.logger.warn(
              `batch ${batch.number}/${totalBatches} attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delayMs}ms`
            );
          },
        }
      );
    } catch (error) {
      if (error instanceof DimensionMismatchError) {
        throw error;
      }
      throw new EmbeddingBatchError(
        `Embedding batch ${batch.number}/${totalBatches} (records ${range[0]}-${range[1] - 1}) failed: ${errorMessage(error)}`,
        batch.number,
        range,
        error
      );
    }

    if (vectors.length !== batch.records.length) {
      throw new EmbeddingBatchError(
        `Embedding batch ${batch.number}/${totalBatches} returned ${vectors.length} vectors for ${batch.records.length} texts`,
        batch.number,
        range
      );
    }

    return batch.records.map((record, position) => {
      const embedding = vectors[position] ?? [];
      if (embedding.length !== this.options.dimensions) {
        throw new DimensionMismatchError(this.options.dimensions, embedding.length, `record ${record.id}`);
      }
      return { ...record, embedding };
    });
  }

  static validateOptions(options: Partial<EmbeddingOptions>): void {
    if (options.batchSize !== undefined && (!Number.isInteger(options.batchSize) || options.batchSize < 1 || options.batchSize > 2048)) {
      throw new ValidationError('batchSize must be between 1 and 2048');
    }

    if (options.concurrency !== undefined && (options.concurrency < 1 || options.concurrency > 16)) {
      throw new ValidationError('concurrency must be between 1 and 16');
    }
  }
}
