import { CorpusRecord } from '../types/record.js';
import { readCorpus, writeCorpus } from '../utils/corpus-file.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { ContentDeduplicator } from './deduplicator.js';

export interface MergeStats {
  inputs: number;
  inputsSkipped: number;
  recordsRead: number;
  malformed: number;
  duplicates: number;
  written: number;
}

export interface MergeResult {
  records: CorpusRecord[];
  stats: MergeStats;
}

/**
 * Combines per-source record streams into one snapshot. Order is input
 * concatenation order; the first record with a given fingerprint (or id,
 * when it has none) wins.
 */
export class CorpusMerger {
  private logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  merge(streams: Array<CorpusRecord[] | null | undefined>): CorpusRecord[] {
    const deduplicator = new ContentDeduplicator();
    const merged: CorpusRecord[] = [];

    for (const stream of streams) {
      if (!stream || stream.length === 0) {
        continue;
      }
      for (const record of stream) {
        if (deduplicator.accept(record)) {
          merged.push(record);
        }
      }
    }

    return merged;
  }

  /**
   * Merge JSONL corpora. Missing files are skipped, malformed lines dropped.
   * When `outPath` is given the combined corpus is written there.
   */
  async mergeFiles(paths: Array<string | undefined>, outPath?: string): Promise<MergeResult> {
    const deduplicator = new ContentDeduplicator();
    const records: CorpusRecord[] = [];
    const stats: MergeStats = {
      inputs: paths.length,
      inputsSkipped: 0,
      recordsRead: 0,
      malformed: 0,
      duplicates: 0,
      written: 0,
    };

    for (const filePath of paths) {
      if (!filePath) {
        stats.inputsSkipped++;
        continue;
      }

      const { records: fileRecords, malformed } = await readCorpus(filePath);
      if (fileRecords.length === 0 && malformed === 0) {
        this.logger.debug(`skipping empty or missing input ${filePath}`);
        stats.inputsSkipped++;
        continue;
      }

      stats.recordsRead += fileRecords.length;
      stats.malformed += malformed;
      for (const record of fileRecords) {
        if (deduplicator.accept(record)) {
          records.push(record);
        }
      }
    }

    stats.duplicates = deduplicator.duplicateCount;

    if (outPath) {
      stats.written = await writeCorpus(outPath, records);
      this.logger.info(`wrote ${stats.written} -> ${outPath}`);
    } else {
      stats.written = records.length;
    }

    return { records, stats };
  }
}
