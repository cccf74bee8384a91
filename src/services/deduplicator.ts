import { CorpusRecord, SourceType } from '../types/record.js';
import { TextProcessor } from '../utils/text-processing.js';

/**
 * Fingerprint of a chunk. File chunks hash `locator::text`, so the same
 * paragraph in two files survives; web chunks hash the text alone so
 * boilerplate repeated across pages is kept once.
 */
export function fingerprint(record: Pick<CorpusRecord, 'sourceType' | 'sourceLocator' | 'text'>): string {
  return computeFingerprint(record.sourceType, record.sourceLocator, record.text);
}

export function computeFingerprint(sourceType: SourceType, sourceLocator: string, text: string): string {
  if (sourceType === 'web-page') {
    return TextProcessor.sha1(text);
  }
  return TextProcessor.sha1(`${sourceLocator}::${text}`);
}

/**
 * Key used when merging record streams: the fingerprint when present,
 * otherwise the id.
 */
export function dedupeKey(record: Pick<CorpusRecord, 'contentFingerprint' | 'id'>): string {
  return record.contentFingerprint || record.id;
}

/**
 * First-seen-wins duplicate filter. State lives for one build run; create a
 * new instance per run.
 */
export class ContentDeduplicator {
  private seen = new Set<string>();
  private duplicates = 0;

  constructor(private keyOf: (record: CorpusRecord) => string = dedupeKey) {}

  /**
   * True the first time a key is offered, false for every repeat.
   */
  accept(record: CorpusRecord): boolean {
    const key = this.keyOf(record);
    if (this.seen.has(key)) {
      this.duplicates++;
      return false;
    }
    this.seen.add(key);
    return true;
  }

  dedupe(records: Iterable<CorpusRecord>): CorpusRecord[] {
    const kept: CorpusRecord[] = [];
    for (const record of records) {
      if (this.accept(record)) {
        kept.push(record);
      }
    }
    return kept;
  }

  get seenCount(): number {
    return this.seen.size;
  }

  get duplicateCount(): number {
    return this.duplicates;
  }
}

export function dedupe(records: Iterable<CorpusRecord>): CorpusRecord[] {
  return new ContentDeduplicator().dedupe(records);
}
