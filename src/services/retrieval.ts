import path from 'path';
import { EmbeddingProvider } from '../types/provider.js';
import { ContextReference, ContextWindow, SearchHit, SearchResponse, SelectableField, VectorMatch } from '../types/search.js';
import { VectorStore } from '../types/vector-store.js';
import { DimensionMismatchError, IndexNotFoundError } from '../utils/errors.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../utils/retry.js';
import { TextProcessor } from '../utils/text-processing.js';
import { schemaDimensions } from './vector-store.js';

export const RETRIEVAL_FIELDS: readonly SelectableField[] = ['id', 'content', 'source', 'sourceType', 'title', 'page'];

export const DEFAULT_MAX_CONTEXT_CHARS = 12000;

export interface RetrievalOptions {
  indexName: string;
  topK: number;
  maxContextChars: number;
  retry: RetryPolicy;
  logger?: Logger;
}

function isWebSource(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/**
 * Human-readable title for a match: its own title, otherwise the file (or
 * URL path) stem with underscores as spaces, title-cased.
 */
export function displayTitle(match: Pick<VectorMatch, 'title' | 'source'>): string {
  if (match.title) {
    return match.title;
  }

  let stem = '';
  if (isWebSource(match.source)) {
    const url = new URL(match.source);
    stem = path.posix.parse(url.pathname).name || url.host;
  } else {
    stem = path.parse(match.source).name;
  }
  return TextProcessor.titleCase(stem.replace(/_/g, ' '));
}

/**
 * Source label shown after a context entry. File sources add the page when
 * known; web sources show the title followed by the URL.
 */
export function sourceLabel(match: Pick<VectorMatch, 'title' | 'source' | 'page'>, position: number): string {
  if (!match.source) {
    return `Source ${position}`;
  }
  const title = displayTitle(match);
  if (isWebSource(match.source)) {
    return `${title} - ${match.source}`;
  }
  return match.page ? `${title} (Page ${match.page})` : title;
}

function toMatch(hit: SearchHit): VectorMatch {
  const match: VectorMatch = {
    id: hit.id,
    content: hit.content ?? '',
    source: hit.source ?? '',
    sourceType: hit.sourceType ?? 'document-file',
    score: hit.score,
  };
  if (hit.title) match.title = hit.title;
  if (hit.page !== undefined) match.page = hit.page;
  return match;
}

/**
 * Build the numbered context block handed to the chat model. Entries keep
 * match order and are added while the block fits in `maxChars`; an oversized
 * first entry is cut down to fit. No usable match yields the
 * insufficient-context sentinel.
 */
export function buildContext(matches: VectorMatch[], maxChars: number = DEFAULT_MAX_CONTEXT_CHARS): ContextWindow {
  const entries: string[] = [];
  const references: ContextReference[] = [];
  let length = 0;

  for (const match of matches) {
    let text = TextProcessor.collapseWhitespace(match.content);
    if (!text) {
      continue;
    }

    const number = entries.length + 1;
    const label = sourceLabel(match, number);
    const decoration = `[${number}] \n(Source: ${label})`.length;
    const separator = entries.length > 0 ? 2 : 0;

    if (length + separator + decoration + text.length > maxChars) {
      if (entries.length > 0) {
        break;
      }
      text = TextProcessor.truncate(text, Math.max(0, maxChars - decoration));
      if (!text) {
        break;
      }
    }

    const entry = `[${number}] ${text}\n(Source: ${label})`;
    entries.push(entry);
    length += separator + entry.length;

    const reference: ContextReference = { number, id: match.id, label };
    if (isWebSource(match.source)) reference.url = match.source;
    if (match.page !== undefined) reference.page = match.page;
    references.push(reference);
  }

  if (entries.length === 0) {
    return { sufficient: false, reason: 'No relevant context found' };
  }

  return { sufficient: true, text: entries.join('\n\n'), references };
}

/**
 * Query-time retrieval: embed the question, ask the store for the nearest
 * chunks and keep its ranking. Nothing is cached between calls.
 */
export class RetrievalRanker {
  private provider: EmbeddingProvider;
  private store: VectorStore;
  private options: RetrievalOptions;
  private logger: Logger;

  constructor(provider: EmbeddingProvider, store: VectorStore, options: Partial<RetrievalOptions> & { indexName: string }) {
    this.provider = provider;
    this.store = store;
    this.options = {
      topK: 5,
      maxContextChars: DEFAULT_MAX_CONTEXT_CHARS,
      retry: DEFAULT_RETRY_POLICY,
      ...options,
    };
    this.logger = options.logger ?? silentLogger;
  }

  async retrieve(query: string, k: number = this.options.topK): Promise<VectorMatch[]> {
    const text = query.trim();
    if (!text || k < 1) {
      return [];
    }

    const index = await this.store.getIndex(this.options.indexName);
    if (!index) {
      throw new IndexNotFoundError(this.options.indexName);
    }

    const vector = await withRetry(signal => this.provider.generateEmbedding(text, { signal }), this.options.retry, {
      onRetry: (error, attempt) => this.logger.warn(`query embedding attempt ${attempt} failed: ${String(error)}`),
    });

    const dimensions = schemaDimensions(index);
    if (vector.length !== dimensions) {
      throw new DimensionMismatchError(dimensions, vector.length, `query against ${this.options.indexName}`);
    }

    const hits = await this.store.vectorSearch(this.options.indexName, vector, k, RETRIEVAL_FIELDS);
    return this.dropDuplicates(hits.map(toMatch));
  }

  /**
   * Retrieve and time a query, for the search command.
   */
  async search(query: string, k: number = this.options.topK): Promise<SearchResponse> {
    const startTime = Date.now();
    const matches = await this.retrieve(query, k);
    return {
      query: query.trim(),
      matches,
      executionTime: Date.now() - startTime,
    };
  }

  async retrieveContext(query: string, k: number = this.options.topK): Promise<ContextWindow> {
    const matches = await this.retrieve(query, k);
    return buildContext(matches, this.options.maxContextChars);
  }

  private dropDuplicates(matches: VectorMatch[]): VectorMatch[] {
    const ids = new Set<string>();
    const contents = new Set<string>();
    const kept: VectorMatch[] = [];

    for (const match of matches) {
      const content = TextProcessor.collapseWhitespace(match.content);
      if (ids.has(match.id) || (content && contents.has(content))) {
        this.logger.debug(`dropping duplicate match ${match.id}`);
        continue;
      }
      ids.add(match.id);
      if (content) contents.add(content);
      kept.push(match);
    }

    return kept;
  }
}
