import { EmbeddingProvider, ChatMessage, ChatOptions, ChatProvider, RequestOptions } from '../types/provider.js';
import { CorpusRecord } from '../types/record.js';
import { RetryPolicy } from '../utils/retry.js';

export const NO_WAIT_RETRY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, timeoutMs: 0 };

export function makeRecord(overrides: Partial<CorpusRecord> & { id: string }): CorpusRecord {
  return {
    sourceType: 'document-file',
    sourceLocator: `/data/${overrides.id}.pdf`,
    fileName: `${overrides.id}.pdf`,
    fileType: '.pdf',
    text: `text of ${overrides.id}`,
    contentFingerprint: `fp-${overrides.id}`,
    chunkIndex: 1,
    totalChunks: 1,
    ...overrides,
  };
}

/**
 * Deterministic embeddings: a fixed vector per known text, otherwise
 * `[text.length, 1, 0, ...]`. Every batch call is recorded.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  name = 'fake';
  calls: string[][] = [];
  signals: Array<AbortSignal | undefined> = [];
  failures: Error[] = [];

  constructor(private dimensions: number, private vectors: Record<string, number[]> = {}) {}

  async batchGenerateEmbeddings(texts: string[], request: RequestOptions = {}): Promise<number[][]> {
    this.calls.push(texts);
    this.signals.push(request.signal);
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    return texts.map(text => this.vectorFor(text));
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const [vector] = await this.batchGenerateEmbeddings([text]);
    return vector ?? [];
  }

  private vectorFor(text: string): number[] {
    const known = this.vectors[text];
    if (known) {
      return known;
    }
    const vector = new Array<number>(this.dimensions).fill(0);
    vector[0] = text.length;
    if (this.dimensions > 1) vector[1] = 1;
    return vector;
  }
}

export class FakeChatProvider implements ChatProvider {
  name = 'fake-chat';
  requests: Array<{ messages: ChatMessage[]; options?: ChatOptions }> = [];

  constructor(private reply: string) {}

  async complete(messages: ChatMessage[], options?: ChatOptions): Promise<string> {
    this.requests.push({ messages, options });
    return this.reply;
  }
}
