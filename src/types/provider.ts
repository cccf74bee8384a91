/** Per-call transport options; `signal` cancels the request */
export interface RequestOptions {
  signal?: AbortSignal;
}

export interface EmbeddingProvider {
  name: string;
  /** One vector per input, in input order. */
  batchGenerateEmbeddings(texts: string[], request?: RequestOptions): Promise<number[][]>;
  generateEmbedding(text: string, request?: RequestOptions): Promise<number[]>;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface ChatProvider {
  name: string;
  complete(messages: ChatMessage[], options?: ChatOptions, request?: RequestOptions): Promise<string>;
}
