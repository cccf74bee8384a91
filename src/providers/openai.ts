import OpenAI from 'openai';
import { BaseAIProvider } from './base.js';
import { ChatMessage, ChatOptions, ChatProvider, EmbeddingProvider, RequestOptions } from '../types/provider.js';
import { ConfigurationError } from '../utils/errors.js';

export interface OpenAIProviderOptions {
  apiKey: string;
  baseURL?: string;
  embeddingModel: string;
  chatModel: string;
  /** Request timeout handed to the SDK */
  timeoutMs?: number;
}

/**
 * Embedding and chat-completion adapter over the OpenAI SDK. The SDK's own
 * retries are turned off; callers wrap each call in `withRetry`.
 */
export class OpenAIProvider extends BaseAIProvider implements EmbeddingProvider, ChatProvider {
  name = 'openai';
  private client: OpenAI;
  private embeddingModel: string;
  private chatModel: string;

  constructor(options: OpenAIProviderOptions) {
    if (!options.apiKey || options.apiKey.trim().length === 0) {
      throw new ConfigurationError('OpenAI API key is not configured. Set OPENAI_API_KEY or run "ndis-rag init".');
    }
    super();
    this.embeddingModel = options.embeddingModel;
    this.chatModel = options.chatModel;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      maxRetries: 0,
      ...(options.timeoutMs ? { timeout: options.timeoutMs } : {}),
    });
  }

  async validateApiKey(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }

  async generateEmbedding(text: string, request: RequestOptions = {}): Promise<number[]> {
    this.validateText(text);
    const [embedding] = await this.batchGenerateEmbeddings([text], request);
    return embedding ?? [];
  }

  async batchGenerateEmbeddings(texts: string[], request: RequestOptions = {}): Promise<number[][]> {
    this.validateBatchTexts(texts);

    try {
      const response = await this.client.embeddings.create({
        model: this.embeddingModel,
        input: texts,
      }, { signal: request.signal });

      // The API tags every item with its input position
      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map(item => item.embedding);
    } catch (error) {
      throw this.toApiError('generate embeddings', error, statusOf(error));
    }
  }

  async complete(messages: ChatMessage[], options: ChatOptions = {}, request: RequestOptions = {}): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.chatModel,
        messages,
        ...(options.temperature !== undefined && { temperature: options.temperature }),
        ...(options.maxTokens !== undefined && { max_tokens: options.maxTokens }),
      }, { signal: request.signal });

      return response.choices[0]?.message?.content?.trim() ?? '';
    } catch (error) {
      throw this.toApiError('generate completion', error, statusOf(error));
    }
  }
}

function statusOf(error: unknown): number | undefined {
  return error instanceof OpenAI.APIError ? error.status : undefined;
}
