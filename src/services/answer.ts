import { ChatMessage, ChatProvider } from '../types/provider.js';
import { ContextReference } from '../types/search.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../utils/retry.js';
import { INSUFFICIENT_CONTEXT_ANSWER, systemPrompt, userPrompt } from './prompts.js';
import { RetrievalRanker } from './retrieval.js';

export interface AnswerOptions {
  topK: number;
  temperature: number;
  maxTokens: number;
  orgName: string;
  retry: RetryPolicy;
  logger?: Logger;
}

export interface Answer {
  answer: string;
  references: ContextReference[];
}

const DEFAULT_OPTIONS: AnswerOptions = {
  topK: 5,
  temperature: 0.2,
  maxTokens: 400,
  orgName: 'NDIS',
  retry: DEFAULT_RETRY_POLICY,
};

/**
 * Retrieval-augmented answering: top-k context, then one chat completion
 * under the guarded system prompt.
 */
export class AnswerService {
  private ranker: RetrievalRanker;
  private chat: ChatProvider;
  private options: AnswerOptions;
  private logger: Logger;

  constructor(ranker: RetrievalRanker, chat: ChatProvider, options: Partial<AnswerOptions> = {}) {
    this.ranker = ranker;
    this.chat = chat;
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = options.logger ?? silentLogger;
  }

  async answer(question: string): Promise<Answer> {
    const query = question.trim();
    const context = await this.ranker.retrieveContext(query, this.options.topK);

    if (!context.sufficient) {
      this.logger.info(`no context for "${query}": ${context.reason}`);
      return { answer: INSUFFICIENT_CONTEXT_ANSWER, references: [] };
    }

    const messages: ChatMessage[] = [
      { role: 'system', content: systemPrompt(this.options.orgName) },
      { role: 'user', content: userPrompt(query, context.text) },
    ];

    const reply = await withRetry(
      signal => this.chat.complete(messages, {
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
      }, { signal }),
      this.options.retry,
      {
        onRetry: (error, attempt) => this.logger.warn(`chat attempt ${attempt} failed: ${String(error)}`),
      }
    );

    return { answer: reply.trim(), references: context.references };
  }
}
