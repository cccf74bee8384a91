import { OpenAIProvider } from '../../providers/openai.js';
import { AnswerService } from '../../services/answer.js';
import { EmbeddingBatcher, EmbeddingProgress } from '../../services/embedding.js';
import { IndexLifecycle } from '../../services/index-lifecycle.js';
import { RetrievalRanker } from '../../services/retrieval.js';
import { SqliteVectorStore } from '../../services/vector-store.js';
import { AssistantConfig } from '../../types/config.js';
import { ConfigManager } from '../../utils/config.js';
import { Logger, createConsoleLogger } from '../../utils/logger.js';

export interface CommonOptions {
  configPath?: string;
  verbose?: boolean;
}

export async function loadConfig(options: CommonOptions): Promise<AssistantConfig> {
  return new ConfigManager(options.configPath).load();
}

export function commandLogger(tag: string, options: CommonOptions): Logger {
  return createConsoleLogger(tag, { verbose: options.verbose ?? false });
}

export function createProvider(config: AssistantConfig): OpenAIProvider {
  const openai = config.providers.openai;
  return new OpenAIProvider({
    apiKey: openai.apiKey,
    baseURL: openai.baseURL,
    embeddingModel: openai.embeddingModel,
    chatModel: openai.chatModel,
    timeoutMs: config.retry.timeoutMs,
  });
}

export function openStore(config: AssistantConfig): SqliteVectorStore {
  return new SqliteVectorStore(config.index.databasePath).initialize();
}

export function createBatcher(
  config: AssistantConfig,
  provider: OpenAIProvider,
  logger: Logger,
  onProgress?: (progress: EmbeddingProgress) => void
): EmbeddingBatcher {
  return new EmbeddingBatcher(provider, {
    batchSize: config.embedding.batchSize,
    dimensions: config.embedding.dimensions,
    concurrency: config.embedding.concurrency,
    retry: config.retry,
    logger,
    onProgress,
  });
}

export function createLifecycle(config: AssistantConfig, store: SqliteVectorStore, logger: Logger): IndexLifecycle {
  return new IndexLifecycle(store, {
    indexName: config.index.name,
    dimensions: config.embedding.dimensions,
    logger,
  });
}

export function createRanker(config: AssistantConfig, provider: OpenAIProvider, store: SqliteVectorStore, logger: Logger): RetrievalRanker {
  return new RetrievalRanker(provider, store, {
    indexName: config.index.name,
    topK: config.retrieval.topK,
    maxContextChars: config.retrieval.maxContextChars,
    retry: config.retry,
    logger,
  });
}

export function createAnswerService(config: AssistantConfig, provider: OpenAIProvider, store: SqliteVectorStore, logger: Logger): AnswerService {
  return new AnswerService(createRanker(config, provider, store, logger), provider, {
    topK: config.retrieval.topK,
    temperature: config.chat.temperature,
    maxTokens: config.chat.maxTokens,
    orgName: config.chat.orgName,
    retry: config.retry,
    logger,
  });
}
