import { z } from 'zod';

const ChunkSettingsSchema = z.object({
  chunkSize: z.number().int().positive(),
  overlap: z.number().int().min(0),
});

export const AssistantConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  providers: z.object({
    openai: z.object({
      apiKey: z.string().default(''),
      baseURL: z.string().optional(),
      embeddingModel: z.string().default('text-embedding-3-small'),
      chatModel: z.string().default('gpt-4o-mini'),
    }).default({}),
  }).default({}),
  embedding: z.object({
    batchSize: z.number().int().min(1).max(2048).default(16),
    dimensions: z.number().int().positive().default(1536),
    concurrency: z.number().int().min(1).max(16).default(1),
  }).default({}),
  chunking: z.object({
    file: ChunkSettingsSchema.default({ chunkSize: 1000, overlap: 100 }),
    web: ChunkSettingsSchema.default({ chunkSize: 2500, overlap: 100 }),
  }).default({}),
  crawler: z.object({
    startUrl: z.string().url().default('https://www.ndis.gov.au'),
    maxPages: z.number().int().positive().default(5),
    delayMs: z.number().int().min(0).default(300),
    maxBytes: z.number().int().positive().default(2_000_000),
    maxTextChars: z.number().int().positive().default(20_000),
    timeoutMs: z.number().int().positive().default(10_000),
  }).default({}),
  index: z.object({
    name: z.string().min(1).default('at2-index'),
    databasePath: z.string().default(''),
    uploadBatchSize: z.number().int().positive().default(500),
    maxKeyLength: z.number().int().positive().default(512),
    maxContentChars: z.number().int().positive().default(32_766),
  }).default({}),
  retrieval: z.object({
    topK: z.number().int().positive().max(100).default(5),
    maxContextChars: z.number().int().positive().default(12_000),
  }).default({}),
  chat: z.object({
    temperature: z.number().min(0).max(2).default(0.2),
    maxTokens: z.number().int().positive().default(400),
    orgName: z.string().min(1).default('NDIS'),
  }).default({}),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10).default(3),
    baseDelayMs: z.number().int().min(0).default(1000),
    maxDelayMs: z.number().int().min(0).default(10_000),
    timeoutMs: z.number().int().min(0).default(30_000),
  }).default({}),
  paths: z.object({
    fileCorpus: z.string().default('out/ndis_parsed.jsonl'),
    webCorpus: z.string().default('out/web_parsed.jsonl'),
    combinedCorpus: z.string().default('out/combined.jsonl'),
    embeddedCorpus: z.string().default('out/ndis_parsed_embedded.jsonl'),
  }).default({}),
  server: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.number().int().min(0).max(65535).default(8000),
  }).default({}),
});

export type AssistantConfig = z.infer<typeof AssistantConfigSchema>;
export type ChunkSettings = z.infer<typeof ChunkSettingsSchema>;
