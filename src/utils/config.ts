import { promises as fs, existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { ZodError } from 'zod';
import { AssistantConfig, AssistantConfigSchema } from '../types/config.js';
import { ValidationError, FileError } from './errors.js';

type RawConfig = Record<string, unknown>;
type Env = Record<string, string | undefined>;

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects; arrays and scalars from `source` win.
 */
export function mergeDeep(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };

  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    if (isPlainObject(value) && isPlainObject(existing)) {
      result[key] = mergeDeep(existing, value);
    } else if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

function parseNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Environment variable ${name} must be a number, got "${raw}"`);
  }
  return value;
}

function nonEmpty(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw && raw.trim() ? raw.trim() : undefined;
}

/**
 * Environment overrides, named after the variables the ingestion scripts
 * have always read.
 */
export function configFromEnv(env: Env): RawConfig {
  const delaySec = parseNumber(env, 'CRAWLER_DELAY_SEC');

  return {
    providers: {
      openai: {
        apiKey: nonEmpty(env, 'OPENAI_API_KEY'),
        baseURL: nonEmpty(env, 'OPENAI_BASE_URL'),
        embeddingModel: nonEmpty(env, 'EMBEDDING_MODEL'),
        chatModel: nonEmpty(env, 'CHAT_MODEL'),
      },
    },
    embedding: {
      batchSize: parseNumber(env, 'EMBED_BATCH'),
    },
    crawler: {
      startUrl: nonEmpty(env, 'SCRAPE_URL'),
      maxPages: parseNumber(env, 'CRAWLER_MAX_PAGES'),
      delayMs: delaySec === undefined ? undefined : Math.round(delaySec * 1000),
      maxBytes: parseNumber(env, 'MAX_BYTES'),
      maxTextChars: parseNumber(env, 'MAX_TEXT_CHARS'),
    },
    index: {
      name: nonEmpty(env, 'VECTOR_INDEX_NAME'),
      databasePath: nonEmpty(env, 'VECTOR_DB_PATH'),
    },
    retrieval: {
      topK: parseNumber(env, 'RAG_TOP_K'),
    },
    chat: {
      orgName: nonEmpty(env, 'ORG_NAME'),
    },
    paths: {
      fileCorpus: nonEmpty(env, 'PARSED_JSONL_PATH'),
      webCorpus: nonEmpty(env, 'WEB_PARSED_JSONL_PATH'),
      embeddedCorpus: nonEmpty(env, 'EMBEDDED_JSONL_PATH'),
    },
    server: {
      port: parseNumber(env, 'PORT'),
    },
  };
}

export class ConfigManager {
  private configPath: string;
  private configDir: string;
  private env: Env;

  constructor(customPath?: string, env: Env = process.env) {
    this.env = env;
    const resolved = customPath ?? env['NDIS_RAG_CONFIG_PATH'];

    if (resolved) {
      this.configPath = path.resolve(resolved);
      this.configDir = path.dirname(this.configPath);
    } else {
      this.configDir = path.join(os.homedir(), '.ndis-rag');
      this.configPath = path.join(this.configDir, 'config.json');
    }
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getDefaultDatabasePath(): string {
    return path.join(this.configDir, 'vectors.db');
  }

  exists(): boolean {
    return existsSync(this.configPath);
  }

  /**
   * Load configuration: defaults, then the config file when present, then
   * environment overrides.
   */
  async load(): Promise<AssistantConfig> {
    let fileConfig: RawConfig = {};

    if (this.exists()) {
      let content: string;
      try {
        content = await fs.readFile(this.configPath, 'utf-8');
      } catch (error) {
        throw new FileError(`Failed to read configuration: ${String(error)}`);
      }

      let data: unknown;
      try {
        data = JSON.parse(content);
      } catch {
        throw new ValidationError('Configuration file contains invalid JSON');
      }
      if (!isPlainObject(data)) {
        throw new ValidationError('Configuration file must contain a JSON object');
      }
      fileConfig = data;
    }

    return this.resolve(mergeDeep(fileConfig, configFromEnv(this.env)));
  }

  /**
   * Validate a raw configuration object and fill in defaults.
   */
  resolve(raw: RawConfig): AssistantConfig {
    const result = AssistantConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ValidationError(`Invalid configuration: ${formatZodError(result.error)}`);
    }

    const config = result.data;
    if (!config.index.databasePath) {
      config.index.databasePath = this.getDefaultDatabasePath();
    }
    return config;
  }

  createDefault(): AssistantConfig {
    return this.resolve({});
  }

  /**
   * Save configuration. The database path is only written when it differs
   * from the default location.
   */
  async save(config: AssistantConfig): Promise<void> {
    try {
      await fs.mkdir(this.configDir, { recursive: true });

      const toSave = {
        ...config,
        index: {
          ...config.index,
          databasePath: config.index.databasePath === this.getDefaultDatabasePath()
            ? undefined
            : config.index.databasePath,
        },
      };

      await fs.writeFile(this.configPath, JSON.stringify(toSave, null, 2), 'utf-8');
    } catch (error) {
      throw new FileError(`Failed to save configuration: ${String(error)}`);
    }
  }
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
