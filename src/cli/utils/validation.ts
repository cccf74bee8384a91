import { InvalidArgumentError } from 'commander';
import {
  ApiError,
  ConfigurationError,
  DimensionMismatchError,
  EmbeddingBatchError,
  IndexNotFoundError,
  IndexUploadError,
  ValidationError,
} from '../../utils/errors.js';

export function validateApiKey(apiKey: string): void {
  if (!apiKey || apiKey.trim().length === 0) {
    throw new ValidationError('OpenAI API key cannot be empty');
  }
  if (!apiKey.startsWith('sk-')) {
    throw new ValidationError('OpenAI API key should start with "sk-"');
  }
  if (apiKey.length < 20) {
    throw new ValidationError('OpenAI API key appears to be too short');
  }
}

export function validateQueryString(query: string): void {
  if (!query || query.trim().length === 0) {
    throw new ValidationError('Query cannot be empty');
  }
  if (query.trim().length > 1000) {
    throw new ValidationError('Query is too long (max: 1000 characters)');
  }
}

export function parsePositiveInt(name: string): (value: string) => number {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      throw new InvalidArgumentError(`${name} must be a positive integer`);
    }
    return parsed;
  };
}

export function validateStartUrl(url: string): void {
  if (!URL.canParse(url)) {
    throw new ValidationError(`Invalid start URL: ${url}`);
  }
  const { protocol } = new URL(url);
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ValidationError('Start URL must use http or https');
  }
}

/**
 * One-line operator message for a failed command, with a hint where the
 * fix is known.
 */
export function formatValidationError(error: unknown): string {
  if (error instanceof ValidationError) {
    return `❌ Validation Error: ${error.message}`;
  }
  if (error instanceof ConfigurationError) {
    return `❌ Configuration Error: ${error.message}`;
  }
  if (error instanceof EmbeddingBatchError) {
    return `❌ Embedding failed, index left untouched: ${error.message}`;
  }
  if (error instanceof DimensionMismatchError) {
    return `❌ ${error.message}. Rebuild the index with the current embedding model.`;
  }
  if (error instanceof IndexNotFoundError) {
    return `❌ ${error.message}. Run "ndis-rag build-index" first.`;
  }
  if (error instanceof IndexUploadError) {
    const sample = error.failedKeys.slice(0, 5).join(', ');
    return `❌ ${error.message} (e.g. ${sample})`;
  }
  if (error instanceof ApiError) {
    return `❌ API Error (${error.provider ?? 'unknown'}): ${error.message}`;
  }
  if (error instanceof Error) {
    return `❌ Error: ${error.message}`;
  }
  return `❌ Unknown error: ${String(error)}`;
}
