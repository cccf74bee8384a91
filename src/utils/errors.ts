export class RagAssistantError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'RagAssistantError';
  }
}

export class ConfigurationError extends RagAssistantError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class ApiError extends RagAssistantError {
  constructor(message: string, public provider?: string, public retryable: boolean = true) {
    super(message, 'API_ERROR');
    this.name = 'ApiError';
  }
}

export class ValidationError extends RagAssistantError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class FileError extends RagAssistantError {
  constructor(message: string) {
    super(message, 'FILE_ERROR');
    this.name = 'FileError';
  }
}

export class TimeoutError extends RagAssistantError {
  constructor(public timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

/**
 * A batch that still failed after its last attempt. The whole build run is
 * aborted; `range` is the [start, end) slice of the embeddable records.
 */
export class EmbeddingBatchError extends RagAssistantError {
  constructor(
    message: string,
    public batchNumber: number,
    public range: [number, number],
    public cause?: unknown
  ) {
    super(message, 'EMBEDDING_BATCH_ERROR');
    this.name = 'EmbeddingBatchError';
  }
}

export class DimensionMismatchError extends RagAssistantError {
  constructor(public expected: number, public actual: number, context: string) {
    super(`Vector dimension mismatch (${context}): expected ${expected}, got ${actual}`, 'DIMENSION_MISMATCH');
    this.name = 'DimensionMismatchError';
  }
}

export class StoreError extends RagAssistantError {
  constructor(message: string) {
    super(message, 'STORE_ERROR');
    this.name = 'StoreError';
  }
}

export class IndexNotFoundError extends StoreError {
  constructor(public indexName: string) {
    super(`Index not found: ${indexName}`);
    this.code = 'INDEX_NOT_FOUND';
    this.name = 'IndexNotFoundError';
  }
}

export class IndexUploadError extends StoreError {
  constructor(message: string, public failedKeys: string[]) {
    super(message);
    this.code = 'INDEX_UPLOAD_ERROR';
    this.name = 'IndexUploadError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
