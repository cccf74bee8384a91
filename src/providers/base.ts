import { ApiError, ValidationError } from '../utils/errors.js';

const MAX_TEXT_LENGTH = 100000;
const MAX_BATCH_SIZE = 2048;

export abstract class BaseAIProvider {
  abstract name: string;

  /**
   * Wrap a client error. Authentication and malformed requests will not
   * succeed on a second try, so they are flagged non-retryable.
   */
  protected toApiError(action: string, error: unknown, status?: number): ApiError {
    const message = error instanceof Error ? error.message : String(error);
    const retryable = this.isRateLimitError(error, status) ||
      !(this.isAuthError(error, status) || this.isBadRequest(status));
    return new ApiError(`Failed to ${action}: ${message}`, this.name, retryable);
  }

  protected isAuthError(error: unknown, status?: number): boolean {
    if (status === 401 || status === 403) {
      return true;
    }
    const errorMessage = String(error).toLowerCase();
    return errorMessage.includes('unauthorized') ||
           errorMessage.includes('invalid api key') ||
           errorMessage.includes('authentication');
  }

  protected isBadRequest(status?: number): boolean {
    return status === 400 || status === 404 || status === 422;
  }

  protected isRateLimitError(error: unknown, status?: number): boolean {
    if (status === 429) {
      return true;
    }
    const errorMessage = String(error).toLowerCase();
    return errorMessage.includes('rate limit') ||
           errorMessage.includes('too many requests');
  }

  protected validateText(text: string): void {
    if (!text || text.trim().length === 0) {
      throw new ValidationError('Text cannot be empty');
    }

    if (text.length > MAX_TEXT_LENGTH) {
      throw new ValidationError('Text is too long for processing');
    }
  }

  protected validateBatchTexts(texts: string[]): void {
    if (texts.length === 0) {
      throw new ValidationError('Texts array cannot be empty');
    }

    if (texts.length > MAX_BATCH_SIZE) {
      throw new ValidationError(`Too many texts in batch request (max: ${MAX_BATCH_SIZE})`);
    }

    texts.forEach((text, index) => {
      try {
        this.validateText(text);
      } catch (error) {
        throw new ValidationError(`Invalid text at index ${index}: ${error instanceof Error ? error.message : String(error)}`);
      }
    });
  }
}
