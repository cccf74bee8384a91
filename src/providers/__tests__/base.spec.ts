import { BaseAIProvider } from '../base.js';
import { ApiError, ValidationError } from '../../utils/errors.js';

class TestProvider extends BaseAIProvider {
  name = 'test';

  wrap(error: unknown, status?: number): ApiError {
    return this.toApiError('call test', error, status);
  }

  checkBatch(texts: string[]): void {
    this.validateBatchTexts(texts);
  }
}

describe('BaseAIProvider', () => {
  const provider = new TestProvider();

  it('marks auth and bad-request failures as not retryable', () => {
    expect(provider.wrap(new Error('denied'), 401).retryable).toBe(false);
    expect(provider.wrap(new Error('Invalid API key provided')).retryable).toBe(false);
    expect(provider.wrap(new Error('bad input'), 400).retryable).toBe(false);
  });

  it('marks rate limits and server errors as retryable', () => {
    expect(provider.wrap(new Error('slow down'), 429).retryable).toBe(true);
    expect(provider.wrap(new Error('boom'), 503).retryable).toBe(true);
    expect(provider.wrap(new Error('ECONNRESET')).retryable).toBe(true);
  });

  it('prefixes the action and provider', () => {
    const error = provider.wrap(new Error('boom'), 500);
    expect(error.message).toBe('Failed to call test: boom');
    expect(error.provider).toBe('test');
  });

  it('validates batch input', () => {
    expect(() => provider.checkBatch([])).toThrow(ValidationError);
    expect(() => provider.checkBatch(['ok', ' '])).toThrow('Invalid text at index 1: Text cannot be empty');
  });
});
