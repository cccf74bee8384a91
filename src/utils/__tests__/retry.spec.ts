import { ApiError, DimensionMismatchError, TimeoutError, ValidationError } from '../errors.js';
import { RetryPolicy, backoffDelay, isRetryableError, withRetry, withTimeout } from '../retry.js';

const fastPolicy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, timeoutMs: 0 };

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const operation = jest.fn()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');
    const onRetry = jest.fn();

    await expect(withRetry(operation, fastPolicy, { onRetry })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[1]).toBe(1);
  });

  it('rethrows the last error after the final attempt', async () => {
    const errors = [new Error('one'), new Error('two'), new Error('three')];
    let call = 0;
    const operation = () => Promise.reject(errors[call++]);

    await expect(withRetry(operation, fastPolicy)).rejects.toBe(errors[2]);
    expect(call).toBe(3);
  });

  it('does not retry non-retryable errors', async () => {
    const operation = jest.fn().mockRejectedValue(new ApiError('unauthorized', 'openai', false));

    await expect(withRetry(operation, fastPolicy)).rejects.toThrow('unauthorized');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('treats timeouts as retryable', async () => {
    const policy: RetryPolicy = { ...fastPolicy, maxAttempts: 2, timeoutMs: 5 };
    const operation = jest.fn()
      .mockImplementationOnce(() => new Promise(resolve => setTimeout(() => resolve('late'), 50)))
      .mockResolvedValueOnce('fast');

    await expect(withRetry(operation, policy)).resolves.toBe('fast');
  });
});

describe('isRetryableError', () => {
  it('classifies errors', () => {
    expect(isRetryableError(new Error('network'))).toBe(true);
    expect(isRetryableError(new TimeoutError(10))).toBe(true);
    expect(isRetryableError(new ApiError('rate limit', 'openai', true))).toBe(true);
    expect(isRetryableError(new ValidationError('bad'))).toBe(false);
    expect(isRetryableError(new DimensionMismatchError(3, 2, 'test'))).toBe(false);
  });
});

describe('backoffDelay', () => {
  const policy: RetryPolicy = { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 300, timeoutMs: 0 };

  it('doubles the ceiling per attempt up to the maximum', () => {
    const top = () => 0.999999;
    expect(backoffDelay(policy, 1, top)).toBe(99);
    expect(backoffDelay(policy, 2, top)).toBe(199);
    expect(backoffDelay(policy, 3, top)).toBe(299);
    expect(backoffDelay(policy, 4, top)).toBe(299);
  });

  it('can be zero', () => {
    expect(backoffDelay(policy, 2, () => 0)).toBe(0);
  });
});

describe('withTimeout', () => {
  it('rejects with TimeoutError when the operation is too slow', async () => {
    const slow = () => new Promise<string>(resolve => setTimeout(() => resolve('late'), 50));
    await expect(withTimeout(slow, 5)).rejects.toBeInstanceOf(TimeoutError);
  });

  it('aborts the signal of an operation that timed out', async () => {
    let received: AbortSignal | undefined;
    const hanging = (signal: AbortSignal) => {
      received = signal;
      return new Promise<string>((_, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    };

    await expect(withTimeout(hanging, 5)).rejects.toBeInstanceOf(TimeoutError);
    expect(received?.aborted).toBe(true);
    expect(received?.reason).toBeInstanceOf(TimeoutError);
  });

  it('leaves the signal alone when the operation finishes in time', async () => {
    let received: AbortSignal | undefined;
    await withTimeout(signal => {
      received = signal;
      return Promise.resolve('done');
    }, 50);

    expect(received?.aborted).toBe(false);
  });

  it('passes through when disabled', async () => {
    await expect(withTimeout(() => Promise.resolve(7), 0)).resolves.toBe(7);
  });
});
