import { describe, it, expect, jest, beforeEach, afterEach, afterAll } from '@jest/globals';
import { executeWithRetry, isRetryable, RetryOptions } from '../RetryStrategy.js';
import { configureLogger } from '../logger.js';
import { LogLevel } from '../../config/debug.js';

describe('executeWithRetry', () => {
  const errorSpy = jest.spyOn(console, 'error');

  beforeEach(() => {
    jest.useFakeTimers();
    configureLogger({
      enabled: false,
      logTokenizer: false,
      logParser: false,
      logValidation: false,
      logDerivation: false,
      logExecutor: false,
      logLevel: LogLevel.WARN,
      logFormat: 'json',
    });
    errorSpy.mockReset();
    errorSpy.mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  afterAll(() => {
    errorSpy.mockRestore();
  });

  it('should succeed on first attempt', async () => {
    const mockFn = jest.fn<() => Promise<string>>().mockResolvedValue('success');

    const result = await executeWithRetry(mockFn);

    expect(result).toBe('success');
    expect(mockFn).toHaveBeenCalledTimes(1);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should retry on retryable errors and eventually succeed', async () => {
    const mockFn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('Connection timeout'))
      .mockRejectedValueOnce(new Error('503 Service Unavailable'))
      .mockResolvedValue('success');

    const promise = executeWithRetry(mockFn, { initialDelayMs: 100 });

    // Advance timers to trigger retries
    await jest.advanceTimersByTimeAsync(100);
    await jest.advanceTimersByTimeAsync(200);

    expect(await promise).toBe('success');
    expect(mockFn).toHaveBeenCalledTimes(3);
  });

  it('should log a warning with the label for each retry', async () => {
    const mockFn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValue('success');

    const promise = executeWithRetry(mockFn, { initialDelayMs: 10, label: 'derivation step 1' });
    await jest.advanceTimersByTimeAsync(10);
    await promise;

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const [line] = errorSpy.mock.calls[0];
    expect(JSON.parse(String(line))).toMatchObject({
      level: 'warn',
      message: 'derivation step 1 failed, retrying',
      attempt: 1,
      delayMs: 10,
      error: { name: 'Error', message: 'ECONNRESET' },
    });
  });

  it('should not retry on non-retryable errors', async () => {
    const mockFn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValue(new Error('Invalid credentials'));

    await expect(executeWithRetry(mockFn)).rejects.toThrow('Invalid credentials');
    expect(mockFn).toHaveBeenCalledTimes(1);
  });

  it('should throw after max retries exceeded', async () => {
    const mockFn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValue(new Error('Connection timeout'));

    const options: RetryOptions = {
      maxRetries: 2,
      initialDelayMs: 100,
    };

    const promise = executeWithRetry(mockFn, options);

    // Use Promise.race to handle timer advances without triggering unhandled rejections
    const resultPromise = Promise.race([
      promise.catch((err) => ({ error: err })),
      (async () => {
        await jest.advanceTimersByTimeAsync(100); // First retry
        await jest.advanceTimersByTimeAsync(200); // Second retry
        await jest.runOnlyPendingTimersAsync();
      })(),
    ]);

    await resultPromise;

    await expect(promise).rejects.toThrow('Connection timeout');
    expect(mockFn).toHaveBeenCalledTimes(3); // Initial + 2 retries
  });

  it('should respect maxDelayMs cap', async () => {
    const mockFn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValue('success');

    const promise = executeWithRetry(mockFn, {
      initialDelayMs: 1000,
      backoffMultiplier: 3,
      maxDelayMs: 2000,
    });

    await jest.advanceTimersByTimeAsync(1000);
    expect(mockFn).toHaveBeenCalledTimes(2);

    // Second retry is capped at 2000ms, not 3000ms
    await jest.advanceTimersByTimeAsync(2000);

    expect(await promise).toBe('success');
    expect(mockFn).toHaveBeenCalledTimes(3);
  });

  it('should handle non-Error objects', async () => {
    const mockFn = jest.fn<() => Promise<string>>().mockRejectedValue('string error');

    await expect(executeWithRetry(mockFn)).rejects.toThrow('string error');
    expect(mockFn).toHaveBeenCalledTimes(1);
  });

  it('should respect maxRetries: 0 (no retries, only initial attempt)', async () => {
    const mockFn = jest.fn<() => Promise<string>>().mockRejectedValue(new Error('timeout'));

    await expect(executeWithRetry(mockFn, { maxRetries: 0 })).rejects.toThrow('timeout');
    expect(mockFn).toHaveBeenCalledTimes(1);
  });
});

describe('isRetryable', () => {
  it.each(['ETIMEDOUT', 'socket hang up', 'HTTP 429', 'Rate limit exceeded', '502 Bad Gateway'])(
    'should treat "%s" as transient',
    (message) => {
      expect(isRetryable(new Error(message))).toBe(true);
    }
  );

  it('should not retry criteria or non-Error failures', () => {
    expect(isRetryable(new Error("Unknown field 'cntn_x' at position 0"))).toBe(false);
    expect(isRetryable('timeout')).toBe(false);
  });
});
