import { ClassifiedError } from '../../errors';
import { computeBackoff, DEFAULT_RETRY_CONFIG, QUICK_RETRY_CONFIG, withRetry } from '../index';

const fastConfig = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5, multiplier: 2 };

function retryable(message: string, retryAfterMs = 1): ClassifiedError {
  return new ClassifiedError({ kind: 'network', message, retryable: true, retryAfterMs });
}

describe('computeBackoff', () => {
  it('grows exponentially up to the cap', () => {
    expect(computeBackoff(DEFAULT_RETRY_CONFIG, 1)).toBe(1_000);
    expect(computeBackoff(DEFAULT_RETRY_CONFIG, 2)).toBe(2_000);
    expect(computeBackoff(DEFAULT_RETRY_CONFIG, 3)).toBe(4_000);
    expect(computeBackoff(DEFAULT_RETRY_CONFIG, 10)).toBe(30_000);
    expect(computeBackoff(QUICK_RETRY_CONFIG, 5)).toBe(5_000);
  });
});

describe('withRetry', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('returns the first successful result', async () => {
    const fn = jest.fn().mockRejectedValueOnce(retryable('blip')).mockResolvedValueOnce('ok');

    await expect(withRetry('list_tables', fn, fastConfig)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry non-retryable classified errors', async () => {
    const error = new ClassifiedError({ kind: 'not_found', message: 'gone', retryable: false });
    const fn = jest.fn().mockRejectedValue(error);

    await expect(withRetry('get_schema', fn, { ...fastConfig, maxAttempts: 5 })).rejects.toBe(
      error
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('annotates classified errors once attempts are exhausted', async () => {
    const fn = jest.fn().mockRejectedValue(retryable('still down'));

    const error = await withRetry('get_metadata', fn, fastConfig).catch((e: unknown) => e);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(ClassifiedError);
    expect(error instanceof Error && error.message).toBe(
      'still down (failed after 3 attempts)'
    );
  });

  it('reports retries through onRetry', async () => {
    const first = retryable('first');
    const second = retryable('second');
    const fn = jest
      .fn()
      .mockRejectedValueOnce(first)
      .mockRejectedValueOnce(second)
      .mockResolvedValueOnce(42);
    const onRetry = jest.fn();

    await expect(withRetry('list_tables', fn, fastConfig, { onRetry })).resolves.toBe(42);
    expect(onRetry.mock.calls).toEqual([
      [2, first],
      [3, second],
    ]);
  });

  it('waits with exponential backoff for unclassified errors', async () => {
    jest.useFakeTimers();
    const boom = new Error('boom');
    const fn = jest.fn().mockRejectedValue(boom);

    const result = withRetry('list_tables', fn, DEFAULT_RETRY_CONFIG).catch((e: unknown) => e);

    await jest.advanceTimersByTimeAsync(999);
    expect(fn).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1);
    await jest.advanceTimersByTimeAsync(1_999);
    expect(fn).toHaveBeenCalledTimes(2);

    await jest.advanceTimersByTimeAsync(1);
    const error = await result;

    expect(fn).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(Error);
    expect(error instanceof Error && error.message).toBe(
      'list_tables failed after 3 attempts: boom'
    );
    expect(error instanceof Error && error.cause).toBe(boom);
  });

  it('stops waiting as soon as the signal is aborted', async () => {
    const controller = new AbortController();
    const fn = jest.fn().mockRejectedValue(retryable('quota', 60_000));
    const started = Date.now();

    setTimeout(() => controller.abort(new Error('cancelled')), 20);

    await expect(
      withRetry('list_tables', fn, DEFAULT_RETRY_CONFIG, { signal: controller.signal })
    ).rejects.toThrow('cancelled');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('does not retry once the signal has been aborted', async () => {
    const controller = new AbortController();
    const fn = jest.fn().mockImplementation(async () => {
      controller.abort(new Error('stopped'));
      throw retryable('failure');
    });

    await expect(
      withRetry('get_schema', fn, fastConfig, { signal: controller.signal })
    ).rejects.toThrow('stopped');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
