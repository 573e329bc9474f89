import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  CancelledError,
  InvalidInputError,
  RateLimitedError,
  RetriesExhaustedError,
  ServiceUnavailableError,
} from '../errors';
import { RetryPolicy, withTimeout } from './retry';

describe('RetryPolicy.delayFor', () => {
  const policy = new RetryPolicy({ baseDelayMs: 250, maxDelayMs: 8000, jitter: 0.2, random: () => 0.5 });

  it('doubles the delay per attempt', () => {
    expect([1, 2, 3, 4].map((attempt) => policy.delayFor(attempt))).toEqual([250, 500, 1000, 2000]);
  });

  it('caps the delay at maxDelayMs', () => {
    expect(policy.delayFor(10)).toBe(8000);
  });

  it('applies jitter within [1 - jitter, 1 + jitter]', () => {
    const low = new RetryPolicy({ baseDelayMs: 250, jitter: 0.2, random: () => 0 });
    const high = new RetryPolicy({ baseDelayMs: 250, jitter: 0.2, random: () => 1 });
    expect(low.delayFor(1)).toBe(200);
    expect(high.delayFor(1)).toBe(300);
  });

  it('waits at least the retry-after hint, bounded by maxDelayMs', () => {
    expect(policy.delayFor(1, new RateLimitedError('slow down', 2000))).toBe(2000);
    expect(policy.delayFor(1, new RateLimitedError('slow down', 60_000))).toBe(8000);
    expect(policy.delayFor(3, new RateLimitedError('slow down', 100))).toBe(1000);
  });
});

describe('RetryPolicy.execute', () => {
  it('retries RateLimited twice and succeeds on the third call', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const policy = new RetryPolicy({ sleep, random: () => 0.5, baseDelayMs: 250 });
    const operation = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValueOnce(new RateLimitedError())
      .mockRejectedValueOnce(new RateLimitedError())
      .mockResolvedValueOnce('ok');

    await expect(policy.execute(operation)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(sleep.mock.calls).toEqual([[250], [500]]);
  });

  it('does not retry a non-retryable error', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const policy = new RetryPolicy({ sleep });
    const operation = vi.fn(async () => {
      throw new InvalidInputError('bad input');
    });

    await expect(policy.execute(operation)).rejects.toMatchObject({ code: 'INVALID_INPUT' });
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('does not retry errors outside the taxonomy', async () => {
    const policy = new RetryPolicy({ sleep: async () => {} });
    const operation = vi.fn(async () => {
      throw new TypeError('boom');
    });

    await expect(policy.execute(operation)).rejects.toThrow('boom');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('throws RetriesExhausted with the last error after maxAttempts', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const policy = new RetryPolicy({ maxAttempts: 3, sleep });
    const operation = vi.fn(async () => {
      throw new ServiceUnavailableError('worker down');
    });

    const error = await policy.execute(operation).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetriesExhaustedError);
    if (error instanceof RetriesExhaustedError) {
      expect(error.attempts).toBe(3);
      expect(error.lastError.code).toBe('SERVICE_UNAVAILABLE');
      expect(error.message).toBe('Gave up after 3 attempts: worker down');
    }
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('stops retrying once the caller aborts', async () => {
    const controller = new AbortController();
    const sleep = vi.fn(async (_ms: number) => {});
    const policy = new RetryPolicy({ sleep });
    const operation = vi.fn(async () => {
      controller.abort();
      throw new ServiceUnavailableError('worker down');
    });

    await expect(policy.execute(operation, 'embed', controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('makes no attempt with an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 'ok');

    await expect(
      new RetryPolicy({ sleep: async () => {} }).execute(operation, 'embed', controller.signal)
    ).rejects.toMatchObject({ code: 'CANCELLED', retryable: false, message: 'embed was cancelled by the caller' });
    expect(operation).not.toHaveBeenCalled();
  });

  it('rejects invalid settings', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
    expect(() => new RetryPolicy({ jitter: 1.5 })).toThrow(RangeError);
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the operation result', async () => {
    await expect(withTimeout(async () => 42, 1000)).resolves.toBe(42);
  });

  it('rejects with TimeoutError and aborts the signal when the deadline passes', async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;
    const pending = withTimeout(
      (signal) => {
        seen = signal;
        return new Promise<never>(() => {});
      },
      50,
      { label: 'slow call' }
    );
    const assertion = expect(pending).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'slow call timed out after 50ms',
    });

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(seen?.aborted).toBe(true);
  });

  it('rejects with CancelledError when the parent signal is already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    const operation = vi.fn(async () => 'never');

    await expect(withTimeout(operation, 1000, { parent: parent.signal })).rejects.toMatchObject({
      code: 'CANCELLED',
      retryable: false,
      message: 'operation was cancelled by the caller',
    });
    expect(operation).not.toHaveBeenCalled();
  });

  it('rejects with CancelledError when the parent aborts mid-flight', async () => {
    const parent = new AbortController();
    const pending = withTimeout(() => new Promise<never>(() => {}), 10_000, {
      parent: parent.signal,
      label: 'embed',
    });
    parent.abort();

    await expect(pending).rejects.toMatchObject({ code: 'CANCELLED', message: 'embed was cancelled by the caller' });
  });
});
