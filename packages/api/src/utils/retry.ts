import { RETRY_CONFIG } from '@eduflow/shared';
import { CancelledError, RagError, RateLimitedError, RetriesExhaustedError, TimeoutError } from '../errors';
import type { Logger } from './logger';

/**
 * Retry policy with bounded exponential backoff.
 *
 * delay(attempt) = min(maxDelay, baseDelay * 2^(attempt - 1)), scaled by a
 * random factor in [1 - jitter, 1 + jitter]. A RateLimited error carrying a
 * retry-after hint waits at least that long.
 *
 * Only RagErrors flagged `retryable` are retried; anything else propagates on
 * the first failure. Once the caller's signal aborts no further attempt is
 * made. Sleep and randomness are injectable so tests run without
 * real delays.
 */

export type Sleep = (ms: number) => Promise<void>;

export interface RetryPolicyOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
  sleep?: Sleep;
  random?: () => number;
  logger?: Logger;
}

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: number;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly logger?: Logger;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? RETRY_CONFIG.MAX_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? RETRY_CONFIG.BASE_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? RETRY_CONFIG.MAX_DELAY_MS;
    this.jitter = options.jitter ?? RETRY_CONFIG.JITTER;
    this.sleep = options.sleep ?? realSleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be a positive integer');
    }
    if (this.jitter < 0 || this.jitter > 1) {
      throw new RangeError('jitter must be between 0 and 1');
    }
  }

  /**
   * Backoff before the attempt following `attempt` (1-based).
   */
  delayFor(attempt: number, error?: RagError): number {
    const exponential = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** (attempt - 1));
    const factor = 1 - this.jitter + this.random() * 2 * this.jitter;
    const delay = Math.round(exponential * factor);

    if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
      return Math.max(delay, Math.min(error.retryAfterMs, this.maxDelayMs));
    }
    return delay;
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    label = 'operation',
    signal?: AbortSignal
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new CancelledError(label);
      }
      try {
        return await operation(attempt);
      } catch (error) {
        if (!(error instanceof RagError) || !error.retryable) {
          throw error;
        }
        if (attempt >= this.maxAttempts) {
          this.logger?.error({ label, attempt, code: error.code }, 'Retries exhausted');
          throw new RetriesExhaustedError(error, attempt);
        }

        if (signal?.aborted) {
          throw new CancelledError(label);
        }
        const delay = this.delayFor(attempt, error);
        this.logger?.warn({ label, attempt, delay, code: error.code }, 'Transient failure, retrying');
        await this.sleep(delay);
      }
    }
  }
}

/**
 * Run `operation` with an AbortSignal that fires after `timeoutMs` or when
 * `parent` aborts. Expiry rejects with TimeoutError and a parent abort with
 * CancelledError, even if the operation ignores the signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: { parent?: AbortSignal; label?: string } = {}
): Promise<T> {
  const controller = new AbortController();
  const { parent, label = 'operation' } = options;

  if (parent?.aborted) {
    throw new CancelledError(label);
  }

  let timer: NodeJS.Timeout | undefined;
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs, label));
    }, timeoutMs);
  });
  const cancelled = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => reject(parent?.aborted ? new CancelledError(label) : new TimeoutError(timeoutMs, label)),
      { once: true }
    );
  });

  try {
    return await Promise.race([operation(controller.signal), expiry, cancelled]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
