/**
 * Error taxonomy for the RAG pipeline.
 *
 * Extraction:   UNSUPPORTED_FORMAT, CORRUPT_DOCUMENT      (terminal)
 * Transient:    RATE_LIMITED, SERVICE_UNAVAILABLE, TIMEOUT (retried by RetryPolicy)
 * Caller error: INVALID_INPUT, DIMENSION_MISMATCH         (terminal)
 * Caller abort: CANCELLED                                  (terminal)
 *
 * RETRIES_EXHAUSTED and EMBEDDING_BATCH_FAILED wrap one of the above.
 */

export type RagErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'CORRUPT_DOCUMENT'
  | 'RATE_LIMITED'
  | 'SERVICE_UNAVAILABLE'
  | 'TIMEOUT'
  | 'INVALID_INPUT'
  | 'DIMENSION_MISMATCH'
  | 'CANCELLED'
  | 'RETRIES_EXHAUSTED'
  | 'EMBEDDING_BATCH_FAILED';

export class RagError extends Error {
  readonly code: RagErrorCode;
  readonly retryable: boolean;
  readonly details: Record<string, unknown>;

  constructor(
    code: RagErrorCode,
    message: string,
    options: { retryable?: boolean; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.details = options.details ?? {};
  }

  toJSON(): { code: RagErrorCode; message: string; retryable: boolean; details: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

export class UnsupportedFormatError extends RagError {
  constructor(format: string) {
    super('UNSUPPORTED_FORMAT', `Unsupported document format: ${format}`, {
      details: { format },
    });
  }
}

export class CorruptDocumentError extends RagError {
  constructor(format: string, reason: string, cause?: unknown) {
    super('CORRUPT_DOCUMENT', `Corrupt ${format} document: ${reason}`, {
      details: { format, reason },
      cause,
    });
  }
}

export class RateLimitedError extends RagError {
  readonly retryAfterMs?: number;

  constructor(message = 'Rate limited by upstream service', retryAfterMs?: number, cause?: unknown) {
    super('RATE_LIMITED', message, {
      retryable: true,
      details: retryAfterMs === undefined ? {} : { retryAfterMs },
      cause,
    });
    this.retryAfterMs = retryAfterMs;
  }
}

export class ServiceUnavailableError extends RagError {
  constructor(message = 'Upstream service unavailable', cause?: unknown) {
    super('SERVICE_UNAVAILABLE', message, { retryable: true, cause });
  }
}

export class TimeoutError extends RagError {
  constructor(timeoutMs: number, operation = 'operation') {
    super('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`, {
      retryable: true,
      details: { timeoutMs, operation },
    });
  }
}

export class InvalidInputError extends RagError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('INVALID_INPUT', message, { details });
  }
}

/**
 * The caller's AbortSignal fired. Never retried.
 */
export class CancelledError extends RagError {
  constructor(operation = 'operation') {
    super('CANCELLED', `${operation} was cancelled by the caller`, {
      details: { operation },
    });
  }
}

export class DimensionMismatchError extends RagError {
  constructor(expected: number, actual: number) {
    super('DIMENSION_MISMATCH', `Expected vector dimension ${expected}, got ${actual}`, {
      details: { expected, actual },
    });
  }
}

export class RetriesExhaustedError extends RagError {
  readonly attempts: number;
  readonly lastError: RagError;

  constructor(lastError: RagError, attempts: number) {
    super('RETRIES_EXHAUSTED', `Gave up after ${attempts} attempts: ${lastError.message}`, {
      details: { attempts, lastCode: lastError.code },
      cause: lastError,
    });
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Raised when one embedding sub-batch fails. `positions` lists the input
 * indexes of that sub-batch; with a cache they need not be contiguous, so
 * `startIndex`/`endIndex` only bound them.
 */
export class EmbeddingBatchError extends RagError {
  readonly subBatchIndex: number;
  readonly positions: readonly number[];
  readonly startIndex: number;
  readonly endIndex: number;
  readonly reason: RagError;

  constructor(reason: RagError, subBatchIndex: number, positions: readonly number[]) {
    const startIndex = positions.length > 0 ? Math.min(...positions) : 0;
    const endIndex = positions.length > 0 ? Math.max(...positions) + 1 : 0;
    super(
      'EMBEDDING_BATCH_FAILED',
      `Embedding sub-batch ${subBatchIndex} (inputs ${startIndex}-${endIndex - 1}) failed: ${reason.message}`,
      {
        details: { subBatchIndex, positions: [...positions], startIndex, endIndex, reasonCode: rootCause(reason).code },
        cause: reason,
      }
    );
    this.subBatchIndex = subBatchIndex;
    this.positions = [...positions];
    this.startIndex = startIndex;
    this.endIndex = endIndex;
    this.reason = reason;
  }
}

/**
 * Unwrap RETRIES_EXHAUSTED / EMBEDDING_BATCH_FAILED down to the error that
 * actually classified the failure.
 */
export function rootCause(error: RagError): RagError {
  if (error instanceof RetriesExhaustedError) {
    return rootCause(error.lastError);
  }
  if (error instanceof EmbeddingBatchError) {
    return rootCause(error.reason);
  }
  return error;
}

const STATUS_BY_CODE: Record<Exclude<RagErrorCode, 'RETRIES_EXHAUSTED' | 'EMBEDDING_BATCH_FAILED'>, number> = {
  UNSUPPORTED_FORMAT: 415,
  CORRUPT_DOCUMENT: 422,
  RATE_LIMITED: 429,
  SERVICE_UNAVAILABLE: 503,
  TIMEOUT: 504,
  INVALID_INPUT: 400,
  DIMENSION_MISMATCH: 400,
  // Client closed request
  CANCELLED: 499,
};

/**
 * HTTP status for a pipeline error. Wrapping errors take the status of
 * their root cause.
 */
export function httpStatusFor(error: RagError): number {
  const root = rootCause(error);
  if (root.code === 'RETRIES_EXHAUSTED' || root.code === 'EMBEDDING_BATCH_FAILED') {
    return 500;
  }
  return STATUS_BY_CODE[root.code];
}
