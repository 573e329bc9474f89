import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError, APIUserAbortError, RateLimitError } from 'openai';
import { z } from 'zod';
import {
  InvalidInputError,
  RagError,
  RateLimitedError,
  ServiceUnavailableError,
  TimeoutError,
} from '../errors';

/**
 * Embedding providers.
 *
 * An EmbeddingProvider makes exactly one upstream call per `embedBatch` and
 * classifies failures into the pipeline's error taxonomy. Batching, retries
 * and timeouts live in the EmbedderGateway, so providers never retry on
 * their own.
 *
 * Implementations:
 * - OpenAIEmbeddingProvider: OpenAI embeddings API
 * - HttpEmbeddingProvider: self-hosted embedding worker (POST /embed)
 */

export interface EmbeddingProvider {
  readonly modelId: string;
  readonly dimension: number;
  embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]>;
}

function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

/**
 * Map an HTTP status from an embedding service onto the taxonomy.
 */
export function errorForStatus(status: number, message: string, retryAfter?: string | null): RagError {
  if (status === 429) {
    return new RateLimitedError(message, parseRetryAfter(retryAfter));
  }
  if (status === 408 || status >= 500) {
    return new ServiceUnavailableError(message);
  }
  return new InvalidInputError(message, { status });
}

export interface OpenAIEmbeddingOptions {
  model: string;
  dimension: number;
  /** Request a reduced dimension from models that support it. */
  requestDimensions?: boolean;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly modelId: string;
  readonly dimension: number;
  private readonly requestDimensions: boolean;

  constructor(private readonly client: OpenAI, options: OpenAIEmbeddingOptions) {
    this.modelId = options.model;
    this.dimension = options.dimension;
    this.requestDimensions = options.requestDimensions ?? false;
  }

  async embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]> {
    try {
      const response = await this.client.embeddings.create(
        {
          model: this.modelId,
          input: texts,
          ...(this.requestDimensions && { dimensions: this.dimension }),
        },
        { signal, maxRetries: 0 }
      );

      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);
    } catch (error) {
      throw toRagError(error);
    }
  }
}

function toRagError(error: unknown): RagError {
  if (error instanceof RagError) {
    return error;
  }
  if (error instanceof RateLimitError) {
    return new RateLimitedError(error.message, parseRetryAfter(error.headers?.['retry-after']), error);
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new TimeoutError(0, 'embedding request');
  }
  if (error instanceof APIUserAbortError || error instanceof APIConnectionError) {
    return new ServiceUnavailableError(error.message, error);
  }
  if (error instanceof APIError && error.status !== undefined) {
    return errorForStatus(error.status, error.message);
  }
  return new ServiceUnavailableError(error instanceof Error ? error.message : 'Embedding request failed', error);
}

const WorkerResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

/**
 * Embedding worker over HTTP.
 *
 * Request:  POST {baseUrl}/embed  { texts: string[], model: string }
 * Response: { embeddings: number[][] }  (same order as texts)
 */
export class HttpEmbeddingProvider implements EmbeddingProvider {
  readonly modelId: string;
  readonly dimension: number;
  private readonly url: string;
  private readonly headers: Record<string, string>;

  constructor(
    baseUrl: string,
    options: { model: string; dimension: number; headers?: Record<string, string> },
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.url = `${baseUrl.replace(/\/+$/, '')}/embed`;
    this.modelId = options.model;
    this.dimension = options.dimension;
    this.headers = options.headers ?? {};
  }

  async embedBatch(texts: string[], signal: AbortSignal): Promise<number[][]> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...this.headers },
        body: JSON.stringify({ texts, model: this.modelId }),
        signal,
      });
    } catch (error) {
      throw new ServiceUnavailableError(
        `Embedding worker unreachable: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }

    if (!response.ok) {
      throw errorForStatus(
        response.status,
        `Embedding worker returned ${response.status}`,
        response.headers.get('retry-after')
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ServiceUnavailableError('Embedding worker returned a malformed response', error);
    }

    const parsed = WorkerResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ServiceUnavailableError('Embedding worker returned a malformed response', parsed.error);
    }
    return parsed.data.embeddings;
  }
}
