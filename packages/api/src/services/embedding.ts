import { EMBEDDING_CONFIG } from '@eduflow/shared';
import type { Chunk, EmbeddingVector } from '@eduflow/shared';
import {
  DimensionMismatchError,
  EmbeddingBatchError,
  InvalidInputError,
  RagError,
  ServiceUnavailableError,
} from '../errors';
import type { EmbeddingProvider } from '../utils/embeddings';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { RetryPolicy, withTimeout } from '../utils/retry';

/**
 * Embedder Gateway
 *
 * Flow:
 * 1. Reject empty inputs up front (non-retryable, names the index)
 * 2. Serve what it can from the embedding cache
 * 3. Split the misses into sub-batches of at most `maxBatchSize`, each tagged
 *    with the input positions it covers
 * 4. Dispatch sub-batches with at most `maxConcurrency` in flight; each call
 *    runs under the timeout and the retry policy
 * 5. Scatter vectors back to their input positions
 *
 * All or nothing: if any sub-batch fails, the call rejects with an
 * EmbeddingBatchError naming that sub-batch and its input range, and no
 * vectors are returned or cached.
 */

export interface EmbeddingCache {
  getMany(modelId: string, texts: readonly string[]): Promise<Array<number[] | null>>;
  setMany(modelId: string, entries: ReadonlyArray<{ text: string; vector: number[] }>): Promise<void>;
}

export interface EmbedderGatewayOptions {
  maxBatchSize?: number;
  maxConcurrency?: number;
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  cache?: EmbeddingCache;
  logger?: Logger;
}

export interface EmbedOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

interface SubBatch {
  index: number;
  positions: number[];
  texts: string[];
}

export class EmbedderGateway {
  private readonly maxBatchSize: number;
  private readonly maxConcurrency: number;
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly cache?: EmbeddingCache;
  private readonly logger: Logger;

  constructor(private readonly provider: EmbeddingProvider, options: EmbedderGatewayOptions = {}) {
    this.maxBatchSize = options.maxBatchSize ?? EMBEDDING_CONFIG.MAX_BATCH_SIZE;
    this.maxConcurrency = options.maxConcurrency ?? EMBEDDING_CONFIG.MAX_CONCURRENCY;
    this.timeoutMs = options.timeoutMs ?? EMBEDDING_CONFIG.TIMEOUT_MS;
    this.logger = (options.logger ?? rootLogger).child({ component: 'embedder', model: provider.modelId });
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy({ logger: this.logger });
    this.cache = options.cache;

    if (!Number.isInteger(this.maxBatchSize) || this.maxBatchSize < 1) {
      throw new RangeError('maxBatchSize must be a positive integer');
    }
    if (!Number.isInteger(this.maxConcurrency) || this.maxConcurrency < 1) {
      throw new RangeError('maxConcurrency must be a positive integer');
    }
  }

  get modelId(): string {
    return this.provider.modelId;
  }

  get dimension(): number {
    return this.provider.dimension;
  }

  /**
   * Embed texts; output[i] is the vector for texts[i].
   */
  async embed(texts: readonly string[], options: EmbedOptions = {}): Promise<number[][]> {
    texts.forEach((text, index) => {
      if (text.trim().length === 0) {
        throw new InvalidInputError(`Input ${index} is empty`, { index });
      }
    });
    if (texts.length === 0) {
      return [];
    }

    const startTime = Date.now();
    const vectors: Array<number[] | undefined> = await this.lookupCache(texts);
    const missing = vectors.flatMap((vector, position) => (vector === undefined ? [position] : []));
    const batches = this.plan(texts, missing);

    await this.dispatch(batches, vectors, options);
    await this.storeCache(texts, missing, vectors);

    const result = vectors.map((vector, position) => {
      if (vector === undefined) {
        throw new ServiceUnavailableError(`No embedding produced for input ${position}`);
      }
      return vector;
    });

    this.logger.info(
      {
        latency: Date.now() - startTime,
        inputCount: texts.length,
        cacheHits: texts.length - missing.length,
        batchCount: batches.length,
      },
      'Embedding completed'
    );
    return result;
  }

  async embedQuery(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const [vector] = await this.embed([text], options);
    return vector;
  }

  async embedChunks(chunks: readonly Chunk[], options: EmbedOptions = {}): Promise<EmbeddingVector[]> {
    const vectors = await this.embed(
      chunks.map((chunk) => chunk.text),
      options
    );
    return chunks.map((chunk, i) => ({
      chunkId: chunk.id,
      vector: vectors[i],
      modelId: this.modelId,
    }));
  }

  private plan(texts: readonly string[], positions: readonly number[]): SubBatch[] {
    const batches: SubBatch[] = [];
    for (let i = 0; i < positions.length; i += this.maxBatchSize) {
      const slice = positions.slice(i, i + this.maxBatchSize);
      batches.push({
        index: batches.length,
        positions: slice,
        texts: slice.map((position) => texts[position]),
      });
    }
    return batches;
  }

  private async dispatch(
    batches: readonly SubBatch[],
    vectors: Array<number[] | undefined>,
    options: EmbedOptions
  ): Promise<void> {
    const failures: EmbeddingBatchError[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (failures.length === 0 && next < batches.length) {
        const batch = batches[next++];
        try {
          const embedded = await this.embedSubBatch(batch, options);
          batch.positions.forEach((position, i) => {
            vectors[position] = embedded[i];
          });
        } catch (error) {
          failures.push(this.toBatchError(error, batch));
        }
      }
    };

    const workerCount = Math.min(this.maxConcurrency, batches.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (failures.length > 0) {
      const first = failures.reduce((a, b) => (b.subBatchIndex < a.subBatchIndex ? b : a));
      this.logger.error(
        { subBatchIndex: first.subBatchIndex, startIndex: first.startIndex, endIndex: first.endIndex, code: first.reason.code },
        'Embedding sub-batch failed'
      );
      throw first;
    }
  }

  private embedSubBatch(batch: SubBatch, options: EmbedOptions): Promise<number[][]> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    return this.retryPolicy.execute(async () => {
      const embedded = await withTimeout(
        (signal) => this.provider.embedBatch(batch.texts, signal),
        timeoutMs,
        { parent: options.signal, label: `embedding sub-batch ${batch.index}` }
      );
      this.validate(embedded, batch.texts.length);
      return embedded;
    }, `embedding sub-batch ${batch.index}`, options.signal);
  }

  private validate(embedded: number[][], expectedCount: number): void {
    if (embedded.length !== expectedCount) {
      throw new ServiceUnavailableError(
        `Embedding service returned ${embedded.length} vectors for ${expectedCount} inputs`
      );
    }
    for (const vector of embedded) {
      if (vector.length !== this.provider.dimension) {
        throw new DimensionMismatchError(this.provider.dimension, vector.length);
      }
    }
  }

  private toBatchError(error: unknown, batch: SubBatch): EmbeddingBatchError {
    const reason =
      error instanceof RagError
        ? error
        : new ServiceUnavailableError(error instanceof Error ? error.message : String(error), error);
    return new EmbeddingBatchError(reason, batch.index, batch.positions);
  }

  private async lookupCache(texts: readonly string[]): Promise<Array<number[] | undefined>> {
    const empty = texts.map((): number[] | undefined => undefined);
    if (!this.cache) {
      return empty;
    }

    try {
      const cached = await this.cache.getMany(this.modelId, texts);
      return texts.map((_, i) => {
        const vector = cached[i];
        return vector && vector.length === this.dimension ? vector : undefined;
      });
    } catch (error) {
      this.logger.warn({ error }, 'Embedding cache read failed, embedding everything');
      return empty;
    }
  }

  private async storeCache(
    texts: readonly string[],
    positions: readonly number[],
    vectors: ReadonlyArray<number[] | undefined>
  ): Promise<void> {
    if (!this.cache || positions.length === 0) {
      return;
    }

    const entries = positions.flatMap((position) => {
      const vector = vectors[position];
      return vector ? [{ text: texts[position], vector }] : [];
    });

    try {
      await this.cache.setMany(this.modelId, entries);
    } catch (error) {
      this.logger.warn({ error, entries: entries.length }, 'Embedding cache write failed');
    }
  }
}
