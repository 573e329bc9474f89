import { cosineSimilarity } from '@eduflow/shared';
import type { ChunkMetadata, ScoredChunk } from '@eduflow/shared';
import { CancelledError, DimensionMismatchError, InvalidInputError } from '../errors';

/**
 * Vector Index
 *
 * Stores one entry per chunk id and answers cosine top-K queries.
 *
 * Contract shared by every implementation:
 * - upsert replaces by chunk id; a replaced entry counts as the newest write
 * - query returns at most k results, score descending, ties broken by the
 *   most recent write first
 * - every vector must match the index dimension and come from the index's
 *   embedding model
 * - a call whose signal has aborted rejects with CancelledError; a remote
 *   store also bounds each call by `timeoutMs`
 */

export interface VectorRecord {
  chunkId: string;
  vector: number[];
  modelId: string;
  metadata: ChunkMetadata;
}

export interface IndexCallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface QueryOptions extends IndexCallOptions {
  documentId?: string;
}

export interface VectorIndex {
  readonly dimension: number;
  readonly modelId: string;
  upsert(record: VectorRecord, options?: IndexCallOptions): Promise<void>;
  /**
   * Upsert every chunk of a document and drop its chunks that are not in
   * `records`, as one atomic step.
   */
  upsertDocument(documentId: string, records: readonly VectorRecord[], options?: IndexCallOptions): Promise<void>;
  query(vector: readonly number[], k: number, options?: QueryOptions): Promise<ScoredChunk[]>;
  deleteDocument(documentId: string, options?: IndexCallOptions): Promise<number>;
  size(): Promise<number>;
  healthCheck(): Promise<boolean>;
}

export function assertVectorDimension(vector: readonly number[], dimension: number): void {
  if (vector.length !== dimension) {
    throw new DimensionMismatchError(dimension, vector.length);
  }
}

export function assertRecord(record: VectorRecord, index: Pick<VectorIndex, 'dimension' | 'modelId'>): void {
  if (record.modelId !== index.modelId) {
    throw new InvalidInputError(
      `Vector for ${record.chunkId} was produced by ${record.modelId}, index holds ${index.modelId}`,
      { chunkId: record.chunkId, modelId: record.modelId, indexModelId: index.modelId }
    );
  }
  assertVectorDimension(record.vector, index.dimension);
}

export function assertNotAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new CancelledError(operation);
  }
}

export function assertTopK(k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new InvalidInputError('k must be a positive integer', { k });
  }
}

export function assertDocumentRecords(documentId: string, records: readonly VectorRecord[]): void {
  const foreign = records.find((record) => record.metadata.documentId !== documentId);
  if (foreign) {
    throw new InvalidInputError(`Chunk ${foreign.chunkId} does not belong to document ${documentId}`, {
      documentId,
      chunkId: foreign.chunkId,
    });
  }
}

interface StoredEntry {
  record: VectorRecord;
  writeSeq: number;
}

/**
 * Process-local index. Used for development and tests; state is lost on
 * restart.
 */
export class InMemoryVectorIndex implements VectorIndex {
  private readonly entries = new Map<string, StoredEntry>();
  private writeSeq = 0;

  constructor(
    readonly dimension: number,
    readonly modelId: string
  ) {}

  async upsert(record: VectorRecord, options: IndexCallOptions = {}): Promise<void> {
    assertNotAborted(options.signal, 'index upsert');
    assertRecord(record, this);
    this.write(record);
  }

  async upsertDocument(
    documentId: string,
    records: readonly VectorRecord[],
    options: IndexCallOptions = {}
  ): Promise<void> {
    assertNotAborted(options.signal, 'index upsert');
    assertDocumentRecords(documentId, records);
    records.forEach((record) => assertRecord(record, this));

    const keep = new Set(records.map((record) => record.chunkId));
    for (const [chunkId, entry] of this.entries) {
      if (entry.record.metadata.documentId === documentId && !keep.has(chunkId)) {
        this.entries.delete(chunkId);
      }
    }
    records.forEach((record) => this.write(record));
  }

  async query(vector: readonly number[], k: number, options: QueryOptions = {}): Promise<ScoredChunk[]> {
    assertNotAborted(options.signal, 'index query');
    assertTopK(k);
    assertVectorDimension(vector, this.dimension);

    const scored: Array<ScoredChunk & { writeSeq: number }> = [];
    for (const { record, writeSeq } of this.entries.values()) {
      if (options.documentId !== undefined && record.metadata.documentId !== options.documentId) {
        continue;
      }
      scored.push({
        chunkId: record.chunkId,
        score: cosineSimilarity(vector, record.vector),
        metadata: record.metadata,
        writeSeq,
      });
    }

    return scored
      .sort((a, b) => b.score - a.score || b.writeSeq - a.writeSeq)
      .slice(0, k)
      .map(({ chunkId, score, metadata }) => ({ chunkId, score, metadata }));
  }

  async deleteDocument(documentId: string, options: IndexCallOptions = {}): Promise<number> {
    assertNotAborted(options.signal, 'index delete');
    let removed = 0;
    for (const [chunkId, entry] of this.entries) {
      if (entry.record.metadata.documentId === documentId) {
        this.entries.delete(chunkId);
        removed++;
      }
    }
    return removed;
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private write(record: VectorRecord): void {
    // Re-insert so the entry moves to the end of iteration order as well.
    this.entries.delete(record.chunkId);
    this.entries.set(record.chunkId, {
      record: { ...record, vector: [...record.vector] },
      writeSeq: ++this.writeSeq,
    });
  }
}
