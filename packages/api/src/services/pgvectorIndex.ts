import postgres from 'postgres';
import { VECTOR_STORE_CONFIG, type ScoredChunk } from '@eduflow/shared';
import { checkDatabaseHealth, type Sql } from '../utils/db';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { RetryPolicy, withTimeout } from '../utils/retry';
import { DimensionMismatchError, InvalidInputError, RagError, ServiceUnavailableError } from '../errors';
import {
  assertDocumentRecords,
  assertRecord,
  assertTopK,
  assertVectorDimension,
  type IndexCallOptions,
  type QueryOptions,
  type VectorIndex,
  type VectorRecord,
} from './indexing';

/**
 * pgvector-backed index (schema: sql/schema.sql).
 *
 * Uses the <=> operator for cosine distance (lower = more similar), so
 * score = 1 - distance. `write_seq` is bumped on every upsert and breaks
 * score ties in favour of the newest write.
 *
 * The secondary `write_seq` sort key keeps the tie-break exact but means the
 * planner does not use the HNSW index; top-K is an ordered scan over the
 * model's rows.
 *
 * Every statement runs under a deadline and the caller's signal. When either
 * fires the in-flight query is cancelled on the server. Connection-level
 * failures surface as ServiceUnavailable and are retried.
 */

export interface PgVectorIndexOptions {
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
}

type CancellableQuery<T> = Promise<T> & { cancel(): void };

interface ChunkRow {
  id: string;
  document_id: string;
  sequence: number;
  content: string;
  start_offset: number;
  end_offset: number;
  score: number;
}

// Format embedding as a pgvector literal
function toVectorLiteral(vector: readonly number[]): string {
  return `[${vector.join(',')}]`;
}

// SQLSTATE classes: 08 connection, 53 insufficient resources, 22 data, 23 integrity
const TRANSIENT_SQLSTATES = new Set(['57P01', '57P03', '40001', '40P01']);

export function toIndexError(error: unknown, label: string): unknown {
  if (error instanceof RagError) {
    return error;
  }
  if (error instanceof postgres.PostgresError) {
    const sqlState = error.code;
    if (sqlState.startsWith('08') || sqlState.startsWith('53') || TRANSIENT_SQLSTATES.has(sqlState)) {
      return new ServiceUnavailableError(`Vector store failed during ${label}: ${error.message}`, error);
    }
    if (sqlState.startsWith('22') || sqlState.startsWith('23')) {
      return new InvalidInputError(`Vector store rejected ${label}: ${error.message}`, { sqlState });
    }
    return error;
  }
  if (error instanceof Error) {
    return new ServiceUnavailableError(`Vector store unreachable during ${label}: ${error.message}`, error);
  }
  return error;
}

export class PgVectorIndex implements VectorIndex {
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;

  constructor(
    private readonly sql: Sql,
    readonly dimension: number,
    readonly modelId: string,
    options: PgVectorIndexOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? VECTOR_STORE_CONFIG.TIMEOUT_MS;
    this.logger = (options.logger ?? rootLogger).child({ component: 'pgvector' });
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy({ logger: this.logger });
  }

  /**
   * Fail fast when the embedding column was created for another dimension.
   * An unconstrained `vector` column is accepted.
   */
  async verifySchema(options: IndexCallOptions = {}): Promise<void> {
    const rows = await this.run(
      'index schema check',
      () => this.sql<Array<{ dimension: number }>>`
        SELECT atttypmod AS dimension
        FROM pg_attribute
        WHERE attrelid = 'chunks'::regclass AND attname = 'embedding'
      `,
      options
    );
    const [row] = rows;
    if (!row) {
      throw new ServiceUnavailableError('chunks.embedding column not found, apply sql/schema.sql');
    }
    if (row.dimension > 0 && row.dimension !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, row.dimension);
    }
  }

  async upsert(record: VectorRecord, options: IndexCallOptions = {}): Promise<void> {
    assertRecord(record, this);
    const { metadata } = record;

    await this.run('index upsert', () => this.sql`
      INSERT INTO chunks (id, document_id, sequence, content, start_offset, end_offset, model_id, embedding)
      VALUES (
        ${record.chunkId},
        ${metadata.documentId},
        ${metadata.sequence},
        ${metadata.text},
        ${metadata.startOffset},
        ${metadata.endOffset},
        ${record.modelId},
        ${toVectorLiteral(record.vector)}::vector
      )
      ON CONFLICT (id) DO UPDATE SET
        document_id = EXCLUDED.document_id,
        sequence = EXCLUDED.sequence,
        content = EXCLUDED.content,
        start_offset = EXCLUDED.start_offset,
        end_offset = EXCLUDED.end_offset,
        model_id = EXCLUDED.model_id,
        embedding = EXCLUDED.embedding,
        write_seq = nextval('chunk_write_seq'),
        updated_at = now()
    `, options);
  }

  /**
   * One statement: the data-modifying CTE upserts every record and the outer
   * DELETE drops the document's chunks that were not part of this write.
   */
  async upsertDocument(
    documentId: string,
    records: readonly VectorRecord[],
    options: IndexCallOptions = {}
  ): Promise<void> {
    assertDocumentRecords(documentId, records);
    records.forEach((record) => assertRecord(record, this));

    const rows = records.map((record) => ({
      id: record.chunkId,
      document_id: documentId,
      sequence: record.metadata.sequence,
      content: record.metadata.text,
      start_offset: record.metadata.startOffset,
      end_offset: record.metadata.endOffset,
      model_id: record.modelId,
      embedding: toVectorLiteral(record.vector),
    }));

    await this.run('index upsert', () => this.sql`
      WITH input AS (
        SELECT *
        FROM jsonb_to_recordset(${JSON.stringify(rows)}::jsonb) AS r(
          id text,
          document_id text,
          sequence int,
          content text,
          start_offset int,
          end_offset int,
          model_id text,
          embedding text
        )
      ),
      upserted AS (
        INSERT INTO chunks (id, document_id, sequence, content, start_offset, end_offset, model_id, embedding)
        SELECT id, document_id, sequence, content, start_offset, end_offset, model_id, embedding::vector
        FROM input
        ORDER BY sequence
        ON CONFLICT (id) DO UPDATE SET
          document_id = EXCLUDED.document_id,
          sequence = EXCLUDED.sequence,
          content = EXCLUDED.content,
          start_offset = EXCLUDED.start_offset,
          end_offset = EXCLUDED.end_offset,
          model_id = EXCLUDED.model_id,
          embedding = EXCLUDED.embedding,
          write_seq = nextval('chunk_write_seq'),
          updated_at = now()
        RETURNING id
      )
      DELETE FROM chunks
      WHERE document_id = ${documentId}
        AND id NOT IN (SELECT id FROM upserted)
    `, options);
  }

  async query(vector: readonly number[], k: number, options: QueryOptions = {}): Promise<ScoredChunk[]> {
    assertTopK(k);
    assertVectorDimension(vector, this.dimension);
    const vectorString = toVectorLiteral(vector);

    const { documentId } = options;

    const rows = await this.run('index query', () => this.sql<ChunkRow[]>`
      SELECT
        id,
        document_id,
        sequence,
        content,
        start_offset,
        end_offset,
        1 - (embedding <=> ${vectorString}::vector) AS score
      FROM chunks
      WHERE model_id = ${this.modelId}
      ${documentId === undefined ? this.sql`` : this.sql`AND document_id = ${documentId}`}
      ORDER BY embedding <=> ${vectorString}::vector, write_seq DESC
      LIMIT ${k}
    `, options);

    return rows.map((row) => ({
      chunkId: row.id,
      score: Number(row.score),
      metadata: {
        documentId: row.document_id,
        sequence: row.sequence,
        text: row.content,
        startOffset: row.start_offset,
        endOffset: row.end_offset,
      },
    }));
  }

  async deleteDocument(documentId: string, options: IndexCallOptions = {}): Promise<number> {
    const result = await this.run(
      'index delete',
      () => this.sql`DELETE FROM chunks WHERE document_id = ${documentId}`,
      options
    );
    return result.count;
  }

  async size(): Promise<number> {
    const [row] = await this.run(
      'index size',
      () => this.sql<Array<{ count: number }>>`
        SELECT count(*)::int AS count FROM chunks WHERE model_id = ${this.modelId}
      `,
      {}
    );
    return row?.count ?? 0;
  }

  async healthCheck(): Promise<boolean> {
    return checkDatabaseHealth(this.sql);
  }

  /**
   * Issue `statement` under the retry policy. Each attempt builds a fresh
   * query, bounded by the deadline and the caller's signal.
   */
  private run<T>(label: string, statement: () => CancellableQuery<T>, options: IndexCallOptions): Promise<T> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    return this.retryPolicy.execute(
      () =>
        withTimeout(
          async (signal) => {
            const pending = statement();
            const cancel = () => pending.cancel();
            signal.addEventListener('abort', cancel, { once: true });
            try {
              return await pending;
            } catch (error) {
              throw toIndexError(error, label);
            } finally {
              signal.removeEventListener('abort', cancel);
            }
          },
          timeoutMs,
          { parent: options.signal, label }
        ),
      label,
      options.signal
    );
  }
}
