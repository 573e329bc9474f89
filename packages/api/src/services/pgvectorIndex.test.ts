import { describe, expect, it } from 'vitest';
import postgres from 'postgres';
import { httpStatusFor, RagError, rootCause } from '../errors';
import { createFakeSql, hang, withCount, type Responder } from '../__fixtures__/sql';
import { testRetryPolicy } from '../__fixtures__/fakes';
import { PgVectorIndex, type PgVectorIndexOptions } from './pgvectorIndex';
import type { VectorRecord } from './indexing';

const record: VectorRecord = {
  chunkId: 'a#0',
  vector: [1, 0, 0],
  modelId: 'test-model',
  metadata: { documentId: 'a', sequence: 0, text: 'alpha', startOffset: 0, endOffset: 5 },
};

function setup(respond?: Responder, options: PgVectorIndexOptions = {}) {
  const fake = createFakeSql(respond);
  const index = new PgVectorIndex(fake.sql, 3, 'test-model', {
    timeoutMs: 1000,
    retryPolicy: testRetryPolicy({ maxAttempts: 1 }),
    ...options,
  });
  return { index, statements: fake.statements };
}

function pgError(code: string, message: string): Error {
  return Object.assign(new postgres.PostgresError(message), { code, message });
}

async function ragError(promise: Promise<unknown>): Promise<RagError> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof RagError)) {
    throw new Error(`expected RagError, got ${String(error)}`);
  }
  return error;
}

describe('PgVectorIndex statements', () => {
  it('maps rows to scored chunks and orders by distance then newest write', async () => {
    const { index, statements } = setup(() => [
      { id: 'a#1', document_id: 'a', sequence: 1, content: 'beta', start_offset: 3, end_offset: 8, score: '0.75' },
    ]);

    const results = await index.query([1, 0, 0], 2);

    expect(results).toEqual([
      {
        chunkId: 'a#1',
        score: 0.75,
        metadata: { documentId: 'a', sequence: 1, text: 'beta', startOffset: 3, endOffset: 8 },
      },
    ]);
    const [statement] = statements();
    expect(statement.text).toContain(
      'FROM chunks WHERE model_id = ? ORDER BY embedding <=> ?::vector, write_seq DESC LIMIT ?'
    );
    expect(statement.values).toEqual(['[1,0,0]', 'test-model', '[1,0,0]', 2]);
  });

  it('restricts a query to one document', async () => {
    const { index, statements } = setup();

    await index.query([0, 1, 0], 4, { documentId: 'a' });

    const [statement] = statements();
    expect(statement.text).toContain('WHERE model_id = ? AND document_id = ? ORDER BY');
    expect(statement.values).toEqual(['[0,1,0]', 'test-model', 'a', '[0,1,0]', 4]);
  });

  it('writes a whole document in one statement', async () => {
    const { index, statements } = setup();
    const second: VectorRecord = {
      ...record,
      chunkId: 'a#1',
      vector: [0, 0.5, 0],
      metadata: { ...record.metadata, sequence: 1, text: 'beta', startOffset: 3, endOffset: 8 },
    };

    await index.upsertDocument('a', [record, second]);

    expect(statements()).toHaveLength(1);
    const [statement] = statements();
    expect(statement.text).toContain('FROM jsonb_to_recordset(?::jsonb)');
    expect(statement.text).toContain('DELETE FROM chunks WHERE document_id = ? AND id NOT IN (SELECT id FROM upserted)');
    expect(statement.values[1]).toBe('a');
    expect(JSON.parse(String(statement.values[0]))).toEqual([
      {
        id: 'a#0',
        document_id: 'a',
        sequence: 0,
        content: 'alpha',
        start_offset: 0,
        end_offset: 5,
        model_id: 'test-model',
        embedding: '[1,0,0]',
      },
      {
        id: 'a#1',
        document_id: 'a',
        sequence: 1,
        content: 'beta',
        start_offset: 3,
        end_offset: 8,
        model_id: 'test-model',
        embedding: '[0,0.5,0]',
      },
    ]);
  });

  it('returns the number of deleted chunks', async () => {
    const { index, statements } = setup(() => withCount(4));

    await expect(index.deleteDocument('a')).resolves.toBe(4);
    expect(statements()[0].text).toBe('DELETE FROM chunks WHERE document_id = ?');
    expect(statements()[0].values).toEqual(['a']);
  });
});

describe('PgVectorIndex failures', () => {
  it('times out a stalled query and cancels it on the server', async () => {
    const { index, statements } = setup(hang, { timeoutMs: 20 });

    const error = await ragError(index.query([1, 0, 0], 3));

    expect(rootCause(error).code).toBe('TIMEOUT');
    expect(rootCause(error).message).toBe('index query timed out after 20ms');
    expect(httpStatusFor(error)).toBe(504);
    expect(statements()[0].cancelled).toBe(true);
  });

  it('retries an unreachable database and then reports it unavailable', async () => {
    const { index, statements } = setup(
      async () => {
        throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
      },
      { retryPolicy: testRetryPolicy({ maxAttempts: 2 }) }
    );

    const error = await ragError(index.upsert(record));

    expect(error.code).toBe('RETRIES_EXHAUSTED');
    expect(rootCause(error).code).toBe('SERVICE_UNAVAILABLE');
    expect(rootCause(error).message).toBe(
      'Vector store unreachable during index upsert: connect ECONNREFUSED 127.0.0.1:5432'
    );
    expect(httpStatusFor(error)).toBe(503);
    expect(statements()).toHaveLength(2);
  });

  it('treats a server shutdown as transient', async () => {
    const { index } = setup(async () => {
      throw pgError('57P01', 'terminating connection due to administrator command');
    });

    const error = await ragError(index.deleteDocument('a'));

    expect(rootCause(error).code).toBe('SERVICE_UNAVAILABLE');
  });

  it('reports a constraint violation as invalid input without retrying', async () => {
    const { index, statements } = setup(
      async () => {
        throw pgError('23505', 'duplicate key value violates unique constraint');
      },
      { retryPolicy: testRetryPolicy({ maxAttempts: 3 }) }
    );

    const error = await ragError(index.upsert(record));

    expect(error.code).toBe('INVALID_INPUT');
    expect(error.message).toBe('Vector store rejected index upsert: duplicate key value violates unique constraint');
    expect(error.details).toEqual({ sqlState: '23505' });
    expect(statements()).toHaveLength(1);
  });

  it('sends nothing when the caller has already aborted', async () => {
    const { index, statements } = setup();
    const controller = new AbortController();
    controller.abort();

    const error = await ragError(index.query([1, 0, 0], 3, { signal: controller.signal }));

    expect(error.code).toBe('CANCELLED');
    expect(statements()).toHaveLength(0);
  });

  it('cancels the running query when the caller aborts', async () => {
    const { index, statements } = setup(hang);
    const controller = new AbortController();

    const pending = index.deleteDocument('a', { signal: controller.signal });
    setTimeout(() => controller.abort(), 10);
    const error = await ragError(pending);

    expect(error.code).toBe('CANCELLED');
    expect(httpStatusFor(error)).toBe(499);
    expect(statements()[0].cancelled).toBe(true);
  });
});

describe('PgVectorIndex.verifySchema', () => {
  it('accepts a column of the configured dimension', async () => {
    const { index, statements } = setup(() => [{ dimension: 3 }]);

    await expect(index.verifySchema()).resolves.toBeUndefined();
    expect(statements()[0].text).toContain("WHERE attrelid = 'chunks'::regclass AND attname = 'embedding'");
  });

  it('accepts an unconstrained vector column', async () => {
    const { index } = setup(() => [{ dimension: -1 }]);

    await expect(index.verifySchema()).resolves.toBeUndefined();
  });

  it('rejects a column created for another dimension', async () => {
    const { index } = setup(() => [{ dimension: 1536 }]);

    await expect(index.verifySchema()).rejects.toMatchObject({
      code: 'DIMENSION_MISMATCH',
      message: 'Expected vector dimension 3, got 1536',
    });
  });

  it('reports a missing chunks table', async () => {
    const { index } = setup(() => []);

    await expect(index.verifySchema()).rejects.toMatchObject({
      code: 'SERVICE_UNAVAILABLE',
      message: 'chunks.embedding column not found, apply sql/schema.sql',
    });
  });
});

describe('PgVectorIndex validation', () => {
  it('rejects a record of the wrong dimension', async () => {
    const { index, statements } = setup();

    await expect(index.upsert({ ...record, vector: [1, 0] })).rejects.toMatchObject({
      code: 'DIMENSION_MISMATCH',
    });
    expect(statements()).toHaveLength(0);
  });

  it('rejects a record from another model', async () => {
    const { index } = setup();

    await expect(index.upsert({ ...record, modelId: 'other-model' })).rejects.toMatchObject({
      code: 'INVALID_INPUT',
    });
  });

  it('rejects a query vector of the wrong dimension', async () => {
    const { index } = setup();

    await expect(index.query([1, 0], 3)).rejects.toMatchObject({ code: 'DIMENSION_MISMATCH' });
  });

  it('rejects a non-positive k', async () => {
    const { index } = setup();

    await expect(index.query([1, 0, 0], 0)).rejects.toMatchObject({ code: 'INVALID_INPUT' });
  });

  it('rejects a document write containing a foreign chunk', async () => {
    const { index, statements } = setup();

    await expect(index.upsertDocument('b', [record])).rejects.toMatchObject({
      code: 'INVALID_INPUT',
      message: 'Chunk a#0 does not belong to document b',
    });
    expect(statements()).toHaveLength(0);
  });
});
