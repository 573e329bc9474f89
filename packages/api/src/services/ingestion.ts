import { CHUNKING_CONFIG } from '@eduflow/shared';
import type { IngestionRequest } from '@eduflow/shared';
import { InvalidInputError } from '../errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { chunkText, validateChunking } from './chunking';
import type { EmbedderGateway, EmbedOptions } from './embedding';
import type { TextExtractor } from './extraction';
import type { VectorIndex, VectorRecord } from './indexing';

/**
 * Ingestion Pipeline
 *
 * extract → chunk → embed (staged in memory) → upsertDocument
 *
 * Nothing reaches the index until every chunk has a vector, and the final
 * write is a single atomic upsertDocument, so a failed ingestion leaves the
 * document's previous state untouched.
 */

export interface IngestionResult {
  documentId: string;
  chunksIndexed: number;
  characters: number;
  modelId: string;
}

export interface IngestionServiceOptions {
  chunkSize?: number;
  overlap?: number;
  logger?: Logger;
}

const DOCUMENT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._:-]{0,127}$/;

export class IngestionService {
  private readonly chunkSize: number;
  private readonly overlap: number;
  private readonly logger: Logger;

  constructor(
    private readonly extractor: TextExtractor,
    private readonly embedder: EmbedderGateway,
    private readonly index: VectorIndex,
    options: IngestionServiceOptions = {}
  ) {
    this.chunkSize = options.chunkSize ?? CHUNKING_CONFIG.CHUNK_SIZE;
    this.overlap = options.overlap ?? CHUNKING_CONFIG.CHUNK_OVERLAP;
    this.logger = (options.logger ?? rootLogger).child({ component: 'ingestion' });
    validateChunking(this.chunkSize, this.overlap);
  }

  async ingest(request: IngestionRequest, options: EmbedOptions = {}): Promise<IngestionResult> {
    const startTime = Date.now();
    const { documentId } = request;
    const chunkSize = request.chunkSize ?? this.chunkSize;
    const overlap = request.overlap ?? this.overlap;

    if (!DOCUMENT_ID_PATTERN.test(documentId)) {
      throw new InvalidInputError(
        'documentId must be 1-128 characters of letters, digits, ".", "_", ":" or "-"',
        { documentId }
      );
    }
    validateChunking(chunkSize, overlap);

    const text = await this.extractor.extract({ format: request.format, payload: request.payload });
    if (text.length === 0) {
      throw new InvalidInputError('Document contains no extractable text', { documentId });
    }

    const chunks = chunkText(documentId, text, { chunkSize, overlap });
    const embeddings = await this.embedder.embedChunks(chunks, options);

    const records: VectorRecord[] = chunks.map((chunk, i) => ({
      chunkId: chunk.id,
      vector: embeddings[i].vector,
      modelId: embeddings[i].modelId,
      metadata: {
        documentId,
        sequence: chunk.sequence,
        text: chunk.text,
        startOffset: chunk.startOffset,
        endOffset: chunk.endOffset,
      },
    }));

    await this.index.upsertDocument(documentId, records, { signal: options.signal });

    this.logger.info(
      {
        documentId,
        format: request.format,
        characters: text.length,
        chunksIndexed: records.length,
        chunkSize,
        overlap,
        latency: Date.now() - startTime,
      },
      'Document ingested'
    );

    return {
      documentId,
      chunksIndexed: records.length,
      characters: text.length,
      modelId: this.embedder.modelId,
    };
  }

  async remove(documentId: string, signal?: AbortSignal): Promise<number> {
    const removed = await this.index.deleteDocument(documentId, { signal });
    this.logger.info({ documentId, removed }, 'Document removed');
    return removed;
  }
}
