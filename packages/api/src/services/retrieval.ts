import { RAG_CONFIG } from '@eduflow/shared';
import type { GenerationContext, ScoredChunk } from '@eduflow/shared';
import { InvalidInputError } from '../errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import type { EmbedderGateway, EmbedOptions } from './embedding';
import type { VectorIndex } from './indexing';

/**
 * Retrieval / Context Assembly
 *
 * 1. Embed the query (EmbedderGateway)
 * 2. Top-K nearest chunks (VectorIndex)
 * 3. Drop results below `minScore`
 * 4. Concatenate chunk texts, best first, separated by a blank line, and stop
 *    at the first chunk that would push the context past `maxContextSize`
 *
 * A chunk is never cut to fit. No usable results → empty context; the caller
 * decides whether to generate without grounding.
 */

export interface ContextAssemblerOptions {
  minScore?: number;
  separator?: string;
  logger?: Logger;
}

export interface AssembleOptions extends EmbedOptions {
  documentId?: string;
}

export class ContextAssembler {
  private readonly minScore: number;
  private readonly separator: string;
  private readonly logger: Logger;

  constructor(
    private readonly embedder: EmbedderGateway,
    private readonly index: VectorIndex,
    options: ContextAssemblerOptions = {}
  ) {
    this.minScore = options.minScore ?? RAG_CONFIG.MIN_SCORE;
    this.separator = options.separator ?? RAG_CONFIG.CONTEXT_SEPARATOR;
    this.logger = (options.logger ?? rootLogger).child({ component: 'assembler' });
  }

  /**
   * Top-K chunks for the query, score descending, at or above minScore.
   */
  async retrieve(queryText: string, k: number, options: AssembleOptions = {}): Promise<ScoredChunk[]> {
    if (queryText.trim().length === 0) {
      throw new InvalidInputError('Query text is empty');
    }

    const startTime = Date.now();
    const queryVector = await this.embedder.embedQuery(queryText, options);
    const results = await this.index.query(queryVector, k, {
      documentId: options.documentId,
      signal: options.signal,
    });
    const relevant = results.filter((result) => result.score >= this.minScore);

    this.logger.info(
      {
        latency: Date.now() - startTime,
        retrieved: results.length,
        aboveThreshold: relevant.length,
        documentId: options.documentId,
      },
      'Retrieval completed'
    );
    return relevant;
  }

  async assemble(
    queryText: string,
    k: number,
    maxContextSize: number,
    options: AssembleOptions = {}
  ): Promise<GenerationContext> {
    if (!Number.isInteger(maxContextSize) || maxContextSize < 1) {
      throw new InvalidInputError('maxContextSize must be a positive integer', { maxContextSize });
    }

    const retrieved = await this.retrieve(queryText, k, options);
    const context = buildContext(queryText, retrieved, maxContextSize, this.separator);

    this.logger.info(
      {
        chunksRetrieved: retrieved.length,
        chunksUsed: context.chunkIds.length,
        size: context.size,
        truncated: context.truncated,
      },
      'Context assembled'
    );
    return context;
  }
}

/**
 * Greedy fill in the given (score-descending) order; the first chunk that
 * does not fit ends the context.
 */
export function buildContext(
  query: string,
  ranked: readonly ScoredChunk[],
  maxContextSize: number,
  separator: string = RAG_CONFIG.CONTEXT_SEPARATOR
): GenerationContext {
  const used: ScoredChunk[] = [];
  let text = '';

  for (const chunk of ranked) {
    const candidate = used.length === 0 ? chunk.metadata.text : `${text}${separator}${chunk.metadata.text}`;
    if (candidate.length > maxContextSize) {
      break;
    }
    text = candidate;
    used.push(chunk);
  }

  return {
    query,
    text,
    chunkIds: used.map((chunk) => chunk.chunkId),
    chunks: used,
    candidates: ranked.length,
    size: text.length,
    truncated: used.length < ranked.length,
  };
}
