import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { LATENCY_BUDGETS, checkLatencyBudget } from '@eduflow/shared';
import type { GenerationContext, QueryResponse } from '@eduflow/shared';
import type { ContextAssembler } from '../services/retrieval';
import { sendError, sendValidationError } from './replyError';

const QueryRequestSchema = z.object({
  query: z.string().min(1).max(1000),
  k: z.number().int().positive().max(100).optional(),
  maxContextSize: z.number().int().positive().optional(),
  documentId: z.string().min(1).optional(),
});

export interface QueryRoutesOptions {
  assembler: ContextAssembler;
  topK: number;
  maxContextSize: number;
}

export const queryRoutes: FastifyPluginAsync<QueryRoutesOptions> = async (fastify, options) => {
  const { assembler } = options;

  /**
   * POST /api/v1/query
   * Retrieval only: returns the assembled context and its sources.
   *
   * Pipeline:
   * 1. Query embedding
   * 2. Top-K vector search
   * 3. Budgeted context assembly
   */
  fastify.post('/', async (request, reply) => {
    const startTime = Date.now();
    const requestId = request.id;

    const validation = QueryRequestSchema.safeParse(request.body);
    if (!validation.success) {
      return sendValidationError(reply, request, validation.error);
    }
    const { query, k, maxContextSize, documentId } = validation.data;

    request.log.info({ requestId, queryLength: query.length, documentId }, 'Processing query');

    const assemblyStartTime = Date.now();
    let context: GenerationContext;
    try {
      context = await assembler.assemble(query, k ?? options.topK, maxContextSize ?? options.maxContextSize, {
        documentId,
      });
    } catch (error) {
      return sendError(reply, request, error, 'Context assembly');
    }
    const assemblyLatency = Date.now() - assemblyStartTime;
    const totalLatency = Date.now() - startTime;

    const violations = [
      checkLatencyBudget(assemblyLatency, LATENCY_BUDGETS.ASSEMBLY, 'assembly'),
      checkLatencyBudget(totalLatency, LATENCY_BUDGETS.TOTAL, 'total'),
    ].flatMap((check) => (check.violation ? [check.violation] : []));

    if (violations.length > 0) {
      request.log.warn({ requestId, violations }, 'Query exceeded latency budget');
    }

    const response: QueryResponse = {
      requestId,
      query,
      context: context.text,
      chunkIds: context.chunkIds,
      sources: context.chunks.map((chunk) => ({
        chunkId: chunk.chunkId,
        documentId: chunk.metadata.documentId,
        sequence: chunk.metadata.sequence,
        score: chunk.score,
      })),
      metadata: {
        latency: {
          total: totalLatency,
          assembly: assemblyLatency,
        },
        chunksRetrieved: context.candidates,
        chunksUsed: context.chunkIds.length,
        contextSize: context.size,
        truncated: context.truncated,
        latencyBudgetViolations: violations,
      },
    };

    request.log.info(
      { requestId, totalLatency, chunksUsed: context.chunkIds.length },
      'Query processed successfully'
    );
    return response;
  });
};
