import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { LATENCY_BUDGETS } from '@eduflow/shared';
import type { GenerationContext } from '@eduflow/shared';
import {
  LEARNER_LEVELS,
  type GenerationOutcome,
  type GenerationRequest,
  type LearningBlockGenerator,
} from '../services/generation';
import type { IngestionService } from '../services/ingestion';
import type { ContextAssembler } from '../services/retrieval';
import { IngestBodySchema, toIngestionRequest } from './documents';
import { sendError, sendValidationError } from './replyError';

const LessonFields = {
  topic: z.string().min(1).max(200),
  level: z.enum(LEARNER_LEVELS).default('intermediate'),
  objective: z.string().min(1).max(500).default('understand the core ideas'),
  k: z.number().int().positive().max(100).optional(),
  maxContextSize: z.number().int().positive().optional(),
};

const GenerateRequestSchema = z.object({
  ...LessonFields,
  documentId: z.string().min(1).optional(),
});

const UploadGenerateRequestSchema = z.object({
  ...LessonFields,
  document: IngestBodySchema,
});

export interface GenerateRoutesOptions {
  assembler: ContextAssembler;
  generator: LearningBlockGenerator;
  ingestion: IngestionService;
  topK: number;
  maxContextSize: number;
}

export const generateRoutes: FastifyPluginAsync<GenerateRoutesOptions> = async (fastify, options) => {
  const { assembler, generator, ingestion } = options;

  const generateBlock = async (
    request: FastifyRequest,
    reply: FastifyReply,
    lesson: Omit<GenerationRequest, 'context'>,
    context: GenerationContext,
    extra: Record<string, unknown> = {}
  ) => {
    const requestId = request.id;
    const generationStartTime = Date.now();
    let outcome: GenerationOutcome;
    try {
      outcome = await generator.generate({ ...lesson, context });
    } catch (error) {
      request.log.error({ requestId, err: error }, 'Generation failed');
      return reply.code(503).send({
        error: 'Generation service unavailable',
        requestId,
      });
    }
    const generationLatency = Date.now() - generationStartTime;

    if (generationLatency > LATENCY_BUDGETS.GENERATION) {
      request.log.warn(
        { requestId, generationLatency, budget: LATENCY_BUDGETS.GENERATION },
        'Generation exceeded latency budget'
      );
    }

    if (outcome.status === 'error') {
      return reply.code(502).send({
        error: outcome.error.message,
        kind: outcome.error.kind,
        issues: outcome.error.issues ?? [],
        requestId,
      });
    }

    return {
      requestId,
      grounded: context.chunkIds.length > 0,
      chunkIds: context.chunkIds,
      artifact: outcome.artifact,
      ...extra,
    };
  };

  /**
   * POST /api/v1/generate
   * Grounded learning-block generation. The topic is the retrieval query; an
   * empty context still generates, ungrounded.
   */
  fastify.post('/', async (request, reply) => {
    const validation = GenerateRequestSchema.safeParse(request.body);
    if (!validation.success) {
      return sendValidationError(reply, request, validation.error);
    }
    const { topic, level, objective, k, maxContextSize, documentId } = validation.data;

    let context: GenerationContext;
    try {
      context = await assembler.assemble(topic, k ?? options.topK, maxContextSize ?? options.maxContextSize, {
        documentId,
      });
    } catch (error) {
      return sendError(reply, request, error, 'Context assembly');
    }

    return generateBlock(request, reply, { topic, level, objective }, context);
  });

  /**
   * POST /api/v1/generate/upload
   * Index the attached document, then generate grounded in that document only.
   */
  fastify.post('/upload', async (request, reply) => {
    const validation = UploadGenerateRequestSchema.safeParse(request.body);
    if (!validation.success) {
      return sendValidationError(reply, request, validation.error);
    }
    const { topic, level, objective, k, maxContextSize, document } = validation.data;

    let chunksIndexed: number;
    try {
      ({ chunksIndexed } = await ingestion.ingest(toIngestionRequest(document)));
    } catch (error) {
      return sendError(reply, request, error, 'Ingestion');
    }

    let context: GenerationContext;
    try {
      context = await assembler.assemble(topic, k ?? options.topK, maxContextSize ?? options.maxContextSize, {
        documentId: document.documentId,
      });
    } catch (error) {
      return sendError(reply, request, error, 'Context assembly');
    }

    return generateBlock(request, reply, { topic, level, objective }, context, {
      document: { documentId: document.documentId, chunksIndexed },
    });
  });
};
