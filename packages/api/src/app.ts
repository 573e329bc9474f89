import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { generateRequestId } from '@eduflow/shared';
import { documentRoutes } from './routes/documents';
import { generateRoutes } from './routes/generate';
import { healthRoutes, type ReadinessCheck } from './routes/health';
import { queryRoutes } from './routes/query';
import type { LearningBlockGenerator } from './services/generation';
import type { IngestionService } from './services/ingestion';
import type { ContextAssembler } from './services/retrieval';
import { logger as rootLogger, type Logger } from './utils/logger';

export interface AppDependencies {
  ingestion: IngestionService;
  assembler: ContextAssembler;
  generator: LearningBlockGenerator;
  checks: Record<string, ReadinessCheck>;
  rag: { topK: number; maxContextSize: number };
  corsOrigins: string[];
  bodyLimit?: number;
  logger?: Logger;
}

/**
 * Assemble the Fastify instance from already-constructed services.
 * Nothing here reads configuration or opens connections.
 */
export async function buildApp(deps: AppDependencies) {
  const fastify = Fastify({
    logger: deps.logger ?? rootLogger,
    requestIdLogLabel: 'reqId',
    disableRequestLogging: false,
    requestIdHeader: 'x-request-id',
    genReqId: () => generateRequestId(),
    bodyLimit: deps.bodyLimit,
  });

  // Register plugins
  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(cors, {
    origin: deps.corsOrigins,
    credentials: true,
  });

  // Register routes
  await fastify.register(healthRoutes, { prefix: '/health', checks: deps.checks });
  await fastify.register(documentRoutes, { prefix: '/api/v1/documents', ingestion: deps.ingestion });
  await fastify.register(queryRoutes, {
    prefix: '/api/v1/query',
    assembler: deps.assembler,
    ...deps.rag,
  });
  await fastify.register(generateRoutes, {
    prefix: '/api/v1/generate',
    assembler: deps.assembler,
    generator: deps.generator,
    ingestion: deps.ingestion,
    ...deps.rag,
  });

  return fastify;
}
