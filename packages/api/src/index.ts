import type { Redis } from 'ioredis';
import OpenAI from 'openai';
import { buildApp } from './app';
import { loadConfigFromEnvironment, type AppConfig } from './config';
import type { ReadinessCheck } from './routes/health';
import { EmbedderGateway, type EmbeddingCache } from './services/embedding';
import { TextExtractor } from './services/extraction';
import { LearningBlockGenerator } from './services/generation';
import { InMemoryVectorIndex, type VectorIndex } from './services/indexing';
import { IngestionService } from './services/ingestion';
import { PgVectorIndex } from './services/pgvectorIndex';
import { ContextAssembler } from './services/retrieval';
import { createSql, type Sql } from './utils/db';
import { HttpEmbeddingProvider, OpenAIEmbeddingProvider, type EmbeddingProvider } from './utils/embeddings';
import { GroqClient } from './utils/llm';
import { logger } from './utils/logger';
import { checkRedisHealth, createRedisClient, RedisEmbeddingCache } from './utils/redis';
import { RetryPolicy } from './utils/retry';

function createEmbeddingProvider(config: AppConfig): EmbeddingProvider {
  const { embeddings } = config;
  if (embeddings.provider === 'http') {
    return new HttpEmbeddingProvider(embeddings.workerUrl, {
      model: embeddings.model,
      dimension: embeddings.dimension,
    });
  }

  if (!embeddings.openaiApiKey) {
    throw new Error('OPENAI_API_KEY is not set. Set it in .env or use EMBEDDINGS_PROVIDER=http.');
  }
  return new OpenAIEmbeddingProvider(new OpenAI({ apiKey: embeddings.openaiApiKey }), {
    model: embeddings.model,
    dimension: embeddings.dimension,
  });
}

async function start() {
  const config = loadConfigFromEnvironment();
  logger.level = config.logLevel;

  let sql: Sql | undefined;
  let redis: Redis | undefined;
  const checks: Record<string, ReadinessCheck> = {};

  // ===== EMBEDDINGS =====
  const provider = createEmbeddingProvider(config);
  let cache: EmbeddingCache | undefined;
  if (config.embeddingCache === 'redis') {
    const client = createRedisClient(config.redis, logger);
    redis = client;
    cache = new RedisEmbeddingCache(client);
    checks.redis = () => checkRedisHealth(client);
  }

  const retryPolicy = new RetryPolicy({ ...config.retry, logger });
  const embedder = new EmbedderGateway(provider, {
    maxBatchSize: config.embeddings.maxBatchSize,
    maxConcurrency: config.embeddings.maxConcurrency,
    timeoutMs: config.embeddings.timeoutMs,
    retryPolicy,
    cache,
    logger,
  });

  // ===== VECTOR INDEX =====
  let index: VectorIndex;
  if (config.vectorStore === 'pgvector') {
    sql = createSql(config.database);
    const pgIndex = new PgVectorIndex(sql, embedder.dimension, embedder.modelId, {
      timeoutMs: config.database.timeoutMs,
      retryPolicy,
      logger,
    });
    await pgIndex.verifySchema();
    index = pgIndex;
  } else {
    index = new InMemoryVectorIndex(embedder.dimension, embedder.modelId);
    logger.warn('Using the in-memory vector index; indexed documents are lost on restart');
  }
  checks.vectorStore = () => index.healthCheck();

  // ===== SERVICES =====
  const ingestion = new IngestionService(new TextExtractor(), embedder, index, {
    chunkSize: config.rag.chunkSize,
    overlap: config.rag.chunkOverlap,
    logger,
  });
  const assembler = new ContextAssembler(embedder, index, { minScore: config.rag.minScore, logger });
  const generator = new LearningBlockGenerator(new GroqClient(config.groq, logger), { logger });

  const fastify = await buildApp({
    ingestion,
    assembler,
    generator,
    checks,
    rag: { topK: config.rag.topK, maxContextSize: config.rag.maxContextSize },
    corsOrigins: config.corsOrigins,
    bodyLimit: config.bodyLimit,
    logger,
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    try {
      await fastify.close();
      await sql?.end({ timeout: 5 });
      await redis?.quit();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await fastify.listen({
    port: config.port,
    host: config.host,
  });

  logger.info(
    { vectorStore: config.vectorStore, embeddings: config.embeddings.provider, model: embedder.modelId },
    `API server running at http://${config.host}:${config.port}`
  );
}

start().catch((err: unknown) => {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
});
