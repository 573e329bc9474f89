import dotenv from 'dotenv';
import { z } from 'zod';
import { CHUNKING_CONFIG, EMBEDDING_CONFIG, RAG_CONFIG, RETRY_CONFIG, VECTOR_STORE_CONFIG } from '@eduflow/shared';

/**
 * Configuration is read once from the environment in the entry point and
 * passed into each component's constructor. Nothing else reads process.env.
 */

const int = (fallback: number) => z.coerce.number().int().default(fallback);

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    HOST: z.string().default('0.0.0.0'),
    PORT: int(3000),
    CORS_ORIGINS: z.string().default('http://localhost:3001'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    BODY_LIMIT_BYTES: int(20 * 1024 * 1024),

    // Vector store
    VECTOR_STORE: z.enum(['memory', 'pgvector']).default('memory'),
    VECTOR_STORE_TIMEOUT_MS: int(VECTOR_STORE_CONFIG.TIMEOUT_MS),
    DB_HOST: z.string().default('localhost'),
    DB_PORT: int(5432),
    DB_NAME: z.string().default('eduflow'),
    DB_USER: z.string().default('postgres'),
    DB_PASSWORD: z.string().default('postgres'),

    // Embedding cache
    EMBEDDING_CACHE: z.enum(['none', 'redis']).default('none'),
    REDIS_URL: z.string().url().optional(),
    REDIS_HOST: z.string().default('localhost'),
    REDIS_PORT: int(6379),
    REDIS_PASSWORD: z.string().optional(),

    // Embeddings
    EMBEDDINGS_PROVIDER: z.enum(['openai', 'http']).default('openai'),
    OPENAI_API_KEY: z.string().default(''),
    EMBEDDINGS_MODEL: z.string().default(EMBEDDING_CONFIG.MODEL),
    EMBEDDINGS_DIMENSION: int(EMBEDDING_CONFIG.DIMENSIONS),
    EMBEDDINGS_WORKER_URL: z.string().url().default('http://localhost:8000'),
    EMBEDDINGS_MAX_BATCH_SIZE: int(EMBEDDING_CONFIG.MAX_BATCH_SIZE),
    EMBEDDINGS_MAX_CONCURRENCY: int(EMBEDDING_CONFIG.MAX_CONCURRENCY),
    EMBEDDINGS_TIMEOUT_MS: int(EMBEDDING_CONFIG.TIMEOUT_MS),

    // Retry policy for transient upstream failures
    RETRY_MAX_ATTEMPTS: int(RETRY_CONFIG.MAX_ATTEMPTS),
    RETRY_BASE_DELAY_MS: int(RETRY_CONFIG.BASE_DELAY_MS),
    RETRY_MAX_DELAY_MS: int(RETRY_CONFIG.MAX_DELAY_MS),
    RETRY_JITTER: z.coerce.number().min(0).max(1).default(RETRY_CONFIG.JITTER),

    // Generation (Groq)
    GROQ_API_KEY: z.string().default(''),
    GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),

    // RAG defaults
    RAG_CHUNK_SIZE: int(CHUNKING_CONFIG.CHUNK_SIZE),
    RAG_CHUNK_OVERLAP: int(CHUNKING_CONFIG.CHUNK_OVERLAP),
    RAG_TOP_K: int(RAG_CONFIG.TOP_K),
    RAG_MAX_CONTEXT_SIZE: int(RAG_CONFIG.MAX_CONTEXT_SIZE),
    RAG_MIN_SCORE: z.coerce.number().min(-1).max(1).default(RAG_CONFIG.MIN_SCORE),
  })
  .refine((env) => env.RAG_CHUNK_OVERLAP >= 0 && env.RAG_CHUNK_OVERLAP < env.RAG_CHUNK_SIZE, {
    message: 'RAG_CHUNK_OVERLAP must be >= 0 and smaller than RAG_CHUNK_SIZE',
    path: ['RAG_CHUNK_OVERLAP'],
  });

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const e = parsed.data;

  return {
    // Server
    env: e.NODE_ENV,
    host: e.HOST,
    port: e.PORT,
    corsOrigins: e.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
    logLevel: e.LOG_LEVEL,
    bodyLimit: e.BODY_LIMIT_BYTES,

    vectorStore: e.VECTOR_STORE,

    // Database
    database: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      database: e.DB_NAME,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      timeoutMs: e.VECTOR_STORE_TIMEOUT_MS,
    },

    // Redis
    embeddingCache: e.EMBEDDING_CACHE,
    redis: {
      url: e.REDIS_URL,
      host: e.REDIS_HOST,
      port: e.REDIS_PORT,
      password: e.REDIS_PASSWORD,
    },

    // Embeddings
    embeddings: {
      provider: e.EMBEDDINGS_PROVIDER,
      openaiApiKey: e.OPENAI_API_KEY,
      model: e.EMBEDDINGS_MODEL,
      dimension: e.EMBEDDINGS_DIMENSION,
      workerUrl: e.EMBEDDINGS_WORKER_URL,
      maxBatchSize: e.EMBEDDINGS_MAX_BATCH_SIZE,
      maxConcurrency: e.EMBEDDINGS_MAX_CONCURRENCY,
      timeoutMs: e.EMBEDDINGS_TIMEOUT_MS,
    },

    retry: {
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
      jitter: e.RETRY_JITTER,
    },

    // Groq (generation)
    groq: {
      apiKey: e.GROQ_API_KEY,
      model: e.GROQ_MODEL,
    },

    // RAG Configuration
    rag: {
      chunkSize: e.RAG_CHUNK_SIZE,
      chunkOverlap: e.RAG_CHUNK_OVERLAP,
      topK: e.RAG_TOP_K,
      maxContextSize: e.RAG_MAX_CONTEXT_SIZE,
      minScore: e.RAG_MIN_SCORE,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;

/**
 * Load `.env` into process.env, then parse it.
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
