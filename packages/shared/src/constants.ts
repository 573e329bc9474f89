/**
 * Shared constants for EduFlow.
 */

export const LATENCY_BUDGETS = {
  EMBEDDING: 1000, // ms
  RETRIEVAL: 200, // ms
  ASSEMBLY: 1500, // ms
  GENERATION: 8000, // ms
  TOTAL: 10000, // ms
} as const;

export const RAG_CONFIG = {
  TOP_K: 6,
  MAX_CONTEXT_SIZE: 4000, // characters
  MIN_SCORE: 0.2,
  CONTEXT_SEPARATOR: '\n\n',
} as const;

export const CHUNKING_CONFIG = {
  CHUNK_SIZE: 512,
  CHUNK_OVERLAP: 128,
  MAX_CHUNK_SIZE: 8192,
} as const;

export const EMBEDDING_CONFIG = {
  MODEL: 'text-embedding-3-small',
  DIMENSIONS: 1536,
  MAX_BATCH_SIZE: 96,
  MAX_CONCURRENCY: 4,
  TIMEOUT_MS: 15000,
  CACHE_TTL: 86400, // 24 hours
} as const;

export const VECTOR_STORE_CONFIG = {
  TIMEOUT_MS: 5000,
} as const;

export const RETRY_CONFIG = {
  MAX_ATTEMPTS: 5,
  BASE_DELAY_MS: 250,
  MAX_DELAY_MS: 8000,
  JITTER: 0.2,
} as const;

export const DOCUMENT_FORMATS = ['text', 'markdown', 'pdf', 'docx'] as const;
