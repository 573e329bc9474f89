/**
 * Core types for the EduFlow RAG pipeline.
 * Shared between the API service and its clients.
 */

export type DocumentFormat = 'text' | 'markdown' | 'pdf' | 'docx';

export interface Document {
  id: string;
  format: DocumentFormat;
  payload: Uint8Array;
  uploadedAt: Date;
}

/**
 * A contiguous span of a document's extracted text.
 * Offsets are UTF-16 code unit positions, end exclusive.
 */
export interface Chunk {
  id: string;
  documentId: string;
  sequence: number;
  text: string;
  startOffset: number;
  endOffset: number;
}

export interface EmbeddingVector {
  chunkId: string;
  vector: number[];
  modelId: string;
}

export interface ChunkMetadata {
  documentId: string;
  sequence: number;
  text: string;
  startOffset: number;
  endOffset: number;
}

export interface ScoredChunk {
  chunkId: string;
  score: number;
  metadata: ChunkMetadata;
}

export interface GenerationContext {
  query: string;
  text: string;
  chunkIds: string[];
  chunks: ScoredChunk[];
  /** Results above the score threshold, before the size budget was applied. */
  candidates: number;
  size: number;
  truncated: boolean;
}

export interface IngestionRequest {
  documentId: string;
  format: DocumentFormat;
  payload: Uint8Array;
  chunkSize?: number;
  overlap?: number;
}

export interface IngestionResponse {
  status: 'success' | 'error';
  documentId: string;
  chunksIndexed: number;
  modelId?: string;
  error?: string;
}

export interface QueryRequest {
  query: string;
  k?: number;
  maxContextSize?: number;
  documentId?: string;
}

export interface QueryResponse {
  requestId: string;
  query: string;
  context: string;
  chunkIds: string[];
  sources: Array<{
    chunkId: string;
    documentId: string;
    sequence: number;
    score: number;
  }>;
  metadata: {
    latency: {
      total: number;
      assembly: number;
    };
    chunksRetrieved: number;
    chunksUsed: number;
    contextSize: number;
    truncated: boolean;
    latencyBudgetViolations: string[];
  };
}
