import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { DocumentFormat, IngestionRequest, IngestionResponse } from '@eduflow/shared';
import { UnsupportedFormatError } from '../errors';
import { formatFromFilename, isDocumentFormat } from '../services/extraction';
import type { IngestionService } from '../services/ingestion';
import { sendError, sendValidationError } from './replyError';

export const IngestBodySchema = z
  .object({
    documentId: z.string().min(1).max(128),
    format: z.string().min(1).optional(),
    filename: z.string().min(1).optional(),
    content: z.string().min(1).optional(), // base64
    text: z.string().optional(),
    chunkSize: z.number().int().positive().optional(),
    overlap: z.number().int().nonnegative().optional(),
  })
  .refine((body) => (body.content === undefined) !== (body.text === undefined), {
    message: 'Provide exactly one of content (base64) or text',
    path: ['content'],
  })
  .refine((body) => body.text !== undefined || body.format !== undefined || body.filename !== undefined, {
    message: 'format or filename is required with base64 content',
    path: ['format'],
  });

export type IngestBody = z.infer<typeof IngestBodySchema>;

function resolveFormat(body: IngestBody): DocumentFormat {
  if (body.format !== undefined) {
    if (!isDocumentFormat(body.format)) {
      throw new UnsupportedFormatError(body.format);
    }
    return body.format;
  }
  if (body.filename !== undefined) {
    return formatFromFilename(body.filename);
  }
  return 'text';
}

function resolvePayload(body: IngestBody): Uint8Array {
  if (body.text !== undefined) {
    return new TextEncoder().encode(body.text);
  }
  return Buffer.from(body.content ?? '', 'base64');
}

/**
 * Throws UnsupportedFormatError for an explicit or inferred unknown format.
 */
export function toIngestionRequest(body: IngestBody): IngestionRequest {
  return {
    documentId: body.documentId,
    format: resolveFormat(body),
    payload: resolvePayload(body),
    chunkSize: body.chunkSize,
    overlap: body.overlap,
  };
}

export interface DocumentRoutesOptions {
  ingestion: IngestionService;
}

/**
 * Document management routes.
 * - POST /documents - Extract, chunk, embed and index a document
 * - DELETE /documents/:id - Remove a document's chunks from the index
 */
export const documentRoutes: FastifyPluginAsync<DocumentRoutesOptions> = async (fastify, { ingestion }) => {
  /**
   * POST /api/v1/documents
   * Re-posting an id replaces the document's previous chunks.
   */
  fastify.post('/', async (request, reply) => {
    const validation = IngestBodySchema.safeParse(request.body);
    if (!validation.success) {
      return sendValidationError(reply, request, validation.error);
    }
    const body = validation.data;

    try {
      const result = await ingestion.ingest(toIngestionRequest(body));

      const response: IngestionResponse = {
        status: 'success',
        documentId: result.documentId,
        chunksIndexed: result.chunksIndexed,
        modelId: result.modelId,
      };
      return reply.code(201).send(response);
    } catch (error) {
      return sendError(reply, request, error, 'Ingestion');
    }
  });

  /**
   * DELETE /api/v1/documents/:id
   */
  fastify.delete<{ Params: { id: string } }>('/:id', async (request, reply) => {
    const { id } = request.params;

    try {
      const removed = await ingestion.remove(id);
      if (removed === 0) {
        return reply.code(404).send({
          error: 'Document not found',
          documentId: id,
          requestId: request.id,
        });
      }
      return { status: 'success', documentId: id, chunksRemoved: removed };
    } catch (error) {
      return sendError(reply, request, error, 'Document removal');
    }
  });
};
