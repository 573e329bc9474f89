import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodError } from 'zod';
import { RagError, httpStatusFor, rootCause } from '../errors';

/**
 * Shared error replies for the route plugins.
 *
 * A RagError maps to the status of its root cause and carries the structured
 * error body; anything else is an unexpected failure and becomes a 500.
 */

export function sendValidationError(reply: FastifyReply, request: FastifyRequest, error: ZodError) {
  return reply.code(400).send({
    error: 'Invalid request',
    details: error.issues,
    requestId: request.id,
  });
}

export function sendError(reply: FastifyReply, request: FastifyRequest, error: unknown, stage: string) {
  if (error instanceof RagError) {
    const status = httpStatusFor(error);
    const cause = rootCause(error);
    const log = status >= 500 ? request.log.error.bind(request.log) : request.log.warn.bind(request.log);
    log({ err: error, code: error.code, cause: cause.code }, `${stage} failed`);

    return reply.code(status).send({
      error: error.message,
      code: error.code,
      retryable: cause.retryable,
      details: error.details,
      requestId: request.id,
    });
  }

  request.log.error({ err: error }, `${stage} failed`);
  return reply.code(500).send({
    error: 'Internal server error',
    requestId: request.id,
  });
}
