import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import type { EventError } from '../../domain/index.js';

export interface ErrorBody {
  detail: string;
}

/** HTTP status for each domain error kind. */
export function statusForError(error: EventError): number {
  switch (error.kind) {
    case 'not_found':
      return 404;
    case 'validation':
      return 422;
    case 'storage':
      return 500;
  }
}

/** Sends a domain error as `{ detail }` with its mapped status. */
export function sendError(reply: FastifyReply, error: EventError): FastifyReply {
  if (error.kind === 'storage') {
    reply.log.error({ err: error.cause }, error.message);
  }
  const body: ErrorBody = { detail: error.message };
  return reply.status(statusForError(error)).send(body);
}

/**
 * Fastify error handler for failures raised outside the domain layer.
 *
 * Body parsing failures (malformed JSON, unsupported content type) are
 * reported as validation errors. Other 4xx keep their status; anything
 * else is a 500.
 */
export function handleFrameworkError(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
): FastifyReply {
  const status = error.statusCode ?? 500;

  if (status === 400 || status === 415) {
    return reply.status(422).send({ detail: error.message } satisfies ErrorBody);
  }
  if (status >= 400 && status < 500) {
    return reply.status(status).send({ detail: error.message } satisfies ErrorBody);
  }

  request.log.error({ err: error }, 'Unhandled error');
  return reply.status(500).send({ detail: error.message || 'Internal Server Error' } satisfies ErrorBody);
}

/** Unknown routes answer 404 with the same error shape as domain failures. */
export function handleNotFound(request: FastifyRequest, reply: FastifyReply): FastifyReply {
  return reply
    .status(404)
    .send({ detail: `Route ${request.method} ${request.url} not found` } satisfies ErrorBody);
}
