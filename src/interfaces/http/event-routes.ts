import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  createEventSchema,
  updateEventSchema,
  listQuerySchema,
  formatIssues,
  createEvent,
  getEvent,
  listEvents,
  updateEvent,
  deleteEvent,
} from '../../application/index.js';
import { validationFailed } from '../../domain/index.js';
import { publishEventChange, type EventChangeReason } from '../../infrastructure/redis/index.js';
import { sendError } from './error-mapping.js';

type EventParams = { Params: { eventId: string } };

/**
 * Event CRUD routes.
 *
 * POST   /events            create event (201)
 * GET    /events            list events, optional ?status= filter
 * GET    /events/:eventId   get single event
 * PUT    /events/:eventId   partial update
 * PATCH  /events/:eventId   partial update (alias)
 * DELETE /events/:eventId   delete event
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  /** Fire-and-forget change notification; a no-op without Redis. */
  function notify(request: FastifyRequest, reason: EventChangeReason, eventId: string): void {
    if (fastify.redis === null) return;
    void publishEventChange(fastify.redis, request.log, reason, eventId);
  }

  // ── POST /events ─────────────────────────────────────────
  fastify.post(
    '/events',
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = createEventSchema.safeParse(request.body);
      if (!parsed.success) {
        return sendError(reply, validationFailed(formatIssues(parsed.error)));
      }

      const outcome = await createEvent(fastify.store, parsed.data);
      if (!outcome.ok) {
        return sendError(reply, outcome.error);
      }

      notify(request, 'create', outcome.value.eventId);
      return reply.status(201).send(outcome.value);
    },
  );

  // ── GET /events ──────────────────────────────────────────
  fastify.get(
    '/events',
    async (
      request: FastifyRequest<{ Querystring: unknown }>,
      reply: FastifyReply,
    ) => {
      const query = listQuerySchema.safeParse(request.query);
      if (!query.success) {
        return sendError(reply, validationFailed(formatIssues(query.error)));
      }

      const outcome = await listEvents(fastify.store, query.data.status);
      if (!outcome.ok) {
        return sendError(reply, outcome.error);
      }

      return reply.status(200).send(outcome.value);
    },
  );

  // ── GET /events/:eventId ─────────────────────────────────
  fastify.get(
    '/events/:eventId',
    async (
      request: FastifyRequest<EventParams>,
      reply: FastifyReply,
    ) => {
      const outcome = await getEvent(fastify.store, request.params.eventId);
      if (!outcome.ok) {
        return sendError(reply, outcome.error);
      }

      return reply.status(200).send(outcome.value);
    },
  );

  // ── PUT / PATCH /events/:eventId ─────────────────────────
  const update = async (
    request: FastifyRequest<EventParams & { Body: unknown }>,
    reply: FastifyReply,
  ) => {
    const { eventId } = request.params;

    const parsed = updateEventSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(reply, validationFailed(formatIssues(parsed.error)));
    }

    const outcome = await updateEvent(fastify.store, eventId, parsed.data);
    if (!outcome.ok) {
      return sendError(reply, outcome.error);
    }

    notify(request, 'update', eventId);
    return reply.status(200).send(outcome.value);
  };

  fastify.put('/events/:eventId', update);
  fastify.patch('/events/:eventId', update);

  // ── DELETE /events/:eventId ──────────────────────────────
  fastify.delete(
    '/events/:eventId',
    async (
      request: FastifyRequest<EventParams>,
      reply: FastifyReply,
    ) => {
      const { eventId } = request.params;

      const outcome = await deleteEvent(fastify.store, eventId);
      if (!outcome.ok) {
        return sendError(reply, outcome.error);
      }

      notify(request, 'delete', eventId);
      return reply.status(200).send({ message: `Event ${eventId} deleted successfully` });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['store', 'redis'],
  fastify: '5.x',
});
