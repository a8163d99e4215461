import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';

/**
 * Service banner and liveness routes.
 *
 * GET /        API name
 * GET /health  liveness plus the active store driver
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/', async () => ({ message: 'Event Management API' }));

  fastify.get('/health', async () => ({
    status: 'healthy',
    store: fastify.store.driver,
  }));
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['store'],
  fastify: '5.x',
});
