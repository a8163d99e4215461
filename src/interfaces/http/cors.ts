import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';

export interface CorsOptions {
  allowOrigin: string;
}

export const CORS_ALLOW_METHODS = 'GET,POST,PUT,PATCH,DELETE,OPTIONS';
export const CORS_ALLOW_HEADERS = 'Content-Type,X-Amz-Date,Authorization,X-Api-Key,X-Amz-Security-Token';

/**
 * Adds CORS headers to every response and answers preflight requests
 * with 204.
 */
const corsPlugin: FastifyPluginAsync<CorsOptions> = async (fastify, opts) => {
  fastify.addHook('onSend', async (_request, reply, payload) => {
    reply.header('access-control-allow-origin', opts.allowOrigin);
    reply.header('access-control-allow-methods', CORS_ALLOW_METHODS);
    reply.header('access-control-allow-headers', CORS_ALLOW_HEADERS);
    return payload;
  });

  fastify.options('*', async (_request, reply) => reply.status(204).send());
};

export default fp(corsPlugin, {
  name: 'cors',
  fastify: '5.x',
});
