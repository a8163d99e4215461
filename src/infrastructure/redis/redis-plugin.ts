import fp from 'fastify-plugin';
import Redis from 'ioredis';
import type { FastifyPluginAsync } from 'fastify';

export interface RedisPluginOptions {
  /** `null` disables change notifications. */
  client: Redis | null;
}

/** Creates a lazily-connecting ioredis client for the notification channel. */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}

/**
 * Fastify plugin that manages the optional ioredis connection lifecycle.
 *
 * - Tries to connect on server start. An unreachable Redis is logged and
 *   left to ioredis' reconnect loop; the server starts regardless.
 * - Quits on close when connected, otherwise drops the connection attempt.
 * - Decorates `fastify.redis`, which is `null` when Redis is not configured.
 */
const redisPlugin: FastifyPluginAsync<RedisPluginOptions> = async (fastify, opts) => {
  const redis = opts.client;

  fastify.decorate('redis', redis);

  if (redis === null) return;

  redis.on('error', (err: unknown) => {
    fastify.log.error({ err }, 'Redis error');
  });

  if (redis.status === 'wait') {
    try {
      await redis.connect();
      fastify.log.info('Redis connected');
    } catch (err: unknown) {
      fastify.log.warn({ err }, 'Redis unreachable at startup; change notifications paused until it reconnects');
    }
  }

  fastify.addHook('onClose', async () => {
    if (redis.status === 'ready') {
      await redis.quit();
    } else {
      redis.disconnect();
    }
    fastify.log.info('Redis disconnected');
  });
};

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.redis` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis | null;
  }
}
