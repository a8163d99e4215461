import Fastify, { type FastifyInstance } from 'fastify';
import type Redis from 'ioredis';
import type { AppConfig } from './config.js';
import { storePlugin, type RecordStore } from './infrastructure/store/index.js';
import { redisPlugin, createRedisClient } from './infrastructure/redis/index.js';
import {
  corsPlugin,
  eventRoutes,
  healthRoutes,
  handleFrameworkError,
  handleNotFound,
} from './interfaces/http/index.js';

export interface BuildAppOptions {
  config: AppConfig;
  store: RecordStore;
  /**
   * Redis client for change notifications. Omit to derive one from
   * `config.redisUrl`; pass `null` to disable notifications.
   */
  redis?: Redis | null;
  /** `false` silences request logging (tests). */
  logger?: boolean;
}

/**
 * Builds the Fastify application.
 *
 * Order:
 * 1) Error and not-found handlers
 * 2) CORS
 * 3) Infrastructure plugins (store, redis)
 * 4) HTTP routes
 *
 * The caller owns `listen()`; tests and the Lambda adapter use `inject()`.
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config, store } = options;

  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
  });

  fastify.setErrorHandler(handleFrameworkError);
  fastify.setNotFoundHandler(handleNotFound);

  await fastify.register(corsPlugin, { allowOrigin: config.cors.allowOrigin });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(storePlugin, { store });

  const redis = options.redis !== undefined
    ? options.redis
    : config.redisUrl !== undefined ? createRedisClient(config.redisUrl) : null;

  await fastify.register(redisPlugin, { client: redis });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(healthRoutes);
  await fastify.register(eventRoutes);

  return fastify;
}
