import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import type { RecordStore } from './record-store.js';

export interface StorePluginOptions {
  store: RecordStore;
}

/**
 * Fastify plugin that exposes the record store to routes.
 *
 * Decorates `fastify.store` and closes the store on server shutdown.
 */
const storePlugin: FastifyPluginAsync<StorePluginOptions> = async (fastify, opts) => {
  const { store } = opts;

  fastify.decorate('store', store);

  fastify.addHook('onClose', async () => {
    await store.close();
    fastify.log.info({ driver: store.driver }, 'Record store closed');
  });
};

export default fp(storePlugin, {
  name: 'store',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.store` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    store: RecordStore;
  }
}
