import { loadConfig } from './config.js';
import { buildApp } from './app.js';
import { createLogger } from './infrastructure/logger.js';
import { createRecordStore } from './infrastructure/store/index.js';

/**
 * Bootstrap the HTTP server.
 *
 * Order:
 * 1) Config (fails fast on an invalid environment)
 * 2) Record store
 * 3) Fastify app
 * 4) Register shutdown handlers
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config);

  const store = await createRecordStore(config.store, log);
  const app = await buildApp({ config, store });

  // onClose hooks release the store and Redis connections.
  const shutdown = (signal: NodeJS.Signals): void => {
    app.log.info({ signal }, 'Shutting down server...');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await app.listen({
    host: config.server.host,
    port: config.server.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
