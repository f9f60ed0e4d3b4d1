import type { Server } from 'http';
import { createApp } from './app.js';
import { getEnv } from './config/env.js';
import { initializeServices } from './config/serviceInitialization.js';
import { logger } from './utils/logger.js';
import { ShutdownCoordinator } from './utils/shutdownCoordinator.js';

async function startServer(): Promise<void> {
  const env = getEnv();
  const services = await initializeServices();

  const app = createApp({
    store: services.store,
    retrieval: services.retrieval,
    extraction: services.extraction,
    orchestrator: services.orchestrator,
    loadSeeds: services.loadSeeds,
  });

  const server: Server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Server listening');
  });

  const shutdownCoordinator = new ShutdownCoordinator();
  // HTTP server first so no new requests arrive while the store closes
  shutdownCoordinator.register('HTTP Server', () =>
    new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    })
  );
  shutdownCoordinator.register('Content Store', () => services.close());

  const onSignal = (signal: NodeJS.Signals) => {
    shutdownCoordinator
      .shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);
}

startServer().catch((error: unknown) => {
  logger.fatal({ error }, 'Server failed to start');
  process.exit(1);
});
