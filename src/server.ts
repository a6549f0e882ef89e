import { initTracing, shutdownTracing, createServiceLogger } from './observability';

// Tracing must patch modules before the app loads them
initTracing();

import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { connectRedis, disconnectRedis } from './config/redis';
import { eventBus } from './events/eventBus';
import {
  escrowService,
  registerEscrowEventHandlers,
  unregisterEscrowEventHandlers,
} from './services/escrow';

const log = createServiceLogger('server');

const startServer = async (): Promise<void> => {
  try {
    log.info(getEnvironmentInfo(), 'Starting Timelock Escrow API');

    await connectDatabase();
    await connectRedis();
    await eventBus.connect();
    await registerEscrowEventHandlers();
    await escrowService.initialize();

    const app = createApp();
    const server = app.listen(config.port, () => {
      log.info({ port: config.port, env: config.nodeEnv }, `Server running on port ${config.port}`);
    });

    const closeResources = async (): Promise<void> => {
      escrowService.detach();
      await unregisterEscrowEventHandlers();
      await eventBus.disconnect();
      await disconnectRedis();
      await disconnectDatabase();
      await shutdownTracing();
    };

    const shutdown = (signal: string): void => {
      log.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        log.info('HTTP server closed');
        closeResources()
          .then(() => {
            log.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            log.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        log.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    log.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
