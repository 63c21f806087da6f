import { initTracing, shutdownTracing, logger } from './observability';

// Tracing must start before express and http are loaded
initTracing();

import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';

const startServer = (): void => {
  try {
    const app = createApp();

    // Start HTTP server
    const server = app.listen(config.port, () => {
      logger.info({ port: config.port, ...getEnvironmentInfo() }, 'Server started');
      logger.info(`Health check: http://localhost:${config.port}/health`);
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        logger.info('HTTP server closed');

        shutdownTracing()
          .then(() => {
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
};

startServer();
