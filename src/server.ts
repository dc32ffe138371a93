import type { Server } from 'http';
import dotenv from 'dotenv';
import { createApp } from './api';
import type { ServiceContainer } from './services';
import { createLogger } from './utils/logger';

const logger = createLogger('Server');

export interface ServerOptions {
  port?: number;
  host?: string;
}

/**
 * Load persisted state and start serving. Strategy executors are supplied by
 * the host through the service container.
 */
export async function startServer(services: ServiceContainer, options: ServerOptions = {}): Promise<Server> {
  dotenv.config();

  const port = options.port ?? services.config.api.port;
  const host = options.host ?? process.env.HOST ?? '0.0.0.0';

  logger.info('Scrapewise API Server Starting...');
  const report = await services.initialize();
  for (const load of [report.valueTable, report.episodeLog]) {
    if (load?.warning) {
      logger.warn(load.warning);
    }
  }

  const app = createApp(services);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host, () => resolve(listening));
    listening.once('error', reject);
  });

  logger.info('Scrapewise API Server Ready', {
    host,
    port,
    healthCheck: `http://${host}:${port}/health`,
    apiBase: `http://${host}:${port}/api/v1`,
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}. Starting graceful shutdown...`);
    server.close(() => {
      services.shutdown().then(
        () => {
          logger.info('HTTP server closed. Goodbye!');
          process.exit(0);
        },
        (error: unknown) => {
          logger.error('Failed to flush state on shutdown', error);
          process.exit(1);
        }
      );
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  return server;
}
