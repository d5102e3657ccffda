import type { Server } from 'node:http';

import { createApp } from './app';
import {
  RequestConfig,
  ServerConfig,
  validateDatabaseEnv,
  validateStravaEnv,
  validateWebhookEnv,
  WebhookConfig,
} from './config';
import { credentialsFromEnv, StravaClient } from './clients/strava';
import { closeStore, getStore } from './storage';
import { logger } from './utils/logger';

let server: Server | undefined;

// Graceful shutdown handler
const gracefulShutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully...`);

  // Force exit after the timeout (unref to not block process exit)
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional forced shutdown
    process.exit(1);
  }, ServerConfig.shutdownTimeoutMs).unref();

  server?.close(() => {
    logger.info('Server closed');
    closeStore()
      .then(() => {
        // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional server shutdown
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Failed to close database pool', error);
        // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Shutdown failed
        process.exit(1);
      });
  });
};

try {
  // Validate environment before starting
  validateWebhookEnv();
  validateStravaEnv();
  validateDatabaseEnv();

  const app = createApp({
    source: new StravaClient(credentialsFromEnv()),
    store: getStore(),
    verifyToken: process.env[WebhookConfig.verifyTokenEnvVar] ?? '',
  });

  server = app.listen(ServerConfig.port, ServerConfig.host, () => {
    logger.info('Server started', {
      host: ServerConfig.host,
      nodeEnv: process.env.NODE_ENV ?? 'development',
      port: ServerConfig.port,
    });
  });
  server.setTimeout(RequestConfig.timeoutMs);

  process.on('SIGTERM', () => {
    gracefulShutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    gracefulShutdown('SIGINT');
  });
} catch (error) {
  logger.error('Failed to initialize server', error);
  // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Fatal startup error
  process.exit(1);
}
