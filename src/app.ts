import express from 'express';

import { HttpStatus, ServerConfig } from './config';
import { requestLogger } from './middleware/requestLogger';
import { createWebhookRouter } from './routes/webhook';

import type { WebhookDeps } from './controllers/webhook';

/**
 * Build the webhook server. Dependencies are passed in so tests can run the
 * routes against fakes.
 */
export function createApp(deps: WebhookDeps): express.Express {
  const app = express();
  app.disable('x-powered-by'); // Prevent version disclosure

  app.use(express.json({ limit: ServerConfig.bodyLimit }));

  // Add request logging middleware (before routes)
  app.use(requestLogger);

  app.get('/', (_req: express.Request, res: express.Response) => {
    res.status(HttpStatus.OK).json({ message: 'Activity sync webhook server' });
  });

  // Health check endpoint
  app.get('/health', (_req: express.Request, res: express.Response) => {
    res.status(HttpStatus.OK).json({ status: 'healthy' });
  });

  app.use('/webhook', createWebhookRouter(deps));

  return app;
}
