import { Router } from 'express';

import { createWebhookController } from '../controllers/webhook';

import type { WebhookDeps } from '../controllers/webhook';

export function createWebhookRouter(deps: WebhookDeps): Router {
  const router = Router();
  const { receiveWebhook, verifyWebhook } = createWebhookController(deps);

  router.get('/', verifyWebhook);
  router.post('/', receiveWebhook);

  return router;
}
