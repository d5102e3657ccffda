import { timingSafeEqual } from 'node:crypto';

import type { Request, Response } from 'express';

import { HttpStatus } from '../config';
import { errorMessage } from '../errors';
import { handleActivityEvent } from '../pipelines/activityEvents';
import { debugRequest, debugWebhook } from '../utils/debugLogger';
import { VerificationQuerySchema, WebhookEventSchema } from '../validation/schemas';

import type { ActivitySource } from '../clients/strava';
import type { ActivityStore } from '../storage/types';

export interface WebhookDeps {
  source: ActivitySource;
  store: ActivityStore;
  verifyToken: string;
  table?: string;
}

/**
 * Timing-safe token comparison to prevent timing attacks.
 */
function isValidToken(provided: string, expected: string): boolean {
  if (provided.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(Buffer.from(provided), Buffer.from(expected));
}

export function createWebhookController(deps: WebhookDeps) {
  /**
   * GET /webhook: subscription verification handshake.
   * Echoes hub.challenge when hub.verify_token matches.
   */
  const verifyWebhook = (req: Request, res: Response) => {
    const { log } = req;
    const parsed = VerificationQuerySchema.safeParse(req.query);

    if (!parsed.success) {
      log.warn('Webhook verification missing parameters', {
        errors: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
      res.status(HttpStatus.BAD_REQUEST).json({ error: 'Missing required parameters' });
      return;
    }

    const query = parsed.data;
    if (!isValidToken(query['hub.verify_token'], deps.verifyToken)) {
      log.warn('Webhook verification failed', { mode: query['hub.mode'] });
      res.status(HttpStatus.FORBIDDEN).json({ error: 'Invalid verify token' });
      return;
    }

    log.info('Webhook subscription verified', { mode: query['hub.mode'] });
    res.status(HttpStatus.OK).json({ 'hub.challenge': query['hub.challenge'] });
  };

  /**
   * POST /webhook: one activity event.
   */
  const receiveWebhook = async (req: Request, res: Response) => {
    const { log } = req;
    const timer = log.startTimer('receiveWebhook');
    debugRequest(log, req.body);

    const parsed = WebhookEventSchema.safeParse(req.body);
    if (!parsed.success) {
      log.warn('Invalid webhook event', { errors: parsed.error.issues });
      res.status(HttpStatus.BAD_REQUEST).json({
        details: parsed.error.issues,
        error: 'Invalid webhook event',
      });
      return;
    }

    const event = parsed.data;
    debugWebhook(log, 'Received event', event);

    try {
      const outcome = await handleActivityEvent(event, {
        log,
        source: deps.source,
        store: deps.store,
        table: deps.table,
      });

      timer.end('info', 'Webhook event processed', { ...outcome });
      res.status(HttpStatus.OK).json({ outcome, status: 'ok' });
    } catch (error) {
      log.error('Webhook event failed', error, {
        activityId: event.object_id,
        aspectType: event.aspect_type,
      });
      timer.end('error', 'Webhook event failed');
      res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
        error: 'Failed to process event',
        message: errorMessage(error),
      });
    }
  };

  return { receiveWebhook, verifyWebhook };
}
