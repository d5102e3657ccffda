/**
 * Webhook event type definitions.
 */

export type AspectType = 'create' | 'delete' | 'update';

export interface WebhookEvent {
  aspect_type: string;
  object_id: number;
  object_type: string;
  owner_id: number;
  event_time?: number;
  subscription_id?: number;
  updates?: Record<string, unknown>;
}

export type EventAction =
  | 'created'
  | 'deleted'
  | 'fetch_failed'
  | 'ignored'
  | 'not_found'
  | 'skipped'
  | 'updated';

export interface EventOutcome {
  action: EventAction;
  activityId: number;
  aspectType: string;
}
