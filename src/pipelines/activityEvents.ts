/**
 * Single-activity sync driven by webhook events.
 *
 * - create: fetch → transform → insert unless an activity with that id exists
 * - update: fetch → transform → update by activity id, no existence check
 * - delete: delete by activity id
 *
 * Zero rows affected by an update or delete is logged, not raised. Two creates
 * racing for the same id are settled by the table's primary key: the losing
 * insert's unique violation is treated as "already stored".
 */

import { LoaderConfig, WebhookConfig } from '../config';
import { UniqueViolationError } from '../errors';
import { ACTIVITY_COLUMNS, transformActivities } from '../mappers';
import { debugWebhook } from '../utils/debugLogger';

import type { ActivitySource } from '../clients/strava';
import type { ActivityStore, StoreSession } from '../storage/types';
import type { AspectType, EventAction, EventOutcome, NormalizedActivity, WebhookEvent } from '../types';
import type { Logger } from '../utils/logger';

export interface EventPipelineDeps {
  log: Logger;
  source: ActivitySource;
  store: ActivityStore;
  table?: string;
}

const ASPECT_TYPES = new Set<string>(['create', 'delete', 'update'] satisfies AspectType[]);

function isAspectType(value: string): value is AspectType {
  return ASPECT_TYPES.has(value);
}

async function withSession<T>(
  store: ActivityStore,
  work: (session: StoreSession) => Promise<T>,
): Promise<T> {
  const session = await store.connect();
  try {
    return await work(session);
  } finally {
    session.release();
  }
}

/**
 * Fetch and normalize one activity; null when the API has nothing for this id.
 */
async function fetchNormalized(
  activityId: number,
  deps: EventPipelineDeps,
): Promise<NormalizedActivity | null> {
  const raw = await deps.source.fetchActivity(activityId);
  if (!raw) {
    deps.log.warn('Failed to fetch activity', { activityId });
    return null;
  }
  const [activity] = transformActivities([raw], deps.log);
  return activity;
}

export async function createActivity(
  activityId: number,
  deps: EventPipelineDeps,
): Promise<EventAction> {
  const { log } = deps;
  const table = deps.table ?? LoaderConfig.table;

  const activity = await fetchNormalized(activityId, deps);
  if (!activity) return 'fetch_failed';

  // athlete_id is part of the primary key
  if (activity.athlete_id === null) {
    log.warn('Activity has no athlete id, skipping insert', { activityId });
    return 'skipped';
  }

  return withSession(deps.store, async (session) => {
    if (await session.findActivity(table, activityId)) {
      log.info('Activity already exists, skipping insert', { activityId });
      return 'skipped';
    }

    try {
      await session.insertRows(table, ACTIVITY_COLUMNS, [activity]);
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        log.info('Activity inserted concurrently, skipping', { activityId });
        return 'skipped';
      }
      throw error;
    }

    log.info('Stored activity', { activityId, athleteId: activity.athlete_id });
    return 'created';
  });
}

export async function updateActivity(
  activityId: number,
  deps: EventPipelineDeps,
): Promise<EventAction> {
  const { log } = deps;
  const table = deps.table ?? LoaderConfig.table;

  const activity = await fetchNormalized(activityId, deps);
  if (!activity) return 'fetch_failed';

  const updated = await withSession(deps.store, (session) =>
    session.updateByActivityId(table, activity),
  );

  if (updated === 0) {
    log.warn('Update matched no stored activity', { activityId });
    return 'not_found';
  }

  log.info('Updated activity', { activityId });
  return 'updated';
}

export async function deleteActivity(
  activityId: number,
  deps: EventPipelineDeps,
): Promise<EventAction> {
  const { log } = deps;
  const table = deps.table ?? LoaderConfig.table;

  const deleted = await withSession(deps.store, (session) =>
    session.deleteByActivityId(table, activityId),
  );

  if (deleted === 0) {
    log.warn('Delete matched no stored activity', { activityId });
    return 'not_found';
  }

  log.info('Deleted activity', { activityId });
  return 'deleted';
}

const ASPECT_HANDLERS: Record<
  AspectType,
  (activityId: number, deps: EventPipelineDeps) => Promise<EventAction>
> = {
  create: createActivity,
  delete: deleteActivity,
  update: updateActivity,
};

/**
 * Route one webhook event. Events for other object types and unknown aspect
 * types are ignored. Fetch and store errors propagate to the caller.
 */
export async function handleActivityEvent(
  event: WebhookEvent,
  deps: EventPipelineDeps,
): Promise<EventOutcome> {
  const activityId = event.object_id;
  const aspectType = event.aspect_type;
  const log = deps.log.child(undefined, { activityId, aspectType });
  const scoped = { ...deps, log };

  if (event.object_type !== WebhookConfig.activityObjectType || !isAspectType(aspectType)) {
    debugWebhook(log, 'Ignoring event', event);
    return { action: 'ignored', activityId, aspectType };
  }

  log.info('Processing activity event', { athleteId: event.owner_id });

  const action = await ASPECT_HANDLERS[aspectType](activityId, scoped);

  return { action, activityId, aspectType };
}
