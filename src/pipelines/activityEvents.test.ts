import { describe, expect, it } from 'vitest';

import { StoreError, UniqueViolationError } from '../errors';
import { transformActivities } from '../mappers';
import { buildRawActivity, createTestLogger, FakeActivitySource } from '../test/factories';
import { MemoryStore } from '../test/memoryStore';
import { loadActivities } from '../storage/ActivityLoader';
import { handleActivityEvent } from './activityEvents';

import type { WebhookEvent } from '../types';

const TABLE = 'activities';
const log = createTestLogger();

function event(overrides: Partial<WebhookEvent> = {}): WebhookEvent {
  return {
    aspect_type: 'create',
    object_id: 1001,
    object_type: 'activity',
    owner_id: 12_345,
    ...overrides,
  };
}

/** A store whose table already holds the given activities. */
async function seededStore(ids: number[]): Promise<MemoryStore> {
  const store = new MemoryStore();
  const activities = transformActivities(
    ids.map((id) => buildRawActivity({ id })),
    log,
  );
  await loadActivities(activities, { log, store }, { table: TABLE });
  return store;
}

describe('handleActivityEvent', () => {
  it('inserts a new activity on create', async () => {
    const store = await seededStore([1]);
    const source = new FakeActivitySource([buildRawActivity({ id: 1001, name: 'Lunch Ride' })]);

    const outcome = await handleActivityEvent(event(), { log, source, store, table: TABLE });

    expect(outcome).toEqual({ action: 'created', activityId: 1001, aspectType: 'create' });
    expect(store.rows(TABLE).find((row) => row.activity_id === 1001)).toMatchObject({
      athlete_id: 12_345,
      name: 'Lunch Ride',
      pace: '5:00/km',
    });
    expect(store.releases).toBe(store.connections);
  });

  it('skips a create for an activity already stored', async () => {
    const store = await seededStore([1001]);
    const source = new FakeActivitySource([buildRawActivity({ id: 1001, name: 'Renamed' })]);

    const outcome = await handleActivityEvent(event(), { log, source, store, table: TABLE });

    expect(outcome.action).toBe('skipped');
    expect(store.rows(TABLE)).toHaveLength(1);
    expect(store.rows(TABLE)[0].name).toBe('Morning Run');
  });

  it('skips a create for an activity without an athlete id', async () => {
    const store = await seededStore([1]);
    const source = new FakeActivitySource([buildRawActivity({ athlete: {}, id: 1001 })]);

    const outcome = await handleActivityEvent(event(), { log, source, store, table: TABLE });

    expect(outcome.action).toBe('skipped');
    expect(store.rows(TABLE).map((row) => row.activity_id)).toEqual([1]);
  });

  it('treats a unique violation on create as already stored', async () => {
    const store = await seededStore([1]);
    store.options.failInsertWith = new UniqueViolationError('duplicate key value');
    const source = new FakeActivitySource([buildRawActivity({ id: 1001 })]);

    const outcome = await handleActivityEvent(event(), { log, source, store, table: TABLE });

    expect(outcome.action).toBe('skipped');
  });

  it('propagates other store errors', async () => {
    const store = await seededStore([1]);
    store.options.failInsertWith = new StoreError('connection reset');
    const source = new FakeActivitySource([buildRawActivity({ id: 1001 })]);

    await expect(
      handleActivityEvent(event(), { log, source, store, table: TABLE }),
    ).rejects.toThrow('connection reset');
    expect(store.releases).toBe(store.connections);
  });

  it('reports fetch_failed when the activity cannot be fetched', async () => {
    const store = await seededStore([1]);
    const source = new FakeActivitySource([]);

    const outcome = await handleActivityEvent(event(), { log, source, store, table: TABLE });

    expect(outcome.action).toBe('fetch_failed');
    expect(store.rows(TABLE)).toHaveLength(1);
  });

  it('overwrites the stored row on update', async () => {
    const store = await seededStore([1001]);
    const source = new FakeActivitySource([
      buildRawActivity({ id: 1001, distance: 10_000, name: 'Long Run' }),
    ]);

    const outcome = await handleActivityEvent(event({ aspect_type: 'update' }), {
      log,
      source,
      store,
      table: TABLE,
    });

    expect(outcome.action).toBe('updated');
    expect(store.rows(TABLE)[0]).toMatchObject({ distance: 10, name: 'Long Run' });
  });

  it('reports not_found for an update of an unknown activity', async () => {
    const store = await seededStore([1]);
    const source = new FakeActivitySource([buildRawActivity({ id: 1001 })]);

    const outcome = await handleActivityEvent(event({ aspect_type: 'update' }), {
      log,
      source,
      store,
      table: TABLE,
    });

    expect(outcome.action).toBe('not_found');
    expect(store.rows(TABLE)).toHaveLength(1);
  });

  it('deletes without fetching', async () => {
    const store = await seededStore([1001, 2]);
    const source = new FakeActivitySource([]);

    const outcome = await handleActivityEvent(event({ aspect_type: 'delete' }), {
      log,
      source,
      store,
      table: TABLE,
    });

    expect(outcome.action).toBe('deleted');
    expect(source.fetchedIds).toEqual([]);
    expect(store.rows(TABLE).map((row) => row.activity_id)).toEqual([2]);
  });

  it('reports not_found for a delete of an unknown activity', async () => {
    const store = await seededStore([2]);

    const outcome = await handleActivityEvent(event({ aspect_type: 'delete' }), {
      log,
      source: new FakeActivitySource(),
      store,
      table: TABLE,
    });

    expect(outcome.action).toBe('not_found');
  });

  it.each([
    ['athlete', 'update'],
    ['activity', 'archive'],
  ])('ignores %s %s events', async (objectType, aspectType) => {
    const store = await seededStore([1001]);
    const source = new FakeActivitySource([buildRawActivity()]);

    const outcome = await handleActivityEvent(
      event({ aspect_type: aspectType, object_type: objectType }),
      { log, source, store, table: TABLE },
    );

    expect(outcome).toEqual({ action: 'ignored', activityId: 1001, aspectType });
    expect(source.fetchedIds).toEqual([]);
    expect(store.connections).toBe(1);
  });
});
