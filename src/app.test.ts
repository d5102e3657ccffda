import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { createApp } from './app';
import { getSafeQuery } from './middleware/requestLogger';
import { buildRawActivity, FakeActivitySource } from './test/factories';
import { MemoryStore } from './test/memoryStore';

import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';

const VERIFY_TOKEN = 'test-verify-token';

describe('createApp', () => {
  const store = new MemoryStore();
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    store.defineTable(
      'activities',
      { activity_id: 'bigint', athlete_id: 'bigint' },
      ['athlete_id', 'activity_id'],
    );
    const app = createApp({
      source: new FakeActivitySource([buildRawActivity({ id: 1001 })]),
      store,
      table: 'activities',
      verifyToken: VERIFY_TOKEN,
    });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => {
        resolve(listening);
      });
    });
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server did not bind to a TCP port');
    }
    baseUrl = `http://127.0.0.1:${String(address.port)}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  });

  it('answers GET /', async () => {
    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ message: 'Activity sync webhook server' });
  });

  it('answers GET /health', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ status: 'healthy' });
  });

  it('verifies the webhook subscription', async () => {
    const query = new URLSearchParams({
      'hub.challenge': 'abc123',
      'hub.mode': 'subscribe',
      'hub.verify_token': VERIFY_TOKEN,
    });

    const response = await fetch(`${baseUrl}/webhook?${query.toString()}`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ 'hub.challenge': 'abc123' });
  });

  it('parses a JSON event and stores the activity', async () => {
    const response = await fetch(`${baseUrl}/webhook`, {
      body: JSON.stringify({
        aspect_type: 'create',
        object_id: 1001,
        object_type: 'activity',
        owner_id: 12_345,
      }),
      headers: { 'Content-Type': 'application/json' },
      method: 'POST',
    });

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({
      outcome: { action: 'created', activityId: 1001, aspectType: 'create' },
      status: 'ok',
    });
    expect(store.rows('activities').map((row) => row.activity_id)).toEqual([1001]);
  });

  it('answers 404 for unknown routes', async () => {
    const response = await fetch(`${baseUrl}/missing`);

    expect(response.status).toBe(404);
  });
});

describe('getSafeQuery', () => {
  it('masks the verify token', () => {
    expect(
      getSafeQuery({ 'hub.challenge': 'abc123', 'hub.verify_token': VERIFY_TOKEN }),
    ).toEqual({ 'hub.challenge': 'abc123', 'hub.verify_token': '****' });
  });

  it('returns undefined for an empty query', () => {
    expect(getSafeQuery({})).toBeUndefined();
  });
});
