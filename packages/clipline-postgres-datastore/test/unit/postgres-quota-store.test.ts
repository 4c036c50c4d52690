import { Resource } from '@clipline/core';
import { PGlite } from '@electric-sql/pglite';
import { afterAll, beforeAll, beforeEach, describe, expect, test } from 'vitest';

import { migrateUp } from '../../src/migration';
import { PostgresQuotaStore } from '../../src/postgres-quota-store';
import { pgliteClient } from '../helpers/pglite-client';

describe('PostgresQuotaStore', () => {
  let pglite: PGlite;
  let store: PostgresQuotaStore;

  const key = { channelId: 'channel-a', resource: Resource.GEMINI, day: '2025-03-10' };

  beforeAll(async () => {
    pglite = new PGlite();
    const client = pgliteClient(pglite);
    await migrateUp(client);
    store = new PostgresQuotaStore(client);
  });

  beforeEach(async () => {
    await pglite.exec('DELETE FROM clipline_quota_usage');
  });

  afterAll(async () => {
    await pglite.close();
  });

  test('should return undefined before anything was spent', async () => {
    await expect(store.get(key)).resolves.toBeUndefined();
  });

  test('should create the record on the first increment and add to it afterwards', async () => {
    const first = await store.increment({ ...key, cost: 22, dailyLimit: 500 });
    const second = await store.increment({ ...key, cost: 22, dailyLimit: 900 });

    expect(first).toMatchObject({ ...key, unitsUsed: 22, dailyLimit: 500 });
    expect(second).toMatchObject({ ...key, unitsUsed: 44, dailyLimit: 500 });
    await expect(store.get(key)).resolves.toMatchObject({ unitsUsed: 44, dailyLimit: 500 });
  });

  test('should add up concurrent increments', async () => {
    await Promise.all(Array.from({ length: 5 }, () => store.increment({ ...key, cost: 18, dailyLimit: 180 })));

    await expect(store.get(key)).resolves.toMatchObject({ unitsUsed: 90 });
  });

  test('should keep days, channels and resources apart', async () => {
    await store.increment({ ...key, cost: 22, dailyLimit: 500 });

    await expect(store.get({ ...key, day: '2025-03-11' })).resolves.toBeUndefined();
    await expect(store.get({ ...key, channelId: 'channel-b' })).resolves.toBeUndefined();
    await expect(store.get({ ...key, resource: Resource.KLING })).resolves.toBeUndefined();
  });
});
