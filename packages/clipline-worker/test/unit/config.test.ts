import { fileURLToPath } from 'node:url';

import { DEFAULT_RESOURCE_POLICIES, Resource } from '@clipline/core';

import { loadEnv, loadResourceCatalog, toWorkerConfiguration } from '../../src/config';

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

const baseEnv = { STEP_SERVICE_URL: 'http://steps.test' };

describe('loadEnv', () => {
  test('applies defaults', () => {
    const env = loadEnv({ ...baseEnv, WORKER_ID: 'worker-a' });

    expect(env).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      WORKER_ID: 'worker-a',
      STEP_SERVICE_URL: 'http://steps.test',
      QUOTA_TIME_ZONE: 'UTC',
      WORKER_CONCURRENCY: 1,
      IDLE_INTERVAL_MS: 5_000,
      CLAIM_STALE_TIMEOUT_MS: 3_600_000,
      STEP_TIMEOUT_MS: 1_800_000,
      PLANNING_POLL_INTERVAL_MS: 60_000,
      FAILURE_ESCALATION_THRESHOLD: 10,
      RUN_MIGRATIONS: false,
    });
  });

  test('coerces numbers and flags', () => {
    const env = loadEnv({ ...baseEnv, WORKER_CONCURRENCY: '4', RUN_MIGRATIONS: '1', STEP_TIMEOUT_MS: '60000' });

    expect(env.WORKER_CONCURRENCY).toBe(4);
    expect(env.RUN_MIGRATIONS).toBe(true);
    expect(env.STEP_TIMEOUT_MS).toBe(60_000);
  });

  test('treats empty variables as unset', () => {
    const env = loadEnv({ ...baseEnv, DATABASE_URL: '', QUOTA_TIME_ZONE: '' });

    expect(env.DATABASE_URL).toBeUndefined();
    expect(env.QUOTA_TIME_ZONE).toBe('UTC');
  });

  test('derives a worker id from the host when none is set', () => {
    const env = loadEnv(baseEnv);

    expect(env.WORKER_ID).toMatch(new RegExp(`-${process.pid}$`));
  });

  test('lists every invalid variable', () => {
    expect(() => loadEnv({ WORKER_CONCURRENCY: '0' })).toThrow(
      /^Invalid environment configuration: STEP_SERVICE_URL: Required; WORKER_CONCURRENCY: /,
    );
  });
});

describe('toWorkerConfiguration', () => {
  test('maps the environment onto the worker settings', () => {
    const env = loadEnv({ ...baseEnv, WORKER_CONCURRENCY: '3', CLAIM_STALE_TIMEOUT_MS: '900000' });

    expect(toWorkerConfiguration(env)).toEqual({
      maxConcurrency: 3,
      idleIntervalMs: 5_000,
      claimStaleTimeoutMs: 900_000,
      stepTimeoutMs: 1_800_000,
      maxRetryDelayMs: 300_000,
      failureEscalationThreshold: 10,
    });
  });
});

describe('loadResourceCatalog', () => {
  test('returns the defaults without a file', async () => {
    await expect(loadResourceCatalog()).resolves.toEqual(DEFAULT_RESOURCE_POLICIES);
  });

  test('merges per-resource overrides from a file', async () => {
    const catalog = await loadResourceCatalog(fixture('resource-policies.json'));

    expect(catalog[Resource.GEMINI]).toEqual({ unitCost: 22, dailyLimit: 1_000, maxConcurrentPerWorker: 2 });
    expect(catalog[Resource.KLING]).toEqual({ unitCost: 20, dailyLimit: 180, maxConcurrentPerWorker: 1 });
    expect(catalog[Resource.YOUTUBE]).toEqual(DEFAULT_RESOURCE_POLICIES[Resource.YOUTUBE]);
  });

  test('rejects invalid overrides', async () => {
    const path = fixture('invalid-resource-policies.json');

    await expect(loadResourceCatalog(path)).rejects.toThrow(`Invalid resource policies in ${path}`);
  });
});
