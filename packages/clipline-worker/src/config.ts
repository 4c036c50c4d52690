import { readFile } from 'node:fs/promises';
import { hostname } from 'node:os';

import {
  type ResourceCatalog,
  ResourceCatalogOverridesSchema,
  resolveResourceCatalog,
  type WorkerConfiguration,
} from '@clipline/core';
import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  // Without a database the worker runs on the in-memory stores
  DATABASE_URL: z.string().url().optional(),
  WORKER_ID: z.string().min(1).optional(),
  STEP_SERVICE_URL: z.string().url(),
  STEP_SERVICE_TOKEN: z.string().min(1).optional(),
  NOTION_TOKEN: z.string().min(1).optional(),
  NOTION_DATABASE_ID: z.string().min(1).optional(),
  DISCORD_WEBHOOK_URL: z.string().url().optional(),
  QUOTA_TIME_ZONE: z.string().min(1).default('UTC'),
  WORKER_CONCURRENCY: positiveInt.default(1),
  IDLE_INTERVAL_MS: positiveInt.default(5_000),
  CLAIM_STALE_TIMEOUT_MS: positiveInt.default(3_600_000),
  STEP_TIMEOUT_MS: positiveInt.default(1_800_000),
  MAX_RETRY_DELAY_MS: positiveInt.default(300_000),
  EXIT_TIMEOUT_MS: positiveInt.default(60_000),
  PLANNING_POLL_INTERVAL_MS: positiveInt.default(60_000),
  FAILURE_ESCALATION_THRESHOLD: positiveInt.default(10),
  RESOURCE_POLICIES_PATH: z.string().min(1).optional(),
  RUN_MIGRATIONS: flag,
});

export type WorkerEnv = z.infer<typeof EnvSchema> & { WORKER_ID: string };

/**
 * Validates the process environment. Empty variables count as unset.
 *
 * @throws {Error} listing every invalid variable
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): WorkerEnv {
  const present = Object.fromEntries(Object.entries(source).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = EnvSchema.safeParse(present);

  if (!parsed.success) {
    const problems = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([name, messages]) => `${name}: ${(messages ?? []).join(', ')}`)
      .join('; ');

    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  return { ...parsed.data, WORKER_ID: parsed.data.WORKER_ID ?? `${hostname()}-${process.pid}` };
}

export function toWorkerConfiguration(env: WorkerEnv): WorkerConfiguration {
  return {
    maxConcurrency: env.WORKER_CONCURRENCY,
    idleIntervalMs: env.IDLE_INTERVAL_MS,
    claimStaleTimeoutMs: env.CLAIM_STALE_TIMEOUT_MS,
    stepTimeoutMs: env.STEP_TIMEOUT_MS,
    maxRetryDelayMs: env.MAX_RETRY_DELAY_MS,
    failureEscalationThreshold: env.FAILURE_ESCALATION_THRESHOLD,
  };
}

/**
 * The default resource catalogue, with per-resource overrides from a JSON file when a path is given.
 */
export async function loadResourceCatalog(path?: string): Promise<ResourceCatalog> {
  if (!path) {
    return resolveResourceCatalog();
  }

  const contents: unknown = JSON.parse(await readFile(path, 'utf8'));
  const overrides = ResourceCatalogOverridesSchema.safeParse(contents);

  if (!overrides.success) {
    throw new Error(`Invalid resource policies in ${path}: ${overrides.error.message}`);
  }

  return resolveResourceCatalog(overrides.data);
}
