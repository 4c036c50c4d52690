import {
  type AlertSink,
  Clipline,
  PlanningPoller,
  type QuotaStore,
  type StatusMirror,
  type StepExecutor,
  type TaskStore,
} from '@clipline/core';
import { MemoryQuotaStore, MemoryTaskStore } from '@clipline/memory-datastore';
import { migrateUp, PgSqlClient, PostgresQuotaStore, PostgresTaskStore } from '@clipline/postgres-datastore';
import pg from 'pg';
import type { Logger } from 'winston';

import { logCliplineEvents, logPollerEvents, logWorkerEvents } from './attach-logging';
import { loadResourceCatalog, toWorkerConfiguration, type WorkerEnv } from './config';
import { DiscordAlertSink } from './discord-alert-sink';
import { HttpStepExecutor } from './http-step-executor';
import { NotionClient } from './notion-client';
import { NotionPlanningFeed } from './notion-planning-feed';
import { NotionStatusMirror } from './notion-status-mirror';

export type RunningWorker = {
  clipline: Clipline;
  poller?: PlanningPoller;
  stop(): Promise<void>;
};

export type StartWorkerOverrides = {
  /** Replaces the HTTP step executor built from STEP_SERVICE_URL */
  executor?: StepExecutor;
};

type Stores = { taskStore: TaskStore; quotaStore: QuotaStore; close(): Promise<void> };

async function openStores(env: WorkerEnv, logger: Logger): Promise<Stores> {
  if (!env.DATABASE_URL) {
    logger.warn('DATABASE_URL is not set; tasks are kept in memory and lost on exit');

    return { taskStore: new MemoryTaskStore(), quotaStore: new MemoryQuotaStore(), close: async () => {} };
  }

  const pool = new pg.Pool({ connectionString: env.DATABASE_URL });
  const client = new PgSqlClient(pool);

  if (env.RUN_MIGRATIONS) {
    await migrateUp(client);
    logger.info('database migrations applied');
  }

  return {
    taskStore: new PostgresTaskStore(client),
    quotaStore: new PostgresQuotaStore(client),
    close: () => pool.end(),
  };
}

/**
 * Builds the orchestrator from the environment, registers this process as one worker and starts
 * the claim loops, plus the planning poller when a planning database is configured.
 */
export async function startWorker(
  env: WorkerEnv,
  logger: Logger,
  overrides: StartWorkerOverrides = {},
): Promise<RunningWorker> {
  const stores = await openStores(env, logger);
  const notion = env.NOTION_TOKEN ? new NotionClient({ token: env.NOTION_TOKEN }) : undefined;
  const statusMirror: StatusMirror | undefined = notion ? new NotionStatusMirror(notion) : undefined;
  const alertSink: AlertSink | undefined = env.DISCORD_WEBHOOK_URL
    ? new DiscordAlertSink(env.DISCORD_WEBHOOK_URL)
    : undefined;

  const clipline = new Clipline({
    taskStore: stores.taskStore,
    quotaStore: stores.quotaStore,
    statusMirror,
    alertSink,
    resources: await loadResourceCatalog(env.RESOURCE_POLICIES_PATH),
    quotaTimeZone: env.QUOTA_TIME_ZONE,
    exitTimeoutMs: env.EXIT_TIMEOUT_MS,
  });
  logCliplineEvents(logger, clipline);

  const runtime = clipline.registerWorker({
    workerId: env.WORKER_ID,
    executor:
      overrides.executor ?? new HttpStepExecutor({ baseUrl: env.STEP_SERVICE_URL, token: env.STEP_SERVICE_TOKEN }),
    configuration: toWorkerConfiguration(env),
  });
  logWorkerEvents(logger, runtime, env.WORKER_ID);

  const poller =
    notion && env.NOTION_DATABASE_ID
      ? new PlanningPoller(new NotionPlanningFeed(notion, env.NOTION_DATABASE_ID), clipline.planning, {
          pollIntervalMs: env.PLANNING_POLL_INTERVAL_MS,
        })
      : undefined;

  if (poller) {
    logPollerEvents(logger, poller);
  }

  await clipline.start();
  await poller?.start();

  logger.info('worker started', {
    workerId: env.WORKER_ID,
    concurrency: env.WORKER_CONCURRENCY,
    store: env.DATABASE_URL ? 'postgres' : 'memory',
    planningPoller: poller !== undefined,
  });

  return {
    clipline,
    poller,
    // clipline.stop only resolves once every claim loop has exited, so no step is left using the pool.
    stop: async () => {
      await poller?.stop();
      await clipline.stop();
      await stores.close();
      logger.info('worker stopped', { workerId: env.WORKER_ID });
    },
  };
}
