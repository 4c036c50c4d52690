export { logCliplineEvents, logPollerEvents, logWorkerEvents } from './attach-logging';
export { EnvSchema, loadEnv, loadResourceCatalog, toWorkerConfiguration, type WorkerEnv } from './config';
export { DiscordAlertSink } from './discord-alert-sink';
export { HttpStepExecutor, type HttpStepExecutorConfig, parseRetryAfter } from './http-step-executor';
export { getLogger } from './logger';
export { NOTION_API_URL, NOTION_VERSION, NotionApiError, NotionClient, type NotionClientConfig } from './notion-client';
export { NotionPlanningFeed, type NotionPropertyNames } from './notion-planning-feed';
export { NotionStatusMirror } from './notion-status-mirror';
export { type RunningWorker, startWorker, type StartWorkerOverrides } from './worker';
