import 'dotenv/config';

import { loadEnv } from './config';
import { getLogger } from './logger';
import { startWorker } from './worker';

const logger = getLogger();

async function main(): Promise<void> {
  const env = loadEnv();
  const worker = await startWorker(env, logger);
  let stopping = false;

  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) {
      // A second signal gives up on the steps still running; their leases go stale and are reclaimed.
      logger.warn('forced exit while workers were still stopping', { signal });
      process.exit(1);
    }

    stopping = true;

    logger.info('shutting down', { signal });
    worker.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      },
    );
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  logger.error('worker failed to start', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
