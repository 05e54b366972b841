import 'dotenv/config';

import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import logger from './logger.js';
import { createService } from './service.js';

const PURGE_INTERVAL_MS = 60 * 60 * 1000;

async function main(): Promise<void> {
  const config = loadConfig();
  const { app, store, orchestrator } = createService(config);

  // Jobs left behind by a previous process are resolved before new work comes in.
  await orchestrator.recover();
  orchestrator.purgeExpired();

  const purgeTimer = setInterval(() => {
    try {
      orchestrator.purgeExpired();
    } catch (err) {
      logger.error('retention purge failed', { error: errorMessage(err) });
    }
  }, PURGE_INTERVAL_MS);
  purgeTimer.unref();

  const server = app.listen(config.port, () => {
    logger.info(`sandbox orchestrator listening on port ${config.port}`, { callbackBase: config.publicBaseUrl });
  });

  let stopping = false;
  const stop = (signal: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`${signal} received: shutting down`);
    clearInterval(purgeTimer);
    server.close();
    orchestrator
      .shutdown({ cancelActiveJobs: config.cancelJobsOnShutdown })
      .catch((err: unknown) => {
        logger.error('shutdown failed', { error: errorMessage(err) });
        process.exitCode = 1;
      })
      .finally(() => {
        store.close?.();
      });
  };

  process.on('SIGTERM', () => stop('SIGTERM'));
  process.on('SIGINT', () => stop('SIGINT'));
}

main().catch((err: unknown) => {
  logger.error('orchestrator failed to start', { error: errorMessage(err) });
  process.exitCode = 1;
});
