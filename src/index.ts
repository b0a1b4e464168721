/**
 * Application Entry Point
 *
 * Runs the health server, the scan worker and the job schedulers in one
 * process. One job runs at a time.
 *
 * Startup:
 * 1. Log environment configuration
 * 2. Open the Dedup Store
 * 3. Start Express server on configured port
 * 4. Start the scan worker and upsert the poll and report schedulers
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Abort the running poll cycle (it stops between messages)
 * 2. Stop accepting new HTTP connections
 * 3. Close the worker, then the queue
 * 4. Close the database and exit
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import 'dotenv/config';
import { appConfig } from './config.js';
import { routingRules } from './rules.js';
import {
  closeScanQueue,
  closeScanWorker,
  createPollDeps,
  createScanWorker,
  getScanQueue,
  startScanSchedulers,
} from './scheduler/index.js';
import { createApp } from './server/index.js';
import { openDedupStore } from './store/index.js';

async function main() {
  console.log('[startup] Invoice mail router starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Kill switch:', appConfig.killSwitch ? 'ACTIVE' : 'inactive');
  console.log('[startup] Routing rules loaded', {
    whitelistedSenders: routingRules.whitelistedSenders.length,
    subjectKeywords: routingRules.subjectKeywords.length,
    linkKeywords: routingRules.linkKeywords.length,
  });

  const dedupStore = openDedupStore();
  console.log('[startup] Last message processed at', dedupStore.getLastProcessedAt()?.toISOString() ?? 'never');
  const shutdownController = new AbortController();

  const app = createApp();
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  createScanWorker({
    dedupStore,
    rules: routingRules,
    createPollDeps,
    signal: shutdownController.signal,
  });

  await startScanSchedulers(getScanQueue());

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[shutdown] Received ${signal}, shutting down gracefully...`);

    shutdownController.abort();

    server.close(() => {
      console.log('[shutdown] HTTP server closed');
    });

    await closeScanWorker();
    console.log('[shutdown] Scan worker closed');

    await closeScanQueue();
    console.log('[shutdown] Queue closed');

    dedupStore.close();
    console.log('[shutdown] Database closed');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error('[shutdown] Error during shutdown:', err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
