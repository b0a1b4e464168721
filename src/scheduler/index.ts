export { getScanQueue, closeScanQueue } from './queue.js';
export { runPollCycle } from './poll-cycle.js';
export { createPollDeps } from './runtime.js';
export { createScanWorker, closeScanWorker, getLastPollSummary } from './scan-worker.js';
export { startScanSchedulers } from './monitor.js';
export { parseBackfillArgs, BACKFILL_USAGE } from './backfill-args.js';
