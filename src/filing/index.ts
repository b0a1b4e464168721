/**
 * Filing barrel: naming, storage period, Drive object store and the routing pipeline.
 */

export { filingConfig } from './config.js';
export { ObjectStoreError } from './types.js';
export type { StoragePeriod, MessageOutcome } from './types.js';
export { buildFilename } from './naming.js';
export { parseCalendarDate } from './router.js';
export { DriveObjectStore, createDriveClient } from './drive-store.js';
export { processMessage, isUnrecoverable } from './pipeline.js';
export type { PipelineContext } from './pipeline.js';
