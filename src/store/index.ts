export { DedupStore, openDedupStore } from './dedup-store.js';
export type { InvoiceRecord, InvoiceRecordInput } from './types.js';
