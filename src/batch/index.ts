export { BatchRenderer } from './batch-renderer.js';
export type { BatchRunOptions, BatchSummary, BatchFailure, ItemWorkerFactory } from './batch-renderer.js';
export { RunLedger, DEFAULT_FLUSH_SIZE } from './run-ledger.js';
export { processItem, validateItem, resolveItemConfig, itemOutputDir } from './process-item.js';
export { WorkerPool } from './worker-pool.js';
export type { PoolOptions, PoolResult, PoolWorker, WorkerFactory } from './worker-pool.js';
export { ForkedWorker, InProcessWorker, WORKER_ENTRY } from './forked-worker.js';
export type { BatchItem, ItemOutcome, LedgerEntry, WorkerContext } from './types.js';
