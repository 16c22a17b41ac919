/**
 * Batch types
 */

import type { ResolvedLayer } from '../config/types.js';
import type { SerializedError } from '../errors/error-handler.js';

/** One unit of work from the input JSON array. Extra fields are carried into the ledger. */
export interface BatchItem {
  identifier: string;
  content: string;
  config?: Record<string, unknown> | null;
  [field: string]: unknown;
}

/** One ledger line: the item as read, plus the pages produced for it. */
export interface LedgerEntry extends BatchItem {
  image_paths: string[];
}

/**
 * Read-only state every worker shares. Fixed when the pool starts and
 * never mutated afterwards.
 */
export interface WorkerContext {
  readonly sharedLayer: ResolvedLayer;
  readonly outputDir: string;
  readonly recover: boolean;
  readonly memoryWarnMb?: number;
}

export type ItemOutcome =
  | { status: 'rendered'; entry: LedgerEntry }
  | { status: 'skipped'; entry: LedgerEntry }
  | { status: 'failed'; identifier?: string; error: SerializedError };
