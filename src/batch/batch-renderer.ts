/**
 * Batch Orchestrator
 *
 * Maps the single-item pipeline over a worker pool. Results arrive in
 * completion order; the orchestrator alone writes the ledger, a batch of
 * entries at a time.
 *
 * Resume: with `recover`, items already in the ledger are dropped up front,
 * and any item whose output directory exists is skipped by its worker. The
 * directory check is the authoritative one.
 */

import os from 'os';
import path from 'path';
import { mkdir, readFile, rm } from 'fs/promises';
import { ProgressReporter } from '../cli/progress.js';
import { ConfigManager } from '../config/config.js';
import { finalizeConfig } from '../config/resolver.js';
import type { ResolvedLayer } from '../config/types.js';
import { BatchError, ErrorHandler, type SerializedError } from '../errors/index.js';
import { assertFontAvailable } from '../pipeline/render-text.js';
import { ForkedWorker } from './forked-worker.js';
import { RunLedger, DEFAULT_FLUSH_SIZE } from './run-ledger.js';
import type { ItemOutcome, WorkerContext } from './types.js';
import { WorkerPool, type PoolWorker } from './worker-pool.js';

export interface BatchRunOptions {
  /** JSON array of `{ identifier, content, config? }` */
  inputPath: string;
  outputDir: string;
  ledgerPath: string;
  /** Shared config file. Ignored when `sharedLayer` is given. */
  configPath?: string;
  sharedLayer?: ResolvedLayer;
  /** Worker processes (default: number of CPUs) */
  workers?: number;
  /** Skip items that already have output instead of starting from scratch. */
  recover?: boolean;
  /** Ledger entries per append (default: 100) */
  flushSize?: number;
  /** Per-item time limit in ms */
  timeoutMs?: number;
  /** Stops dispatching new items once aborted. */
  signal?: AbortSignal;
  memoryWarnMb?: number;
}

export interface BatchFailure {
  identifier?: string;
  error: SerializedError;
}

export interface BatchSummary {
  total: number;
  processed: number;
  skipped: number;
  failed: number;
  /** Items never dispatched because the run was aborted. */
  cancelled: number;
  failures: BatchFailure[];
}

export type ItemWorkerFactory = (context: WorkerContext) => PoolWorker<unknown, ItemOutcome>;

const forkWorker: ItemWorkerFactory = (context) => new ForkedWorker(context);

function identifierOf(item: unknown): string | undefined {
  if (typeof item === 'object' && item !== null && 'identifier' in item) {
    return typeof item.identifier === 'string' ? item.identifier : undefined;
  }
  return undefined;
}

export class BatchRenderer {
  constructor(
    private readonly reporter: ProgressReporter = new ProgressReporter(),
    private readonly workerFactory: ItemWorkerFactory = forkWorker
  ) {}

  async run(options: BatchRunOptions): Promise<BatchSummary> {
    const sharedLayer = this.loadSharedLayer(options);
    const recover = options.recover ?? false;
    const ledger = new RunLedger(options.ledgerPath, options.flushSize ?? DEFAULT_FLUSH_SIZE);

    await this.prepareOutput(options.outputDir, ledger, recover);
    let items = await this.loadItems(options.inputPath);

    if (recover) {
      const done = ledger.readCompletedIds();
      if (done.size > 0) this.reporter.logInfo(`Found ${done.size} already processed items`);
      items = items.filter((item) => {
        const id = identifierOf(item);
        return id === undefined || !done.has(id);
      });
    }

    const summary: BatchSummary = {
      total: items.length,
      processed: 0,
      skipped: 0,
      failed: 0,
      cancelled: 0,
      failures: [],
    };

    this.reporter.logInfo(`Remaining items to process: ${items.length}`);
    if (items.length === 0) {
      this.reporter.logInfo('All items processed');
      return summary;
    }

    const context: WorkerContext = Object.freeze({
      sharedLayer: Object.freeze({ ...sharedLayer }),
      outputDir: options.outputDir,
      recover,
      memoryWarnMb: options.memoryWarnMb,
    });

    const pool = new WorkerPool<unknown, ItemOutcome>(() => this.workerFactory(context), {
      size: options.workers ?? os.cpus().length,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    });

    let done = 0;
    try {
      for await (const result of pool.imapUnordered(items)) {
        done++;
        const outcome: ItemOutcome = result.output ?? {
          status: 'failed',
          identifier: identifierOf(result.input),
          error: ErrorHandler.serialize(result.error),
        };

        switch (outcome.status) {
          case 'rendered':
            summary.processed++;
            this.reporter.itemRendered(outcome.entry.identifier, outcome.entry.image_paths.length, done, items.length);
            await ledger.record(outcome.entry);
            break;
          case 'skipped':
            summary.skipped++;
            this.reporter.itemSkipped(outcome.entry.identifier, done, items.length);
            await ledger.record(outcome.entry);
            break;
          case 'failed':
            summary.failed++;
            summary.failures.push({ identifier: outcome.identifier, error: outcome.error });
            this.reporter.itemFailed(outcome.identifier, ErrorHandler.revive(outcome.error), done, items.length);
            break;
        }
      }
    } finally {
      await ledger.flush();
    }

    summary.cancelled = items.length - done;
    this.reporter.summary(summary);
    return summary;
  }

  /** Shared config is checked once, before any item is dispatched. */
  private loadSharedLayer(options: BatchRunOptions): ResolvedLayer {
    let layer = options.sharedLayer;
    if (!layer) {
      if (!options.configPath) {
        throw new BatchError('A config file is required for batch runs');
      }
      layer = new ConfigManager(options.configPath).loadWithEnvOverrides();
    }
    // Items may override the font; each one is checked again when it renders.
    assertFontAvailable(finalizeConfig(layer));
    return layer;
  }

  /** A fresh run clears previous output; a recovery run keeps it. */
  private async prepareOutput(outputDir: string, ledger: RunLedger, recover: boolean): Promise<void> {
    try {
      if (!recover) {
        await rm(outputDir, { recursive: true, force: true });
        await ledger.remove();
      }
      await mkdir(outputDir, { recursive: true });
      await mkdir(path.dirname(ledger.path), { recursive: true });
    } catch (err) {
      throw new BatchError(`Cannot prepare output directory ${outputDir}: ${(err as Error).message}`, {
        outputDir,
      });
    }
  }

  private async loadItems(inputPath: string): Promise<unknown[]> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(inputPath, 'utf-8'));
    } catch (err) {
      throw new BatchError(`Cannot read input ${inputPath}: ${(err as Error).message}`, { inputPath });
    }
    if (!Array.isArray(parsed)) {
      throw new BatchError(`Input ${inputPath} must be a JSON array of items`, { inputPath });
    }
    return parsed;
  }
}
