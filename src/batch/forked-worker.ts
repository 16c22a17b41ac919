/**
 * Pool workers
 *
 * `ForkedWorker` runs items in a child process so rasterization and pixel
 * work use every core. `InProcessWorker` runs them on the calling thread
 * (tests, `--workers 0`).
 */

import { fork, type ChildProcess } from 'child_process';
import { fileURLToPath } from 'url';
import { TextRenderer, type TextRendererOptions } from '../pipeline/render-text.js';
import { processItem } from './process-item.js';
import type { ItemOutcome, WorkerContext } from './types.js';
import type { PoolWorker } from './worker-pool.js';

// ─── IPC messages ─────────────────────────────────────────────────────────────

export type ParentMessage =
  | { type: 'init'; context: WorkerContext }
  | { type: 'task'; item: unknown };

export interface ResultMessage {
  type: 'result';
  outcome: ItemOutcome;
}

function isResultMessage(message: unknown): message is ResultMessage {
  return (
    typeof message === 'object' &&
    message !== null &&
    'type' in message &&
    message.type === 'result' &&
    'outcome' in message
  );
}

// Running from TypeScript sources the entry is a .ts file and needs the tsx loader.
const RUNNING_FROM_SOURCE = import.meta.url.endsWith('.ts');

export const WORKER_ENTRY = fileURLToPath(
  new URL(RUNNING_FROM_SOURCE ? './worker-entry.ts' : './worker-entry.js', import.meta.url)
);

// ─── ForkedWorker ─────────────────────────────────────────────────────────────

interface Pending {
  resolve: (outcome: ItemOutcome) => void;
  reject: (err: Error) => void;
}

export class ForkedWorker implements PoolWorker<unknown, ItemOutcome> {
  private readonly child: ChildProcess;
  private pending?: Pending;
  private exited = false;

  constructor(context: WorkerContext, entry: string = WORKER_ENTRY) {
    this.child = fork(entry, [], {
      execArgv: RUNNING_FROM_SOURCE ? [...process.execArgv, '--import', 'tsx'] : process.execArgv,
      stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
    });

    this.child.on('message', (message: unknown) => {
      if (!isResultMessage(message) || !this.pending) return;
      const { resolve } = this.pending;
      this.pending = undefined;
      resolve(message.outcome);
    });

    this.child.on('exit', (code, signal) => {
      this.exited = true;
      this.rejectPending(new Error(`Worker process exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})`));
    });

    this.child.on('error', (err) => {
      this.exited = true;
      this.rejectPending(err);
    });

    this.send({ type: 'init', context });
  }

  get alive(): boolean {
    return !this.exited;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  run(item: unknown): Promise<ItemOutcome> {
    if (this.exited) {
      return Promise.reject(new Error('Worker process is not running'));
    }
    if (this.pending) {
      return Promise.reject(new Error('Worker is already running an item'));
    }
    return new Promise<ItemOutcome>((resolve, reject) => {
      this.pending = { resolve, reject };
      this.send({ type: 'task', item });
    });
  }

  async terminate(): Promise<void> {
    if (this.exited) return;
    const exited = new Promise<void>((resolve) => this.child.once('exit', () => resolve()));
    this.child.kill();
    await exited;
  }

  private send(message: ParentMessage): void {
    this.child.send(message, (err) => {
      if (err) this.rejectPending(err);
    });
  }

  private rejectPending(err: Error): void {
    if (!this.pending) return;
    const { reject } = this.pending;
    this.pending = undefined;
    reject(err);
  }
}

// ─── InProcessWorker ──────────────────────────────────────────────────────────

export class InProcessWorker implements PoolWorker<unknown, ItemOutcome> {
  private readonly renderer: TextRenderer;
  private terminated = false;

  constructor(
    private readonly context: WorkerContext,
    options: TextRendererOptions = {}
  ) {
    this.renderer = new TextRenderer({ memoryWarnMb: context.memoryWarnMb, ...options });
  }

  get alive(): boolean {
    return !this.terminated;
  }

  run(item: unknown): Promise<ItemOutcome> {
    return processItem(item, this.context, this.renderer);
  }

  async terminate(): Promise<void> {
    this.terminated = true;
  }
}

