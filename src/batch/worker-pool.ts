/**
 * Worker Pool
 *
 * Fixed-size pool that runs one input per worker at a time and yields results
 * in completion order, not submission order. Failures are captured per input;
 * the pool keeps going.
 *
 * A per-input timeout terminates the worker that ran it and replaces it with
 * a fresh one. Aborting the signal stops dispatch of inputs that have not
 * started; inputs already running are allowed to finish.
 */

import { ItemTimeoutError } from '../errors/index.js';

export interface PoolWorker<TInput, TOutput> {
  /** False once the worker has exited or been terminated. */
  readonly alive: boolean;
  run(input: TInput): Promise<TOutput>;
  terminate(): Promise<void>;
}

export type WorkerFactory<TInput, TOutput> = () => PoolWorker<TInput, TOutput>;

export interface PoolOptions {
  /** Number of workers (default: 4) */
  size?: number;
  /** Per-input time limit in ms; unset means no limit */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface PoolResult<TInput, TOutput> {
  input: TInput;
  output?: TOutput;
  error?: Error;
}

interface Settled<TInput, TOutput> {
  id: number;
  /** Worker to hand the next input to; absent when it had to be discarded. */
  worker?: PoolWorker<TInput, TOutput>;
  result: PoolResult<TInput, TOutput>;
}

export class WorkerPool<TInput, TOutput> {
  private readonly size: number;
  private readonly timeoutMs?: number;
  private readonly signal?: AbortSignal;
  private readonly workers = new Set<PoolWorker<TInput, TOutput>>();

  constructor(
    private readonly factory: WorkerFactory<TInput, TOutput>,
    options: PoolOptions = {}
  ) {
    this.size = Math.max(1, Math.floor(options.size ?? 4));
    this.timeoutMs = options.timeoutMs;
    this.signal = options.signal;
  }

  /**
   * Dispatch `inputs` across the pool and yield each result as soon as it
   * settles. All workers are torn down when iteration ends.
   */
  async *imapUnordered(inputs: Iterable<TInput>): AsyncGenerator<PoolResult<TInput, TOutput>> {
    const queue = [...inputs];
    const idle: Array<PoolWorker<TInput, TOutput>> = [];
    const inFlight = new Map<number, Promise<Settled<TInput, TOutput>>>();
    let nextId = 0;

    const dispatch = (): void => {
      while (inFlight.size < this.size && queue.length > 0 && !this.signal?.aborted) {
        const input = queue.shift();
        if (input === undefined) break;
        const worker = idle.pop() ?? this.spawn();
        const id = nextId++;
        inFlight.set(id, this.runOne(id, worker, input));
      }
    };

    try {
      dispatch();
      while (inFlight.size > 0) {
        const settled = await Promise.race(inFlight.values());
        inFlight.delete(settled.id);
        if (settled.worker?.alive) idle.push(settled.worker);
        yield settled.result;
        dispatch();
      }
    } finally {
      await this.close();
    }
  }

  /** Terminate every worker the pool has started. */
  async close(): Promise<void> {
    const workers = [...this.workers];
    this.workers.clear();
    await Promise.all(workers.map((w) => w.terminate()));
  }

  private spawn(): PoolWorker<TInput, TOutput> {
    const worker = this.factory();
    this.workers.add(worker);
    return worker;
  }

  private async runOne(
    id: number,
    worker: PoolWorker<TInput, TOutput>,
    input: TInput
  ): Promise<Settled<TInput, TOutput>> {
    let timer: NodeJS.Timeout | undefined;
    try {
      const task = worker.run(input);
      const output = this.timeoutMs === undefined
        ? await task
        : await Promise.race([
            task,
            new Promise<never>((_, reject) => {
              const ms = this.timeoutMs ?? 0;
              timer = setTimeout(() => {
                reject(new ItemTimeoutError(`Task timed out after ${ms}ms`, ms));
              }, ms);
            }),
          ]);
      return { id, worker, result: { input, output } };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (err instanceof ItemTimeoutError || !worker.alive) {
        // A timed-out worker may still be busy; a dead one cannot be reused.
        this.workers.delete(worker);
        await worker.terminate();
        return { id, result: { input, error } };
      }
      return { id, worker, result: { input, error } };
    } finally {
      clearTimeout(timer);
    }
  }
}
