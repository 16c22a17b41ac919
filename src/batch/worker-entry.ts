/**
 * Child-process entry for `ForkedWorker`.
 *
 * Receives the frozen worker context once, then one item at a time.
 */

import { TextRenderer } from '../pipeline/render-text.js';
import type { ParentMessage, ResultMessage } from './forked-worker.js';
import { processItem } from './process-item.js';
import type { WorkerContext } from './types.js';

let context: WorkerContext | undefined;
let renderer: TextRenderer | undefined;

function isParentMessage(message: unknown): message is ParentMessage {
  return (
    typeof message === 'object' &&
    message !== null &&
    'type' in message &&
    (message.type === 'init' || message.type === 'task')
  );
}

function reply(message: ResultMessage): void {
  process.send?.(message);
}

async function handle(message: ParentMessage): Promise<void> {
  if (message.type === 'init') {
    context = Object.freeze({ ...message.context });
    renderer = new TextRenderer({ memoryWarnMb: context.memoryWarnMb });
    return;
  }

  if (!context || !renderer) {
    reply({
      type: 'result',
      outcome: {
        status: 'failed',
        error: { name: 'Error', code: 'WORKER_NOT_READY', message: 'Worker received a task before init' },
      },
    });
    return;
  }

  reply({ type: 'result', outcome: await processItem(message.item, context, renderer) });
}

process.on('message', (message: unknown) => {
  if (!isParentMessage(message)) return;
  handle(message).catch((err: unknown) => {
    console.error('Worker failure:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
});

// Exit with the parent.
process.on('disconnect', () => process.exit(0));

// Ctrl-C reaches the whole process group. The parent stops dispatching and
// this worker finishes its item; it is shut down through `terminate`.
process.on('SIGINT', () => {});
