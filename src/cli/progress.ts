/**
 * ProgressReporter
 *
 * Structured console output for rendering runs.
 */

export interface RunSummary {
  processed: number;
  skipped: number;
  failed: number;
  cancelled: number;
}

export class ProgressReporter {
  logInfo(message: string): void {
    console.log(`ℹ️  ${message}`);
  }

  warn(message: string): void {
    console.warn(`⚠️  ${message}`);
  }

  itemRendered(identifier: string, pages: number, done: number, total: number): void {
    console.log(`✅ [${done}/${total}] ${identifier}: generated ${pages} page${pages === 1 ? '' : 's'}`);
  }

  itemSkipped(identifier: string, done: number, total: number): void {
    console.log(`⏭️  [${done}/${total}] ${identifier}: output exists, skipped`);
  }

  itemFailed(identifier: string | undefined, err: Error, done: number, total: number): void {
    console.error(`❌ [${done}/${total}] ${identifier ?? '<no identifier>'}: ${err.message}`);
  }

  summary(summary: RunSummary): void {
    const parts = [
      `${summary.processed} processed`,
      `${summary.skipped} skipped`,
      `${summary.failed} failed`,
    ];
    if (summary.cancelled > 0) parts.push(`${summary.cancelled} not started`);
    console.log(`ℹ️  Done: ${parts.join(', ')}`);
  }
}
