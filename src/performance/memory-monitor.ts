/**
 * Memory Monitor
 *
 * Heap/RSS snapshots between rasterization batches, with a console warning
 * once usage passes a threshold.
 */

export interface MemorySnapshot {
  heapUsedMb: number;
  rssMb: number;
  externalMb: number;
  arrayBuffersMb: number;
}

const BYTES_PER_MB = 1024 * 1024;

export class MemoryMonitor {
  constructor(private readonly read: () => NodeJS.MemoryUsage = () => process.memoryUsage()) {}

  snapshot(): MemorySnapshot {
    const mem = this.read();
    return {
      heapUsedMb: mem.heapUsed / BYTES_PER_MB,
      rssMb: mem.rss / BYTES_PER_MB,
      externalMb: mem.external / BYTES_PER_MB,
      arrayBuffersMb: mem.arrayBuffers / BYTES_PER_MB,
    };
  }

  /**
   * Raster pixels live in ArrayBuffers outside the JS heap, so those count
   * toward the threshold too.
   */
  isUnderPressure(thresholdMb: number): boolean {
    const snap = this.snapshot();
    return snap.heapUsedMb + snap.arrayBuffersMb > thresholdMb;
  }

  warnIfHigh(thresholdMb: number, label?: string): boolean {
    if (!this.isUnderPressure(thresholdMb)) return false;
    const snap = this.snapshot();
    const prefix = label ? `[${label}] ` : '';
    console.warn(
      `${prefix}Memory warning: heapUsed=${snap.heapUsedMb.toFixed(1)}MB ` +
      `arrayBuffers=${snap.arrayBuffersMb.toFixed(1)}MB ` +
      `rss=${snap.rssMb.toFixed(1)}MB ` +
      `(threshold: ${thresholdMb}MB)`
    );
    return true;
  }
}
