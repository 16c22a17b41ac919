/**
 * Run Ledger
 *
 * Append-only NDJSON record of finished items. Entries are buffered and
 * appended `flushSize` at a time; a crash loses at most the unflushed buffer,
 * which a recovery run rediscovers from the output directories anyway.
 */

import fs from 'fs';
import { appendFile, rm } from 'fs/promises';
import { BatchError } from '../errors/index.js';
import type { LedgerEntry } from './types.js';

export const DEFAULT_FLUSH_SIZE = 100;

export class RunLedger {
  private buffer: LedgerEntry[] = [];
  private written = 0;

  constructor(
    readonly path: string,
    private readonly flushSize: number = DEFAULT_FLUSH_SIZE
  ) {}

  /** Entries recorded but not yet on disk. */
  get pending(): number {
    return this.buffer.length;
  }

  /** Entries appended to the file by this instance. */
  get flushed(): number {
    return this.written;
  }

  /**
   * Identifiers already present in the ledger file. Lines that do not parse
   * (e.g. a torn final line after a crash) are ignored.
   */
  readCompletedIds(): Set<string> {
    const ids = new Set<string>();
    if (!fs.existsSync(this.path)) return ids;

    for (const line of fs.readFileSync(this.path, 'utf-8').split('\n')) {
      if (!line.trim()) continue;
      try {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === 'object' && parsed !== null && 'identifier' in parsed) {
          const id = parsed.identifier;
          if (typeof id === 'string') ids.add(id);
        }
      } catch {
        continue;
      }
    }
    return ids;
  }

  async record(entry: LedgerEntry): Promise<void> {
    this.buffer.push(entry);
    if (this.buffer.length >= this.flushSize) {
      await this.flush();
    }
  }

  /**
   * Append everything buffered; returns the number of lines written. A failed
   * append keeps the entries buffered for the next flush.
   */
  async flush(): Promise<number> {
    if (this.buffer.length === 0) return 0;
    const batch = this.buffer;
    this.buffer = [];
    try {
      await appendFile(this.path, batch.map((e) => JSON.stringify(e) + '\n').join(''), 'utf-8');
    } catch (err) {
      this.buffer = batch.concat(this.buffer);
      throw new BatchError(`Cannot write ledger ${this.path}: ${(err as Error).message}`, {
        ledgerPath: this.path,
      });
    }
    this.written += batch.length;
    return batch.length;
  }

  async remove(): Promise<void> {
    this.buffer = [];
    await rm(this.path, { force: true });
  }
}
