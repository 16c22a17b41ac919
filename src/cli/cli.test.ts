/**
 * text2page CLI: argument parsing and hand-off to the pipeline
 *
 * The service adapters are replaced, so nothing is rendered.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';

vi.mock('ora', () => ({
  default: () => ({ start: () => ({ succeed: vi.fn(), fail: vi.fn(), stop: vi.fn() }) }),
}));

import { Text2PageCLI, explicitLayer } from './cli.js';
import type { BatchRunOptions, BatchSummary } from '../batch/batch-renderer.js';
import { ConfigurationError } from '../errors/index.js';
import type { RenderTextOptions } from '../pipeline/render-text.js';

// ─── Test double ──────────────────────────────────────────────────────────────

class TestCLI extends Text2PageCLI {
  renderCalls: Array<{ text: string; outputDir: string; options: RenderTextOptions }> = [];
  batchCalls: Array<{ options: BatchRunOptions; inProcess: boolean }> = [];
  renderResult: () => Promise<string[]> = async () => ['/out/doc/page_001.png'];
  batchResult: BatchSummary = { total: 2, processed: 2, skipped: 0, failed: 0, cancelled: 0, failures: [] };

  protected override renderFile(text: string, outputDir: string, options: RenderTextOptions): Promise<string[]> {
    this.renderCalls.push({ text, outputDir, options });
    return this.renderResult();
  }

  protected override async runBatch(options: BatchRunOptions, inProcess: boolean): Promise<BatchSummary> {
    this.batchCalls.push({ options, inProcess });
    return this.batchResult;
  }
}

let dir: string;
let textFile: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'text2page-cli-'));
  textFile = path.join(dir, 'note.txt');
  fs.writeFileSync(textFile, 'Hello\nWorld');
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

const argv = (...args: string[]): string[] => ['node', 'text2page', ...args];

// ─── explicitLayer ────────────────────────────────────────────────────────────

describe('explicitLayer', () => {
  it('maps flags to config keys and leaves out unset ones', () => {
    expect(explicitLayer({ output: '/o', font: '/f/a.ttf', dpi: 150, cropContent: true })).toEqual({
      'font-path': '/f/a.ttf',
      dpi: 150,
      'auto-crop-content': true,
    });
    expect(explicitLayer({ output: '/o' })).toEqual({});
  });
});

// ─── render ───────────────────────────────────────────────────────────────────

describe('text2page render', () => {
  it('reads the text file and passes flags as the explicit layer', async () => {
    const cli = new TestCLI();
    await cli.run(
      argv('render', textFile, '-o', '/out', '-c', '/etc/t2p.json', '--id', 'doc', '--font', '/f/a.ttf',
        '--font-size', '10.5', '--dpi', '150', '--page-size', 'A5')
    );

    expect(cli.renderCalls).toEqual([
      {
        text: 'Hello\nWorld',
        outputDir: '/out',
        options: {
          configPath: '/etc/t2p.json',
          identifier: 'doc',
          config: { 'font-path': '/f/a.ttf', 'font-size': 10.5, dpi: 150, 'page-size': 'A5' },
        },
      },
    ]);
    expect(console.log).toHaveBeenCalledWith('  /out/doc/page_001.png');
    expect(process.exitCode).toBeUndefined();
  });

  it('prints a friendly message and sets the exit code on failure', async () => {
    const cli = new TestCLI();
    cli.renderResult = async () => {
      throw new ConfigurationError('A font is required: set "font-path" in the config');
    };

    await cli.run(argv('render', textFile, '-o', '/out'));

    expect(console.error).toHaveBeenCalledWith(
      'Configuration problem: A font is required: set "font-path" in the config'
    );
    expect(process.exitCode).toBe(1);
  });

  it('fails cleanly when the text file is missing', async () => {
    const cli = new TestCLI();
    await cli.run(argv('render', path.join(dir, 'missing.txt'), '-o', '/out'));
    expect(cli.renderCalls).toHaveLength(0);
    expect(process.exitCode).toBe(1);
  });
});

// ─── batch ────────────────────────────────────────────────────────────────────

describe('text2page batch', () => {
  it('passes paths and tuning flags to the batch renderer', async () => {
    const cli = new TestCLI();
    await cli.run(
      argv('batch', 'items.json', '-o', 'out', '-l', 'ledger.jsonl', '-c', 'config.json', '-w', '3', '--recover',
        '--timeout', '5000', '--memory-warn', '512')
    );

    expect(cli.batchCalls).toHaveLength(1);
    const { options, inProcess } = cli.batchCalls[0];
    expect(inProcess).toBe(false);
    expect(options).toMatchObject({
      inputPath: 'items.json',
      outputDir: 'out',
      ledgerPath: 'ledger.jsonl',
      configPath: 'config.json',
      workers: 3,
      recover: true,
      flushSize: 100,
      timeoutMs: 5000,
      memoryWarnMb: 512,
    });
    expect(options.signal).toBeInstanceOf(AbortSignal);
    expect(process.exitCode).toBeUndefined();
  });

  it('--workers 0 renders in-process', async () => {
    const cli = new TestCLI();
    await cli.run(argv('batch', 'items.json', '-o', 'out', '-l', 'l.jsonl', '-c', 'c.json', '-w', '0'));
    expect(cli.batchCalls[0].inProcess).toBe(true);
    expect(cli.batchCalls[0].options.workers).toBe(1);
    expect(cli.batchCalls[0].options.recover).toBe(false);
  });

  it('exits non-zero when any item failed', async () => {
    const cli = new TestCLI();
    cli.batchResult = { total: 2, processed: 1, skipped: 0, failed: 1, cancelled: 0, failures: [] };
    await cli.run(argv('batch', 'items.json', '-o', 'out', '-l', 'l.jsonl', '-c', 'c.json'));
    expect(process.exitCode).toBe(1);
  });

  it('removes its SIGINT handler when the run ends', async () => {
    const before = process.listenerCount('SIGINT');
    await new TestCLI().run(argv('batch', 'items.json', '-o', 'out', '-l', 'l.jsonl', '-c', 'c.json'));
    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
