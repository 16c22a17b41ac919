/**
 * text2page CLI
 *
 * Commands:
 *   text2page render <text-file> -o <dir> [-c config.json] [--id <id>] [--font <path>] …
 *   text2page batch <input.json> -o <dir> -l <ledger.jsonl> -c <config.json> [-w <n>] [--recover]
 */

import { readFile } from 'fs/promises';
import { Command } from 'commander';
import { BatchRenderer, type BatchRunOptions, type BatchSummary, type ItemWorkerFactory } from '../batch/batch-renderer.js';
import { InProcessWorker } from '../batch/forked-worker.js';
import { ErrorHandler } from '../errors/index.js';
import { renderText, type RenderTextOptions } from '../pipeline/render-text.js';
import { ProgressReporter } from './progress.js';

// Spinner factory: lazily imported so tests can run without a real TTY.
async function spinner(text: string): Promise<{ stop: (symbol?: string, text?: string) => void }> {
  try {
    const { default: ora } = await import('ora');
    const s = ora(text).start();
    return {
      stop: (symbol?: string, text?: string) => {
        if (symbol === '✓') {
          s.succeed(text);
        } else if (symbol === '✗') {
          s.fail(text);
        } else {
          s.stop();
        }
      },
    };
  } catch {
    // Fallback for environments without ora
    process.stdout.write(`${text}...\n`);
    return { stop: () => {} };
  }
}

function toInt(value: string): number {
  const n = parseInt(value, 10);
  if (!Number.isFinite(n)) throw new Error(`Not a number: ${value}`);
  return n;
}

function toFloat(value: string): number {
  const n = parseFloat(value);
  if (!Number.isFinite(n)) throw new Error(`Not a number: ${value}`);
  return n;
}

export interface RenderCommandOptions {
  output: string;
  config?: string;
  id?: string;
  font?: string;
  fontSize?: number;
  dpi?: number;
  pageSize?: string;
  cropContent?: boolean;
}

export interface BatchCommandOptions {
  output: string;
  ledger: string;
  config: string;
  workers?: number;
  recover?: boolean;
  flushSize?: number;
  timeout?: number;
  memoryWarn?: number;
}

/** Flags given on the command line form the explicit (highest) config layer. */
export function explicitLayer(opts: RenderCommandOptions): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  if (opts.font) layer['font-path'] = opts.font;
  if (opts.fontSize !== undefined) layer['font-size'] = opts.fontSize;
  if (opts.dpi !== undefined) layer.dpi = opts.dpi;
  if (opts.pageSize) layer['page-size'] = opts.pageSize;
  if (opts.cropContent) layer['auto-crop-content'] = true;
  return layer;
}

export class Text2PageCLI {
  private readonly program: Command;

  constructor(private readonly reporter: ProgressReporter = new ProgressReporter()) {
    this.program = this.buildProgram();
  }

  /** Parse argv and execute the matching command. */
  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }

  // ─── Program builder ──────────────────────────────────────────────────────

  private buildProgram(): Command {
    const program = new Command('text2page')
      .version('0.1.0', '-V, --version', 'Print version')
      .description('Render text into paginated, cropped PNG pages');

    // ── render ─────────────────────────────────────────────────────────────
    program
      .command('render <text-file>')
      .description('Render one text file to page images')
      .requiredOption('-o, --output <dir>', 'Output directory')
      .option('-c, --config <path>', 'JSON render config')
      .option('--id <identifier>', 'Output subdirectory name (default: hash of the text)')
      .option('--font <path>', 'Font file (overrides the config)')
      .option('--font-size <pt>', 'Font size in points', toFloat)
      .option('--dpi <n>', 'Output resolution', toInt)
      .option('--page-size <size>', 'A4, LETTER, … or "W,H" in points')
      .option('--crop-content', 'Crop every page to its content')
      .action(async (textFile: string, opts: RenderCommandOptions) => {
        const spin = await spinner(`Rendering ${textFile}`);
        try {
          const text = await readFile(textFile, 'utf-8');
          const paths = await this.renderFile(text, opts.output, {
            configPath: opts.config,
            config: explicitLayer(opts),
            identifier: opts.id,
          });
          spin.stop('✓', `Generated ${paths.length} page(s)`);
          for (const p of paths) console.log(`  ${p}`);
        } catch (err) {
          spin.stop('✗', 'Render failed');
          console.error(ErrorHandler.toUserMessage(err));
          process.exitCode = 1;
        }
      });

    // ── batch ──────────────────────────────────────────────────────────────
    program
      .command('batch <input>')
      .description('Render every item of a JSON array in parallel')
      .requiredOption('-o, --output <dir>', 'Output directory (one subdirectory per item)')
      .requiredOption('-l, --ledger <path>', 'NDJSON result ledger')
      .requiredOption('-c, --config <path>', 'Shared JSON render config')
      .option('-w, --workers <n>', 'Worker processes; 0 renders in this process', toInt)
      .option('--recover', 'Resume: keep existing output and skip finished items')
      .option('--flush-size <n>', 'Ledger entries per write', toInt, 100)
      .option('--timeout <ms>', 'Per-item time limit', toInt)
      .option('--memory-warn <mb>', 'Warn when memory passes this size', toInt)
      .action(async (input: string, opts: BatchCommandOptions) => {
        const controller = new AbortController();
        const onSigint = (): void => {
          this.reporter.warn('Interrupted: finishing items in progress, not starting new ones');
          controller.abort();
        };
        process.once('SIGINT', onSigint);
        try {
          this.reporter.logInfo(`Loaded config from: ${opts.config}`);
          const summary = await this.runBatch(
            {
              inputPath: input,
              outputDir: opts.output,
              ledgerPath: opts.ledger,
              configPath: opts.config,
              workers: opts.workers === 0 ? 1 : opts.workers,
              recover: opts.recover ?? false,
              flushSize: opts.flushSize,
              timeoutMs: opts.timeout,
              memoryWarnMb: opts.memoryWarn,
              signal: controller.signal,
            },
            opts.workers === 0
          );
          if (summary.failed > 0) process.exitCode = 1;
        } catch (err) {
          console.error(ErrorHandler.toUserMessage(err));
          process.exitCode = 1;
        } finally {
          process.removeListener('SIGINT', onSigint);
        }
      });

    return program;
  }

  // ─── Service adapters (swappable for testing) ─────────────────────────────

  protected renderFile(text: string, outputDir: string, options: RenderTextOptions): Promise<string[]> {
    return renderText(text, outputDir, options);
  }

  protected runBatch(options: BatchRunOptions, inProcess: boolean): Promise<BatchSummary> {
    const factory: ItemWorkerFactory | undefined = inProcess
      ? (context) => new InProcessWorker(context)
      : undefined;
    return new BatchRenderer(this.reporter, factory).run(options);
  }
}
