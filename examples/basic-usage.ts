/**
 * Basic Usage Example
 *
 * Renders a short text to PNG pages, then runs a two-item batch.
 * Set TEXT2PAGE_FONT_PATH to a .ttf/.otf file before running.
 */

import os from 'os';
import path from 'path';
import { writeFile } from 'fs/promises';
import { renderText, BatchRenderer, InProcessWorker } from '../src/index.js';

async function main() {
  const outDir = path.join(os.tmpdir(), 'text2page-example');
  const fontPath = process.env.TEXT2PAGE_FONT_PATH ?? '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf';

  // 1. One text, explicit config
  const pages = await renderText('Hello\n\nA second paragraph with   spaced words.', outDir, {
    identifier: 'hello',
    config: { 'font-path': fontPath, 'page-size': 'A5', 'auto-crop-last-page': true },
  });
  console.log(`Rendered ${pages.length} page(s):`);
  for (const p of pages) console.log(`  ${p}`);

  // 2. A batch with per-item overrides
  const inputPath = path.join(outDir, 'items.json');
  await writeFile(
    inputPath,
    JSON.stringify([
      { identifier: 'plain', content: 'First item' },
      { identifier: 'large', content: 'Second item, larger', config: { 'font-size': 14 } },
    ])
  );

  const batch = new BatchRenderer(undefined, (context) => new InProcessWorker(context));
  const summary = await batch.run({
    inputPath,
    outputDir: path.join(outDir, 'batch'),
    ledgerPath: path.join(outDir, 'ledger.jsonl'),
    sharedLayer: { fontPath, dpi: 150 },
    workers: 2,
  });
  console.log(`Batch: ${summary.processed} rendered, ${summary.failed} failed`);
}

main().catch(console.error);
