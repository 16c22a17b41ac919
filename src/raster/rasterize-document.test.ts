/**
 * rasterizeDocument: batching, per-page transforms and PNG output
 *
 * A fake rasterizer hands out 100 x 60 white pages with a black block over
 * rows 10..50 and columns 5..90; PNGs are really written and read back.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { PNG } from 'pngjs';
import { finalizeConfig } from '../config/resolver.js';
import type { ResolvedLayer } from '../config/types.js';
import { MemoryMonitor } from '../performance/memory-monitor.js';
import type { TypesetDocument } from '../typeset/types.js';
import { createImage } from './image-ops.js';
import { pageFileName } from './page-writer.js';
import { rasterizeDocument, transformPage } from './rasterize-document.js';
import type { RasterImage, Rasterizer } from './types.js';

function blockPage(): RasterImage {
  const img = createImage(100, 60, [255, 255, 255, 255]);
  for (let y = 10; y <= 50; y++) {
    for (let x = 5; x <= 90; x++) img.data.fill(0, (y * 100 + x) * 4, (y * 100 + x) * 4 + 3);
  }
  return img;
}

function documentOf(pages: number): TypesetDocument {
  return {
    pageWidth: 100,
    pageHeight: 60,
    background: { r: 255, g: 255, b: 255, a: 1 },
    fontName: 'Body',
    fontSize: 9,
    pages: Array.from({ length: pages }, (_, i) => ({ index: i + 1, boxes: [], runs: [] })),
  };
}

class FakeRasterizer implements Rasterizer {
  readonly calls: Array<[number, number]> = [];

  rasterize(_document: TypesetDocument, _dpi: number, firstPage: number, lastPage: number): RasterImage[] {
    this.calls.push([firstPage, lastPage]);
    return Array.from({ length: lastPage - firstPage + 1 }, () => blockPage());
  }
}

function config(overrides: ResolvedLayer = {}) {
  return finalizeConfig({ fontPath: '/fonts/Body.ttf', pageSize: [100, 60], ...overrides });
}

function pngSize(file: string): [number, number] {
  const png = PNG.sync.read(fs.readFileSync(file));
  return [png.width, png.height];
}

let outDir: string;

beforeEach(() => {
  outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'text2page-raster-'));
});

afterEach(() => {
  fs.rmSync(outDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('pageFileName', () => {
  it('zero-pads to three digits', () => {
    expect(pageFileName(1)).toBe('page_001.png');
    expect(pageFileName(42)).toBe('page_042.png');
    expect(pageFileName(1234)).toBe('page_1234.png');
  });
});

describe('rasterizeDocument', () => {
  it('rasterizes in bounded batches and returns absolute paths in page order', async () => {
    const rasterizer = new FakeRasterizer();
    const paths = await rasterizeDocument(documentOf(5), config({ rasterBatchSize: 2 }), outDir, rasterizer);

    expect(rasterizer.calls).toEqual([
      [1, 2],
      [3, 4],
      [5, 5],
    ]);
    expect(paths).toEqual([1, 2, 3, 4, 5].map((i) => path.resolve(outDir, pageFileName(i))));
    for (const p of paths) expect(fs.existsSync(p)).toBe(true);
  });

  it('crops the bottom of the last page only', async () => {
    const paths = await rasterizeDocument(
      documentOf(2),
      config({ autoCropLastPage: true, marginY: 3 }),
      outDir,
      new FakeRasterizer()
    );
    expect(pngSize(paths[0])).toEqual([100, 60]);
    expect(pngSize(paths[1])).toEqual([100, 53]);
  });

  it('applies the horizontal scale before cropping', async () => {
    const paths = await rasterizeDocument(
      documentOf(1),
      config({ horizontalScale: 0.5 }),
      outDir,
      new FakeRasterizer()
    );
    expect(pngSize(paths[0])).toEqual([50, 60]);
  });

  it('creates the output directory', async () => {
    const nested = path.join(outDir, 'a', 'b');
    await rasterizeDocument(documentOf(1), config(), nested, new FakeRasterizer());
    expect(fs.existsSync(path.join(nested, 'page_001.png'))).toBe(true);
  });

  it('checks memory after every batch when a threshold is set', async () => {
    const monitor = new MemoryMonitor();
    const warn = vi.spyOn(monitor, 'warnIfHigh').mockReturnValue(false);
    await rasterizeDocument(documentOf(3), config({ rasterBatchSize: 2 }), outDir, new FakeRasterizer(), {
      memoryWarnMb: 512,
      monitor,
    });
    expect(warn.mock.calls).toEqual([
      [512, 'pages 1-2'],
      [512, 'pages 3-3'],
    ]);
  });
});

describe('transformPage', () => {
  it('returns the page untouched when no transform is configured', () => {
    const image = blockPage();
    expect(transformPage({ image, index: 1, total: 1 }, config())).toBe(image);
  });

  it('content crop keeps the margin around the block', () => {
    const out = transformPage(
      { image: blockPage(), index: 1, total: 1 },
      config({ autoCropContent: true, contentCropMargin: 2 })
    );
    expect([out.width, out.height]).toEqual([90, 45]);
  });
});
