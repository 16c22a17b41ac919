/**
 * Rasterizer & Cropper
 *
 * Turns a typeset document into cropped PNG files, a bounded batch of pages
 * at a time so peak memory does not grow with document length.
 */

import { mkdir } from 'fs/promises';
import type { RenderConfig } from '../config/types.js';
import { MemoryMonitor } from '../performance/memory-monitor.js';
import type { TypesetDocument } from '../typeset/types.js';
import { applyCropPolicies, type CropSettings } from './crop-policies.js';
import { scaleHorizontal } from './image-ops.js';
import { writePage } from './page-writer.js';
import type { RasterImage, RasterPage, Rasterizer } from './types.js';

export interface RasterizeOptions {
  /** Warn when the heap grows past this many MB between batches. */
  memoryWarnMb?: number;
  monitor?: MemoryMonitor;
}

export function cropSettings(config: RenderConfig): CropSettings {
  return {
    autoCropContent: config.autoCropContent,
    autoCropWidth: config.autoCropWidth,
    autoCropLastPage: config.autoCropLastPage,
    marginX: config.marginX,
    marginY: config.marginY,
    contentCropMargin: config.contentCropMargin,
  };
}

/** Horizontal rescale, then the first crop policy that applies. */
export function transformPage(page: RasterPage, config: RenderConfig): RasterImage {
  let image = page.image;
  if (config.horizontalScale !== 1.0) {
    image = scaleHorizontal(image, config.horizontalScale);
  }
  return applyCropPolicies(image, {
    page: page.index,
    total: page.total,
    settings: cropSettings(config),
  });
}

/**
 * Rasterize every page of `document` into `outDir`, returning absolute paths
 * in page order.
 */
export async function rasterizeDocument(
  document: TypesetDocument,
  config: RenderConfig,
  outDir: string,
  rasterizer: Rasterizer,
  options: RasterizeOptions = {}
): Promise<string[]> {
  await mkdir(outDir, { recursive: true });

  const total = document.pages.length;
  const batch = Math.max(1, config.rasterBatchSize);
  const monitor = options.monitor ?? new MemoryMonitor();
  const paths: string[] = [];

  for (let start = 1; start <= total; start += batch) {
    const end = Math.min(start + batch - 1, total);
    const images: RasterImage[] = rasterizer.rasterize(document, config.dpi, start, end);

    for (let offset = 0; offset < images.length; offset++) {
      const index = start + offset;
      const image = transformPage({ image: images[offset], index, total }, config);
      paths.push(await writePage(outDir, index, image));
    }

    // Drop this batch before rasterizing the next one.
    images.length = 0;
    if (options.memoryWarnMb !== undefined) {
      monitor.warnIfHigh(options.memoryWarnMb, `pages ${start}-${end}`);
    }
  }

  return paths;
}
