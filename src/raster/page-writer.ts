/**
 * PNG output for raster pages.
 */

import { writeFile } from 'fs/promises';
import path from 'path';
import { PNG } from 'pngjs';
import type { RasterImage } from './types.js';

/** `page_001.png`, `page_002.png`, … */
export function pageFileName(index: number): string {
  return `page_${String(index).padStart(3, '0')}.png`;
}

export function encodePng(image: RasterImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength);
  return PNG.sync.write(png);
}

/** Write one page and return its absolute path. */
export async function writePage(outDir: string, index: number, image: RasterImage): Promise<string> {
  const outPath = path.resolve(outDir, pageFileName(index));
  await writeFile(outPath, encodePng(image));
  return outPath;
}
