/**
 * Pixel operations on RGBA raster images.
 */

import type { PixelBox, RasterImage } from './types.js';

export function createImage(width: number, height: number, fill?: [number, number, number, number]): RasterImage {
  const data = new Uint8ClampedArray(width * height * 4);
  if (fill) {
    for (let i = 0; i < data.length; i += 4) {
      data[i] = fill[0];
      data[i + 1] = fill[1];
      data[i + 2] = fill[2];
      data[i + 3] = fill[3];
    }
  }
  return { width, height, data };
}

/** 8-bit luma, ITU-R 601-2: L = (299 R + 587 G + 114 B) / 1000, truncated. */
export function toGray(image: RasterImage): Uint8Array {
  const gray = new Uint8Array(image.width * image.height);
  const { data } = image;
  for (let p = 0, i = 0; p < gray.length; p++, i += 4) {
    gray[p] = Math.floor((data[i] * 299 + data[i + 1] * 587 + data[i + 2] * 114) / 1000);
  }
  return gray;
}

/** Median gray level of the top-left `patch × patch` corner. */
export function estimateBackground(gray: Uint8Array, width: number, height: number, patch: number): number {
  const w = Math.min(patch, width);
  const h = Math.min(patch, height);
  const samples: number[] = [];
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) samples.push(gray[y * width + x]);
  }
  if (samples.length === 0) return 0;
  samples.sort((a, b) => a - b);
  const mid = samples.length >> 1;
  return samples.length % 2 === 1 ? samples[mid] : (samples[mid - 1] + samples[mid]) / 2;
}

/** Foreground where |gray − background| > tolerance. */
export function foregroundMask(gray: Uint8Array, background: number, tolerance: number): Uint8Array {
  const mask = new Uint8Array(gray.length);
  for (let p = 0; p < gray.length; p++) {
    mask[p] = Math.abs(gray[p] - background) > tolerance ? 1 : 0;
  }
  return mask;
}

/** Inclusive bounds of the foreground, or null for a blank mask. */
export function boundingBox(
  mask: Uint8Array,
  width: number,
  height: number
): { minX: number; minY: number; maxX: number; maxY: number } | null {
  let minX = width;
  let minY = height;
  let maxX = -1;
  let maxY = -1;
  for (let y = 0; y < height; y++) {
    const row = y * width;
    for (let x = 0; x < width; x++) {
      if (!mask[row + x]) continue;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    }
  }
  return maxX < 0 ? null : { minX, minY, maxX, maxY };
}

/** Copy out `box`, clamped to the image. */
export function crop(image: RasterImage, box: PixelBox): RasterImage {
  const left = Math.max(0, Math.min(image.width, box.left));
  const right = Math.max(left, Math.min(image.width, box.right));
  const top = Math.max(0, Math.min(image.height, box.top));
  const bottom = Math.max(top, Math.min(image.height, box.bottom));

  const width = right - left;
  const height = bottom - top;
  const data = new Uint8ClampedArray(width * height * 4);
  for (let y = 0; y < height; y++) {
    const from = ((top + y) * image.width + left) * 4;
    data.set(image.data.subarray(from, from + width * 4), y * width * 4);
  }
  return { width, height, data };
}

/**
 * Resample horizontally only; the height is untouched. Linear interpolation
 * between the two nearest source columns.
 */
export function scaleHorizontal(image: RasterImage, factor: number): RasterImage {
  const width = Math.max(1, Math.floor(image.width * factor));
  if (width === image.width) return image;

  const { height, data: src } = image;
  const out = new Uint8ClampedArray(width * height * 4);
  const ratio = image.width / width;

  for (let x = 0; x < width; x++) {
    const sx = Math.max(0, Math.min(image.width - 1, (x + 0.5) * ratio - 0.5));
    const x0 = Math.floor(sx);
    const x1 = Math.min(image.width - 1, x0 + 1);
    const t = sx - x0;
    for (let y = 0; y < height; y++) {
      const row = y * image.width;
      const a = (row + x0) * 4;
      const b = (row + x1) * 4;
      const o = (y * width + x) * 4;
      for (let c = 0; c < 4; c++) {
        out[o + c] = src[a + c] + (src[b + c] - src[a + c]) * t;
      }
    }
  }
  return { width, height, data: out };
}
