/**
 * Crop policies, in priority order.
 *
 * The first policy that applies to a page is the only one that runs: content
 * crop wins over the axis crops whenever it is enabled. A page with no
 * foreground is never cropped.
 */

import { boundingBox, crop, estimateBackground, foregroundMask, toGray } from './image-ops.js';
import type { RasterImage } from './types.js';

export interface CropSettings {
  autoCropContent: boolean;
  autoCropWidth: boolean;
  autoCropLastPage: boolean;
  /** Pixels kept right of the content by the width trim. */
  marginX: number;
  /** Rows kept past the last foreground row by the last-page trim, that row included. */
  marginY: number;
  /** Pixels kept on every side by the content crop. */
  contentCropMargin: number;
}

export interface CropContext {
  /** 1-based page index */
  page: number;
  total: number;
  settings: CropSettings;
}

export interface CropPolicy {
  readonly name: string;
  appliesTo(ctx: CropContext): boolean;
  apply(image: RasterImage, ctx: CropContext): RasterImage;
}

function foregroundBounds(image: RasterImage, patch: number, tolerance: number) {
  const gray = toGray(image);
  const background = estimateBackground(gray, image.width, image.height, patch);
  return boundingBox(foregroundMask(gray, background, tolerance), image.width, image.height);
}

/** Bounding box of everything that differs from the corner colour, plus a margin. */
export const contentCrop: CropPolicy = {
  name: 'content',
  appliesTo: (ctx) => ctx.settings.autoCropContent,
  apply(image, ctx) {
    const bounds = foregroundBounds(image, 10, 8);
    if (!bounds) return image;
    const m = ctx.settings.contentCropMargin;
    return crop(image, {
      left: Math.max(0, bounds.minX - m),
      top: Math.max(0, bounds.minY - m),
      right: Math.min(image.width, bounds.maxX + 1 + m),
      bottom: Math.min(image.height, bounds.maxY + 1 + m),
    });
  },
};

/**
 * Trailing-whitespace trims: the right edge on every page, the bottom edge
 * on the last page only.
 */
export const axisCrop: CropPolicy = {
  name: 'axis',
  appliesTo: (ctx) =>
    ctx.settings.autoCropWidth || (ctx.settings.autoCropLastPage && ctx.page === ctx.total),
  apply(image, ctx) {
    const bounds = foregroundBounds(image, 2, 5);
    if (!bounds) return image;
    const { autoCropWidth, autoCropLastPage, marginX, marginY } = ctx.settings;
    const right = autoCropWidth ? Math.min(image.width, bounds.maxX + 1 + marginX) : image.width;
    const bottom =
      autoCropLastPage && ctx.page === ctx.total
        ? Math.min(image.height, Math.max(1, bounds.maxY + marginY))
        : image.height;
    if (right === image.width && bottom === image.height) return image;
    return crop(image, { left: 0, top: 0, right, bottom });
  },
};

export const CROP_POLICIES: readonly CropPolicy[] = [contentCrop, axisCrop];

export function applyCropPolicies(
  image: RasterImage,
  ctx: CropContext,
  policies: readonly CropPolicy[] = CROP_POLICIES
): RasterImage {
  const policy = policies.find((p) => p.appliesTo(ctx));
  return policy ? policy.apply(image, ctx) : image;
}
