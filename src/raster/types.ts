/**
 * Raster types
 */

import type { TypesetDocument } from '../typeset/types.js';

/** RGBA pixels, row-major, 4 bytes per pixel. */
export interface RasterImage {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

export interface RasterPage {
  image: RasterImage;
  /** 1-based, within [1, total] */
  index: number;
  total: number;
}

/** Half-open pixel box: [left, right) × [top, bottom). */
export interface PixelBox {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/** The page → bitmap capability. Pages are 1-based and inclusive. */
export interface Rasterizer {
  rasterize(document: TypesetDocument, dpi: number, firstPage: number, lastPage: number): RasterImage[];
}
