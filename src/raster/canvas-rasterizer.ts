/**
 * Canvas Rasterizer
 *
 * Draws typeset pages onto Skia canvas surfaces at a target DPI.
 */

import { createCanvas } from '@napi-rs/canvas';
import { toCssColor } from '../config/tokens.js';
import { cssFont } from '../typeset/canvas-flow-engine.js';
import type { TypesetDocument, TypesetPage } from '../typeset/types.js';
import type { RasterImage, Rasterizer } from './types.js';

const POINTS_PER_INCH = 72;

/** Pixel size of a page: points × dpi / 72, rounded up. */
export function pagePixelSize(document: TypesetDocument, dpi: number): { width: number; height: number } {
  const scale = dpi / POINTS_PER_INCH;
  return {
    width: Math.ceil(document.pageWidth * scale),
    height: Math.ceil(document.pageHeight * scale),
  };
}

export class CanvasRasterizer implements Rasterizer {
  rasterize(document: TypesetDocument, dpi: number, firstPage: number, lastPage: number): RasterImage[] {
    const total = document.pages.length;
    if (firstPage < 1 || lastPage > total || firstPage > lastPage) {
      throw new Error(`Page range ${firstPage}-${lastPage} out of range (document has ${total} pages)`);
    }

    const { width, height } = pagePixelSize(document, dpi);
    const images: RasterImage[] = [];
    for (let index = firstPage; index <= lastPage; index++) {
      images.push(this.renderPage(document, document.pages[index - 1], width, height, dpi));
    }
    return images;
  }

  private renderPage(
    document: TypesetDocument,
    page: TypesetPage,
    width: number,
    height: number,
    dpi: number
  ): RasterImage {
    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext('2d');

    // Same background on every page, first page included.
    ctx.fillStyle = toCssColor(document.background);
    ctx.fillRect(0, 0, width, height);

    ctx.save();
    ctx.scale(dpi / POINTS_PER_INCH, dpi / POINTS_PER_INCH);

    for (const box of page.boxes) {
      ctx.fillStyle = toCssColor(box.fill);
      ctx.fillRect(box.x, box.y, box.width, box.height);
      if (box.stroke && box.lineWidth > 0) {
        ctx.strokeStyle = toCssColor(box.stroke);
        ctx.lineWidth = box.lineWidth;
        ctx.strokeRect(box.x, box.y, box.width, box.height);
      }
    }

    ctx.font = cssFont(document.fontName, document.fontSize);
    ctx.textBaseline = 'alphabetic';
    for (const run of page.runs) {
      ctx.fillStyle = toCssColor(run.color);
      ctx.fillText(run.text, run.x, run.y);
    }
    ctx.restore();

    const { data } = ctx.getImageData(0, 0, width, height);
    return { width, height, data: new Uint8ClampedArray(data) };
  }
}
