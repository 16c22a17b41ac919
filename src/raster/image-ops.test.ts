/**
 * Pixel operations
 */

import { describe, it, expect } from 'vitest';
import {
  createImage,
  toGray,
  estimateBackground,
  foregroundMask,
  boundingBox,
  crop,
  scaleHorizontal,
} from './image-ops.js';

describe('createImage', () => {
  it('fills every pixel with the given RGBA', () => {
    const img = createImage(2, 1, [1, 2, 3, 4]);
    expect(Array.from(img.data)).toEqual([1, 2, 3, 4, 1, 2, 3, 4]);
  });

  it('defaults to transparent black', () => {
    expect(Array.from(createImage(1, 1).data)).toEqual([0, 0, 0, 0]);
  });
});

describe('toGray', () => {
  it('uses 601 luma weights, truncated', () => {
    const img = createImage(3, 1);
    img.data.set([255, 0, 0, 255, 0, 255, 0, 255, 255, 255, 255, 255]);
    expect(Array.from(toGray(img))).toEqual([76, 149, 255]);
  });
});

describe('estimateBackground', () => {
  it('takes the median of the corner patch', () => {
    expect(estimateBackground(Uint8Array.from([5, 1, 9]), 3, 1, 3)).toBe(5);
  });

  it('averages the middle pair for an even sample count', () => {
    expect(estimateBackground(Uint8Array.from([10, 20, 30, 40]), 2, 2, 2)).toBe(25);
  });

  it('samples only the top-left patch', () => {
    // 3x2 image; patch 1 sees only the first pixel
    expect(estimateBackground(Uint8Array.from([7, 200, 200, 200, 200, 200]), 3, 2, 1)).toBe(7);
  });
});

describe('foregroundMask / boundingBox', () => {
  it('marks pixels strictly beyond the tolerance', () => {
    expect(Array.from(foregroundMask(Uint8Array.from([100, 105, 106, 94]), 100, 5))).toEqual([0, 0, 1, 1]);
  });

  it('returns inclusive bounds of the foreground', () => {
    const mask = new Uint8Array(16);
    mask[1 * 4 + 2] = 1;
    mask[3 * 4 + 1] = 1;
    expect(boundingBox(mask, 4, 4)).toEqual({ minX: 1, minY: 1, maxX: 2, maxY: 3 });
  });

  it('returns null for a blank mask', () => {
    expect(boundingBox(new Uint8Array(9), 3, 3)).toBeNull();
  });
});

describe('crop', () => {
  it('copies the half-open box', () => {
    const img = createImage(3, 2);
    img.data.set([0, 0, 0, 0, 1, 1, 1, 1, 2, 2, 2, 2, 3, 3, 3, 3, 4, 4, 4, 4, 5, 5, 5, 5]);
    const out = crop(img, { left: 1, top: 1, right: 3, bottom: 2 });
    expect(out.width).toBe(2);
    expect(out.height).toBe(1);
    expect(Array.from(out.data)).toEqual([4, 4, 4, 4, 5, 5, 5, 5]);
  });

  it('clamps the box to the image', () => {
    const out = crop(createImage(4, 4), { left: -2, top: 1, right: 10, bottom: 3 });
    expect([out.width, out.height]).toEqual([4, 2]);
  });
});

describe('scaleHorizontal', () => {
  it('returns the same image when the width does not change', () => {
    const img = createImage(10, 2);
    expect(scaleHorizontal(img, 1)).toBe(img);
    expect(scaleHorizontal(img, 1.05)).toBe(img);
  });

  it('keeps the height and interpolates between columns', () => {
    const img = createImage(4, 1);
    img.data.set([0, 0, 0, 255, 100, 0, 0, 255, 200, 0, 0, 255, 250, 0, 0, 255]);
    const out = scaleHorizontal(img, 0.5);
    expect([out.width, out.height]).toEqual([2, 1]);
    expect(Array.from(out.data)).toEqual([50, 0, 0, 255, 225, 0, 0, 255]);
  });

  it('widens the image when the factor is above one', () => {
    expect(scaleHorizontal(createImage(3, 5), 2).width).toBe(6);
  });
});
