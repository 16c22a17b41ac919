export { rasterizeDocument, transformPage, cropSettings } from './rasterize-document.js';
export type { RasterizeOptions } from './rasterize-document.js';
export { CanvasRasterizer, pagePixelSize } from './canvas-rasterizer.js';
export { applyCropPolicies, contentCrop, axisCrop, CROP_POLICIES } from './crop-policies.js';
export type { CropContext, CropPolicy, CropSettings } from './crop-policies.js';
export {
  createImage,
  toGray,
  estimateBackground,
  foregroundMask,
  boundingBox,
  crop,
  scaleHorizontal,
} from './image-ops.js';
export { encodePng, writePage, pageFileName } from './page-writer.js';
export type { PixelBox, RasterImage, RasterPage, Rasterizer } from './types.js';
