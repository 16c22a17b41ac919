export { renderText, TextRenderer, defaultIdentifier, assertFontAvailable } from './render-text.js';
export type { RenderTextOptions, TextRendererOptions } from './render-text.js';
