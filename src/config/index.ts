export { ConfigManager } from './config.js';
export {
  DEFAULT_LAYER,
  coerceLayer,
  mergeLayers,
  finalizeConfig,
  resolveConfig,
  fontNameFromPath,
} from './resolver.js';
export type { LayerScope } from './resolver.js';
export { parseAlignment, parseColor, parsePageSize, toCssColor, PAGE_SIZES } from './tokens.js';
export type {
  Alignment,
  ConfigLayer,
  PageSize,
  RenderConfig,
  ResolvedLayer,
  RGBAColor,
} from './types.js';
