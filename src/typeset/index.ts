export { paginate, groupLines, paragraphStyle, pageGeometry } from './paginator.js';
export { FlowLayout } from './flow-layout.js';
export { CanvasFlowEngine, cssFont } from './canvas-flow-engine.js';
export { registerFontFace, isFontRegistered } from './font-registry.js';
export { parseInline, decodeEntities } from './markup.js';
export type { InlineToken } from './markup.js';
export type {
  FlowEngine,
  PageGeometry,
  ParagraphStyle,
  PlacedBox,
  TextMeasurer,
  TextRun,
  TypesetDocument,
  TypesetPage,
  WordWrap,
} from './types.js';
