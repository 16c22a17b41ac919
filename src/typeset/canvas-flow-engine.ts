/**
 * Canvas Flow Engine
 *
 * `FlowEngine` backed by Skia canvas text metrics.
 */

import { createCanvas } from '@napi-rs/canvas';
import { FlowLayout } from './flow-layout.js';
import { registerFontFace } from './font-registry.js';
import type {
  FlowEngine,
  PageGeometry,
  ParagraphStyle,
  TextMeasurer,
  TypesetDocument,
} from './types.js';

/** CSS font shorthand shared by measuring and drawing. */
export function cssFont(fontName: string, fontSize: number): string {
  return `${fontSize}px "${fontName}"`;
}

export class CanvasFlowEngine implements FlowEngine {
  registerFont(fontPath: string, fontName: string): void {
    registerFontFace(fontPath, fontName);
  }

  paginate(units: readonly string[], style: ParagraphStyle, geometry: PageGeometry): TypesetDocument {
    // One unit of canvas space is one point; only the context's metrics are used.
    const ctx = createCanvas(1, 1).getContext('2d');
    ctx.font = cssFont(style.fontName, style.fontSize);
    const measurer: TextMeasurer = { measure: (text) => ctx.measureText(text).width };
    return new FlowLayout(measurer, style, geometry).layout(units);
  }
}
