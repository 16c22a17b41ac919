/**
 * Typesetting types shared by the flow engine and the rasterizer.
 *
 * Coordinates are in points with the origin at the page's top-left corner.
 */

import type { Alignment, RGBAColor } from '../config/types.js';

export type WordWrap = 'word' | 'cjk';

export interface ParagraphStyle {
  fontName: string;
  fontSize: number;
  leading: number;
  textColor: RGBAColor;
  backColor: RGBAColor;
  borderColor: RGBAColor;
  borderWidth: number;
  borderPadding: number;
  firstLineIndent: number;
  leftIndent: number;
  rightIndent: number;
  alignment: Alignment;
  spaceBefore: number;
  spaceAfter: number;
  wordWrap: WordWrap;
}

export interface PageGeometry {
  width: number;
  height: number;
  marginX: number;
  marginY: number;
  background: RGBAColor;
}

/** A piece of text drawn at `y` (alphabetic baseline). */
export interface TextRun {
  text: string;
  x: number;
  y: number;
  color: RGBAColor;
}

/** Paragraph decoration drawn underneath the text. */
export interface PlacedBox {
  x: number;
  y: number;
  width: number;
  height: number;
  fill: RGBAColor;
  stroke?: RGBAColor;
  lineWidth: number;
}

export interface TypesetPage {
  /** 1-based */
  index: number;
  boxes: PlacedBox[];
  runs: TextRun[];
}

export interface TypesetDocument {
  pageWidth: number;
  pageHeight: number;
  /** Painted identically on every page. */
  background: RGBAColor;
  fontName: string;
  fontSize: number;
  pages: TypesetPage[];
}

export interface TextMeasurer {
  /** Advance width of `text` in points at the style's font. */
  measure(text: string): number;
}

/** The flow/typeset capability: fixed-size pages out of paragraph units. */
export interface FlowEngine {
  registerFont(fontPath: string, fontName: string): void;
  paginate(units: readonly string[], style: ParagraphStyle, geometry: PageGeometry): TypesetDocument;
}
