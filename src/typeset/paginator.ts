/**
 * Paginating Renderer
 *
 * Groups normalized lines into typesetting units and hands them to the flow
 * engine with the style resolved from the render config.
 */

import type { RenderConfig } from '../config/types.js';
import { containsCJK, type NormalizedText } from '../text/normalizer.js';
import type { FlowEngine, PageGeometry, ParagraphStyle, TypesetDocument } from './types.js';

/**
 * Join consecutive lines, `unitSize` at a time, with an inline break marker.
 * A paragraph per line would add paragraph spacing at every line boundary;
 * one paragraph for everything would be one enormous unit.
 */
export function groupLines(
  lines: NormalizedText,
  unitSize = 30,
  marker = '<br/>'
): string[] {
  const size = Math.max(1, Math.floor(unitSize));
  const units: string[] = [];
  for (let i = 0; i < lines.length; i += size) {
    units.push(lines.slice(i, i + size).join(marker));
  }
  return units;
}

export function paragraphStyle(config: RenderConfig, lines: NormalizedText): ParagraphStyle {
  return {
    fontName: config.fontName,
    fontSize: config.fontSize,
    leading: config.lineHeight,
    textColor: config.fontColor,
    backColor: config.paraBgColor,
    borderColor: config.paraBorderColor,
    borderWidth: config.borderWidth,
    borderPadding: config.borderPadding,
    firstLineIndent: config.firstLineIndent,
    leftIndent: config.leftIndent,
    rightIndent: config.rightIndent,
    alignment: config.alignment,
    spaceBefore: config.spaceBefore,
    spaceAfter: config.spaceAfter,
    wordWrap: lines.some(containsCJK) ? 'cjk' : 'word',
  };
}

export function pageGeometry(config: RenderConfig): PageGeometry {
  return {
    width: config.pageSize[0],
    height: config.pageSize[1],
    marginX: config.marginX,
    marginY: config.marginY,
    background: config.pageBgColor,
  };
}

/**
 * Typeset `lines` into a fixed-size multi-page document. Font registration
 * failures propagate; no partial document is returned.
 */
export function paginate(lines: NormalizedText, config: RenderConfig, engine: FlowEngine): TypesetDocument {
  engine.registerFont(config.fontPath, config.fontName);
  const units = groupLines(lines, config.linesPerUnit, config.newlineMarkup);
  return engine.paginate(units, paragraphStyle(config, lines), pageGeometry(config));
}
