/**
 * Configuration Resolver
 *
 * Layers, lowest precedence first: defaults < config file < item override <
 * explicit arguments. Tokens are converted as each layer enters the merge, so
 * no raw colour/alignment/page-size string ever reaches the typesetter.
 */

import path from 'path';
import { ConfigurationError } from '../errors/index.js';
import { parseAlignment, parseColor, parsePageSize, PAGE_SIZES } from './tokens.js';
import type { ConfigLayer, PageSize, RenderConfig, ResolvedLayer, RGBAColor } from './types.js';

export type LayerScope = 'file' | 'env' | 'item' | 'explicit';

const WHITE: RGBAColor = { r: 255, g: 255, b: 255, a: 1 };
const BLACK: RGBAColor = { r: 0, g: 0, b: 0, a: 1 };

/** Everything but the font has a default. */
export const DEFAULT_LAYER: Readonly<ResolvedLayer> = Object.freeze({
  pageSize: PAGE_SIZES.A4,
  marginX: 20,
  marginY: 20,
  fontSize: 9,
  pageBgColor: WHITE,
  fontColor: BLACK,
  paraBgColor: WHITE,
  paraBorderColor: WHITE,
  firstLineIndent: 0,
  leftIndent: 0,
  rightIndent: 0,
  alignment: 'justify',
  spaceBefore: 0,
  spaceAfter: 0,
  borderWidth: 0,
  borderPadding: 0,
  horizontalScale: 1.0,
  dpi: 72,
  autoCropWidth: false,
  autoCropLastPage: false,
  autoCropContent: false,
  newlineMarkup: '<br/>',
  linesPerUnit: 30,
  rasterBatchSize: 20,
  contentCropMargin: 10,
});

type NumericKey =
  | 'marginX' | 'marginY' | 'fontSize' | 'firstLineIndent' | 'leftIndent' | 'rightIndent'
  | 'spaceBefore' | 'spaceAfter' | 'borderWidth' | 'borderPadding' | 'horizontalScale'
  | 'dpi' | 'linesPerUnit' | 'rasterBatchSize' | 'contentCropMargin';

const NUMERIC_KEYS: ReadonlyArray<[keyof ConfigLayer, NumericKey]> = [
  ['margin-x', 'marginX'],
  ['margin-y', 'marginY'],
  ['font-size', 'fontSize'],
  ['first-line-indent', 'firstLineIndent'],
  ['left-indent', 'leftIndent'],
  ['right-indent', 'rightIndent'],
  ['space-before', 'spaceBefore'],
  ['space-after', 'spaceAfter'],
  ['border-width', 'borderWidth'],
  ['border-padding', 'borderPadding'],
  ['horizontal-scale', 'horizontalScale'],
  ['dpi', 'dpi'],
  ['lines-per-unit', 'linesPerUnit'],
  ['raster-batch-size', 'rasterBatchSize'],
  ['content-crop-margin', 'contentCropMargin'],
];

type ColorKey = 'pageBgColor' | 'fontColor' | 'paraBgColor' | 'paraBorderColor';

const COLOR_KEYS: ReadonlyArray<[keyof ConfigLayer, ColorKey]> = [
  ['page-bg-color', 'pageBgColor'],
  ['font-color', 'fontColor'],
  ['para-bg-color', 'paraBgColor'],
  ['para-border-color', 'paraBorderColor'],
];

type FlagKey = 'autoCropWidth' | 'autoCropLastPage' | 'autoCropContent';

const FLAG_KEYS: ReadonlyArray<[keyof ConfigLayer, FlagKey]> = [
  ['auto-crop-width', 'autoCropWidth'],
  ['auto-crop-last-page', 'autoCropLastPage'],
  ['auto-crop-content', 'autoCropContent'],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isColor(value: unknown): value is RGBAColor {
  return (
    isRecord(value) &&
    typeof value.r === 'number' &&
    typeof value.g === 'number' &&
    typeof value.b === 'number' &&
    typeof value.a === 'number'
  );
}

function isPageSize(value: unknown): value is PageSize {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    value.every((n) => typeof n === 'number' && Number.isFinite(n) && n > 0)
  );
}

/**
 * Convert one raw layer (parsed JSON or a caller's object) into typed values.
 * Unknown keys are ignored.
 */
export function coerceLayer(raw: unknown, scope: LayerScope = 'explicit'): ResolvedLayer {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Config ${scope} layer must be an object`, { scope });
  }

  const fail = (key: string, expected: string): never => {
    throw new ConfigurationError(`Config key "${key}" must be ${expected}`, {
      scope,
      key,
      value: raw[key],
    });
  };

  const out: ResolvedLayer = {};

  const pageSize = raw['page-size'];
  if (pageSize !== undefined) {
    if (typeof pageSize === 'string') {
      out.pageSize = parsePageSize(pageSize);
    } else if (isPageSize(pageSize)) {
      out.pageSize = [pageSize[0], pageSize[1]];
    } else {
      fail('page-size', 'a page-size keyword, "W,H" or [W, H]');
    }
  }

  for (const [key, field] of NUMERIC_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) fail(key, 'a number');
    else out[field] = value;
  }

  const lineHeight = raw['line-height'];
  if (lineHeight !== undefined && lineHeight !== null) {
    if (typeof lineHeight !== 'number') fail('line-height', 'a number');
    // 0 means "derive from font size", same as leaving it out
    else if (lineHeight > 0) out.lineHeight = lineHeight;
  }

  for (const [key, field] of COLOR_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === 'string') {
      try {
        out[field] = parseColor(value);
      } catch (err) {
        if (err instanceof ConfigurationError) {
          throw new ConfigurationError(err.message, { ...err.context, scope, key });
        }
        throw err;
      }
    } else if (isColor(value)) {
      out[field] = { ...value };
    } else {
      fail(key, 'a colour string');
    }
  }

  for (const [key, field] of FLAG_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') fail(key, 'true or false');
    else out[field] = value;
  }

  const alignment = raw.alignment;
  if (alignment !== undefined) {
    if (typeof alignment !== 'string') fail('alignment', 'an alignment keyword');
    else out.alignment = parseAlignment(alignment);
  }

  for (const [key, field] of [
    ['font-path', 'fontPath'],
    ['font-name', 'fontName'],
    ['newline-markup', 'newlineMarkup'],
  ] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string') fail(key, 'a string');
    else out[field] = value;
  }

  return out;
}

/** Merge already-coerced layers; later layers win. */
export function mergeLayers(...layers: Array<ResolvedLayer | undefined>): ResolvedLayer {
  const result: ResolvedLayer = {};
  for (const layer of layers) {
    if (!layer) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) Object.assign(result, { [key]: value });
    }
  }
  return result;
}

/** Logical font name: the font file's basename up to its first dot. */
export function fontNameFromPath(fontPath: string): string {
  return path.basename(fontPath).split('.')[0];
}

/**
 * Turn a merged layer into a concrete `RenderConfig`. The font is the only
 * required field and is checked here, before any rendering starts.
 */
export function finalizeConfig(layer: ResolvedLayer): RenderConfig {
  const merged = mergeLayers(DEFAULT_LAYER, layer);
  const fontPath = merged.fontPath?.trim();
  if (!fontPath) {
    throw new ConfigurationError('A font is required: set "font-path" in the config');
  }

  const fontSize = merged.fontSize ?? 9;
  const positive = (value: number | undefined, key: string, fallback: number): number => {
    const v = value ?? fallback;
    if (!(v > 0)) throw new ConfigurationError(`Config key "${key}" must be positive`, { key, value: v });
    return v;
  };

  return Object.freeze({
    pageSize: merged.pageSize ?? PAGE_SIZES.A4,
    marginX: merged.marginX ?? 20,
    marginY: merged.marginY ?? 20,
    fontPath,
    fontName: merged.fontName || fontNameFromPath(fontPath),
    fontSize: positive(fontSize, 'font-size', 9),
    lineHeight: merged.lineHeight ?? fontSize + 1,
    pageBgColor: merged.pageBgColor ?? WHITE,
    fontColor: merged.fontColor ?? BLACK,
    paraBgColor: merged.paraBgColor ?? WHITE,
    paraBorderColor: merged.paraBorderColor ?? WHITE,
    firstLineIndent: merged.firstLineIndent ?? 0,
    leftIndent: merged.leftIndent ?? 0,
    rightIndent: merged.rightIndent ?? 0,
    alignment: merged.alignment ?? 'justify',
    spaceBefore: merged.spaceBefore ?? 0,
    spaceAfter: merged.spaceAfter ?? 0,
    borderWidth: merged.borderWidth ?? 0,
    borderPadding: merged.borderPadding ?? 0,
    horizontalScale: positive(merged.horizontalScale, 'horizontal-scale', 1),
    dpi: positive(merged.dpi, 'dpi', 72),
    autoCropWidth: merged.autoCropWidth ?? false,
    autoCropLastPage: merged.autoCropLastPage ?? false,
    autoCropContent: merged.autoCropContent ?? false,
    newlineMarkup: merged.newlineMarkup ?? '<br/>',
    linesPerUnit: Math.floor(positive(merged.linesPerUnit, 'lines-per-unit', 30)),
    rasterBatchSize: Math.floor(positive(merged.rasterBatchSize, 'raster-batch-size', 20)),
    contentCropMargin: merged.contentCropMargin ?? 10,
  });
}

/**
 * Resolve defaults < file config < item override < explicit arguments into
 * one immutable `RenderConfig`.
 */
export function resolveConfig(
  defaults: ResolvedLayer = DEFAULT_LAYER,
  fileConfig?: unknown,
  itemOverride?: unknown,
  explicitArgs?: unknown
): RenderConfig {
  return finalizeConfig(
    mergeLayers(
      defaults,
      coerceLayer(fileConfig, 'file'),
      coerceLayer(itemOverride, 'item'),
      coerceLayer(explicitArgs, 'explicit')
    )
  );
}

