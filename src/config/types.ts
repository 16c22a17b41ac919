/**
 * Render configuration types
 *
 * `ConfigLayer` is what a config file, an item override or a caller hands in:
 * kebab-case keys, colours/alignment/page size as human-readable tokens.
 * `RenderConfig` is the resolved, fully typed parameter set the pipeline runs on.
 */

export type Alignment = 'start' | 'center' | 'end' | 'justify';

/** 8-bit channels, alpha in [0, 1]. */
export interface RGBAColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

/** Page width and height in points (1/72 inch). */
export type PageSize = readonly [number, number];

export interface ConfigLayer {
  'page-size'?: string | PageSize;
  'margin-x'?: number;
  'margin-y'?: number;
  'font-path'?: string;
  'font-name'?: string;
  'font-size'?: number;
  /** Leading. Falsy means `font-size + 1`. */
  'line-height'?: number | null;
  'page-bg-color'?: string | RGBAColor;
  'font-color'?: string | RGBAColor;
  'para-bg-color'?: string | RGBAColor;
  'para-border-color'?: string | RGBAColor;
  'first-line-indent'?: number;
  'left-indent'?: number;
  'right-indent'?: number;
  alignment?: string;
  'space-before'?: number;
  'space-after'?: number;
  'border-width'?: number;
  'border-padding'?: number;
  'horizontal-scale'?: number;
  dpi?: number;
  'auto-crop-width'?: boolean;
  'auto-crop-last-page'?: boolean;
  'auto-crop-content'?: boolean;
  'newline-markup'?: string;
  'lines-per-unit'?: number;
  'raster-batch-size'?: number;
  'content-crop-margin'?: number;
}

export interface RenderConfig {
  readonly pageSize: PageSize;
  readonly marginX: number;
  readonly marginY: number;
  readonly fontPath: string;
  readonly fontName: string;
  readonly fontSize: number;
  readonly lineHeight: number;
  readonly pageBgColor: RGBAColor;
  readonly fontColor: RGBAColor;
  readonly paraBgColor: RGBAColor;
  readonly paraBorderColor: RGBAColor;
  readonly firstLineIndent: number;
  readonly leftIndent: number;
  readonly rightIndent: number;
  readonly alignment: Alignment;
  readonly spaceBefore: number;
  readonly spaceAfter: number;
  readonly borderWidth: number;
  readonly borderPadding: number;
  readonly horizontalScale: number;
  readonly dpi: number;
  readonly autoCropWidth: boolean;
  readonly autoCropLastPage: boolean;
  /** Takes precedence over both axis crops when set. */
  readonly autoCropContent: boolean;
  readonly newlineMarkup: string;
  readonly linesPerUnit: number;
  readonly rasterBatchSize: number;
  readonly contentCropMargin: number;
}

/** A config layer after its tokens have been converted; every field optional. */
export type ResolvedLayer = { -readonly [K in keyof RenderConfig]?: RenderConfig[K] };
