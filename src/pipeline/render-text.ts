/**
 * Single-item rendering
 *
 * normalize → paginate → rasterize & crop, for one piece of text.
 */

import { createHash } from 'crypto';
import fs from 'fs';
import path from 'path';
import { ConfigManager } from '../config/config.js';
import { DEFAULT_LAYER, coerceLayer, finalizeConfig, mergeLayers } from '../config/resolver.js';
import type { RenderConfig, ResolvedLayer } from '../config/types.js';
import { ConfigurationError } from '../errors/index.js';
import { rasterizeDocument } from '../raster/rasterize-document.js';
import { CanvasRasterizer } from '../raster/canvas-rasterizer.js';
import type { Rasterizer } from '../raster/types.js';
import { normalizeText } from '../text/normalizer.js';
import { CanvasFlowEngine } from '../typeset/canvas-flow-engine.js';
import { paginate } from '../typeset/paginator.js';
import type { FlowEngine } from '../typeset/types.js';

export interface TextRendererOptions {
  engine?: FlowEngine;
  rasterizer?: Rasterizer;
  /** Warn when memory passes this many MB between raster batches. */
  memoryWarnMb?: number;
}

export interface RenderTextOptions extends TextRendererOptions {
  /** JSON config file; the file layer. */
  configPath?: string;
  /** Explicit settings, kebab-case keys; highest precedence. */
  config?: unknown;
  /** Output subdirectory name. Defaults to a hash of the text. */
  identifier?: string;
}

/** First 16 hex digits of the MD5 of the text. */
export function defaultIdentifier(text: string): string {
  return createHash('md5').update(text).digest('hex').slice(0, 16);
}

/** The font must exist before any typesetting starts. */
export function assertFontAvailable(config: RenderConfig): void {
  if (!fs.existsSync(config.fontPath)) {
    throw new ConfigurationError(`Font file not found: ${config.fontPath}`, {
      fontPath: config.fontPath,
    });
  }
}

export class TextRenderer {
  private readonly engine: FlowEngine;
  private readonly rasterizer: Rasterizer;

  constructor(private readonly options: TextRendererOptions = {}) {
    this.engine = options.engine ?? new CanvasFlowEngine();
    this.rasterizer = options.rasterizer ?? new CanvasRasterizer();
  }

  /**
   * Render `text` into `outputDir/<identifier>/page_NNN.png` and return the
   * absolute paths in page order.
   */
  async render(text: string, outputDir: string, config: RenderConfig, identifier: string): Promise<string[]> {
    assertFontAvailable(config);

    const lines = normalizeText(text);
    const document = paginate(lines, config, this.engine);

    return rasterizeDocument(document, config, path.join(outputDir, identifier), this.rasterizer, {
      memoryWarnMb: this.options.memoryWarnMb,
    });
  }
}

/**
 * Render one text without batch machinery. Config layers: defaults < config
 * file < `options.config`.
 */
export async function renderText(
  text: string,
  outputDir: string,
  options: RenderTextOptions = {}
): Promise<string[]> {
  const fileLayer: ResolvedLayer = options.configPath
    ? new ConfigManager(options.configPath).load()
    : {};
  const config = finalizeConfig(
    mergeLayers(DEFAULT_LAYER, fileLayer, coerceLayer(options.config, 'explicit'))
  );

  const renderer = new TextRenderer(options);
  return renderer.render(text, outputDir, config, options.identifier ?? defaultIdentifier(text));
}
