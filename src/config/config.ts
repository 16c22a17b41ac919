/**
 * Configuration file loader
 *
 * Reads a JSON render config (kebab-case keys, human-readable tokens) and
 * supports environment variable overrides as an extra layer on top of it.
 */

import fs from 'fs';
import { ConfigurationError } from '../errors/index.js';
import { coerceLayer, finalizeConfig, mergeLayers } from './resolver.js';
import type { RenderConfig, ResolvedLayer } from './types.js';

export class ConfigManager {
  constructor(private readonly configPath: string) {}

  get path(): string {
    return this.configPath;
  }

  /**
   * Load and coerce the config file. Missing or malformed files are fatal:
   * nothing can be rendered without them.
   */
  load(): ResolvedLayer {
    if (!fs.existsSync(this.configPath)) {
      throw new ConfigurationError(`Config file not found: ${this.configPath}`, {
        path: this.configPath,
      });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(
        `Failed to read config at ${this.configPath}: ${(err as Error).message}`,
        { path: this.configPath }
      );
    }
    return coerceLayer(parsed, 'file');
  }

  /**
   * Load the file layer, then apply environment variable overrides.
   *
   * Supported env vars:
   *   TEXT2PAGE_FONT_PATH, TEXT2PAGE_FONT_SIZE, TEXT2PAGE_DPI, TEXT2PAGE_PAGE_SIZE
   */
  loadWithEnvOverrides(env: NodeJS.ProcessEnv = process.env): ResolvedLayer {
    return mergeLayers(this.load(), ConfigManager.envLayer(env));
  }

  /** Resolve the file (plus env) layer against the defaults. */
  resolve(env: NodeJS.ProcessEnv = process.env): RenderConfig {
    return finalizeConfig(this.loadWithEnvOverrides(env));
  }

  static envLayer(env: NodeJS.ProcessEnv): ResolvedLayer {
    const raw: Record<string, unknown> = {};
    if (env.TEXT2PAGE_FONT_PATH) raw['font-path'] = env.TEXT2PAGE_FONT_PATH;
    if (env.TEXT2PAGE_PAGE_SIZE) raw['page-size'] = env.TEXT2PAGE_PAGE_SIZE;
    if (env.TEXT2PAGE_FONT_SIZE) raw['font-size'] = parseFloat(env.TEXT2PAGE_FONT_SIZE);
    if (env.TEXT2PAGE_DPI) raw.dpi = parseInt(env.TEXT2PAGE_DPI, 10);
    return coerceLayer(raw, 'env');
  }
}
