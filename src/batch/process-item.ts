/**
 * Per-item work, run inside a pool worker.
 */

import fs from 'fs';
import path from 'path';
import { coerceLayer, finalizeConfig, mergeLayers } from '../config/resolver.js';
import type { RenderConfig } from '../config/types.js';
import { ConfigurationError, ErrorHandler, ItemValidationError } from '../errors/index.js';
import type { TextRenderer } from '../pipeline/render-text.js';
import type { BatchItem, ItemOutcome, WorkerContext } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Check the shape of one input element. */
export function validateItem(raw: unknown): BatchItem {
  if (!isRecord(raw)) {
    throw new ItemValidationError('Batch item must be an object');
  }
  const { identifier, content, config, ...extra } = raw;
  if (typeof identifier !== 'string' || identifier.trim() === '') {
    throw new ItemValidationError('Batch item has no identifier');
  }
  if (/[\\/]|^\.\.?$/.test(identifier)) {
    throw new ItemValidationError(`Identifier "${identifier}" cannot be used as a directory name`, {
      identifier,
    });
  }
  if (typeof content !== 'string' || content === '') {
    throw new ItemValidationError(`Batch item "${identifier}" has no content`, { identifier });
  }
  const item: BatchItem = { identifier, content, ...extra };
  if (isRecord(config) || config === null) {
    item.config = config;
  } else if (config !== undefined) {
    throw new ItemValidationError(`Batch item "${identifier}" has a non-object config`, { identifier });
  }
  return item;
}

/** The item's own output directory. Its existence marks the item as done. */
export function itemOutputDir(context: WorkerContext, identifier: string): string {
  return path.join(context.outputDir, identifier);
}

/** Item override over the shared layer; errors name the item. */
export function resolveItemConfig(item: BatchItem, context: WorkerContext): RenderConfig {
  try {
    return finalizeConfig(mergeLayers(context.sharedLayer, coerceLayer(item.config, 'item')));
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw new ConfigurationError(err.message, {
        ...err.context,
        scope: 'item',
        identifier: item.identifier,
      });
    }
    throw err;
  }
}

/**
 * Validate, skip-if-done, merge the item override over the shared layer and
 * render. Never throws: every failure becomes a `failed` outcome so one bad
 * item cannot take the pool down.
 */
export async function processItem(
  raw: unknown,
  context: WorkerContext,
  renderer: TextRenderer
): Promise<ItemOutcome> {
  let identifier: string | undefined;
  try {
    const item = validateItem(raw);
    identifier = item.identifier;

    if (context.recover && fs.existsSync(itemOutputDir(context, item.identifier))) {
      return { status: 'skipped', entry: { ...item, image_paths: [] } };
    }

    const config = resolveItemConfig(item, context);
    const imagePaths = await renderer.render(item.content, context.outputDir, config, item.identifier);
    return { status: 'rendered', entry: { ...item, image_paths: imagePaths } };
  } catch (err) {
    return { status: 'failed', identifier, error: ErrorHandler.serialize(err) };
  }
}
