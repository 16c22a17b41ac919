/**
 * text2page - render text into paginated, cropped PNG pages
 *
 * Main entry point for the library.
 * Exports all public APIs and utilities.
 */

// Single-item pipeline
export * from './pipeline/index.js';

// Batch orchestration
export * from './batch/index.js';

// Stages
export * from './text/index.js';
export * from './typeset/index.js';
export * from './raster/index.js';

// Config
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Performance
export * from './performance/index.js';

// CLI
export { Text2PageCLI, explicitLayer } from './cli/cli.js';
export { ProgressReporter } from './cli/progress.js';
export type { RunSummary } from './cli/progress.js';
