#!/usr/bin/env node
/**
 * text2page CLI entry point
 *
 * Compiled to dist/bin/text2page.js by TypeScript.
 * Registered as the `text2page` binary in package.json.
 */

import { Text2PageCLI } from '../cli/cli.js';

const cli = new Text2PageCLI();
cli.run(process.argv).catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
