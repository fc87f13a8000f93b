#!/usr/bin/env node

/**
 * browser-tool: one headless browser run per command, JSON on stdout.
 *
 * Usage:
 *   browser-tool search "playwright network idle"
 *   browser-tool screenshot https://example.com out/example.png
 *   browser-tool get_text https://example.com
 *   browser-tool get_html https://example.com
 *   browser-tool click_extract https://example.com "#more" ".details"
 *
 * Browser and driver errors are not recovered: they end the process with
 * exit code 1.
 */

import { BROWSER_COMMANDS, BROWSER_HELP } from './browser-commands.js';
import { dispatch } from './dispatch.js';
import { createLogger } from './log.js';

const log = createLogger('browser-tool');

async function main() {
  await dispatch(BROWSER_COMMANDS, process.argv.slice(2), { help: BROWSER_HELP });
}

main().catch((err) => {
  log.error('Fatal error:', err);
  process.exit(1);
});
