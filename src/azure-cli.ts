#!/usr/bin/env node

/**
 * azure-tool: thin CLI over the Azure CLI.
 *
 * Usage:
 *   azure-tool list_subscriptions
 *   azure-tool get_keys openai my-openai my-rg
 *   azure-tool create_resource_group my-rg westeurope
 *
 * az failures are printed as text and never change the exit status.
 */

import { AZURE_COMMANDS, AZURE_HELP } from './azure-commands.js';
import { dispatch } from './dispatch.js';
import { createLogger } from './log.js';

const log = createLogger('azure-tool');

async function main() {
  await dispatch(AZURE_COMMANDS, process.argv.slice(2), { help: AZURE_HELP, ignoreCase: true });
}

main().catch((err) => {
  log.error('Fatal error:', err);
  process.exit(1);
});
