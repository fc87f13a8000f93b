import { clickAndExtract, getHtml, getText, screenshot, search } from './browser.js';
import type { CommandSpec, CommandTable } from './dispatch.js';

function printJson<T>(result: T): T {
  console.log(JSON.stringify(result, null, 2));
  return result;
}

export const BROWSER_COMMANDS: CommandTable = new Map<string, CommandSpec>([
  ['search', { args: '<query...>', minArgs: 1, run: async (words) => printJson(await search(words.join(' '))) }],
  [
    'screenshot',
    {
      args: '<url> <output_path>',
      minArgs: 2,
      run: async ([url, output]) => printJson(await screenshot(url, output)),
    },
  ],
  ['get_text', { args: '<url>', minArgs: 1, run: async ([url]) => printJson(await getText(url)) }],
  ['get_html', { args: '<url>', minArgs: 1, run: async ([url]) => printJson(await getHtml(url)) }],
  [
    'click_extract',
    {
      args: '<url> <click_selector> <extract_selector>',
      minArgs: 3,
      run: async ([url, click, extract]) => printJson(await clickAndExtract(url, click, extract)),
    },
  ],
]);

export const BROWSER_HELP: string[] = [
  'Usage: browser-tool <command> [args...]',
  `Commands: ${[...BROWSER_COMMANDS.keys()].join(', ')}`,
];
