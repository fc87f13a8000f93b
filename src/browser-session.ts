/**
 * One isolated browser per operation.
 *
 * `withPage` launches Chromium, hands a fresh page to the callback and
 * closes the browser in `finally`, so every exit path releases it exactly
 * once. Sessions are never shared between operations.
 */

import { chromium, type Page } from 'playwright-core';
import { findLocalChrome } from './browser-utils.js';
import { getConfig } from './config.js';
import { createLogger } from './log.js';

const log = createLogger('browser-tool');

export async function withPage<T>(fn: (page: Page) => Promise<T>): Promise<T> {
  const config = getConfig();
  const executablePath = config.browserExecutablePath ?? findLocalChrome();
  if (!executablePath) {
    log.warn('No local Chrome found; using the browser installed by Playwright');
  }
  log.debug('launch', { executablePath: executablePath ?? '(playwright default)', headless: config.browserHeadless });

  const browser = await chromium.launch({ headless: config.browserHeadless, executablePath });
  try {
    const page = await browser.newPage();
    return await fn(page);
  } finally {
    await browser.close();
  }
}

/** Navigates and waits until the network has been idle for a moment. */
export async function openPage(page: Page, url: string): Promise<void> {
  const { browserNavTimeoutMs } = getConfig();
  log.debug('goto', { url });
  await page.goto(url, { timeout: browserNavTimeoutMs });
  await page.waitForLoadState('networkidle', { timeout: browserNavTimeoutMs });
}
