/**
 * browser-tool operations. Each call runs in its own browser via
 * {@link withPage} and returns a plain JSON-serialisable result.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { MAX_HTML_LENGTH, MAX_TEXT_LENGTH, fitScreenshot, truncate } from './browser-utils.js';
import { openPage, withPage } from './browser-session.js';
import { getConfig } from './config.js';

export const MAX_SEARCH_RESULTS = 5;

export interface SearchResult {
  title: string;
  link: string;
  snippet: string;
}

export interface SearchResponse {
  query: string;
  results: SearchResult[];
  timestamp: string;
}

export interface ScreenshotResponse {
  url: string;
  screenshot: string;
  timestamp: string;
}

export interface PageTextResponse {
  url: string;
  title: string;
  text: string;
  timestamp: string;
}

export interface PageHtmlResponse {
  url: string;
  html: string;
  timestamp: string;
}

export interface ClickExtractResponse {
  url: string;
  clicked: string;
  extracted: string | null;
  timestamp: string;
}

function now(): string {
  return new Date().toISOString();
}

export function searchUrl(query: string): string {
  return `https://www.google.com/search?q=${encodeURIComponent(query)}`;
}

export async function search(query: string): Promise<SearchResponse> {
  const results = await withPage(async (page) => {
    await openPage(page, searchUrl(query));
    // Runs in the page; `limit` is passed in because closures do not cross over.
    return page.evaluate((limit) => {
      const items = document.querySelectorAll('div.g');
      return Array.from(items)
        .slice(0, limit)
        .map((item) => ({
          title: item.querySelector('h3')?.textContent ?? '',
          link: item.querySelector('a')?.href ?? '',
          snippet: item.querySelector('.VwiC3b')?.textContent ?? '',
        }));
    }, MAX_SEARCH_RESULTS);
  });
  return { query, results, timestamp: now() };
}

export async function screenshot(url: string, outputPath: string): Promise<ScreenshotResponse> {
  const { screenshotMaxDimension } = getConfig();
  await mkdir(dirname(outputPath), { recursive: true });

  await withPage(async (page) => {
    await openPage(page, url);
    if (screenshotMaxDimension === undefined) {
      await page.screenshot({ path: outputPath, fullPage: true, type: 'png' });
      return;
    }
    const raw = await page.screenshot({ fullPage: true, type: 'png' });
    await writeFile(outputPath, await fitScreenshot(raw, screenshotMaxDimension));
  });

  return { url, screenshot: outputPath, timestamp: now() };
}

export async function getText(url: string): Promise<PageTextResponse> {
  const { title, text } = await withPage(async (page) => {
    await openPage(page, url);
    return {
      title: await page.title(),
      text: await page.evaluate(() => document.body?.innerText ?? ''),
    };
  });
  return { url, title, text: truncate(text, MAX_TEXT_LENGTH), timestamp: now() };
}

export async function getHtml(url: string): Promise<PageHtmlResponse> {
  const html = await withPage(async (page) => {
    await openPage(page, url);
    return page.content();
  });
  return { url, html: truncate(html, MAX_HTML_LENGTH), timestamp: now() };
}

export async function clickAndExtract(
  url: string,
  clickSelector: string,
  extractSelector: string,
): Promise<ClickExtractResponse> {
  const { browserNavTimeoutMs } = getConfig();
  const extracted = await withPage(async (page) => {
    await openPage(page, url);
    await page.click(clickSelector);
    await page.waitForLoadState('networkidle', { timeout: browserNavTimeoutMs });
    return page.locator(extractSelector).textContent();
  });
  return { url, clicked: clickSelector, extracted, timestamp: now() };
}
