import { existsSync } from 'fs';
import { platform } from 'os';
import sharp from 'sharp';

/** Extracted page text is cut to this many characters. */
export const MAX_TEXT_LENGTH = 5_000;
/** Extracted markup is cut to this many characters. */
export const MAX_HTML_LENGTH = 10_000;

/** Cuts `value` to `max` code points, so surrogate pairs are never split. */
export function truncate(value: string, max: number): string {
  if (value.length <= max) return value;
  const chars = Array.from(value);
  return chars.length > max ? chars.slice(0, max).join('') : value;
}

function chromeCandidates(systemPlatform: NodeJS.Platform): string[] {
  const home = process.env.HOME;
  if (systemPlatform === 'darwin') {
    return [
      '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
      '/Applications/Chromium.app/Contents/MacOS/Chromium',
      `${home}/Applications/Google Chrome.app/Contents/MacOS/Google Chrome`,
      `${home}/Applications/Chromium.app/Contents/MacOS/Chromium`,
    ];
  }
  if (systemPlatform === 'win32') {
    return [
      'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
      'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
      `${process.env.LOCALAPPDATA}\\Google\\Chrome\\Application\\chrome.exe`,
      'C:\\Program Files\\Chromium\\Application\\chrome.exe',
    ];
  }
  return [
    '/usr/bin/google-chrome',
    '/usr/bin/google-chrome-stable',
    '/usr/bin/chromium',
    '/usr/bin/chromium-browser',
    '/snap/bin/chromium',
    '/usr/local/bin/chromium',
    '/opt/google/chrome/chrome',
  ];
}

/**
 * Finds a locally installed Chrome or Chromium. Returns undefined when none
 * is found, in which case Playwright falls back to its own browser download.
 */
export function findLocalChrome(
  systemPlatform: NodeJS.Platform = platform(),
  exists: (path: string) => boolean = existsSync,
): string | undefined {
  return chromeCandidates(systemPlatform).find((p) => exists(p));
}

/**
 * Downscales a PNG so neither side exceeds `maxDimension`. Smaller images
 * are returned unchanged.
 */
export async function fitScreenshot(png: Buffer, maxDimension: number): Promise<Buffer> {
  const { width, height } = await sharp(png).metadata();
  if (!width || !height || (width <= maxDimension && height <= maxDimension)) {
    return png;
  }
  return sharp(png)
    .resize(maxDimension, maxDimension, { fit: 'inside', withoutEnlargement: true })
    .png()
    .toBuffer();
}
