import sharp from 'sharp';
import { describe, it, expect } from 'vitest';
import { MAX_HTML_LENGTH, MAX_TEXT_LENGTH, findLocalChrome, fitScreenshot, truncate } from './browser-utils.js';

describe('truncate', () => {
  it('cuts long values to the limit', () => {
    expect(truncate('abcdef', 4)).toBe('abcd');
  });

  it('returns values at or under the limit unchanged', () => {
    expect(truncate('abcd', 4)).toBe('abcd');
    expect(truncate('', 4)).toBe('');
  });

  it('counts characters outside the basic plane as one', () => {
    const result = truncate('😀'.repeat(6_000), 5_000);
    expect(Array.from(result)).toHaveLength(5_000);
    expect(result).toBe('😀'.repeat(5_000));
  });

  it('never leaves half of a surrogate pair at the cut', () => {
    expect(truncate('ab😀cd', 3)).toBe('ab😀');
    expect(truncate('😀😀', 3)).toBe('😀😀');
  });

  it('uses fixed limits for text and markup', () => {
    expect(MAX_TEXT_LENGTH).toBe(5_000);
    expect(MAX_HTML_LENGTH).toBe(10_000);
  });
});

describe('findLocalChrome', () => {
  it('returns the first Linux candidate that exists', () => {
    const found = findLocalChrome('linux', (p) => p === '/usr/bin/chromium' || p === '/snap/bin/chromium');
    expect(found).toBe('/usr/bin/chromium');
  });

  it('looks in /Applications on macOS', () => {
    const found = findLocalChrome('darwin', (p) => p.startsWith('/Applications/Chromium.app'));
    expect(found).toBe('/Applications/Chromium.app/Contents/MacOS/Chromium');
  });

  it('returns undefined when nothing is installed', () => {
    expect(findLocalChrome('linux', () => false)).toBeUndefined();
  });
});

describe('fitScreenshot', () => {
  function blankPng(width: number, height: number): Promise<Buffer> {
    return sharp({ create: { width, height, channels: 3, background: { r: 0, g: 0, b: 0 } } })
      .png()
      .toBuffer();
  }

  it('returns small images unchanged', async () => {
    const png = await blankPng(50, 40);
    expect(await fitScreenshot(png, 100)).toBe(png);
  });

  it('fits tall images inside the box', async () => {
    const resized = await fitScreenshot(await blankPng(300, 1200), 600);
    const meta = await sharp(resized).metadata();
    expect(meta.width).toBe(150);
    expect(meta.height).toBe(600);
  });
});
