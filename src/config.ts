/**
 * Environment configuration shared by both CLIs.
 *
 * Values come from `process.env`, after `.env` in the package root has been
 * loaded. Empty strings are treated as unset so a blank line in `.env`
 * falls back to the default.
 */

import { existsSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walks up from this module to the directory holding package.json. Works
 * both from `src/` and from the compiled `dist/src/`.
 */
export function findPackageRoot(start: string = __dirname): string {
  let dir = start;
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) return start;
    dir = parent;
  }
  return dir;
}

export const PACKAGE_ROOT = findPackageRoot();

dotenv.config({ path: join(PACKAGE_ROOT, '.env') });

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  AZ_CLI_PATH: z.string().optional(),
  AZ_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  AZ_DEFAULT_LOCATION: z.string().default('eastus'),
  BROWSER_EXECUTABLE_PATH: z.string().optional(),
  BROWSER_HEADLESS: booleanFlag.default('true'),
  BROWSER_NAV_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  BROWSER_SCREENSHOT_MAX_DIMENSION: z.coerce.number().int().positive().optional(),
});

export interface Config {
  azCliPath: string;
  azTimeoutMs: number;
  azDefaultLocation: string;
  browserExecutablePath?: string;
  browserHeadless: boolean;
  browserNavTimeoutMs: number;
  screenshotMaxDimension?: number;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  platform: NodeJS.Platform = process.platform,
): Config {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    azCliPath: e.AZ_CLI_PATH ?? (platform === 'win32' ? 'az.cmd' : 'az'),
    azTimeoutMs: e.AZ_TIMEOUT_MS,
    azDefaultLocation: e.AZ_DEFAULT_LOCATION,
    browserExecutablePath: e.BROWSER_EXECUTABLE_PATH,
    browserHeadless: e.BROWSER_HEADLESS,
    browserNavTimeoutMs: e.BROWSER_NAV_TIMEOUT_MS,
    screenshotMaxDimension: e.BROWSER_SCREENSHOT_MAX_DIMENSION,
  };
}

let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/** Drops the cached config so the next `getConfig()` re-reads the environment. */
export function resetConfig(): void {
  _config = null;
}
