export interface Logger {
  warn(message: string): void;
  error(message: string, err?: unknown): void;
  debug(message: string, data?: unknown): void;
}

function debugEnabled(): boolean {
  return !!process.env.BROWSER_TOOLS_DEBUG;
}

/**
 * Diagnostics go to stderr under a `[tag]` prefix so stdout stays clean for
 * reports and JSON.
 */
export function createLogger(tag: string): Logger {
  return {
    warn(message) {
      console.error(`[${tag}] WARN ${message}`);
    },
    error(message, err) {
      if (err === undefined) {
        console.error(`[${tag}] ${message}`);
      } else {
        console.error(`[${tag}] ${message}`, err);
      }
    },
    debug(message, data) {
      if (!debugEnabled()) return;
      const suffix = data !== undefined ? ' ' + JSON.stringify(data) : '';
      console.error(`[${tag}] DEBUG ${new Date().toISOString()} ${message}${suffix}`);
    },
  };
}
