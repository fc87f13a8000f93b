/**
 * Azure CLI invoker.
 *
 * Every call runs `az` once, waits for it under a wall-clock timeout and
 * normalises the outcome into an {@link AzOutcome}. Nothing here throws for
 * a failed command; callers branch on `kind`.
 */

import { execa, ExecaError } from 'execa';
import type { z } from 'zod';
import { getConfig } from './config.js';
import { createLogger } from './log.js';

const log = createLogger('azure-tool');

export type AzOutcome<T> =
  | { kind: 'structured'; data: T }
  | { kind: 'text'; text: string; decodeError?: string }
  | { kind: 'failed'; error: string };

export type ExecResult = { ok: true; stdout: string } | { ok: false; error: string };

export interface ExecAzOptions {
  /** Append `-o json` so az prints machine-readable output. */
  json?: boolean;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Spawn options for az. No shell is involved on any platform: execa resolves
 * the `az.cmd` shim on Windows and escapes each argument for it. Elsewhere the
 * child leads its own process group so a timeout can take down the python
 * process the `az` launcher starts.
 */
export function azSpawnOptions(platform: NodeJS.Platform = process.platform) {
  return {
    stdin: 'inherit',
    reject: false,
    windowsHide: true,
    detached: platform !== 'win32',
  } as const;
}

function spawnAz(command: string, argv: readonly string[]) {
  return execa(command, argv, azSpawnOptions());
}

type AzSubprocess = ReturnType<typeof spawnAz>;

function killProcessTree(subprocess: AzSubprocess, platform: NodeJS.Platform = process.platform): void {
  if (platform !== 'win32' && subprocess.pid !== undefined) {
    try {
      process.kill(-subprocess.pid, 'SIGKILL');
    } catch (err) {
      // the group is already gone
      log.debug('process group kill failed', { pid: subprocess.pid, error: errorMessage(err) });
    }
  }
  subprocess.kill('SIGKILL');
  subprocess.stdout?.destroy();
  subprocess.stderr?.destroy();
}

function toExecResult(command: string, result: Awaited<AzSubprocess>): ExecResult {
  if (result.exitCode === 0) {
    return { ok: true, stdout: result.stdout };
  }
  if (result.exitCode === undefined && result.signal === undefined && result instanceof ExecaError) {
    return {
      ok: false,
      error:
        `Failed to run ${command}: ${result.originalMessage || result.shortMessage}. ` +
        `Make sure the Azure CLI is installed and on PATH (az --version).`,
    };
  }
  const detail = result.stderr.trim();
  const status = result.exitCode !== undefined ? `code ${result.exitCode}` : `signal ${result.signal}`;
  return { ok: false, error: detail || `az exited with ${status}` };
}

export function execAz(args: readonly string[], options: ExecAzOptions = {}): Promise<ExecResult> {
  const { azCliPath, azTimeoutMs } = getConfig();
  const argv = options.json ? [...args, '-o', 'json'] : [...args];
  log.debug('spawn', { command: azCliPath, args: argv });

  return new Promise((resolve) => {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;
    const finish = (result: ExecResult) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve(result);
    };

    let subprocess: AzSubprocess;
    try {
      subprocess = spawnAz(azCliPath, argv);
    } catch (err) {
      finish({ ok: false, error: `Failed to run ${azCliPath}: ${errorMessage(err)}` });
      return;
    }

    timer = setTimeout(() => {
      killProcessTree(subprocess);
      finish({ ok: false, error: `Command timed out after ${azTimeoutMs / 1000}s` });
    }, azTimeoutMs);

    subprocess.then(
      (result) => finish(toExecResult(azCliPath, result)),
      (err: unknown) => finish({ ok: false, error: `Failed to run ${azCliPath}: ${errorMessage(err)}` }),
    );
  });
}

/**
 * Decodes az JSON output against `schema`. Unparseable or unexpected output
 * falls back to the raw text with `decodeError` set.
 */
export function decodeAzOutput<S extends z.ZodTypeAny>(
  stdout: string,
  schema: S,
): AzOutcome<z.infer<S>> {
  const trimmed = stdout.trim();
  if (!trimmed) {
    return { kind: 'text', text: stdout };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (err) {
    return { kind: 'text', text: stdout, decodeError: `Output is not valid JSON: ${errorMessage(err)}` };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { kind: 'text', text: stdout, decodeError: `Unexpected output shape: ${issues}` };
  }
  return { kind: 'structured', data: result.data };
}

/** Runs az and keeps its output as text. */
export async function runAz(args: readonly string[]): Promise<AzOutcome<never>> {
  const result = await execAz(args);
  if (!result.ok) return { kind: 'failed', error: result.error };
  return { kind: 'text', text: result.stdout };
}

/** Runs az with `-o json` and decodes the output against `schema`. */
export async function runAzJson<S extends z.ZodTypeAny>(
  args: readonly string[],
  schema: S,
): Promise<AzOutcome<z.infer<S>>> {
  const result = await execAz(args, { json: true });
  if (!result.ok) return { kind: 'failed', error: result.error };
  return decodeAzOutput(result.stdout, schema);
}
