import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { execAz } from './az.js';
import { resetConfig } from './config.js';

// Runs a real stand-in for az whose launcher forks a long-lived child that
// holds the output pipes, the way the az shell script starts python.
function isRunning(pid: number): boolean {
  const statFile = `/proc/${pid}/stat`;
  if (!fs.existsSync(statFile)) return false;
  return !/^\d+ \(.*\) Z/.test(fs.readFileSync(statFile, 'utf8'));
}

describe.skipIf(process.platform !== 'linux')('execAz timeout with a forking az', () => {
  let tmpDir: string;
  let pidFile: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'azure-tool-timeout-'));
    pidFile = path.join(tmpDir, 'grandchild.pid');
    const script = path.join(tmpDir, 'az');
    fs.writeFileSync(script, `#!/bin/sh\nsleep 30 &\necho $! > "${pidFile}"\nwait\n`);
    fs.chmodSync(script, 0o755);
    process.env.AZ_CLI_PATH = script;
    process.env.AZ_TIMEOUT_MS = '300';
    resetConfig();
  });

  afterEach(() => {
    delete process.env.AZ_CLI_PATH;
    delete process.env.AZ_TIMEOUT_MS;
    resetConfig();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('resolves at the deadline and takes the forked child down with it', async () => {
    const started = Date.now();

    const result = await execAz(['account', 'list']);

    expect(result).toEqual({ ok: false, error: 'Command timed out after 0.3s' });
    expect(Date.now() - started).toBeLessThan(3_000);

    const grandchild = Number(fs.readFileSync(pidFile, 'utf8').trim());
    await vi.waitFor(() => expect(isRunning(grandchild)).toBe(false), { timeout: 2_000 });
  }, 10_000);
});
