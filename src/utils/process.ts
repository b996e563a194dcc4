import { spawn } from 'child_process';

const DEFAULT_TIMEOUT_MS = 30_000;

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Run a command to completion and collect its output.
 * Rejects only when the process cannot be spawned or times out; a non-zero
 * exit code is returned to the caller to interpret.
 */
export function runCommand(
  cmd: string,
  args: string[],
  options: { timeout?: number } = {},
): Promise<CommandResult> {
  const { timeout = DEFAULT_TIMEOUT_MS } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    proc.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    const timer = setTimeout(() => {
      proc.kill('SIGTERM');
      reject(new Error(`${cmd} timed out after ${timeout / 1000}s`));
    }, timeout);

    proc.on('close', (code) => {
      clearTimeout(timer);
      resolve({ code, stdout, stderr });
    });

    proc.on('error', (err) => {
      clearTimeout(timer);
      reject(new Error(`Failed to spawn ${cmd}: ${err.message}`));
    });
  });
}

/**
 * Start a long-lived process that outlives this one (wallpaper renderers and
 * their daemons). Resolves once the process has spawned.
 */
export function spawnDetached(cmd: string, args: string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const proc = spawn(cmd, args, { detached: true, stdio: 'ignore' });

    proc.once('spawn', () => {
      proc.unref();
      resolve();
    });

    proc.once('error', (err) => {
      reject(new Error(`Failed to spawn ${cmd}: ${err.message}`));
    });
  });
}

/** True when `bin` resolves on PATH. */
export async function commandExists(bin: string): Promise<boolean> {
  try {
    const { code } = await runCommand('which', [bin], { timeout: 5_000 });
    return code === 0;
  } catch {
    return false;
  }
}
