import { spawn } from 'child_process';

export interface CommandOutcome {
  code: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  stderr: string;
}

const STDERR_LIMIT = 4096;

/**
 * Spawns `command` in its own process group and resolves once it exits and its output streams
 * close. When `timeoutMs` passes first, the whole group is killed and the outcome is reported
 * with `timedOut` as soon as the command itself exits. Rejects only when the process cannot be
 * started.
 */
export function runCommand(
  command: string,
  args: string[],
  options: { timeoutMs: number; cwd?: string }
): Promise<CommandOutcome> {
  return new Promise<CommandOutcome>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'ignore', 'pipe'],
      detached: process.platform !== 'win32',
      windowsHide: true,
    });
    let stderr = '';
    let timedOut = false;
    let settled = false;

    // Launchers such as soffice fork a worker that would outlive a kill aimed at the launcher alone.
    const killGroup = () => {
      if (child.pid !== undefined && process.platform !== 'win32') {
        try {
          process.kill(-child.pid, 'SIGKILL');
          return;
        } catch {
          // The group is already gone; fall through to the direct kill.
        }
      }
      child.kill('SIGKILL');
    };

    const settle = (code: number | null, signal: NodeJS.Signals | null) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      resolve({ code, signal, timedOut, stderr: stderr.trim() });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killGroup();
    }, options.timeoutMs);

    child.stderr?.on('data', (chunk: Buffer) => {
      if (stderr.length < STDERR_LIMIT) {
        stderr = (stderr + chunk.toString('utf-8')).slice(0, STDERR_LIMIT);
      }
    });

    child.once('exit', (code, signal) => {
      if (!timedOut) return;
      // A survivor may still hold stderr open, so the timed out run does not wait for 'close'.
      child.stderr?.destroy();
      settle(code, signal);
    });
    child.once('close', settle);
    child.once('error', (error) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      reject(error);
    });
  });
}
