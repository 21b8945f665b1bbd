import { spawn } from 'child_process';

export interface ProcessResult {
  /**
   * Exit status; -1 when the process was killed by a signal.
   */
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /**
   * Kill the process (SIGKILL) after this many milliseconds.
   */
  timeoutMs?: number;
}

/**
 * Run a command without a shell and collect its output.
 *
 * Rejects only when the process cannot be started (e.g. ENOENT); a non-zero
 * exit or a timeout resolves normally.
 */
export function runProcess(
  command: string,
  args: string[],
  { cwd, env, timeoutMs }: RunProcessOptions = {},
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: process.platform === 'win32',
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            child.kill('SIGKILL');
          }, timeoutMs);

    child.on('error', error => {
      if (timer) clearTimeout(timer);
      if (settled) return;
      settled = true;
      reject(error);
    });

    child.on('close', code => {
      if (timer) clearTimeout(timer);
      if (settled) return;
      settled = true;
      resolve({ exitCode: code ?? -1, stdout, stderr, timedOut });
    });
  });
}
