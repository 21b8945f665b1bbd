/**
 * Local code execution in a throwaway file and subprocess.
 *
 * There is no isolation beyond the OS process boundary and the timeout.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { errorMessage } from './errors.js';
import { log } from './logger.js';
import { runProcess } from './process.js';

export const DEFAULT_EXECUTION_TIMEOUT_SECONDS = 30;

/**
 * Prefix of the temporary directory created for every run.
 */
export const SANDBOX_DIR_PREFIX = 'repo-forge-exec-';

/**
 * How to run a source file of one language.
 */
export interface CodeRuntime {
  /**
   * Language name used in prompts.
   */
  readonly language: string;
  readonly extension: string;
  readonly command: string;
  readonly args: readonly string[];
}

export const RUNTIMES = {
  python: {
    language: 'Python',
    extension: '.py',
    command: process.platform === 'win32' ? 'python' : 'python3',
    args: [],
  },
  javascript: {
    language: 'JavaScript (Node.js, ES modules)',
    extension: '.mjs',
    command: process.execPath,
    args: [],
  },
} as const satisfies Record<string, CodeRuntime>;

export type RuntimeName = keyof typeof RUNTIMES;

export function isRuntimeName(value: string): value is RuntimeName {
  return Object.hasOwn(RUNTIMES, value);
}

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  success: boolean;
}

export interface ExecuteCodeOptions {
  /**
   * @default 30
   */
  timeoutSeconds?: number;

  /**
   * @default RUNTIMES.python
   */
  runtime?: CodeRuntime;

  /**
   * Directory the temporary run directory is created in.
   *
   * @default os.tmpdir()
   */
  tmpRoot?: string;
}

/**
 * Write `source` to a temporary file and run it. Never throws: timeouts and
 * start-up failures come back as unsuccessful results with exit code -1.
 */
export async function executeCode(
  source: string,
  {
    timeoutSeconds = DEFAULT_EXECUTION_TIMEOUT_SECONDS,
    runtime = RUNTIMES.python,
    tmpRoot = os.tmpdir(),
  }: ExecuteCodeOptions = {},
): Promise<ExecutionResult> {
  let runDir: string | undefined;

  try {
    runDir = await fs.mkdtemp(path.join(tmpRoot, SANDBOX_DIR_PREFIX));
    const file = path.join(runDir, `main${runtime.extension}`);
    await fs.writeFile(file, source, 'utf-8');

    const result = await runProcess(runtime.command, [...runtime.args, file], {
      cwd: runDir,
      timeoutMs: timeoutSeconds * 1000,
    });

    if (result.timedOut) {
      return {
        exitCode: -1,
        stdout: '',
        stderr: `Execution timed out after ${timeoutSeconds} seconds`,
        success: false,
      };
    }

    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      success: result.exitCode === 0,
    };
  } catch (error) {
    return {
      exitCode: -1,
      stdout: '',
      stderr: `Execution error: ${errorMessage(error)}`,
      success: false,
    };
  } finally {
    if (runDir) {
      await fs.rm(runDir, { recursive: true, force: true }).catch(error => {
        log(`  [!] Could not remove ${runDir}: ${errorMessage(error)}`, 'yellow');
      });
    }
  }
}
