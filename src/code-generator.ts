import type { CompletionSource } from './completion-client.js';
import {
  DEFAULT_EXECUTION_TIMEOUT_SECONDS,
  RUNTIMES,
  executeCode,
  type CodeRuntime,
  type ExecutionResult,
} from './code-sandbox.js';
import { errorMessage } from './errors.js';
import { log } from './logger.js';
import { codeGenerationPrompt } from './task-prompts.js';

export interface SolveOptions {
  /**
   * Run the generated code after generating it.
   *
   * @default true
   */
  execute?: boolean;

  /**
   * @default 30
   */
  timeoutSeconds?: number;

  /**
   * @default RUNTIMES.python
   */
  runtime?: CodeRuntime;

  /**
   * Directory for the sandbox's temporary files.
   */
  tmpRoot?: string;
}

export interface SolveResult {
  readonly problem: string;
  readonly generatedCode: string | null;
  readonly execution: ExecutionResult | null;
  readonly error?: string;
}

/**
 * Generate standalone code for a problem statement.
 */
export async function generateCode(
  completion: CompletionSource,
  problem: string,
  runtime: CodeRuntime = RUNTIMES.python,
): Promise<string> {
  return completion.send(codeGenerationPrompt(problem, runtime.language));
}

/**
 * Generate code for `problem` and, unless disabled, run it. Generation
 * failures are returned in `error` rather than thrown.
 */
export async function solveProblem(
  completion: CompletionSource,
  problem: string,
  {
    execute = true,
    timeoutSeconds = DEFAULT_EXECUTION_TIMEOUT_SECONDS,
    runtime = RUNTIMES.python,
    tmpRoot,
  }: SolveOptions = {},
): Promise<SolveResult> {
  log(`  [-] Generating code for: ${problem}`, 'cyan');

  let code: string;
  try {
    code = await generateCode(completion, problem, runtime);
  } catch (error) {
    return {
      problem,
      generatedCode: null,
      execution: null,
      error: errorMessage(error),
    };
  }

  if (!execute) {
    return { problem, generatedCode: code, execution: null };
  }

  log('  [-] Executing generated code...', 'cyan');
  const execution = await executeCode(code, { timeoutSeconds, runtime, tmpRoot });
  return { problem, generatedCode: code, execution };
}
