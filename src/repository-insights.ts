import type { CompletionSource } from './completion-client.js';
import { log } from './logger.js';
import { DEFAULT_MAX_CONTEXT_FILES, buildRepositoryContext } from './repository-context.js';
import { improvementPrompt, summaryPrompt } from './task-prompts.js';
import type { Workspace } from './workspace.js';

export interface InsightOptions {
  /**
   * @default 20
   */
  maxContextFiles?: number;
}

/**
 * Ask the model for an overview of the repository.
 */
export async function summarizeRepository(
  workspace: Workspace,
  completion: CompletionSource,
  { maxContextFiles = DEFAULT_MAX_CONTEXT_FILES }: InsightOptions = {},
): Promise<string> {
  const context = await buildRepositoryContext(workspace, { maxFiles: maxContextFiles });
  log('  [-] Generating repository summary...', 'cyan');
  return completion.send(summaryPrompt(context));
}

/**
 * Ask the model for improvement suggestions, optionally narrowed to one area
 * such as "performance" or "security".
 */
export async function suggestImprovements(
  workspace: Workspace,
  completion: CompletionSource,
  focus?: string,
  { maxContextFiles = DEFAULT_MAX_CONTEXT_FILES }: InsightOptions = {},
): Promise<string> {
  const context = await buildRepositoryContext(workspace, { maxFiles: maxContextFiles });
  log('  [-] Generating improvement suggestions...', 'cyan');
  return completion.send(improvementPrompt(context, focus));
}
