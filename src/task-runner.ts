import type { CompletionSource } from './completion-client.js';
import {
  fileWrites,
  parseChangeSet,
  renderCommitMessage,
  type ChangeSet,
  type TaskKind,
} from './change-set.js';
import { ChangeSetParseError, errorMessage } from './errors.js';
import { log } from './logger.js';
import { DEFAULT_MAX_CONTEXT_FILES, buildRepositoryContext } from './repository-context.js';
import { featurePrompt, fixPrompt } from './task-prompts.js';
import type { Workspace } from './workspace.js';

/**
 * Maximum length of the description part of a derived branch name.
 */
export const BRANCH_SLUG_LENGTH = 30;

/**
 * Parameters for one feature or fix task.
 */
export type TaskOptions = {
  kind: TaskKind;

  /**
   * Natural-language description of the feature or the issues.
   */
  description: string;

  /**
   * Branch reported when no new branch is created.
   *
   * @default 'main'
   */
  baseBranch?: string;

  /**
   * Create and check out a `feature/...` or `fix/...` branch first, and
   * commit the applied files on it.
   *
   * @default false
   */
  createBranch?: boolean;

  /**
   * @default 20
   */
  maxContextFiles?: number;
};

/**
 * Outcome of one task. Not persisted.
 */
export interface ApplyResult {
  readonly success: boolean;
  /**
   * Files written, in order. On a write failure, only those written before it.
   */
  readonly touchedFiles: string[];
  readonly branch?: string;
  readonly error?: string;
  /**
   * Model output, present only when it could not be parsed.
   */
  readonly rawResponse?: string;
  readonly changeSet?: ChangeSet;
}

/**
 * `feature/<slug>` or `fix/<slug>`, where the slug is the lower-cased
 * description with spaces turned into hyphens, cut to 30 characters.
 */
export function deriveBranchName(kind: TaskKind, description: string): string {
  const slug = description.toLowerCase().split(' ').join('-').slice(0, BRANCH_SLUG_LENGTH);
  return `${kind}/${slug}`;
}

/**
 * Write every file of a change-set in order. Stops at the first failure.
 */
export async function applyChangeSet(
  workspace: Workspace,
  changeSet: ChangeSet,
): Promise<{ touchedFiles: string[]; error?: string }> {
  const touchedFiles: string[] = [];

  for (const write of fileWrites(changeSet)) {
    try {
      await workspace.writeFile(write.path, write.content);
    } catch (error) {
      log(`  [x] ${write.summary}: ${errorMessage(error)}`, 'red');
      return {
        touchedFiles,
        error: `write failure: ${write.path}: ${errorMessage(error)}`,
      };
    }
    log(`  [+] ${write.summary}`, 'green');
    touchedFiles.push(write.path);
  }

  return { touchedFiles };
}

/**
 * Run a feature or fix task against a working copy: build the context,
 * optionally branch, ask the model for a change-set, write it, optionally commit.
 *
 * Unparseable model output and write or commit failures come back as an
 * unsuccessful result. Branch creation failures and completion errors throw.
 */
export async function runTask(
  workspace: Workspace,
  completion: CompletionSource,
  {
    kind,
    description,
    baseBranch = 'main',
    createBranch = false,
    maxContextFiles = DEFAULT_MAX_CONTEXT_FILES,
  }: TaskOptions,
): Promise<ApplyResult> {
  const context = await buildRepositoryContext(workspace, { maxFiles: maxContextFiles });

  let branch = baseBranch;
  if (createBranch) {
    branch = deriveBranchName(kind, description);
    await workspace.createBranch(branch);
  }

  const prompt = kind === 'feature' ? featurePrompt(description, context) : fixPrompt(description, context);

  log(
    kind === 'feature' ? '  [-] Generating implementation plan...' : '  [-] Analyzing issues and generating fixes...',
    'cyan',
  );
  const raw = await completion.send(prompt);

  let changeSet: ChangeSet;
  try {
    changeSet = parseChangeSet(kind, raw);
  } catch (error) {
    if (!(error instanceof ChangeSetParseError)) throw error;
    log(`  [x] Could not parse the model response: ${error.message}`, 'red');
    return {
      success: false,
      touchedFiles: [],
      error: `parse failure: ${error.message}`,
      rawResponse: raw,
    };
  }

  const applied = await applyChangeSet(workspace, changeSet);
  if (applied.error) {
    return {
      success: false,
      touchedFiles: applied.touchedFiles,
      branch,
      error: applied.error,
      changeSet,
    };
  }

  if (createBranch) {
    try {
      await workspace.commitAll(renderCommitMessage(description, changeSet));
    } catch (error) {
      log(`  [x] Commit failed: ${errorMessage(error)}`, 'red');
      return {
        success: false,
        touchedFiles: applied.touchedFiles,
        branch,
        error: `commit failure: ${errorMessage(error)}`,
        changeSet,
      };
    }
    log(`  [+] Changes committed to branch ${branch}`, 'green');
  }

  return {
    success: true,
    touchedFiles: applied.touchedFiles,
    branch,
    changeSet,
  };
}
