import { z, type ZodError } from 'zod';
import { ChangeSetParseError, errorMessage } from './errors.js';

export type TaskKind = 'feature' | 'fix';

const fileChangeSchema = z.object({
  path: z.string().min(1),
  action: z.enum(['create', 'modify']),
  content: z.string(),
  description: z.string().default(''),
});

const fixEntrySchema = z.object({
  file: z.string().min(1),
  issue: z.string().default(''),
  solution: z.string().default(''),
  content: z.string(),
});

/**
 * Wire shape the model is asked to return for a feature.
 */
export const implementationSchema = z.object({
  plan: z.string().default(''),
  files: z.array(fileChangeSchema),
  dependencies: z.array(z.string()).default([]),
  tests: z.array(z.string()).default([]),
  notes: z.string().default(''),
});

/**
 * Wire shape the model is asked to return for a fix.
 */
export const fixSetSchema = z.object({
  analysis: z.string().default(''),
  fixes: z.array(fixEntrySchema),
  tests: z.array(z.string()).default([]),
  notes: z.string().default(''),
});

export type FileChange = z.infer<typeof fileChangeSchema>;
export type FixEntry = z.infer<typeof fixEntrySchema>;

export type Implementation = { readonly kind: 'feature' } & z.infer<typeof implementationSchema>;
export type FixSet = { readonly kind: 'fix' } & z.infer<typeof fixSetSchema>;

/**
 * Parsed task result: an ordered list of whole-file writes plus metadata.
 */
export type ChangeSet = Implementation | FixSet;

/**
 * One file write, independent of the change-set variant.
 */
export interface FileWrite {
  readonly path: string;
  readonly content: string;
  /**
   * Human-readable line for logs and commit messages.
   */
  readonly summary: string;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse raw model text into the change-set variant for `kind`.
 * Invalid JSON and schema violations both throw ChangeSetParseError.
 */
export function parseChangeSet(kind: TaskKind, raw: string): ChangeSet {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ChangeSetParseError(`invalid JSON: ${errorMessage(error)}`, raw, { cause: error });
  }

  if (kind === 'feature') {
    const parsed = implementationSchema.safeParse(data);
    if (!parsed.success) {
      throw new ChangeSetParseError(`unexpected structure: ${formatIssues(parsed.error)}`, raw);
    }
    return { kind, ...parsed.data };
  }

  const parsed = fixSetSchema.safeParse(data);
  if (!parsed.success) {
    throw new ChangeSetParseError(`unexpected structure: ${formatIssues(parsed.error)}`, raw);
  }
  return { kind, ...parsed.data };
}

/**
 * The writes a change-set asks for, in order.
 */
export function fileWrites(changeSet: ChangeSet): FileWrite[] {
  switch (changeSet.kind) {
    case 'feature':
      return changeSet.files.map(file => ({
        path: file.path,
        content: file.content,
        summary: `${capitalize(file.action)} ${file.path}`,
      }));

    case 'fix':
      return changeSet.fixes.map(fix => ({
        path: fix.file,
        content: fix.content,
        summary: `${fix.file}: ${fix.solution}`,
      }));

    default: {
      // TypeScript exhaustiveness check
      const _exhaustive: never = changeSet;
      throw new Error(`Unknown change-set kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Commit message for an applied change-set.
 */
export function renderCommitMessage(description: string, changeSet: ChangeSet): string {
  const lines = fileWrites(changeSet).map(write => `- ${write.summary}\n`).join('');

  if (changeSet.kind === 'feature') {
    return `Implement ${description}\n\nGenerated implementation including:\n${lines}`;
  }
  return `Fix: ${description}\n\n${changeSet.analysis}\n\n${lines}`;
}
