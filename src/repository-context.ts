import { analyzeRepository, type RepositoryAnalysis } from './repository-analysis.js';
import type { Workspace } from './workspace.js';
import { log } from './logger.js';

/**
 * Base-name globs tried in order when picking files for the digest.
 */
export const PRIORITY_PATTERNS: readonly string[] = [
  'README*',
  '*.md',
  'package.json',
  'requirements.txt',
  'Cargo.toml',
  'pom.xml',
  'build.gradle',
  'Makefile',
  '*.py',
  '*.js',
  '*.ts',
  '*.go',
  '*.rs',
  '*.java',
];

export const DEFAULT_MAX_CONTEXT_FILES = 20;
export const MAX_MATCHES_PER_PATTERN = 5;
export const MAX_EXCERPT_CHARS = 2000;

export interface RepositoryContextOptions {
  /**
   * Maximum number of file excerpts.
   *
   * @default 20
   */
  maxFiles?: number;

  /**
   * @default PRIORITY_PATTERNS
   */
  patterns?: readonly string[];
}

/**
 * Header lines describing the repository as a whole.
 */
export function formatAnalysisHeader(analysis: RepositoryAnalysis): string[] {
  const extensions = Object.keys(analysis.languageCounts).filter(ext => ext !== '');
  const lines = [
    '=== REPOSITORY ANALYSIS ===',
    `Path: ${analysis.rootPath}`,
    `Total files: ${analysis.files.length}`,
    `Size: ${analysis.totalSizeBytes} bytes`,
    `Languages: ${extensions.join(', ')}`,
  ];
  if (analysis.gitInfo.currentBranch) {
    lines.push(`Current branch: ${analysis.gitInfo.currentBranch}`);
  }
  if (analysis.gitInfo.remoteUrl) {
    lines.push(`Remote: ${analysis.gitInfo.remoteUrl}`);
  }
  return lines;
}

/**
 * Build the textual digest of a working copy that goes into prompts: a
 * header plus at most `maxFiles` excerpts of MAX_EXCERPT_CHARS characters.
 *
 * Each pattern contributes at most MAX_MATCHES_PER_PATTERN of its (sorted)
 * matches. Files that cannot be read are skipped and still use up their slot.
 */
export async function buildRepositoryContext(
  workspace: Workspace,
  { maxFiles = DEFAULT_MAX_CONTEXT_FILES, patterns = PRIORITY_PATTERNS }: RepositoryContextOptions = {},
): Promise<string> {
  if (!Number.isInteger(maxFiles) || maxFiles < 0) {
    throw new RangeError(`maxFiles must be a non-negative integer, got ${maxFiles}`);
  }

  const analysis = await analyzeRepository(workspace);
  const context = [...formatAnalysisHeader(analysis), '', '=== FILE STRUCTURE ==='];

  const included = new Set<string>();

  for (const pattern of patterns) {
    if (included.size >= maxFiles) break;

    const matches = await workspace.findFiles(pattern);
    for (const filePath of matches.slice(0, MAX_MATCHES_PER_PATTERN)) {
      if (included.has(filePath) || included.size >= maxFiles) continue;

      let content: string;
      try {
        content = await workspace.readFile(filePath);
      } catch {
        continue;
      }

      context.push(`\n--- ${filePath} ---`);
      context.push(content.slice(0, MAX_EXCERPT_CHARS));
      included.add(filePath);
    }
  }

  log(`      Context: ${analysis.files.length} files scanned, ${included.size} included`, 'dim');
  return context.join('\n');
}
