import type { Dirent, Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { WorkspaceError, errorMessage } from './errors.js';
import { log } from './logger.js';
import { VCS_DIR, type Workspace } from './workspace.js';

export interface RepositoryFile {
  /**
   * Path relative to the repository root, `/`-separated.
   */
  readonly relativePath: string;
  readonly sizeBytes: number;
  /**
   * Lower-cased extension including the dot, or '' when there is none.
   */
  readonly extension: string;
}

/**
 * Git metadata. A missing field means it could not be determined.
 */
export interface GitInfo {
  readonly currentBranch?: string;
  readonly remoteUrl?: string;
}

/**
 * Snapshot of a working copy's shape at the time of the call.
 */
export interface RepositoryAnalysis {
  readonly rootPath: string;
  readonly files: ReadonlyArray<RepositoryFile>;
  /**
   * File count per extension; files without an extension count under ''.
   */
  readonly languageCounts: Readonly<Record<string, number>>;
  readonly totalSizeBytes: number;
  readonly gitInfo: GitInfo;
}

/**
 * Walk the working copy (entries in name order, `.git` skipped) and collect
 * file sizes, extension counts and best-effort git metadata.
 *
 * Subdirectories that cannot be listed and entries that cannot be stat'ed are
 * skipped. Only an unlistable root is an error.
 */
export async function analyzeRepository(workspace: Workspace): Promise<RepositoryAnalysis> {
  const files: RepositoryFile[] = [];
  const languageCounts: Record<string, number> = {};
  let totalSizeBytes = 0;

  async function walk(dir: string, prefix: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (!prefix) {
        throw new WorkspaceError(`Cannot list working copy: ${errorMessage(error)}`, '.', {
          cause: error,
        });
      }
      log(`      Skipping ${prefix}/: ${errorMessage(error)}`, 'dim');
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (entry.name === VCS_DIR) continue;
        await walk(fullPath, relativePath);
        continue;
      }

      if (!entry.isFile() && !entry.isSymbolicLink()) continue;

      let stats: Stats;
      try {
        stats = await fs.stat(fullPath);
      } catch (error) {
        // broken links and entries removed since the listing
        log(`      Skipping ${relativePath}: ${errorMessage(error)}`, 'dim');
        continue;
      }
      // links to directories are not files
      if (!stats.isFile()) continue;
      const sizeBytes = stats.size;

      const extension = path.extname(entry.name).toLowerCase();
      files.push({ relativePath, sizeBytes, extension });
      totalSizeBytes += sizeBytes;
      languageCounts[extension] = (languageCounts[extension] ?? 0) + 1;
    }
  }

  await walk(workspace.rootPath, '');

  const currentBranch = await workspace.git.currentBranch(workspace.rootPath);
  const remoteUrl = await workspace.git.remoteUrl(workspace.rootPath);

  return {
    rootPath: workspace.rootPath,
    files,
    languageCounts,
    totalSizeBytes,
    gitInfo: {
      ...(currentBranch ? { currentBranch } : {}),
      ...(remoteUrl ? { remoteUrl } : {}),
    },
  };
}
