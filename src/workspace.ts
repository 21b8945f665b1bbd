import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { glob } from 'glob';
import { CliGitClient, type GitClient } from './git-client.js';
import { GitError, WorkspaceError, errorMessage } from './errors.js';
import { log } from './logger.js';

/**
 * Prefix of the temporary directory every clone goes into.
 */
export const WORKSPACE_DIR_PREFIX = 'repo-forge-';

/**
 * Version-control metadata directory, never part of the repository contents.
 */
export const VCS_DIR = '.git';

export interface CloneOptions {
  /**
   * @default 'main'
   */
  branch?: string;
  git?: GitClient;
  /**
   * Directory the unique working directory is created in.
   *
   * @default os.tmpdir()
   */
  parentDir?: string;
}

/**
 * Repository name from a clone URL: last path segment without `.git`.
 */
export function repositoryName(url: string): string {
  const segments = url.replace(/[\\/]+$/, '').split(/[\\/:]/);
  const last = segments[segments.length - 1] ?? '';
  return last.replace(/\.git$/, '') || 'repository';
}

/**
 * Decode file bytes as UTF-8, falling back to latin1 (which never fails).
 */
export function decodeText(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return Buffer.from(bytes).toString('latin1');
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * An explicit handle to one working copy. Every repository operation goes
 * through it; nothing depends on the process working directory.
 *
 * A workspace assumes it is the only writer of its directory.
 */
export class Workspace {
  private realRoot: Promise<string> | undefined;

  protected constructor(
    readonly rootPath: string,
    readonly git: GitClient,
    private readonly ownedDir: string | undefined,
  ) {}

  /**
   * Clone `url` into a fresh, uniquely named temporary directory. On failure
   * the directory is removed and a GitError is thrown.
   */
  static async clone(url: string, options: CloneOptions = {}): Promise<Workspace> {
    const { branch = 'main', git = new CliGitClient(), parentDir = os.tmpdir() } = options;
    const workDir = await fs.mkdtemp(path.join(parentDir, WORKSPACE_DIR_PREFIX));
    const clonePath = path.join(workDir, repositoryName(url));

    log(`  [-] Cloning ${url} (${branch})...`, 'cyan');
    try {
      await git.clone(url, branch, clonePath);
    } catch (error) {
      await fs.rm(workDir, { recursive: true, force: true });
      if (error instanceof GitError) throw error;
      throw new GitError(`Failed to clone repository: ${errorMessage(error)}`, 'clone', '', {
        cause: error,
      });
    }
    log(`  [+] Cloned into ${clonePath}`, 'green');

    return new Workspace(clonePath, git, workDir);
  }

  /**
   * Wrap an existing directory. The directory is never deleted by dispose().
   */
  static open(rootPath: string, git: GitClient = new CliGitClient()): Workspace {
    return new Workspace(path.resolve(rootPath), git, undefined);
  }

  /**
   * Absolute path of `relativePath` inside the working copy. Absolute paths,
   * paths that leave the working copy and paths into `.git` are rejected.
   */
  resolve(relativePath: string): string {
    if (!relativePath.trim() || path.isAbsolute(relativePath) || /^[a-zA-Z]:/.test(relativePath)) {
      throw new WorkspaceError(`Invalid path '${relativePath}': must be relative`, relativePath);
    }
    const full = path.resolve(this.rootPath, relativePath);
    const rel = path.relative(this.rootPath, full);
    if (!rel || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
      throw new WorkspaceError(
        `Invalid path '${relativePath}': outside the working copy`,
        relativePath,
      );
    }
    if (rel.split(path.sep).includes(VCS_DIR)) {
      throw new WorkspaceError(`Invalid path '${relativePath}': inside ${VCS_DIR}`, relativePath);
    }
    return full;
  }

  /**
   * Like resolve(), but also follows symbolic links: the target, or for a
   * path that does not exist yet its deepest existing ancestor, must lie
   * inside the real working copy and outside `.git`.
   */
  async resolveReal(relativePath: string): Promise<string> {
    const full = this.resolve(relativePath);
    const root = await this.realRootPath(relativePath);

    let existing = full;
    let real: string | undefined;
    while (real === undefined) {
      try {
        real = await fs.realpath(existing);
      } catch (error) {
        if (!isMissing(error)) {
          throw new WorkspaceError(
            `Cannot resolve '${relativePath}': ${errorMessage(error)}`,
            relativePath,
            { cause: error },
          );
        }
        // a dangling link would be followed by the write
        if (await fs.lstat(existing).then(stats => stats.isSymbolicLink(), () => false)) {
          throw new WorkspaceError(
            `Invalid path '${relativePath}': dangling symbolic link`,
            relativePath,
          );
        }
        existing = path.dirname(existing);
      }
    }

    const rel = path.relative(root, real);
    if (rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
      throw new WorkspaceError(
        `Invalid path '${relativePath}': resolves outside the working copy`,
        relativePath,
      );
    }
    if (rel.split(path.sep).includes(VCS_DIR)) {
      throw new WorkspaceError(`Invalid path '${relativePath}': resolves into ${VCS_DIR}`, relativePath);
    }
    return full;
  }

  private async realRootPath(relativePath: string): Promise<string> {
    this.realRoot ??= fs.realpath(this.rootPath);
    try {
      return await this.realRoot;
    } catch (error) {
      this.realRoot = undefined;
      throw new WorkspaceError(
        `Cannot resolve working copy '${this.rootPath}': ${errorMessage(error)}`,
        relativePath,
        { cause: error },
      );
    }
  }

  /**
   * Relative paths (with `/` separators, sorted) of files whose base name
   * matches `pattern`. Case-sensitive; `.git` is skipped.
   */
  async findFiles(pattern: string): Promise<string[]> {
    const matches = await glob(pattern, {
      cwd: this.rootPath,
      matchBase: true,
      nodir: true,
      dot: true,
      nocase: false,
      posix: true,
      ignore: [`**/${VCS_DIR}/**`],
    });
    return matches.sort();
  }

  async readFile(relativePath: string): Promise<string> {
    const bytes = await fs.readFile(await this.resolveReal(relativePath));
    return decodeText(bytes);
  }

  /**
   * Write `content` verbatim, creating parent directories as needed.
   */
  async writeFile(relativePath: string, content: string): Promise<void> {
    const full = await this.resolveReal(relativePath);
    try {
      await fs.mkdir(path.dirname(full), { recursive: true });
      await fs.writeFile(full, content, 'utf-8');
    } catch (error) {
      throw new WorkspaceError(
        `Cannot write '${relativePath}': ${errorMessage(error)}`,
        relativePath,
        { cause: error },
      );
    }
  }

  async createBranch(name: string): Promise<void> {
    await this.git.createBranch(this.rootPath, name);
    log(`  [+] Checked out new branch ${name}`, 'green');
  }

  async commitAll(message: string): Promise<void> {
    await this.git.commitAll(this.rootPath, message);
  }

  async push(branch?: string): Promise<void> {
    await this.git.push(this.rootPath, branch);
  }

  /**
   * Remove the temporary directory of a cloned workspace.
   */
  async dispose(): Promise<void> {
    if (!this.ownedDir) return;
    await fs.rm(this.ownedDir, { recursive: true, force: true });
  }
}
