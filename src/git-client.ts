import { GitError, errorMessage } from './errors.js';
import { runProcess, type ProcessResult } from './process.js';

/**
 * The git operations a workspace needs. Every method that changes state
 * throws a GitError on failure; the two metadata queries return '' instead.
 */
export interface GitClient {
  clone(url: string, branch: string, destination: string): Promise<void>;
  currentBranch(cwd: string): Promise<string>;
  remoteUrl(cwd: string): Promise<string>;
  /**
   * Create a branch and check it out.
   */
  createBranch(cwd: string, name: string): Promise<void>;
  /**
   * Stage every change and commit.
   */
  commitAll(cwd: string, message: string): Promise<void>;
  /**
   * Push `branch` to origin and set upstream, or push the current branch.
   */
  push(cwd: string, branch?: string): Promise<void>;
}

/**
 * GitClient backed by the `git` executable.
 */
export class CliGitClient implements GitClient {
  constructor(private readonly executable: string = 'git') {}

  async clone(url: string, branch: string, destination: string): Promise<void> {
    await this.run('clone', ['clone', '-b', branch, url, destination]);
  }

  async currentBranch(cwd: string): Promise<string> {
    return this.query(['branch', '--show-current'], cwd);
  }

  async remoteUrl(cwd: string): Promise<string> {
    return this.query(['remote', 'get-url', 'origin'], cwd);
  }

  async createBranch(cwd: string, name: string): Promise<void> {
    await this.run('checkout', ['checkout', '-b', name], cwd);
  }

  async commitAll(cwd: string, message: string): Promise<void> {
    await this.run('add', ['add', '.'], cwd);
    await this.run('commit', ['commit', '-m', message], cwd);
  }

  async push(cwd: string, branch?: string): Promise<void> {
    await this.run('push', branch ? ['push', '-u', 'origin', branch] : ['push'], cwd);
  }

  private async query(args: string[], cwd: string): Promise<string> {
    try {
      const result = await runProcess(this.executable, args, { cwd });
      return result.exitCode === 0 ? result.stdout.trim() : '';
    } catch {
      // git missing: metadata is simply unknown
      return '';
    }
  }

  private async run(operation: string, args: string[], cwd?: string): Promise<string> {
    let result: ProcessResult;
    try {
      result = await runProcess(this.executable, args, { cwd });
    } catch (error) {
      throw new GitError(
        `git ${operation} could not be started: ${errorMessage(error)}`,
        operation,
        '',
        { cause: error },
      );
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      throw new GitError(
        `git ${operation} failed (exit ${result.exitCode}): ${stderr || result.stdout.trim()}`,
        operation,
        stderr,
      );
    }
    return result.stdout;
  }
}
