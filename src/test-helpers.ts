/**
 * In-process stand-ins shared by the unit tests.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { CompletionSource } from './completion-client.js';
import { GitError } from './errors.js';
import type { GitClient } from './git-client.js';

export type GitOperation = 'clone' | 'checkout' | 'commit' | 'push';

/**
 * GitClient that records calls and "clones" by writing a fixed file tree.
 */
export class FakeGitClient implements GitClient {
  readonly calls: string[][] = [];
  branch = 'main';
  remote = 'https://example.com/acme/widgets.git';
  failOn: GitOperation | undefined;

  constructor(private readonly files: Record<string, string> = {}) {}

  async clone(url: string, branch: string, destination: string): Promise<void> {
    this.calls.push(['clone', url, branch, destination]);
    this.maybeFail('clone');
    await writeTree(destination, this.files);
    this.branch = branch;
  }

  async currentBranch(): Promise<string> {
    return this.branch;
  }

  async remoteUrl(): Promise<string> {
    return this.remote;
  }

  async createBranch(_cwd: string, name: string): Promise<void> {
    this.calls.push(['checkout', name]);
    this.maybeFail('checkout');
    this.branch = name;
  }

  async commitAll(_cwd: string, message: string): Promise<void> {
    this.calls.push(['commit', message]);
    this.maybeFail('commit');
  }

  async push(_cwd: string, branch?: string): Promise<void> {
    this.calls.push(branch ? ['push', branch] : ['push']);
    this.maybeFail('push');
  }

  private maybeFail(operation: GitOperation) {
    if (this.failOn === operation) {
      throw new GitError(`git ${operation} failed (exit 128): fatal: simulated`, operation, 'fatal: simulated');
    }
  }
}

/**
 * CompletionSource that replays canned replies and records every prompt.
 */
export class ScriptedCompletion implements CompletionSource {
  readonly prompts: string[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async send(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('no scripted reply left');
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'repo-forge-test-'));
}

/**
 * Write `files` (relative path to content) under `root`.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  await fs.mkdir(root, { recursive: true });
  for (const [relativePath, content] of Object.entries(files)) {
    const full = path.join(root, relativePath);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content, 'utf-8');
  }
}
