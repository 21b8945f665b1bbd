import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CompletionError, GitError } from './errors.js';
import { deriveBranchName, runTask } from './task-runner.js';
import { FakeGitClient, ScriptedCompletion, makeTempDir, writeTree } from './test-helpers.js';
import { Workspace } from './workspace.js';

const authFix = JSON.stringify({
  analysis: 'Empty string was treated as valid',
  fixes: [
    {
      file: 'src/auth.py',
      issue: 'no empty check',
      solution: 'Reject empty passwords',
      content: 'def check(p):\n    return bool(p)\n',
    },
  ],
});

function implementationOf(...paths: string[]): string {
  return JSON.stringify({
    plan: 'plan',
    files: paths.map(p => ({ path: p, action: 'create', content: `content of ${p}` })),
  });
}

describe('deriveBranchName', () => {
  it('should lower-case and hyphenate the description', () => {
    expect(deriveBranchName('feature', 'Add Dark Mode!')).toBe('feature/add-dark-mode!');
  });

  it('should cut the slug to 30 characters', () => {
    expect(deriveBranchName('feature', 'Implement user authentication with OAuth')).toBe(
      'feature/implement-user-authentication-',
    );
  });
});

describe('runTask', () => {
  let dir: string;
  let git: FakeGitClient;
  let workspace: Workspace;

  beforeEach(async () => {
    dir = await makeTempDir();
    await writeTree(dir, { 'README.md': '# widgets', 'src/auth.py': 'def check(p):\n    return True\n' });
    git = new FakeGitClient();
    workspace = Workspace.open(dir, git);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should write the files of an implementation', async () => {
    const completion = new ScriptedCompletion([
      JSON.stringify({ files: [{ path: 'a/b.txt', action: 'create', content: 'hi' }] }),
    ]);

    const result = await runTask(workspace, completion, { kind: 'feature', description: 'Add b' });

    expect(result.success).toBe(true);
    expect(result.touchedFiles).toEqual(['a/b.txt']);
    expect(result.branch).toBe('main');
    expect(result.changeSet?.kind).toBe('feature');
    await expect(fs.readFile(path.join(dir, 'a/b.txt'), 'utf-8')).resolves.toBe('hi');
    expect(completion.prompts[0]).toContain('FEATURE: Add b');
    expect(completion.prompts[0]).toContain('--- README.md ---\n# widgets');
    expect(git.calls).toEqual([]);
  });

  it('should return unparseable replies without writing anything', async () => {
    const completion = new ScriptedCompletion(['not json']);

    const result = await runTask(workspace, completion, { kind: 'feature', description: 'Add b' });

    expect(result.success).toBe(false);
    expect(result.touchedFiles).toEqual([]);
    expect(result.rawResponse).toBe('not json');
    expect(result.error).toMatch(/^parse failure: invalid JSON: /);
    expect((await fs.readdir(dir)).sort()).toEqual(['README.md', 'src']);
  });

  it('should report a structurally invalid reply', async () => {
    const completion = new ScriptedCompletion([JSON.stringify({ plan: 'p' })]);

    const result = await runTask(workspace, completion, { kind: 'feature', description: 'Add b' });

    expect(result.error).toMatch(/^parse failure: unexpected structure: files: /);
  });

  it('should stop at the first failed write and keep earlier ones', async () => {
    const completion = new ScriptedCompletion([implementationOf('ok.txt', 'ok.txt/nested.txt', 'later.txt')]);

    const result = await runTask(workspace, completion, { kind: 'feature', description: 'Add files' });

    expect(result.success).toBe(false);
    expect(result.touchedFiles).toEqual(['ok.txt']);
    expect(result.error).toMatch(/^write failure: ok\.txt\/nested\.txt: Cannot write 'ok\.txt\/nested\.txt': /);
    await expect(fs.readFile(path.join(dir, 'ok.txt'), 'utf-8')).resolves.toBe('content of ok.txt');
    await expect(fs.access(path.join(dir, 'later.txt'))).rejects.toThrow();
  });

  it('should refuse paths outside the working copy', async () => {
    const completion = new ScriptedCompletion([implementationOf('../outside.txt')]);

    const result = await runTask(workspace, completion, { kind: 'feature', description: 'Escape' });

    expect(result.success).toBe(false);
    expect(result.error).toBe(
      "write failure: ../outside.txt: Invalid path '../outside.txt': outside the working copy",
    );
  });

  it('should refuse writes through a link that leaves the working copy', async () => {
    const outside = await makeTempDir();
    try {
      await fs.symlink(outside, path.join(dir, 'docs'));
      const completion = new ScriptedCompletion([implementationOf('docs/escaped.txt')]);

      const result = await runTask(workspace, completion, { kind: 'feature', description: 'Escape' });

      expect(result.success).toBe(false);
      expect(result.touchedFiles).toEqual([]);
      expect(result.error).toBe(
        "write failure: docs/escaped.txt: Invalid path 'docs/escaped.txt': resolves outside the working copy",
      );
      await expect(fs.readdir(outside)).resolves.toEqual([]);
    } finally {
      await fs.rm(outside, { recursive: true, force: true });
    }
  });

  it('should branch and commit when asked', async () => {
    const completion = new ScriptedCompletion([authFix]);

    const result = await runTask(workspace, completion, {
      kind: 'fix',
      description: 'Login fails on empty password',
      createBranch: true,
    });

    expect(result.success).toBe(true);
    expect(result.branch).toBe('fix/login-fails-on-empty-password');
    expect(result.touchedFiles).toEqual(['src/auth.py']);
    expect(git.calls).toEqual([
      ['checkout', 'fix/login-fails-on-empty-password'],
      [
        'commit',
        'Fix: Login fails on empty password\n\nEmpty string was treated as valid\n\n- src/auth.py: Reject empty passwords\n',
      ],
    ]);
    await expect(fs.readFile(path.join(dir, 'src/auth.py'), 'utf-8')).resolves.toBe(
      'def check(p):\n    return bool(p)\n',
    );
  });

  it('should report a failed commit after writing', async () => {
    git.failOn = 'commit';
    const completion = new ScriptedCompletion([authFix]);

    const result = await runTask(workspace, completion, {
      kind: 'fix',
      description: 'Login fails on empty password',
      createBranch: true,
    });

    expect(result.success).toBe(false);
    expect(result.touchedFiles).toEqual(['src/auth.py']);
    expect(result.error).toBe('commit failure: git commit failed (exit 128): fatal: simulated');
  });

  it('should throw when the branch cannot be created', async () => {
    git.failOn = 'checkout';
    const completion = new ScriptedCompletion([authFix]);

    await expect(
      runTask(workspace, completion, { kind: 'fix', description: 'x', createBranch: true }),
    ).rejects.toBeInstanceOf(GitError);
    expect(completion.prompts).toEqual([]);
  });

  it('should propagate completion errors', async () => {
    const completion = new ScriptedCompletion([new CompletionError('Error calling LLM API: boom')]);

    await expect(runTask(workspace, completion, { kind: 'feature', description: 'x' })).rejects.toThrow(
      'Error calling LLM API: boom',
    );
  });
});
