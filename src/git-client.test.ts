import * as fs from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GitError } from './errors.js';
import { CliGitClient } from './git-client.js';
import { makeTempDir } from './test-helpers.js';

describe('CliGitClient', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should report an executable that cannot be started', async () => {
    const git = new CliGitClient('repo-forge-no-such-git');

    const error = await git.clone('https://example.com/acme/widgets.git', 'main', dir).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GitError);
    expect(error).toMatchObject({ operation: 'clone' });
    expect(String(error)).toMatch(/git clone could not be started: /);
  });

  it('should report a non-zero exit with its status', async () => {
    // node treats "checkout" as a missing script and exits with 1
    const git = new CliGitClient(process.execPath);

    const error = await git.createBranch(dir, 'feature/x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GitError);
    expect(error).toMatchObject({ operation: 'checkout' });
    expect(String(error)).toMatch(/git checkout failed \(exit 1\): /);
  });

  it('should return empty metadata when git fails', async () => {
    await expect(new CliGitClient('repo-forge-no-such-git').currentBranch(dir)).resolves.toBe('');
    await expect(new CliGitClient(process.execPath).remoteUrl(dir)).resolves.toBe('');
  });
});
