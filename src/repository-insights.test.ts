import * as fs from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { summarizeRepository, suggestImprovements } from './repository-insights.js';
import { FakeGitClient, ScriptedCompletion, makeTempDir, writeTree } from './test-helpers.js';
import { Workspace } from './workspace.js';

describe('repository insights', () => {
  let dir: string;
  let workspace: Workspace;

  beforeEach(async () => {
    dir = await makeTempDir();
    await writeTree(dir, { 'README.md': '# widgets', 'main.go': 'package main' });
    workspace = Workspace.open(dir, new FakeGitClient());
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should summarize with the repository context', async () => {
    const completion = new ScriptedCompletion(['A small Go service.']);

    await expect(summarizeRepository(workspace, completion)).resolves.toBe('A small Go service.');
    expect(completion.prompts[0]).toContain('Languages: .md, .go');
    expect(completion.prompts[0]).toContain('--- main.go ---\npackage main');
  });

  it('should pass the focus area', async () => {
    const completion = new ScriptedCompletion(['Use prepared statements.']);

    await suggestImprovements(workspace, completion, 'security');

    expect(completion.prompts[0]).toContain('Focus specifically on: security');
  });

  it('should consider everything without a focus', async () => {
    const completion = new ScriptedCompletion(['Add tests.']);

    await suggestImprovements(workspace, completion, '  ');

    expect(completion.prompts[0]).toContain('Consider all aspects');
  });

  it('should honour maxContextFiles', async () => {
    const completion = new ScriptedCompletion(['ok']);

    await summarizeRepository(workspace, completion, { maxContextFiles: 1 });

    expect(completion.prompts[0]).toContain('--- README.md ---');
    expect(completion.prompts[0]).not.toContain('--- main.go ---');
  });
});
