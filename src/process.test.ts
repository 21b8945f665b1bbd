import { describe, expect, it } from 'vitest';
import { runProcess } from './process.js';

describe('runProcess', () => {
  it('should collect output and exit status', async () => {
    const result = await runProcess(process.execPath, [
      '-e',
      'process.stdout.write("out"); process.stderr.write("err"); process.exitCode = 2;',
    ]);

    expect(result).toEqual({ exitCode: 2, stdout: 'out', stderr: 'err', timedOut: false });
  });

  it('should kill a process that runs too long', async () => {
    const result = await runProcess(process.execPath, ['-e', 'setInterval(() => {}, 1000)'], {
      timeoutMs: 200,
    });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(-1);
  });

  it('should reject when the command cannot be started', async () => {
    await expect(runProcess('repo-forge-no-such-command', [])).rejects.toThrow(/ENOENT/);
  });
});
