import { describe, expect, it } from 'vitest';
import { runCommand } from './command.js';

describe('runCommand', () => {
  it('should capture stdout and a zero exit code', async () => {
    const result = await runCommand(process.execPath, ['-e', 'process.stdout.write("packed")']);

    expect(result).toEqual({ stdout: 'packed', stderr: '', exitCode: 0 });
  });

  it('should report a non-zero exit code and stderr', async () => {
    const result = await runCommand(process.execPath, [
      '-e',
      'process.stderr.write("tar: docs: Cannot open"); process.exit(2)',
    ]);

    expect(result.exitCode).toBe(2);
    expect(result.stderr).toBe('tar: docs: Cannot open');
  });

  it('should resolve with exit code 1 when the executable cannot be launched', async () => {
    const result = await runCommand('/nonexistent/bin/archive-tool', ['--version']);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain('ENOENT');
  });
});
