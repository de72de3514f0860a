import { spawn } from 'node:child_process';
import type { CommandResult } from './types.js';

export type RunCommand = (command: string, args: string[]) => Promise<CommandResult>;

/**
 * Spawns a process without a shell and waits for it to exit. Output is captured
 * rather than shown. A launch failure resolves with exit code 1 and the error
 * message as stderr, so callers handle both cases through the exit code.
 */
export const runCommand: RunCommand = (command, args) => {
  return new Promise((resolve) => {
    const proc = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const settle = (result: CommandResult) => {
      if (!settled) {
        settled = true;
        resolve(result);
      }
    };

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      settle({ stdout, stderr, exitCode: code ?? 1 });
    });

    proc.on('error', (err) => {
      settle({ stdout, stderr: err.message, exitCode: 1 });
    });
  });
};
