import { runCommand as defaultRunCommand, type RunCommand } from './command.js';
import type { CommandResult, CreateArchiveParams } from './types.js';

export const WINDOWS_TAR_PATH = 'C:\\Windows\\System32\\tar.exe';

export interface TarTool {
  readonly executable: string;
  isAvailable(): Promise<boolean>;
  /**
   * Writes an uncompressed archive of `entryName` with paths relative to `sourceDir`,
   * so the archive root is the entry itself.
   */
  createArchive(params: CreateArchiveParams): Promise<CommandResult>;
}

export type SystemTarToolOptions = {
  platform?: NodeJS.Platform;
  runCommand?: RunCommand;
};

export function buildCreateArchiveArgs({ sourceDir, entryName, outputFile }: CreateArchiveParams) {
  return ['-cf', outputFile, '-C', sourceDir, entryName];
}

export function createSystemTarTool(options: SystemTarToolOptions = {}): TarTool {
  const platform = options.platform ?? process.platform;
  const runCommand = options.runCommand ?? defaultRunCommand;
  const isWindows = platform === 'win32';
  const executable = isWindows ? WINDOWS_TAR_PATH : 'tar';

  return {
    executable,

    async isAvailable(): Promise<boolean> {
      const result = isWindows
        ? await runCommand(executable, ['--version'])
        : await runCommand('which', [executable]);
      return result.exitCode === 0;
    },

    createArchive(params: CreateArchiveParams): Promise<CommandResult> {
      return runCommand(executable, buildCreateArchiveArgs(params));
    },
  };
}
