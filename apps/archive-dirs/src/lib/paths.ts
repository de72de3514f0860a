import { homedir } from 'node:os';
import path from 'node:path';

export type ExpandPathOptions = {
  platform?: NodeJS.Platform;
  homeDir?: string;
  env?: Record<string, string | undefined>;
  cwd?: string;
};

function resolveHomeDir(
  platform: NodeJS.Platform,
  env: Record<string, string | undefined>,
  homeDir: string | undefined,
): string {
  if (homeDir !== undefined) {
    return homeDir;
  }
  if (platform === 'win32') {
    return env.USERPROFILE ?? '';
  }
  return homedir();
}

/**
 * Expands a leading `~` to the user's home directory (`%USERPROFILE%` on Windows)
 * and resolves the result to a normalized absolute path. Does not touch the file system.
 */
export function expandPath(input: string, options: ExpandPathOptions = {}): string {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const pathApi = platform === 'win32' ? path.win32 : path.posix;
  const cwd = options.cwd ?? process.cwd();

  const isHomeRelative =
    input === '~' ||
    input.startsWith('~/') ||
    (platform === 'win32' && input.startsWith('~\\'));

  if (!isHomeRelative) {
    return pathApi.resolve(cwd, input);
  }

  const home = resolveHomeDir(platform, env, options.homeDir);
  return pathApi.resolve(cwd, pathApi.join(home, input.slice(1)));
}

export function archiveFileName(entryName: string): string {
  return `${entryName}.tar`;
}

export function isArchiveFileName(fileName: string): boolean {
  return path.extname(fileName) === '.tar';
}
