import type { Stats } from 'node:fs';
import { access, lstat, stat } from 'node:fs/promises';

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export async function statIfExists(filePath: string): Promise<Stats | undefined> {
  try {
    return await stat(filePath);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return undefined;
    }
    throw error;
  }
}

/**
 * True when anything occupies the path, a dangling symlink included.
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await lstat(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export type AccessCheck = (filePath: string, mode: number) => Promise<boolean>;

export const canAccess: AccessCheck = async (filePath, mode) => {
  try {
    await access(filePath, mode);
    return true;
  } catch {
    return false;
  }
};
