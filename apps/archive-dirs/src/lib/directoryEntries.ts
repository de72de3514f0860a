import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { ArchiveDirsValidationError, describeError } from './errors.js';

function isHiddenEntry(name: string): boolean {
  return name.startsWith('.');
}

/**
 * Names of the immediate, non-hidden subdirectories of `sourcePath`, sorted.
 * Symlinks are not followed, so a link to a directory is not an entry.
 */
export async function listDirectoryEntries(sourcePath: string): Promise<string[]> {
  let dirents: Dirent[];
  try {
    dirents = await readdir(sourcePath, { withFileTypes: true });
  } catch (error) {
    throw new ArchiveDirsValidationError(
      `Failed to read source directory: ${describeError(error)}`,
      sourcePath,
    );
  }

  return dirents
    .filter((dirent) => dirent.isDirectory() && !isHiddenEntry(dirent.name))
    .map((dirent) => dirent.name)
    .sort();
}
