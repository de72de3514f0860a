import { mkdir, mkdtemp, rm, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { listDirectoryEntries } from './directoryEntries.js';
import { ArchiveDirsValidationError } from './errors.js';

describe('listDirectoryEntries', () => {
  let sourceDir: string;

  beforeEach(async () => {
    sourceDir = await mkdtemp(join(tmpdir(), 'archive-dirs-entries-'));
  });

  afterEach(async () => {
    await rm(sourceDir, { recursive: true, force: true });
  });

  it('should return subdirectory names sorted', async () => {
    for (const name of ['photos', 'docs', '2024']) {
      await mkdir(join(sourceDir, name));
    }

    await expect(listDirectoryEntries(sourceDir)).resolves.toEqual(['2024', 'docs', 'photos']);
  });

  it('should ignore files, hidden directories and symlinks', async () => {
    await mkdir(join(sourceDir, 'music'));
    await mkdir(join(sourceDir, '.cache'));
    await writeFile(join(sourceDir, 'notes.txt'), 'not a directory');
    await writeFile(join(sourceDir, 'music.tar'), 'already archived');
    await symlink(join(sourceDir, 'music'), join(sourceDir, 'music-link'));

    await expect(listDirectoryEntries(sourceDir)).resolves.toEqual(['music']);
  });

  it('should return an empty list when there are no subdirectories', async () => {
    await writeFile(join(sourceDir, 'readme.md'), '# empty');

    await expect(listDirectoryEntries(sourceDir)).resolves.toEqual([]);
  });

  it('should fail with a validation error when the directory cannot be read', async () => {
    const missing = join(sourceDir, 'missing');

    await expect(listDirectoryEntries(missing)).rejects.toBeInstanceOf(ArchiveDirsValidationError);
    await expect(listDirectoryEntries(missing)).rejects.toThrow(
      /^Failed to read source directory: ENOENT/,
    );
  });
});
