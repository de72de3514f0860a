import { describe, expect, it } from 'vitest';
import { archiveFileName, expandPath, isArchiveFileName } from './paths.js';

describe('expandPath', () => {
  const posix = { platform: 'linux' as const, homeDir: '/home/tester', cwd: '/work' };

  it('should expand a lone tilde to the home directory', () => {
    expect(expandPath('~', posix)).toBe('/home/tester');
  });

  it('should expand a home-relative path', () => {
    expect(expandPath('~/Documents/projects', posix)).toBe('/home/tester/Documents/projects');
  });

  it('should leave a tilde inside a name alone', () => {
    expect(expandPath('backup~old', posix)).toBe('/work/backup~old');
    expect(expandPath('~other/dir', posix)).toBe('/work/~other/dir');
  });

  it('should resolve relative paths against the working directory', () => {
    expect(expandPath('data/../archives', posix)).toBe('/work/archives');
  });

  it('should normalize absolute paths', () => {
    expect(expandPath('/srv//backups/./daily/', posix)).toBe('/srv/backups/daily');
  });

  it('should use USERPROFILE on Windows', () => {
    const windows = {
      platform: 'win32' as const,
      env: { USERPROFILE: 'C:\\Users\\tester' },
      cwd: 'C:\\work',
    };

    expect(expandPath('~\\Projects', windows)).toBe('C:\\Users\\tester\\Projects');
    expect(expandPath('~/Projects', windows)).toBe('C:\\Users\\tester\\Projects');
    expect(expandPath('Backups', windows)).toBe('C:\\work\\Backups');
  });
});

describe('archiveFileName', () => {
  it('should append the tar extension to the entry name', () => {
    expect(archiveFileName('photos')).toBe('photos.tar');
    expect(archiveFileName('2024')).toBe('2024.tar');
  });
});

describe('isArchiveFileName', () => {
  it('should match names with a tar extension only', () => {
    expect(isArchiveFileName('docs.tar')).toBe(true);
    expect(isArchiveFileName('docs.tar.gz')).toBe(false);
    expect(isArchiveFileName('docs.TAR')).toBe(false);
    expect(isArchiveFileName('.tar')).toBe(false);
    expect(isArchiveFileName('notes.txt')).toBe(false);
  });
});
