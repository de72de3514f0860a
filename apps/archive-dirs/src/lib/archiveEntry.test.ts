import { createMockLogger } from '@dirtar/service-framework-node/test';
import { mkdir, mkdtemp, readFile, rm, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ARCHIVE_BYTES, createFakeTarTool } from '../test/fakeTarTool.js';
import { archiveEntry, type ArchiveEntryContext } from './archiveEntry.js';
import { createBufferedReporter } from './reporter.js';

describe('archiveEntry', () => {
  let sourceDir: string;
  let outputDir: string;

  const createContext = (tarTool = createFakeTarTool()) => {
    const reporter = createBufferedReporter();
    const logger = createMockLogger();
    const trackInFlight = vi.fn();
    const context: ArchiveEntryContext = {
      sourcePath: sourceDir,
      outputPath: outputDir,
      tarTool,
      reporter,
      logger,
      trackInFlight,
    };
    return { context, reporter, logger, tarTool, trackInFlight };
  };

  beforeEach(async () => {
    sourceDir = await mkdtemp(join(tmpdir(), 'archive-dirs-entry-src-'));
    outputDir = await mkdtemp(join(tmpdir(), 'archive-dirs-entry-out-'));
    await mkdir(join(sourceDir, 'docs'));
  });

  afterEach(async () => {
    await rm(sourceDir, { recursive: true, force: true });
    await rm(outputDir, { recursive: true, force: true });
  });

  it('should create the archive and report its size', async () => {
    const { context, reporter, tarTool } = createContext();
    const archivePath = join(outputDir, 'docs.tar');

    const outcome = await archiveEntry(context, 'docs');

    expect(outcome).toEqual({
      status: 'created',
      entryName: 'docs',
      archivePath,
      sizeBytes: ARCHIVE_BYTES,
    });
    expect(tarTool.createArchive).toHaveBeenCalledWith({
      sourceDir,
      entryName: 'docs',
      outputFile: archivePath,
    });
    expect(reporter.lines).toEqual([`  Creating: ${archivePath}`, '  ✓ Created: docs.tar (2.0 KB)']);
  });

  it('should mark the archive in flight only while tar runs', async () => {
    const { context, trackInFlight } = createContext();

    await archiveEntry(context, 'docs');

    expect(trackInFlight.mock.calls).toEqual([[join(outputDir, 'docs.tar')], [undefined]]);
  });

  it('should skip an existing archive without touching it', async () => {
    const { context, reporter, tarTool, trackInFlight } = createContext();
    const archivePath = join(outputDir, 'docs.tar');
    await writeFile(archivePath, 'original archive');

    const outcome = await archiveEntry(context, 'docs');

    expect(outcome).toEqual({ status: 'skipped', entryName: 'docs', archivePath });
    expect(tarTool.createArchive).not.toHaveBeenCalled();
    expect(trackInFlight).not.toHaveBeenCalled();
    expect(await readFile(archivePath, 'utf8')).toBe('original archive');
    expect(reporter.lines).toEqual([
      '  ⚠️  Archive already exists in output directory: docs.tar',
      '  Skipping...',
    ]);
  });

  it('should treat a dangling symlink at the target as existing', async () => {
    const { context, tarTool } = createContext();
    await symlink(join(outputDir, 'nowhere'), join(outputDir, 'docs.tar'));

    const outcome = await archiveEntry(context, 'docs');

    expect(outcome.status).toBe('skipped');
    expect(tarTool.createArchive).not.toHaveBeenCalled();
  });

  it('should remove the partial file and report a failure', async () => {
    const { context, reporter, logger } = createContext(createFakeTarTool({ failEntries: ['docs'] }));
    const archivePath = join(outputDir, 'docs.tar');

    const outcome = await archiveEntry(context, 'docs');

    expect(outcome).toEqual({
      status: 'failed',
      entryName: 'docs',
      archivePath,
      exitCode: 2,
      stderr: 'tar: docs: Cannot stat\n',
    });
    await expect(readFile(archivePath)).rejects.toMatchObject({ code: 'ENOENT' });
    expect(reporter.lines).toEqual([
      `  Creating: ${archivePath}`,
      '  ✗ Failed to create archive for: docs',
    ]);
    expect(logger.warn).toHaveBeenCalledWith('tar failed', {
      archivePath,
      exitCode: 2,
      stderr: 'tar: docs: Cannot stat',
    });
  });

  it('should report a failure when tar cannot be launched and left nothing behind', async () => {
    const tarTool = createFakeTarTool({
      behaviour: async () => ({ exitCode: 1, stdout: '', stderr: 'spawn tar ENOENT' }),
    });
    const { context } = createContext(tarTool);

    const outcome = await archiveEntry(context, 'docs');

    expect(outcome).toMatchObject({ status: 'failed', exitCode: 1, stderr: 'spawn tar ENOENT' });
  });

  it('should report the archive without a size when it cannot be read back', async () => {
    const tarTool = createFakeTarTool({
      behaviour: async () => ({ exitCode: 0, stdout: '', stderr: '' }),
    });
    const { context, reporter } = createContext(tarTool);

    const outcome = await archiveEntry(context, 'docs');

    expect(outcome).toEqual({
      status: 'created',
      entryName: 'docs',
      archivePath: join(outputDir, 'docs.tar'),
      sizeBytes: undefined,
    });
    expect(reporter.lines[1]).toBe('  ✓ Created: docs.tar');
  });
});
