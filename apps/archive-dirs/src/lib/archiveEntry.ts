import type { SF } from '@dirtar/service-framework-node';
import { formatByteSize } from '@dirtar/utils';
import { rm, stat } from 'node:fs/promises';
import path from 'node:path';
import { describeError } from './errors.js';
import { pathExists } from './fs.js';
import { archiveFileName } from './paths.js';
import type { Reporter } from './reporter.js';
import type { TarTool } from './tarTool.js';
import type { ArchiveOutcome } from './types.js';

export type ArchiveEntryContext = {
  sourcePath: string;
  outputPath: string;
  tarTool: TarTool;
  reporter: Reporter;
  logger: SF.Logger;
  /**
   * Called with the target path right before tar starts writing it and with
   * undefined once tar has finished, so an interrupted run knows which file is partial.
   */
  trackInFlight?: (archivePath: string | undefined) => void;
};

async function removePartialArchive(archivePath: string, logger: SF.Logger): Promise<void> {
  try {
    await rm(archivePath, { force: true });
  } catch (error) {
    logger.warn('Failed to remove partial archive', {
      archivePath,
      error: describeError(error),
    });
  }
}

async function readArchiveSize(archivePath: string, logger: SF.Logger): Promise<number | undefined> {
  try {
    const stats = await stat(archivePath);
    return stats.size;
  } catch (error) {
    logger.warn('Archive created but its size could not be read', {
      archivePath,
      error: describeError(error),
    });
    return undefined;
  }
}

/**
 * Archives one subdirectory into `<outputPath>/<entryName>.tar`. Never overwrites:
 * an existing entry at the target path is reported and skipped. Failures are
 * returned as outcomes so the caller can carry on with the next entry.
 */
export async function archiveEntry(
  context: ArchiveEntryContext,
  entryName: string,
): Promise<ArchiveOutcome> {
  const { sourcePath, outputPath, tarTool, reporter, trackInFlight } = context;
  const logger = context.logger.createChild(entryName);
  const tarFileName = archiveFileName(entryName);
  const archivePath = path.join(outputPath, tarFileName);

  let exists: boolean;
  try {
    exists = await pathExists(archivePath);
  } catch (error) {
    reporter.line(`  ✗ Failed to create archive for: ${entryName}`);
    logger.warn('Could not check for an existing archive', {
      archivePath,
      error: describeError(error),
    });
    return { status: 'failed', entryName, archivePath, exitCode: 1, stderr: describeError(error) };
  }

  if (exists) {
    reporter.line(`  ⚠️  Archive already exists in output directory: ${tarFileName}`);
    reporter.line('  Skipping...');
    return { status: 'skipped', entryName, archivePath };
  }

  reporter.line(`  Creating: ${archivePath}`);
  logger.debug('Running tar', {
    executable: tarTool.executable,
    sourcePath,
    archivePath,
  });

  trackInFlight?.(archivePath);
  const result = await tarTool.createArchive({
    sourceDir: sourcePath,
    entryName,
    outputFile: archivePath,
  });
  trackInFlight?.(undefined);

  if (result.exitCode !== 0) {
    reporter.line(`  ✗ Failed to create archive for: ${entryName}`);
    logger.warn('tar failed', {
      archivePath,
      exitCode: result.exitCode,
      stderr: result.stderr.trim(),
    });
    await removePartialArchive(archivePath, logger);
    return {
      status: 'failed',
      entryName,
      archivePath,
      exitCode: result.exitCode,
      stderr: result.stderr,
    };
  }

  const sizeBytes = await readArchiveSize(archivePath, logger);
  reporter.line(
    sizeBytes === undefined
      ? `  ✓ Created: ${tarFileName}`
      : `  ✓ Created: ${tarFileName} (${formatByteSize(sizeBytes)})`,
  );

  return { status: 'created', entryName, archivePath, sizeBytes };
}
