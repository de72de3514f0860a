import type { SF } from '@dirtar/service-framework-node';
import { pluralize } from '@dirtar/utils';
import { readdir, rm } from 'node:fs/promises';
import { archiveEntry } from './archiveEntry.js';
import { listDirectoryEntries } from './directoryEntries.js';
import { ArchiveDirsValidationError, describeError, TarNotFoundError } from './errors.js';
import { expandPath, isArchiveFileName } from './paths.js';
import {
  reportArchiveListing,
  reportConfiguration,
  reportSummary,
  type Reporter,
} from './reporter.js';
import type { TarTool } from './tarTool.js';
import type { ArchiveOutcome, ArchiveRunOptions, ArchiveRunSummary } from './types.js';
import { prepareOutputDirectory, validateSourceDirectory } from './validation.js';

export type ArchiveRunContext = {
  tarTool: TarTool;
  reporter: Reporter;
  logger: SF.Logger;
  processContext: Pick<SF.ProcessLifecycleContext, 'onShutdown' | 'isShuttingDown'>;
};

async function listArchiveNames(outputPath: string, logger: SF.Logger) {
  try {
    const names = await readdir(outputPath);
    return names.filter(isArchiveFileName).sort();
  } catch (error) {
    logger.warn('Unable to list archives', { outputPath, error: describeError(error) });
    return undefined;
  }
}

function countOutcomes(outcomes: ArchiveOutcome[]) {
  return {
    successCount: outcomes.filter((outcome) => outcome.status === 'created').length,
    failCount: outcomes.filter((outcome) => outcome.status === 'failed').length,
    skipCount: outcomes.filter((outcome) => outcome.status === 'skipped').length,
  };
}

/**
 * Archives every immediate subdirectory of `options.directory` into its own
 * uncompressed tar file, one at a time.
 *
 * Throws ArchiveDirsValidationError or TarNotFoundError before anything is written
 * when the paths or the tar executable are unusable. Per-entry failures do not throw;
 * they are counted in the returned summary.
 */
export async function runArchiveDirectories(
  options: ArchiveRunOptions,
  context: ArchiveRunContext,
): Promise<ArchiveRunSummary> {
  const { tarTool, reporter, logger, processContext } = context;

  // an empty path would otherwise resolve to the working directory
  if (options.directory.trim() === '') {
    throw new ArchiveDirsValidationError(
      `Source directory '${options.directory}' does not exist or is not accessible.`,
      options.directory,
    );
  }
  const sourcePath = expandPath(options.directory);
  await validateSourceDirectory(sourcePath);

  if (!(await tarTool.isAvailable())) {
    throw new TarNotFoundError(tarTool.executable);
  }

  let outputPath: string;
  if (options.output !== undefined) {
    if (options.output.trim() === '') {
      throw new ArchiveDirsValidationError(
        `Failed to create output directory '${options.output}': path is empty`,
        options.output,
      );
    }
    outputPath = expandPath(options.output);
    reporter.line(`Output directory specified: ${outputPath}`);
  } else {
    outputPath = sourcePath;
    reporter.line(`Output directory not specified. Using source directory: ${sourcePath}`);
  }

  await prepareOutputDirectory(outputPath, reporter);

  const sameDirectory = sourcePath === outputPath;
  if (sameDirectory) {
    reporter.line('Note: Output directory is same as source directory.');
  }

  reportConfiguration(reporter, { sourcePath, outputPath });

  const entries = await listDirectoryEntries(sourcePath);
  const totalFound = entries.length;
  const outcomes: ArchiveOutcome[] = [];

  if (totalFound === 0) {
    reporter.line('No directories found in source directory.');
    return {
      sourcePath,
      outputPath,
      sameDirectory,
      totalFound,
      ...countOutcomes(outcomes),
      outcomes,
      interrupted: false,
    };
  }

  reporter.line(`Found ${totalFound} ${pluralize(totalFound, 'directory', 'directories')} to archive.`);
  reporter.line();

  let inFlightArchive: string | undefined;
  processContext.onShutdown(async () => {
    if (inFlightArchive) {
      logger.warn('Interrupted while archiving, removing partial archive', {
        archivePath: inFlightArchive,
      });
      await rm(inFlightArchive, { force: true });
    }
  });

  const entryContext = {
    sourcePath,
    outputPath,
    tarTool,
    reporter,
    logger,
    trackInFlight: (archivePath: string | undefined) => {
      inFlightArchive = archivePath;
    },
  };

  let interrupted = false;
  for (const [index, entryName] of entries.entries()) {
    if (processContext.isShuttingDown()) {
      interrupted = true;
      break;
    }

    reporter.line(`[${index + 1}/${totalFound}] Processing: ${entryName}`);
    outcomes.push(await archiveEntry(entryContext, entryName));
    reporter.line();
  }

  const summary: ArchiveRunSummary = {
    sourcePath,
    outputPath,
    sameDirectory,
    totalFound,
    ...countOutcomes(outcomes),
    outcomes,
    interrupted,
  };

  reportSummary(reporter, summary);

  if (summary.successCount > 0) {
    reportArchiveListing(reporter, outputPath, await listArchiveNames(outputPath, logger));
  }

  reporter.line();
  reporter.line('Done!');

  logger.info('Archive run finished', {
    totalFound,
    successCount: summary.successCount,
    failCount: summary.failCount,
    skipCount: summary.skipCount,
  });

  return summary;
}
