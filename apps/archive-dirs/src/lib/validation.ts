import { constants } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { ArchiveDirsValidationError, describeError } from './errors.js';
import { canAccess, statIfExists, type AccessCheck } from './fs.js';
import type { Reporter } from './reporter.js';

async function statIfAccessible(sourcePath: string) {
  try {
    return await statIfExists(sourcePath);
  } catch {
    return undefined;
  }
}

export type AccessOptions = {
  canAccess?: AccessCheck;
};

export async function validateSourceDirectory(
  sourcePath: string,
  options: AccessOptions = {},
): Promise<void> {
  const checkAccess = options.canAccess ?? canAccess;
  const stats = await statIfAccessible(sourcePath);

  if (!stats) {
    throw new ArchiveDirsValidationError(
      `Source directory '${sourcePath}' does not exist or is not accessible.`,
      sourcePath,
    );
  }

  if (!stats.isDirectory()) {
    throw new ArchiveDirsValidationError(
      `Source path '${sourcePath}' is not a directory.`,
      sourcePath,
    );
  }

  if (!(await checkAccess(sourcePath, constants.R_OK | constants.X_OK))) {
    throw new ArchiveDirsValidationError(
      `Cannot read source directory '${sourcePath}'. Permission denied.`,
      sourcePath,
    );
  }
}

/**
 * Creates the output directory with its parents when missing, then checks it can be written to.
 */
export async function prepareOutputDirectory(
  outputPath: string,
  reporter: Reporter,
  options: AccessOptions = {},
): Promise<void> {
  const checkAccess = options.canAccess ?? canAccess;
  const stats = await statIfAccessible(outputPath);

  if (!stats) {
    reporter.line(`Output directory '${outputPath}' does not exist. Creating it...`);
    try {
      await mkdir(outputPath, { recursive: true });
    } catch (error) {
      throw new ArchiveDirsValidationError(
        `Failed to create output directory '${outputPath}': ${describeError(error)}`,
        outputPath,
      );
    }
    reporter.line(`Created output directory: ${outputPath}`);
  } else if (!stats.isDirectory()) {
    throw new ArchiveDirsValidationError(
      `Output path '${outputPath}' is not a directory.`,
      outputPath,
    );
  }

  if (!(await checkAccess(outputPath, constants.W_OK))) {
    throw new ArchiveDirsValidationError(
      `Cannot write to output directory '${outputPath}'. Permission denied.`,
      outputPath,
    );
  }
}
