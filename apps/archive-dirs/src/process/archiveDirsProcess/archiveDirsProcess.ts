import { Command, CommanderError } from 'commander';
import { runArchiveDirectories } from '../../lib/archiveRun.js';
import { ArchiveDirsError } from '../../lib/errors.js';
import type { ArchiveRunOptions } from '../../lib/types.js';
import type { ArchiveDirsContext } from './context.js';

const VERSION = '1.0.0';

const EXAMPLES = `
This tool creates individual tar archives for each subdirectory found in the source directory.
Archives are uncompressed and saved with a .tar extension. Existing archives are skipped.

Note: On Windows, this requires tar.exe (included in Windows 10+).

Examples:
  archive-dirs -d /home/user/projects
  archive-dirs -d C:\\Projects -o C:\\Backups
  archive-dirs --directory ~/Documents --output ~/archives`;

export function createArchiveDirsProgram(
  action: (options: ArchiveRunOptions) => Promise<void>,
): Command {
  return new Command()
    .name('archive-dirs')
    .version(VERSION)
    .description(
      'Archive all directories in a specified directory into separate uncompressed tar files',
    )
    .requiredOption('-d, --directory <path>', 'Source directory containing directories to archive')
    .option(
      '-o, --output <path>',
      'Output directory for tar files (default: same as source directory)',
    )
    .addHelpText('after', EXAMPLES)
    .exitOverride()
    .action(async (options: ArchiveRunOptions) => {
      await action({ directory: options.directory, output: options.output });
    });
}

/**
 * Parses argv and runs the archive. Resolves with the exit code instead of exiting,
 * leaving `process.exit` to the bin entry.
 */
export async function runArchiveDirsCommand(
  context: ArchiveDirsContext,
  argv: string[] = process.argv,
): Promise<number> {
  const { diagnosticContext, processContext, tarTool, reporter } = context;
  let exitCode = 0;

  const program = createArchiveDirsProgram(async (options) => {
    const stopLifecycle = processContext.start();
    try {
      await runArchiveDirectories(options, {
        tarTool,
        reporter,
        logger: diagnosticContext.logger,
        processContext,
      });
    } catch (error) {
      if (!(error instanceof ArchiveDirsError)) {
        throw error;
      }
      diagnosticContext.logger.debug('Archive run aborted', { error: error.toErrorPlainObject() });
      console.error(`Error: ${error.message}`);
      exitCode = 1;
    } finally {
      stopLifecycle();
    }
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
