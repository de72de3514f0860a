#!/usr/bin/env tsx
import {
  createArchiveDirsContext,
  type ArchiveDirsContext,
} from './process/archiveDirsProcess/context.js';
import { runArchiveDirsCommand } from './process/archiveDirsProcess/archiveDirsProcess.js';

async function bootstrap(): Promise<void> {
  let context: ArchiveDirsContext;
  try {
    context = createArchiveDirsContext();
  } catch (error) {
    console.error('Failed to bootstrap archive-dirs:', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  try {
    process.exitCode = await runArchiveDirsCommand(context);
  } catch (error) {
    context.diagnosticContext.logger.fatal(error, 'archive-dirs failed unexpectedly');
    process.exit(1);
  }
}

void bootstrap();
