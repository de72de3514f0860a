import type { ArchiveRunSummary } from './types.js';

export const MAX_LISTED_ARCHIVES = 20;

const HEAVY_RULE = '='.repeat(40);
const LIGHT_RULE = '-'.repeat(40);

/**
 * Sink for the human-readable run report. Kept apart from the diagnostics
 * logger so the report stays plain text whatever LOG_FORMAT says.
 */
export interface Reporter {
  line(text?: string): void;
}

export function createConsoleReporter(): Reporter {
  return {
    line(text = ''): void {
      console.log(text);
    },
  };
}

export function createBufferedReporter(): Reporter & { readonly lines: string[] } {
  const lines: string[] = [];

  return {
    lines,
    line(text = ''): void {
      lines.push(text);
    },
  };
}

function reportHeading(reporter: Reporter, title: string): void {
  reporter.line(HEAVY_RULE);
  reporter.line(title);
  reporter.line(HEAVY_RULE);
}

export function reportConfiguration(
  reporter: Reporter,
  { sourcePath, outputPath }: Pick<ArchiveRunSummary, 'sourcePath' | 'outputPath'>,
): void {
  reportHeading(reporter, 'Archive Configuration:');
  reporter.line(`Source directory: ${sourcePath}`);
  reporter.line(`Output directory: ${outputPath}`);
  reporter.line();
}

export function reportSummary(reporter: Reporter, summary: ArchiveRunSummary): void {
  reportHeading(reporter, 'Archiving Summary:');
  reporter.line(`Source directory: ${summary.sourcePath}`);
  reporter.line(`Output directory: ${summary.outputPath}`);
  reporter.line(`Total directories found: ${summary.totalFound}`);
  reporter.line(`Successfully archived: ${summary.successCount}`);
  reporter.line(`Failed: ${summary.failCount}`);
  reporter.line(`Skipped (already exists): ${summary.skipCount}`);
  reporter.line(LIGHT_RULE);
}

/**
 * Lists archive names already sorted by the caller, cut off after
 * MAX_LISTED_ARCHIVES with a count of the rest.
 */
export function reportArchiveListing(
  reporter: Reporter,
  outputPath: string,
  archiveNames: string[] | undefined,
): void {
  reporter.line();
  reporter.line(`Archives created in: ${outputPath}`);
  reporter.line('File format: directory_name.tar (uncompressed)');
  reporter.line();
  reporter.line('Created archives:');

  if (!archiveNames) {
    reporter.line('(Unable to list archives)');
    return;
  }

  for (const name of archiveNames.slice(0, MAX_LISTED_ARCHIVES)) {
    reporter.line(name);
  }

  if (archiveNames.length > MAX_LISTED_ARCHIVES) {
    reporter.line(`... and ${archiveNames.length - MAX_LISTED_ARCHIVES} more`);
  }
}
