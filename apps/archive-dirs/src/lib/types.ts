export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type CreateArchiveParams = {
  sourceDir: string;
  entryName: string;
  outputFile: string;
};

export type ArchiveOutcome =
  | {
      status: 'created';
      entryName: string;
      archivePath: string;
      sizeBytes?: number;
    }
  | {
      status: 'skipped';
      entryName: string;
      archivePath: string;
    }
  | {
      status: 'failed';
      entryName: string;
      archivePath: string;
      exitCode: number;
      stderr: string;
    };

export type ArchiveRunOptions = {
  directory: string;
  output?: string;
};

export type ArchiveRunSummary = {
  sourcePath: string;
  outputPath: string;
  sameDirectory: boolean;
  totalFound: number;
  successCount: number;
  failCount: number;
  skipCount: number;
  outcomes: ArchiveOutcome[];
  interrupted: boolean;
};
