import { SF } from '@dirtar/service-framework-node';
import { TB } from '@dirtar/service-framework-node/typebox';

export const archiveDirsEnvSchema = TB.Object({
  PROCESS_NAME: TB.String({ default: 'archive-dirs' }),
  NODE_ENV: TB.String({ default: 'production' }),

  // Diagnostics only; the archive report always goes to stdout as plain text
  LOG_LEVEL: TB.Union(SF.LogSeveritySchema.anyOf, { default: 'warn' }),
  LOG_FORMAT: TB.Union(SF.LogOutputFormatSchema.anyOf, { default: 'human' }),
});

export type ArchiveDirsEnv = TB.Static<typeof archiveDirsEnvSchema>;
