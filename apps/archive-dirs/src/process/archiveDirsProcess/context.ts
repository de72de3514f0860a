import { SF } from '@dirtar/service-framework-node';
import { createConsoleReporter } from '../../lib/reporter.js';
import { createSystemTarTool } from '../../lib/tarTool.js';
import { archiveDirsEnvSchema } from './environment.js';

export function createArchiveDirsContext(customEnv?: Record<string, string | undefined>) {
  const envContext = SF.createEnvContext(archiveDirsEnvSchema, { source: customEnv });

  const diagnosticContext = SF.createDiagnosticContext(envContext, {
    minimumSeverity: envContext.config.LOG_LEVEL,
    outputFormat: envContext.config.LOG_FORMAT,
  });

  const processContext = SF.createProcessLifecycle({
    diagnosticContext,
  });

  return {
    envContext,
    diagnosticContext,
    processContext,
    tarTool: createSystemTarTool(),
    reporter: createConsoleReporter(),
  };
}

export type ArchiveDirsContext = ReturnType<typeof createArchiveDirsContext>;
