import { randomUUID } from 'node:crypto';
import type { DefaultEnvContext } from '../environment/types.js';
import type {
  CorrelationIdGenerator,
  DiagnosticConfig,
  DiagnosticContext,
  LogEntry,
  Logger,
  LogOutputFormat,
  LogSeverity,
} from './types.js';

const severityLevels: Record<LogSeverity, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const resetColor = '\x1b[0m';
const msgColor = '\x1b[34m';

const severityColors: Record<LogSeverity, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

const scopeDelimiter = '.';

export function createCorrelationIdGenerator(): CorrelationIdGenerator {
  return {
    generateRootId(): string {
      return `run-${randomUUID()}`;
    },

    createScopedId(parentId: string, scope: string): string {
      return `${parentId}${scopeDelimiter}${scope}`;
    },

    extractRootId(scopedId: string): string {
      const firstDelimiterIndex = scopedId.indexOf(scopeDelimiter);
      if (firstDelimiterIndex === -1) {
        return scopedId;
      }
      return scopedId.substring(0, firstDelimiterIndex);
    },
  };
}

const scopedIds = createCorrelationIdGenerator();

function formatAsJson(entry: LogEntry): string {
  return JSON.stringify(entry);
}

function formatAsHumanReadable(entry: LogEntry): string {
  const severityColor = severityColors[entry.severity];

  const parts: string[] = [
    `${severityColor}${entry.severity}${resetColor}`,
    `process=${msgColor}${entry.serviceName}${resetColor}`,
    `ts=${msgColor}${entry.timestamp}${resetColor}`,
    `msg="${severityColor}${entry.message}${resetColor}"`,
  ];

  if (entry.fields) {
    for (const [key, value] of Object.entries(entry.fields)) {
      const serializedValue = typeof value === 'object' ? JSON.stringify(value) : `"${value}"`;
      parts.push(`${key}=${severityColor}${serializedValue}${resetColor}`);
    }
  }

  return parts.join(' ');
}

function formatAsStructuredText(entry: LogEntry): string {
  const parts: string[] = [
    `timestamp=${entry.timestamp}`,
    `service_name=${entry.serviceName}`,
    `severity=${entry.severity}`,
    `message="${entry.message}"`,
  ];

  if (entry.correlationId) {
    parts.push(`correlation_id=${entry.correlationId}`);
  }

  if (entry.fields) {
    for (const [key, value] of Object.entries(entry.fields)) {
      const serializedValue = typeof value === 'string' ? `"${value}"` : JSON.stringify(value);
      parts.push(`${key}=${serializedValue}`);
    }
  }

  return parts.join(' ');
}

function formatLogEntry(entry: LogEntry, outputFormat: LogOutputFormat): string {
  switch (outputFormat) {
    case 'json':
      return formatAsJson(entry);
    case 'human':
      return formatAsHumanReadable(entry);
    case 'structured-text':
      return formatAsStructuredText(entry);
    default:
      return formatAsJson(entry);
  }
}

function formatErrorAsParams(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      ...(error.name !== 'Error' ? { name: error.name } : {}),
      stack: error.stack,
      ...('toErrorPlainObject' in error && typeof error.toErrorPlainObject === 'function'
        ? error.toErrorPlainObject()
        : {}),
    };
  }

  return {
    error: String(error),
  };
}

export function createLogger(
  serviceName: string,
  correlationId: string | undefined,
  config: DiagnosticConfig = {},
): Logger {
  const minimumSeverity = config.minimumSeverity ?? 'info';
  const minimumSeverityLevel = severityLevels[minimumSeverity];
  const outputFormat = config.outputFormat ?? 'human';

  function log(severity: LogSeverity, message: string, fields?: Record<string, unknown>): void {
    if (severityLevels[severity] < minimumSeverityLevel) {
      return;
    }

    const mergedFields = {
      ...config.defaultLoggerArgs,
      ...fields,
    };

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      severity,
      message,
      serviceName,
      correlationId,
      fields: Object.keys(mergedFields).length > 0 ? mergedFields : undefined,
    };

    const formattedOutput = formatLogEntry(logEntry, outputFormat);

    if (severity === 'error' || severity === 'fatal') {
      console.error(formattedOutput);
    } else {
      console.log(formattedOutput);
    }
  }

  function logError(
    severity: 'error' | 'fatal',
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void {
    const additionalFields = typeof message === 'string' ? fields : message;
    const additionalMessage = typeof message === 'string' ? message : undefined;
    const errorMessage = error instanceof Error ? error.message : undefined;

    log(severity, errorMessage ?? additionalMessage ?? String(error), {
      ...formatErrorAsParams(error),
      ...additionalFields,
      ...(additionalMessage && errorMessage ? { additionalMessage } : {}),
    });
  }

  return {
    debug(message: string, fields?: Record<string, unknown>): void {
      log('debug', message, fields);
    },

    info(message: string, fields?: Record<string, unknown>): void {
      log('info', message, fields);
    },

    warn(message: string, fields?: Record<string, unknown>): void {
      log('warn', message, fields);
    },

    error(error, message, fields): void {
      logError('error', error, message, fields);
    },

    fatal(error, message, fields): void {
      logError('fatal', error, message, fields);
    },

    createChild(scopeId: string): Logger {
      const childCorrelationId = correlationId
        ? scopedIds.createScopedId(correlationId, scopeId)
        : scopeId;

      return createLogger(serviceName, childCorrelationId, {
        ...config,
        minimumSeverity,
        outputFormat,
      });
    },
  };
}

export function createDiagnosticContext(
  envContext: DefaultEnvContext,
  config: DiagnosticConfig = {},
): DiagnosticContext {
  const correlationIdGenerator = createCorrelationIdGenerator();
  const serviceName = envContext.config.PROCESS_NAME;
  const rootId = config.correlationId ?? correlationIdGenerator.generateRootId();
  const rootLogger = createLogger(serviceName, rootId, config);

  return {
    correlationIdGenerator,
    logger: rootLogger,
  };
}
