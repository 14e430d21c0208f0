import { randomUUID } from 'node:crypto';
import { isPlainRecord } from '@fleetctl/utils';
import type { EnvContext } from '../environment/types.js';
import type {
  CorrelationIdGenerator,
  DiagnosticConfig,
  DiagnosticContext,
  LogEntry,
  Logger,
  LogOutputFormat,
  LogSeverity,
} from './types.js';

const severityRanks: Record<LogSeverity, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const logOutputFormats: readonly LogOutputFormat[] = ['json', 'human', 'structured-text'];

const resetColor = '\x1b[0m';
const accentColor = '\x1b[34m';

const severityColors: Record<LogSeverity, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

const scopeDelimiter = '.';

export function isLogSeverity(value: unknown): value is LogSeverity {
  return typeof value === 'string' && value in severityRanks;
}

export function isLogOutputFormat(value: unknown): value is LogOutputFormat {
  return typeof value === 'string' && logOutputFormats.some((format) => format === value);
}

export function parseLogSeverity(value: unknown, fallback: LogSeverity = 'info'): LogSeverity {
  return isLogSeverity(value) ? value : fallback;
}

export function parseLogOutputFormat(
  value: unknown,
  fallback: LogOutputFormat = 'human',
): LogOutputFormat {
  return isLogOutputFormat(value) ? value : fallback;
}

export function createCorrelationIdGenerator(): CorrelationIdGenerator {
  return {
    generateRootId(): string {
      return `req-${randomUUID()}`;
    },

    createScopedId(parentId: string, scope: string): string {
      return `${parentId}${scopeDelimiter}${scope}`;
    },

    extractRootId(scopedId: string): string {
      const [rootId] = scopedId.split(scopeDelimiter);
      return rootId ?? scopedId;
    },
  };
}

function serializeHumanValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : `"${String(value)}"`;
}

function formatAsHumanReadable(entry: LogEntry): string {
  const color = severityColors[entry.severity];

  const parts = [
    `${color}${entry.severity.toUpperCase()}${resetColor}`,
    `${accentColor}${entry.timestamp}${resetColor}`,
    `${accentColor}${entry.serviceName}${resetColor}`,
  ];

  if (entry.correlationId) {
    parts.push(`[${entry.correlationId}]`);
  }

  parts.push(`${color}${entry.message}${resetColor}`);

  for (const [key, value] of Object.entries(entry.fields ?? {})) {
    parts.push(`${key}=${serializeHumanValue(value)}`);
  }

  return parts.join(' ');
}

function formatAsStructuredText(entry: LogEntry): string {
  const parts = [
    `timestamp=${entry.timestamp}`,
    `service_name=${entry.serviceName}`,
    `severity=${entry.severity}`,
    `message="${entry.message}"`,
  ];

  if (entry.correlationId) {
    parts.push(`correlation_id=${entry.correlationId}`);
  }

  for (const [key, value] of Object.entries(entry.fields ?? {})) {
    parts.push(`${key}=${typeof value === 'string' ? `"${value}"` : JSON.stringify(value)}`);
  }

  return parts.join(' ');
}

function formatLogEntry(entry: LogEntry, outputFormat: LogOutputFormat): string {
  switch (outputFormat) {
    case 'human':
      return formatAsHumanReadable(entry);
    case 'structured-text':
      return formatAsStructuredText(entry);
    case 'json':
      return JSON.stringify(entry);
  }
}

function formatErrorAsFields(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { error: String(error) };
  }

  const plainObject: unknown =
    'toErrorPlainObject' in error && typeof error.toErrorPlainObject === 'function'
      ? error.toErrorPlainObject()
      : undefined;

  return {
    ...(error.name !== 'Error' ? { name: error.name } : {}),
    stack: error.stack,
    ...(isPlainRecord(plainObject) ? plainObject : {}),
  };
}

export function createLogger(
  serviceName: string,
  correlationId: string | undefined,
  config: DiagnosticConfig = {},
): Logger {
  const minimumRank = severityRanks[config.minimumSeverity ?? 'info'];
  const outputFormat = config.outputFormat ?? 'human';

  function log(severity: LogSeverity, message: string, fields?: Record<string, unknown>): void {
    if (severityRanks[severity] < minimumRank) {
      return;
    }

    const mergedFields = { ...config.defaultLoggerArgs, ...fields };

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      severity,
      message,
      serviceName,
      correlationId,
      fields: Object.keys(mergedFields).length > 0 ? mergedFields : undefined,
    };

    const output = formatLogEntry(entry, outputFormat);

    if (severityRanks[severity] >= severityRanks.error) {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  function logFailure(
    severity: 'error' | 'fatal',
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void {
    const additionalMessage = typeof message === 'string' ? message : undefined;
    const additionalFields = typeof message === 'string' ? fields : message;
    const errorMessage = error instanceof Error ? error.message : undefined;

    log(severity, additionalMessage ?? errorMessage ?? String(error), {
      ...formatErrorAsFields(error),
      ...additionalFields,
      ...(additionalMessage && errorMessage ? { errorMessage } : {}),
    });
  }

  return {
    debug: (message, fields) => log('debug', message, fields),
    info: (message, fields) => log('info', message, fields),
    warn: (message, fields) => log('warn', message, fields),
    error: (error, message, fields) => logFailure('error', error, message, fields),
    fatal: (error, message, fields) => logFailure('fatal', error, message, fields),

    createChild(scopeId: string): Logger {
      const childCorrelationId = correlationId
        ? `${correlationId}${scopeDelimiter}${scopeId}`
        : scopeId;

      return createLogger(serviceName, childCorrelationId, config);
    },
  };
}

interface DiagnosticEnv {
  PROCESS_NAME: string;
  LOG_LEVEL?: string;
  LOG_FORMAT?: string;
}

export function createDiagnosticContext(
  envContext: EnvContext<DiagnosticEnv>,
  config: DiagnosticConfig = {},
): DiagnosticContext {
  const env: DiagnosticEnv = envContext.config;
  const resolvedConfig: DiagnosticConfig = {
    ...config,
    minimumSeverity: config.minimumSeverity ?? parseLogSeverity(env.LOG_LEVEL),
    outputFormat: config.outputFormat ?? parseLogOutputFormat(env.LOG_FORMAT),
  };

  const correlationIdGenerator = createCorrelationIdGenerator();
  const serviceName = env.PROCESS_NAME;
  const rootId = resolvedConfig.correlationId ?? correlationIdGenerator.generateRootId();

  return {
    correlationIdGenerator,
    logger: createLogger(serviceName, rootId, resolvedConfig),
    createChildLogger: (correlationId: string) =>
      createLogger(serviceName, correlationId, resolvedConfig),
    getChildDiagnosticContext: (defaultLoggerArgs?: Record<string, unknown>, scopeId?: string) =>
      createDiagnosticContext(envContext, {
        ...resolvedConfig,
        correlationId: scopeId ? correlationIdGenerator.createScopedId(rootId, scopeId) : rootId,
        defaultLoggerArgs: {
          ...resolvedConfig.defaultLoggerArgs,
          ...defaultLoggerArgs,
        },
      }),
  };
}
