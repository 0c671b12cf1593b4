import { appendFileSync } from 'fs';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  readonly [key: string]: unknown;
}

export interface Logger {
  readonly debug: (message: string, context?: LogContext) => void;
  readonly info: (message: string, context?: LogContext) => void;
  readonly warn: (message: string, context?: LogContext) => void;
  readonly error: (message: string, context?: LogContext) => void;
}

export interface LoggingOptions {
  level: LogLevel;
  timestamps: boolean;
  colors: boolean;
  /** Plain-text copy of every emitted line */
  file?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Default patterns for sensitive field names (case-insensitive, partial match)
 */
export const DEFAULT_SENSITIVE_FIELDS: readonly string[] = [
  'token',
  'password',
  'secret',
  'key',
  'auth',
  'credential',
  'accountsid',
  'private',
] as const;

const REDACTED = '[REDACTED]';

let options: LoggingOptions = {
  level: 'info',
  timestamps: true,
  colors: true,
};

let fileSinkFailed = false;

/**
 * Apply logging settings for every logger, including ones already created
 */
export function configureLogging(next: Partial<LoggingOptions>): void {
  options = { ...options, ...next };
  fileSinkFailed = false;
}

function isSensitiveField(fieldName: string, sensitivePatterns: readonly string[]): boolean {
  const lowerFieldName = fieldName.toLowerCase();
  return sensitivePatterns.some((pattern) => lowerFieldName.includes(pattern.toLowerCase()));
}

/**
 * Recursively redact sensitive fields.
 * Returns a copy where string values under sensitive keys are replaced by [REDACTED].
 */
export function redactSensitiveFields(
  value: unknown,
  sensitivePatterns: readonly string[] = DEFAULT_SENSITIVE_FIELDS
): unknown {
  if (value == null || typeof value !== 'object') {
    return value;
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactSensitiveFields(item, sensitivePatterns));
  }

  const result: Record<string, unknown> = {};
  for (const [fieldName, fieldValue] of Object.entries(value)) {
    if (isSensitiveField(fieldName, sensitivePatterns) && typeof fieldValue === 'string') {
      result[fieldName] = REDACTED;
    } else {
      result[fieldName] = redactSensitiveFields(fieldValue, sensitivePatterns);
    }
  }
  return result;
}

/**
 * Render one log line without colors
 */
export function formatLogLine(
  level: LogLevel,
  scope: string,
  message: string,
  context: LogContext | undefined,
  timestamp: Date | null
): string {
  const parts: string[] = [];
  if (timestamp) {
    parts.push(timestamp.toISOString());
  }
  parts.push(level.toUpperCase().padEnd(5), `[${scope}]`, message);
  if (context && Object.keys(context).length > 0) {
    parts.push(JSON.stringify(redactSensitiveFields(context)));
  }
  return parts.join(' ');
}

function colorize(level: LogLevel, line: string, scope: string): string {
  const tag = `[${scope}]`;
  const at = line.indexOf(tag);
  if (at < 0) {
    return LEVEL_COLORS[level](line);
  }
  const head = line.slice(0, at);
  const tail = line.slice(at + tag.length);
  return `${LEVEL_COLORS[level](head)}${chalk.magenta(tag)}${tail}`;
}

function writeToFile(line: string): void {
  if (!options.file || fileSinkFailed) {
    return;
  }
  try {
    appendFileSync(options.file, `${line}\n`, 'utf-8');
  } catch (err) {
    fileSinkFailed = true;
    console.error(`[logger] Could not append to ${options.file}:`, err);
  }
}

function emit(level: LogLevel, scope: string, message: string, context?: LogContext): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[options.level]) {
    return;
  }

  const line = formatLogLine(level, scope, message, context, options.timestamps ? new Date() : null);
  const rendered = options.colors ? colorize(level, line, scope) : line;

  if (level === 'error') {
    console.error(rendered);
  } else if (level === 'warn') {
    console.warn(rendered);
  } else {
    console.log(rendered);
  }

  writeToFile(line);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, context) => emit('debug', scope, message, context),
    info: (message, context) => emit('info', scope, message, context),
    warn: (message, context) => emit('warn', scope, message, context),
    error: (message, context) => emit('error', scope, message, context),
  };
}
