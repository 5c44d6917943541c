/**
 * Reaper logging.
 *
 * One JSON object per line on stdout/stderr, with the component, module and
 * cycle id carried as context by child loggers. The platform token and the
 * bind password are registered once at startup and redacted from every
 * message and top-level string field before a line is written.
 */

import { maskSecretsInMessage } from './domain/errors';

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

const writeJsonLine: LogHandler = (entry: LogEntry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
  if (entry.level === LogLevel.Error) console.error(line);
  else if (entry.level === LogLevel.Warn) console.warn(line);
  else console.log(line);
};

let currentHandler: LogHandler = writeJsonLine;
let currentMinLevel: LogLevel = LogLevel.Info;
let redacted: readonly string[] = [];

/** Route entries elsewhere (tests capture them). Called without a handler, JSON lines resume. */
export function setLogHandler(handler?: LogHandler): void {
  currentHandler = handler ?? writeJsonLine;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

/** Values that must never reach a log line. Replaces any earlier list. */
export function setLogSecrets(secrets: readonly string[]): void {
  redacted = secrets.filter((secret) => secret.length > 0);
}

/** Parse a LOG_LEVEL value, case-insensitively. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

function redact(context: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    result[key] = typeof value === 'string' ? maskSecretsInMessage(value, redacted) : value;
  }
  return result;
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return;
  currentHandler({
    level,
    message: redacted.length > 0 ? maskSecretsInMessage(message, redacted) : message,
    context: redacted.length > 0 ? redact(context) : context,
    timestamp: new Date().toISOString(),
  });
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** A logger whose lines also carry `context`. */
  child(context: Record<string, unknown>): Logger;
}

export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => emit(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => emit(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => emit(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => emit(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

export const logger = createLogger({ component: 'workspace-reaper' });
