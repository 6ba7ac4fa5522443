/**
 * Service logging: one JSON line per entry.
 *
 * Entries lift the fields that correlate a line with an intent run
 * (`traceId`, `intentId`, `executionId`, `organizationId`, `component`) to the
 * top level, so a log pipeline can join them with trace events without
 * digging into `context`. Anything else bound or passed stays in `context`.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.SILENT]: 'silent',
};

const CORRELATION_KEYS = ['traceId', 'intentId', 'executionId', 'organizationId', 'component'] as const;
type CorrelationKey = (typeof CORRELATION_KEYS)[number];

export type LogContext = Record<string, unknown>;

/** Bindings for `child()`. Correlation fields are typed; anything else lands in `context`. */
export type LogBindings = Partial<Record<CorrelationKey, string>> & LogContext;

export interface LogEntry extends Partial<Record<CorrelationKey, string>> {
  timestamp: string;
  level: LogLevelName;
  module: string;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LogBindings): Logger;
}

let globalLogLevel: LogLevel = LogLevel.INFO;
let logOutput: (entry: LogEntry) => void = writeLine;

function writeLine(entry: LogEntry): void {
  const line = JSON.stringify(entry) + '\n';
  if (entry.level === 'error' || entry.level === 'warn') process.stderr.write(line);
  else process.stdout.write(line);
}

export function setGlobalLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLogLevel;
}

/** Route entries somewhere other than stdout/stderr. */
export function setLogOutput(fn: (entry: LogEntry) => void): void {
  logOutput = fn;
}

export function resetLogOutput(): void {
  logOutput = writeLine;
}

/** `debug`, `WARN`, ` Info ` and so on; unknown names yield undefined. */
export function parseLogLevel(name: string): LogLevel | undefined {
  const lower = name.trim().toLowerCase();
  const levels = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.SILENT];
  return levels.find((level) => LEVEL_NAMES[level] === lower);
}

function isCorrelationKey(key: string): key is CorrelationKey {
  return (CORRELATION_KEYS as readonly string[]).includes(key);
}

export function buildEntry(level: LogLevel, module: string, message: string, fields: LogContext): LogEntry {
  const entry: LogEntry = { timestamp: new Date().toISOString(), level: LEVEL_NAMES[level], module, message };
  const context: LogContext = {};
  for (const [key, value] of Object.entries(fields)) {
    if (isCorrelationKey(key) && typeof value === 'string') entry[key] = value;
    else context[key] = value;
  }
  if (Object.keys(context).length > 0) entry.context = context;
  return entry;
}

export class ConsoleLogger implements Logger {
  constructor(
    private module: string,
    private level?: LogLevel,
    private bindings: LogBindings = {},
  ) {}

  debug(message: string, context?: LogContext): void {
    this.emit(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.emit(LogLevel.ERROR, message, context);
  }

  child(bindings: LogBindings): Logger {
    return new ConsoleLogger(this.module, this.level, { ...this.bindings, ...bindings });
  }

  private emit(level: LogLevel, message: string, context?: LogContext): void {
    if (level < (this.level ?? globalLogLevel)) return;
    logOutput(buildEntry(level, this.module, message, { ...this.bindings, ...context }));
  }
}

export function createLogger(module: string, level?: LogLevel): Logger {
  return new ConsoleLogger(module, level);
}
