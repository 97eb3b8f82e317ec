import type { LogEntry, LogLevel, LogSeverity } from '../types.js';

import { createStructuredLogger, type LogFormat, type StructuredLogger } from './structured-logger.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  TRC: 0,
  VRB: 1,
  WRN: 2,
  ERR: 3,
  OFF: 4,
};

export const ROOT_LOGGER_NAME = 'root';

export const isSeverityEnabled = (severity: LogSeverity, level: LogLevel): boolean =>
  LEVEL_RANK[severity] >= LEVEL_RANK[level];

/** Anything whose threshold can be forced from outside. */
export interface LevelledLogger {
  readonly name: string;
  readonly level: LogLevel;
  setLevel(level: LogLevel): void;
}

/**
 * Source of loggers for the level controller. The root logger is reported
 * separately from the named ones.
 */
export interface LoggingProvider {
  rootLogger(): LevelledLogger;
  currentLoggers(): Iterable<LevelledLogger>;
}

export class Logger implements LevelledLogger {
  readonly name: string;
  private currentLevel: LogLevel;
  private readonly write: (entry: LogEntry) => void;

  constructor(name: string, level: LogLevel, write: (entry: LogEntry) => void) {
    this.name = name;
    this.currentLevel = level;
    this.write = write;
  }

  get level(): LogLevel {
    return this.currentLevel;
  }

  setLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  isEnabled(severity: LogSeverity): boolean {
    return isSeverityEnabled(severity, this.currentLevel);
  }

  log(severity: LogSeverity, message: string, details?: LogEntry['details'], stack?: string): void {
    if (!this.isEnabled(severity)) return;
    this.write({
      timestamp: Date.now(),
      severity,
      logger: this.name,
      message,
      details,
      stack,
    });
  }

  trace(message: string, details?: LogEntry['details']): void {
    this.log('TRC', message, details);
  }

  verbose(message: string, details?: LogEntry['details']): void {
    this.log('VRB', message, details);
  }

  warn(message: string, details?: LogEntry['details']): void {
    this.log('WRN', message, details);
  }

  error(message: string, error?: unknown, details?: LogEntry['details']): void {
    const stack = error instanceof Error ? error.stack : undefined;
    this.log('ERR', message, details, stack);
  }
}

export interface LoggerRegistryOptions {
  level?: LogLevel;
  format?: LogFormat;
  labels?: Record<string, string>;
  color?: boolean;
  // Replaces the structured sink entirely; used by tests to capture entries.
  sink?: (entry: LogEntry) => void;
}

export class LoggerRegistry implements LoggingProvider {
  private readonly root: Logger;
  private readonly loggers = new Map<string, Logger>();
  private readonly sink: (entry: LogEntry) => void;

  constructor(options: LoggerRegistryOptions = {}) {
    if (options.sink !== undefined) {
      this.sink = options.sink;
    } else {
      const structured: StructuredLogger = createStructuredLogger({
        format: options.format,
        labels: options.labels,
        color: options.color,
      });
      this.sink = (entry) => { structured.emit(entry); };
    }
    this.root = new Logger(ROOT_LOGGER_NAME, options.level ?? 'WRN', this.sink);
  }

  rootLogger(): Logger {
    return this.root;
  }

  currentLoggers(): Logger[] {
    return Array.from(this.loggers.values());
  }

  /** Returns the named logger, creating it at the root's current level. */
  getLogger(name: string): Logger {
    if (name === ROOT_LOGGER_NAME) return this.root;
    const existing = this.loggers.get(name);
    if (existing !== undefined) return existing;
    const created = new Logger(name, this.root.level, this.sink);
    this.loggers.set(name, created);
    return created;
  }
}

let processRegistry: LoggerRegistry | undefined;

const resolveEnvFormat = (): LogFormat | undefined => {
  const raw = process.env.HARNESS_LOG_FORMAT;
  if (raw === 'logfmt' || raw === 'json' || raw === 'console' || raw === 'none') return raw;
  return undefined;
};

/** Process-wide registry used when no explicit provider is injected. */
export function getProcessLoggerRegistry(): LoggerRegistry {
  processRegistry ??= new LoggerRegistry({
    format: resolveEnvFormat(),
    color: process.stderr.isTTY,
  });
  return processRegistry;
}
