/**
 * Engine Logger
 *
 * Structured logging for the agent graph engine.
 * Supports text and JSON output with severity-based level filtering.
 *
 * There is no process-wide logger: the engine facade owns one and hands it
 * to the loader and graph operations that log.
 *
 * @module logging
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import {
  LogLevel,
  LogLevelSeverity,
  type EngineLogFormat,
  type EngineLoggerConfig,
  type LogCategory,
  type LogEntry,
  type LogSink,
} from '../types/log-types.js';

const DEFAULT_HISTORY_LIMIT = 500;

const defaultSink: LogSink = (line, entry) => {
  if (LogLevelSeverity[entry.level] >= LogLevelSeverity[LogLevel.WARN]) {
    console.error(line);
  } else {
    console.log(line);
  }
};

/**
 * Check whether `level` passes the `minimum` filter
 */
export function shouldLog(level: LogLevel, minimum: LogLevel): boolean {
  return LogLevelSeverity[level] >= LogLevelSeverity[minimum];
}

/**
 * Render an entry as a single line
 *
 * @example
 * ```typescript
 * formatLog(entry, { format: 'text', colors: false, timestamp: false });
 * // "[INFO] AgentGraph: graph built {"agents":3}"
 * ```
 */
export function formatLog(
  entry: LogEntry,
  options: { format: EngineLogFormat; colors: boolean; timestamp: boolean }
): string {
  if (options.format === 'json') {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      source: entry.source,
      message: entry.message,
      ...(entry.context ? { context: entry.context } : {}),
      ...(entry.error ? { error: entry.error } : {}),
    });
  }

  const c = options.colors ? chalk : new Chalk({ level: 0 });
  const parts: string[] = [];

  if (options.timestamp) {
    parts.push(c.gray(entry.timestamp.toISOString()));
  }
  parts.push(levelColor(entry.level, c)(`[${entry.level.toUpperCase()}]`));
  parts.push(`${c.bold(entry.source)}: ${entry.message}`);

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(c.dim(JSON.stringify(entry.context)));
  }
  if (entry.error) {
    parts.push(c.red(`(${entry.error.name}: ${entry.error.message})`));
  }

  return parts.join(' ');
}

function levelColor(level: LogLevel, c: ChalkInstance): ChalkInstance {
  switch (level) {
    case LogLevel.DEBUG:
      return c.gray;
    case LogLevel.INFO:
      return c.cyan;
    case LogLevel.WARN:
      return c.yellow;
    case LogLevel.ERROR:
      return c.red;
    case LogLevel.FATAL:
      return c.red.bold;
  }
}

/**
 * Engine Logger
 */
export class EngineLogger {
  private config: Required<EngineLoggerConfig>;
  private history: LogEntry[] = [];

  constructor(config: EngineLoggerConfig) {
    this.config = {
      level: config.level,
      format: config.format ?? 'text',
      colors: config.colors ?? true,
      timestamp: config.timestamp ?? false,
      source: config.source ?? 'AgentGraph',
      sink: config.sink ?? defaultSink,
      historyLimit: config.historyLimit ?? DEFAULT_HISTORY_LIMIT,
    };
  }

  debug(message: string, context?: Record<string, unknown>, category: LogCategory = 'analysis'): void {
    this.log(LogLevel.DEBUG, message, category, context);
  }

  info(message: string, context?: Record<string, unknown>, category: LogCategory = 'analysis'): void {
    this.log(LogLevel.INFO, message, category, context);
  }

  warn(message: string, context?: Record<string, unknown>, category: LogCategory = 'analysis'): void {
    this.log(LogLevel.WARN, message, category, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>, category: LogCategory = 'analysis'): void {
    this.log(LogLevel.ERROR, message, category, context, error);
  }

  private log(
    level: LogLevel,
    message: string,
    category: LogCategory,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      source: this.config.source,
      category,
      context,
      error: error ? { name: error.name, message: error.message } : undefined,
    };

    if (this.config.historyLimit > 0) {
      this.history.push(entry);
      if (this.history.length > this.config.historyLimit) {
        this.history.shift();
      }
    }
    this.config.sink(formatLog(entry, this.config), entry);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  willLog(level: LogLevel): boolean {
    return shouldLog(level, this.config.level);
  }

  /**
   * Entries that passed the level filter, oldest first.
   * Holds at most `historyLimit` entries.
   */
  getHistory(): ReadonlyArray<LogEntry> {
    return [...this.history];
  }

  clearHistory(): void {
    this.history = [];
  }

  getConfig(): Readonly<EngineLoggerConfig> {
    return { ...this.config };
  }
}

/**
 * Create a logger from a config-level name.
 * Returns null for 'silent'; callers skip logging then.
 */
export function createEngineLogger(
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent',
  options: Omit<EngineLoggerConfig, 'level'> = {}
): EngineLogger | null {
  if (logLevel === 'silent') {
    return null;
  }

  const levelMap: Record<'debug' | 'info' | 'warn' | 'error', LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
  };

  return new EngineLogger({ ...options, level: levelMap[logLevel] });
}
