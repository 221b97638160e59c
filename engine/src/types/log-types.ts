/**
 * Log level, ordered by severity
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

/**
 * Numeric severity for level filtering
 */
export const LogLevelSeverity: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4,
};

/**
 * Log categories (phase-based, not feature-based)
 *
 * - 'discovery': Config loading, agent file walking and parsing
 * - 'analysis': Graph building, cycle detection, resolution, rendering
 * - 'system': Engine lifecycle
 */
export type LogCategory = 'discovery' | 'analysis' | 'system';

/**
 * Engine log format
 */
export type EngineLogFormat = 'text' | 'json';

/**
 * A single structured log entry
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  source: string;
  category: LogCategory;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
  };
}

/**
 * Where formatted lines go. The default writes debug/info to stdout and
 * warn and above to stderr.
 */
export type LogSink = (line: string, entry: LogEntry) => void;

/**
 * Engine logger configuration
 */
export interface EngineLoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  format?: EngineLogFormat;
  /** Enable colors in text output */
  colors?: boolean;
  /** Include timestamps in text output */
  timestamp?: boolean;
  /** Source identifier */
  source?: string;
  sink?: LogSink;
  /** Entries kept for getHistory(); older ones are dropped. 0 keeps none. */
  historyLimit?: number;
}
