/**
 * Logging types shared by the engine logger and its hosts.
 *
 * @module types
 */

/**
 * Log levels, lowest to highest severity.
 * `silent` disables every message.
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
  SILENT = 'silent',
}

/**
 * Numeric severity used for level filtering
 */
export const LogLevelSeverity: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.FATAL]: 50,
  [LogLevel.SILENT]: Number.POSITIVE_INFINITY,
};

/**
 * Engine-specific log format type
 */
export type EngineLogFormat = 'pretty' | 'text' | 'json';

/**
 * A single structured log entry, as handed to the formatter
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  source: string;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Receives every formatted line. Defaults to stdout/stderr.
 */
export type LogSink = (line: string, level: LogLevel) => void;

/**
 * Parse a user-supplied level name
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  for (const level of Object.values(LogLevel)) {
    if (level === value.toLowerCase()) return level;
  }
  return undefined;
}
