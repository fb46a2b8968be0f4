/**
 * Engine Logger
 *
 * Structured logging for the playbook engine. Every component receives its
 * logger explicitly; `child()` derives a logger tagged with a component name.
 *
 * @module core
 */

import { Chalk, type ChalkInstance } from 'chalk';
import {
  LogLevel,
  LogLevelSeverity,
  type EngineLogFormat,
  type LogEntry,
  type LogSink,
} from '../types/log-types.js';

/**
 * Engine logger configuration
 */
export interface EngineLoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Output format */
  format?: EngineLogFormat;
  /** Enable colors in output */
  colors?: boolean;
  /** Include timestamps */
  timestamp?: boolean;
  /** Source identifier */
  source?: string;
  /** Where formatted lines go */
  sink?: LogSink;
}

const defaultSink: LogSink = (line, level) => {
  if (LogLevelSeverity[level] >= LogLevelSeverity[LogLevel.WARN]) {
    console.error(line);
  } else {
    console.log(line);
  }
};

export class EngineLogger {
  private readonly config: Required<EngineLoggerConfig>;
  private readonly chalk: ChalkInstance;

  constructor(config: EngineLoggerConfig) {
    this.config = {
      level: config.level,
      format: config.format ?? 'text',
      colors: config.colors ?? true,
      timestamp: config.timestamp ?? true,
      source: config.source ?? 'restplay',
      sink: config.sink ?? defaultSink,
    };
    this.chalk = new Chalk({ level: this.config.colors ? 1 : 0 });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, message, context, error);
  }

  /**
   * Derive a logger for a component. Level, format and sink are shared
   * at creation time.
   */
  child(source: string): EngineLogger {
    return new EngineLogger({ ...this.config, source });
  }

  willLog(level: LogLevel): boolean {
    return (
      level !== LogLevel.SILENT &&
      LogLevelSeverity[level] >= LogLevelSeverity[this.config.level]
    );
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.willLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      source: this.config.source,
      message,
      context,
      error,
    };

    this.config.sink(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case 'json':
        return JSON.stringify({
          timestamp: entry.timestamp.toISOString(),
          level: entry.level,
          source: entry.source,
          message: entry.message,
          ...(entry.context ? { context: entry.context } : {}),
          ...(entry.error ? { error: { name: entry.error.name, message: entry.error.message } } : {}),
        });
      case 'pretty':
        return this.formatPretty(entry);
      case 'text':
        return this.formatText(entry);
    }
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];
    if (this.config.timestamp) {
      parts.push(this.chalk.gray(entry.timestamp.toISOString()));
    }
    parts.push(this.colorLevel(entry.level, entry.level.toUpperCase().padEnd(5)));
    parts.push(this.chalk.cyan(`[${entry.source}]`));
    parts.push(entry.message);
    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(this.chalk.gray(JSON.stringify(entry.context)));
    }
    if (entry.error) {
      parts.push(this.chalk.red(`${entry.error.name}: ${entry.error.message}`));
    }
    return parts.join(' ');
  }

  private formatPretty(entry: LogEntry): string {
    const lines = [this.formatText({ ...entry, context: undefined, error: undefined })];
    if (entry.context) {
      for (const [key, value] of Object.entries(entry.context)) {
        lines.push(`    ${this.chalk.gray(key)}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
      }
    }
    if (entry.error) {
      lines.push(this.chalk.red(`    ${entry.error.stack ?? `${entry.error.name}: ${entry.error.message}`}`));
    }
    return lines.join('\n');
  }

  private colorLevel(level: LogLevel, text: string): string {
    switch (level) {
      case LogLevel.DEBUG:
        return this.chalk.gray(text);
      case LogLevel.INFO:
        return this.chalk.blue(text);
      case LogLevel.WARN:
        return this.chalk.yellow(text);
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        return this.chalk.red.bold(text);
      case LogLevel.SILENT:
        return text;
    }
  }
}

/**
 * Create a logger from CLI-style options
 */
export function createEngineLogger(
  level: LogLevel,
  options: { verbose?: boolean; colors?: boolean; json?: boolean; sink?: LogSink } = {}
): EngineLogger {
  return new EngineLogger({
    level: options.verbose ? LogLevel.DEBUG : level,
    format: options.json ? 'json' : options.verbose ? 'pretty' : 'text',
    colors: options.colors ?? true,
    timestamp: false,
    sink: options.sink,
  });
}

/**
 * Logger that drops everything. Used where a host supplies none.
 */
export function createSilentLogger(): EngineLogger {
  return new EngineLogger({ level: LogLevel.SILENT, colors: false });
}
