/**
 * @file Logging for dta-sensitivity.
 *       Lines carry a timestamp, level, context path and JSON metadata, and go to every
 *       configured sink (console, log file, or a caller-supplied one). Pipeline steps are
 *       wrapped with `track()` so that both their completion and their failure are logged
 *       with a duration.
 */

import * as fs from 'fs';
import * as path from 'path';
import { getErrorMessage } from './error-handling';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: string;
  metadata?: Record<string, unknown>;
}

/** Receives every entry at or above the logger's level, already formatted. */
export type LogSink = (entry: LogEntry, line: string) => void;

export interface LoggerOptions {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logFilePath?: string;
  context?: string;
  /** Extra sinks, called after the console and file sinks. */
  sinks?: LogSink[];
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const consoleSink: LogSink = (entry, line) => {
  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

export function fileSink(logFilePath: string): LogSink {
  fs.mkdirSync(path.dirname(logFilePath), { recursive: true });
  return (_entry, line) => {
    try {
      fs.appendFileSync(logFilePath, line + '\n');
    } catch (error) {
      console.error(`Failed to write to log file '${logFilePath}': ${getErrorMessage(error)}`);
    }
  };
}

function buildSinks(options: LoggerOptions): LogSink[] {
  const sinks: LogSink[] = [];
  if (options.enableConsole) sinks.push(consoleSink);
  if (options.enableFile && options.logFilePath) sinks.push(fileSink(options.logFilePath));
  return sinks.concat(options.sinks ?? []);
}

/**
 * JSON with circular references replaced and errors reduced to their message.
 */
export function stringifyMetadata(metadata: Record<string, unknown>): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(metadata, (_key, value: unknown) => {
    if (value instanceof Error) {
      return value.message;
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular Reference]';
      }
      seen.add(value);
    }
    return value;
  });
}

export function formatLogEntry(entry: LogEntry): string {
  const contextStr = entry.context ? `[${entry.context}] ` : '';
  const metadataStr = entry.metadata && Object.keys(entry.metadata).length > 0
    ? ` ${stringifyMetadata(entry.metadata)}`
    : '';
  return `${entry.timestamp} [${entry.level.toUpperCase()}] ${contextStr}${entry.message}${metadataStr}`;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly context?: string;
  private readonly sinks: LogSink[];

  constructor(options: LoggerOptions, sinks?: LogSink[]) {
    this.level = options.level;
    this.context = options.context;
    this.sinks = sinks ?? buildSinks(options);
  }

  /**
   * Logger for a nested context (`Parent:child`), sharing this logger's sinks.
   */
  child(context: string): Logger {
    return new Logger(
      {
        level: this.level,
        enableConsole: false,
        enableFile: false,
        context: this.context ? `${this.context}:${context}` : context,
      },
      this.sinks
    );
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private write(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context,
      metadata,
    };
    const line = formatLogEntry(entry);
    this.sinks.forEach((sink) => sink(entry, line));
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.write('error', message, metadata);
  }

  /**
   * Runs one step, logging its start, then either its completion or its failure with the
   * elapsed time. The step's error is rethrown unchanged. `describe` adds result details
   * to the completion line.
   */
  async track<T>(
    stepName: string,
    work: () => T | Promise<T>,
    describe?: (result: T) => Record<string, unknown>
  ): Promise<T> {
    const startTime = Date.now();
    this.info(`Starting step: ${stepName}`);
    try {
      const result = await work();
      this.info(`Completed step: ${stepName}`, {
        duration: `${Date.now() - startTime}ms`,
        ...(describe ? describe(result) : {}),
      });
      return result;
    } catch (error) {
      this.error(`Failed step: ${stepName}`, {
        duration: `${Date.now() - startTime}ms`,
        error: getErrorMessage(error),
      });
      throw error;
    }
  }
}

let globalLogger: Logger | null = null;

export function initializeLogger(options: Omit<LoggerOptions, 'context'>): Logger {
  globalLogger = new Logger(options);
  return globalLogger;
}

/**
 * The global logger, or a child of it for `context`. Falls back to console output at
 * info level before `initializeLogger` is called.
 */
export function getLogger(context?: string): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({ level: 'info', enableConsole: true, enableFile: false });
  }
  return context ? globalLogger.child(context) : globalLogger;
}
