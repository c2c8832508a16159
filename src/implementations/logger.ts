/**
 * Structured JSON logger implementation
 * Entries go to the real stderr, never into a captured command's buffers
 */

import { Logger } from '../core/interfaces.js';
import type { LogLevelName } from '../core/configuration.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export const parseLogLevel = (name: LogLevelName): LogLevel => {
  switch (name) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
  }
};

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export class StructuredLogger implements Logger {
  private readonly context: Record<string, unknown>;

  constructor(
    context: Record<string, unknown> = {},
    private readonly level: LogLevel = LogLevel.INFO,
    private readonly output: (entry: LogEntry) => void = (entry) =>
      process.stderr.write(`${JSON.stringify(entry)}\n`)
  ) {
    this.context = { ...context };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.log('debug', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.log('info', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.log('warn', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level > LogLevel.ERROR) {
      return;
    }
    const entry = this.entry('error', message, context);
    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }
    this.output(entry);
  }

  child(context: Record<string, unknown>): Logger {
    return new StructuredLogger(
      { ...this.context, ...context },
      this.level,
      this.output
    );
  }

  private log(level: string, message: string, context?: Record<string, unknown>): void {
    this.output(this.entry(level, message, context));
  }

  private entry(level: string, message: string, context?: Record<string, unknown>): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: { ...this.context, ...context },
    };
  }
}

/**
 * Test logger that captures logs
 */
export class TestLogger implements Logger {
  public readonly logs: Array<{
    level: string;
    message: string;
    context?: Record<string, unknown>;
    error?: Error;
  }> = [];

  debug(message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level: 'debug', message, context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level: 'info', message, context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level: 'warn', message, context });
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logs.push({ level: 'error', message, context, error });
  }

  child(_context: Record<string, unknown>): Logger {
    return this; // Children share the capture
  }

  clear(): void {
    this.logs.length = 0;
  }

  hasLog(level: string, message: string): boolean {
    return this.logs.some(log => log.level === level && log.message === message);
  }
}
