import { createWriteStream, mkdirSync, WriteStream } from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: LogContext;
  operation?: string;
}

export interface LoggerOptions {
  logFile?: string;
  verbose: boolean;
  /** Suppress console output entirely (interactive views, tests) */
  silent?: boolean;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Logs to the console and, when configured, to a JSON-lines file.
 */
export class DualLogger implements Logger {
  private fileStream?: WriteStream;
  private logs: LogEntry[] = [];

  constructor(private options: LoggerOptions) {
    this.initializeFileLogging();
  }

  private initializeFileLogging() {
    if (!this.options.logFile) return;
    mkdirSync(path.dirname(this.options.logFile), { recursive: true });
    this.fileStream = createWriteStream(this.options.logFile, { flags: 'a' });
    this.fileStream.on('error', error => {
      this.fileStream = undefined;
      console.error('Failed to write log file:', error.message);
    });
  }

  private getLogPrefix(level: LogLevel): string {
    switch (level) {
      case 'error':
        return '❌';
      case 'warn':
        return '⚠️';
      case 'info':
        return 'ℹ️';
      case 'debug':
        return '🔍';
    }
  }

  public log(level: LogLevel, message: string, context?: LogContext, operation?: string) {
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      context,
      operation,
    };

    this.logs.push(entry);

    if (this.fileStream) {
      this.fileStream.write(JSON.stringify(entry) + '\n');
    }

    if (this.options.silent) return;
    if (this.options.verbose || level === 'error' || level === 'warn') {
      const prefix = this.getLogPrefix(level);
      const contextStr = context ? ` ${JSON.stringify(context)}` : '';
      const line = `${prefix} ${message}${contextStr}`;
      if (level === 'error') {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  }

  /**
   * Logger whose entries all carry `operation`. Overlapping operations keep their own tags.
   */
  public startOperation(operation: string, context?: LogContext): Logger {
    const scoped: Logger = {
      debug: (message, entryContext) => this.log('debug', message, entryContext, operation),
      info: (message, entryContext) => this.log('info', message, entryContext, operation),
      warn: (message, entryContext) => this.log('warn', message, entryContext, operation),
      error: (message, entryContext) => this.log('error', message, entryContext, operation),
    };
    scoped.debug(`Starting ${operation}`, context);
    return scoped;
  }

  public getLogs(level?: LogLevel, operation?: string): LogEntry[] {
    let filteredLogs = this.logs;

    if (level) {
      filteredLogs = filteredLogs.filter(log => log.level === level);
    }

    if (operation) {
      filteredLogs = filteredLogs.filter(log => log.operation === operation);
    }

    return filteredLogs;
  }

  public async close() {
    const stream = this.fileStream;
    if (!stream) return;
    this.fileStream = undefined;
    await new Promise<void>(resolve => stream.end(() => resolve()));
  }

  public debug(message: string, context?: LogContext) {
    this.log('debug', message, context);
  }

  public info(message: string, context?: LogContext) {
    this.log('info', message, context);
  }

  public warn(message: string, context?: LogContext) {
    this.log('warn', message, context);
  }

  public error(message: string, context?: LogContext) {
    this.log('error', message, context);
  }
}

/**
 * Logger that records entries in memory only
 */
export function createSilentLogger(): DualLogger {
  return new DualLogger({ verbose: false, silent: true });
}
