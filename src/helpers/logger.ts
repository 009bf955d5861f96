import type { Logger } from '../shared/types';

export type LogLevel = 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface Transport {
  write(entry: LogEntry): void;
}

/**
 * Writes to stderr, keeping diagnostics apart from rendered output.
 */
export class ConsoleTransport implements Transport {
  write(entry: LogEntry): void {
    const { level, message, timestamp, ...metadata } = entry;
    const prefix = `[${timestamp}] [${level.toUpperCase()}]`;

    if (Object.keys(metadata).length > 0) {
      console.error(`${prefix} ${message}`, metadata);
    } else {
      console.error(`${prefix} ${message}`);
    }
  }
}

export class MemoryTransport implements Transport {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

export interface StructuredLoggerOptions {
  level?: LogLevel;
  transport?: Transport;
  context?: Record<string, unknown>;
}

export class StructuredLogger implements Logger {
  private level: LogLevel;
  private transport: Transport;
  private context: Record<string, unknown>;
  private levels: Record<LogLevel, number> = {
    warn: 0,
    error: 1
  };

  constructor(options: StructuredLoggerOptions = {}) {
    this.level = options.level || 'warn';
    this.transport = options.transport || new ConsoleTransport();
    this.context = options.context || {};
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.level];
  }

  private log(level: LogLevel, message: string, metadata?: Error | Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context
    };

    if (metadata instanceof Error) {
      entry.error = {
        name: metadata.name,
        message: metadata.message,
        stack: metadata.stack
      };
    } else if (metadata) {
      Object.assign(entry, metadata);
    }

    this.transport.write(entry);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, metadata);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    this.log('error', message, error);
  }

  child(context: Record<string, unknown>): Logger {
    return new StructuredLogger({
      level: this.level,
      transport: this.transport,
      context: { ...this.context, ...context }
    });
  }
}
