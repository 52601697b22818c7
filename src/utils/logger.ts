/**
 * Logger Utility for Rebinder
 *
 * Writes structured JSON lines to stderr so that stdout stays free for the
 * MCP stdio transport and for the CLI summary.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogSink = (line: string) => void;

export class Logger {
  private logLevel: LogLevel;
  private sink: LogSink;

  constructor(logLevel: LogLevel = 'info', sink: LogSink = line => console.error(line)) {
    this.logLevel = logLevel;
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    const levels: Record<LogLevel, number> = {
      error: 0,
      warn: 1,
      info: 2,
      debug: 3,
    };

    return levels[level] <= levels[this.logLevel];
  }

  private formatMessage(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEntry = {
      timestamp: new Date().toISOString(),
      level: level.toUpperCase(),
      message,
      service: 'rebinder',
      ...(meta !== undefined && { meta: this.serializeMeta(meta) }),
    };

    this.sink(JSON.stringify(logEntry));
  }

  // Error instances stringify to {} otherwise
  private serializeMeta(meta: unknown): unknown {
    if (meta instanceof Error) {
      return { name: meta.name, message: meta.message };
    }
    return meta;
  }

  error(message: string, meta?: unknown): void {
    this.formatMessage('error', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.formatMessage('warn', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.formatMessage('info', message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.formatMessage('debug', message, meta);
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }
}
