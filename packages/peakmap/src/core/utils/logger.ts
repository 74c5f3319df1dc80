/**
 * Structured logging for peakmap library modules
 *
 * Console-based logger with levels, timestamps and per-module context.
 * The CLI has its own richer logger (cli/lib/logger); this one is for code
 * that may run without the CLI around it.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Minimal logging surface accepted by library functions; satisfied by both
 * this module's Logger and the CLI logger
 */
export interface LogSink {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  readonly context: LogMetadata;
}

export class Logger implements LogSink {
  private readonly config: LoggerConfig;
  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.config.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const merged: LogMetadata = { ...this.config.context, ...metadata };
    const hasMeta = Object.keys(merged).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(merged)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    // JSON format for production
    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...merged,
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

/**
 * Create a child logger with additional context
 *
 * `module` names the service suffix; every other key is attached to each entry.
 */
export function createLogger(context: LogMetadata): Logger {
  const { module: moduleName, ...rest } = context;
  return new Logger({
    level: getLogLevel(),
    service: `peakmap:${typeof moduleName === 'string' ? moduleName : 'unknown'}`,
    pretty: process.env.NODE_ENV !== 'production',
    context: rest,
  });
}
