/**
 * peakmap CLI Structured Logging
 *
 * Human-readable coloured output for interactive use, one JSON object per
 * line with --json. Tracks command duration and prints summary tables.
 *
 * @module cli/lib/logger
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry metadata
 */
export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly duration_ms?: number;
  readonly [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  /** Service name */
  readonly service: string;
  /** Metadata attached to every entry */
  readonly context: LogMetadata;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

// ============================================================================
// CLI Logger Class
// ============================================================================

export class CLILogger {
  private readonly config: CLILoggerConfig;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig) {
    this.config = config;
    this.startTime = Date.now();
  }

  get isJson(): boolean {
    return this.config.json;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private getElapsedMs(): number {
    return Date.now() - this.startTime;
  }

  private formatJson(level: LogLevel, message: string, metadata: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.service,
      ...(this.commandContext ? { command: this.commandContext } : {}),
      ...metadata,
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata: LogMetadata): string {
    let line = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `;
    line += `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} `;
    line += message;

    if (Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const merged: LogMetadata = { ...this.config.context, ...metadata };
    const formatted = this.config.json
      ? this.formatJson(level, message, merged)
      : this.formatHuman(level, message, merged);

    switch (level) {
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
        console.info(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'error':
        console.error(formatted);
        break;
    }
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Log command start and reset the duration timer
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.commandContext = command;
    this.startTime = Date.now();
    this.info(`Starting ${command}`, options);
  }

  /**
   * Log command completion with duration
   *
   * JSON entries carry `duration_ms`; human output puts the formatted
   * duration in the message.
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const elapsed = this.getElapsedMs();
    const message = success ? 'Command completed' : 'Command failed';
    const level: LogLevel = success ? 'info' : 'error';

    if (this.config.json) {
      this.log(level, message, { duration_ms: elapsed, ...metadata });
    } else {
      this.log(level, `${message} in ${formatDuration(elapsed)}`, metadata);
    }
  }

  /**
   * Print rows as an aligned table (one JSON array in JSON mode)
   */
  table(data: readonly Record<string, unknown>[], columns?: readonly string[]): void {
    if (this.config.json) {
      console.log(JSON.stringify(data));
      return;
    }

    const first = data[0];
    if (!first) {
      this.info('No data to display');
      return;
    }

    const cols = columns ?? Object.keys(first);
    const widths = cols.map((col) =>
      Math.max(col.length, ...data.map((row) => String(row[col] ?? '').length))
    );

    console.log(cols.map((col, i) => col.padEnd(widths[i] ?? 0)).join(' | '));
    console.log(widths.map((width) => '-'.repeat(width)).join('-+-'));
    for (const row of data) {
      console.log(cols.map((col, i) => String(row[col] ?? '').padEnd(widths[i] ?? 0)).join(' | '));
    }
  }

  /**
   * Create a child logger whose entries carry extra metadata
   */
  child(context: LogMetadata): CLILogger {
    const childLogger = new CLILogger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
    childLogger.commandContext = this.commandContext;
    childLogger.startTime = this.startTime;
    return childLogger;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a CLI logger with the given configuration
 */
export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    service: config.service ?? 'peakmap',
    context: config.context ?? {},
  });
}

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(1);
  return `${minutes}m ${seconds}s`;
}
