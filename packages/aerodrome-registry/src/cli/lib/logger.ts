/**
 * Aerodrome Registry CLI Structured Logging
 *
 * Structured logging with JSON output for machine consumption and
 * human-readable output for interactive use. Includes timestamp, command
 * context and duration tracking. Implements the core `Logger` interface so
 * it can be handed to sync, release and overrides loading directly.
 *
 * @module cli/lib/logger
 */

import type { LogLevel, LogMetadata, Logger } from '../../core/utils/logger.js';

// ============================================================================
// Types
// ============================================================================

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

export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  readonly service?: string;
}

/**
 * Line sink per level; defaults to the console
 */
export type LogSink = (level: LogLevel, line: string) => void;

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

const consoleSink: LogSink = (level, line) => {
  switch (level) {
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

// ============================================================================
// CLI Logger Class
// ============================================================================

export class CLILogger implements Logger {
  private readonly config: CLILoggerConfig;
  private readonly sink: LogSink;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig, sink: LogSink = consoleSink) {
    this.config = {
      service: 'aerodrome-registry',
      ...config,
    };
    this.sink = sink;
    this.startTime = Date.now();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service && { service: this.config.service }),
      ...(this.commandContext && { command: this.commandContext }),
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `;
    line += `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} `;
    line += message;

    if (metadata && Object.keys(metadata).length > 0) {
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

    this.sink(
      level,
      this.config.json
        ? this.formatJson(level, message, metadata)
        : this.formatHuman(level, message, metadata)
    );
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
    this.debug(`Starting ${command}`, options);
  }

  /**
   * Log command completion with duration
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const baseMetadata = { duration_ms: Date.now() - this.startTime, ...metadata };

    if (success) {
      this.debug('Command completed', baseMetadata);
    } else {
      this.error('Command failed', baseMetadata);
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCLILogger(config: Partial<CLILoggerConfig> = {}, sink?: LogSink): CLILogger {
  return new CLILogger(
    {
      level: config.level ?? 'info',
      json: config.json ?? false,
      service: config.service ?? 'aerodrome-registry',
    },
    sink
  );
}
