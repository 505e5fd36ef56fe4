/**
 * Structured logging for project resolution
 *
 * - Human-readable or JSON output
 * - Everything goes to stderr; stdout is reserved for command output
 * - Child loggers carry bound context (config path, sample name, ...)
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details (if applicable) */
  error?: {
    name: string;
    message: string;
    code?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
}

// =============================================================================
// Constants
// =============================================================================

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Parse a log level from an environment value
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find(level => level === normalized);
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private config: Required<LoggerConfig>;

  constructor(
    config: LoggerConfig = {},
    private readonly bound: Record<string, unknown> = {}
  ) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
    };
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const merged = { ...this.bound, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    if (error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      entry.error = { name: error.name, message: error.message, code };
    }

    return entry;
  }

  /**
   * Format entry for output
   */
  format(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      const code = entry.error.code ? ` (${entry.error.code})` : '';
      parts.push(`\n  Error: ${entry.error.name}${code}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private output(entry: LogEntry): void {
    console.error(this.format(entry));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.output(this.createEntry('debug', message, context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.output(this.createEntry('info', message, context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.output(this.createEntry('warn', message, context));
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    this.output(this.createEntry('error', message, context, error));
  }

  /**
   * Create a child logger with additional bound context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger(this.config, { ...this.bound, ...context });
  }

  /**
   * Update logger configuration
   */
  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

/**
 * Default logger, configured from PEP_LOG_LEVEL and PEP_LOG_JSON
 */
export const logger = new Logger({
  level: parseLogLevel(process.env.PEP_LOG_LEVEL),
  json: process.env.PEP_LOG_JSON === 'true',
});

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return new Logger(config);
}
