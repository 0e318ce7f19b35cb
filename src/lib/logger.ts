/**
 * Structured Logger Utility
 *
 * Features:
 * - Log levels: debug, info, warn, error
 * - Text output for terminals, JSON output for aggregation (LOG_FORMAT=json)
 * - Environment-based level control (LOG_LEVEL env var)
 * - Child loggers per module (`extract:expand`, `extract:lua`, ...)
 * - Page context propagated through AsyncLocalStorage, so every line
 *   logged while a page is being processed carries its title
 */

import { AsyncLocalStorage } from 'node:async_hooks';

/** Log levels in order of severity */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Context of the page currently being processed */
export interface PageContext {
  /** Title of the page */
  page: string;
  /** Index of the pool lane processing the page */
  worker?: number;
  /** Additional fields to include in all logs */
  fields?: Record<string, unknown>;
}

const pageContextStorage = new AsyncLocalStorage<PageContext>();

/**
 * Run a function with page context
 * All logs within the callback include the page title
 */
export function withPageContext<T>(context: PageContext, fn: () => T): T {
  return pageContextStorage.run(context, fn);
}

/**
 * Get the current page context, if any
 */
export function getPageContext(): PageContext | undefined {
  return pageContextStorage.getStore();
}

/** Numeric values for log level comparison */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

/** Log entry structure */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Logger context (module name) */
  context: string;
  message: string;
  data?: Record<string, unknown>;
  /** Error stack trace (for error level) */
  stack?: string;
  operation?: string;
  /** Page title (from AsyncLocalStorage) */
  page?: string;
  /** Pool lane (from AsyncLocalStorage) */
  worker?: number;
  service?: string;
}

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Output format: 'text' for human-readable, 'json' for structured */
  format: 'text' | 'json';
  /** Logger context (module name) */
  context: string;
  timestamps: boolean;
  /** Service name for log aggregation (defaults to 'wiktextract') */
  service?: string;
  /** Default fields to include in all log entries */
  defaultFields?: Record<string, unknown>;
  /** Output sink; defaults to stdout/stderr */
  sink?: (line: string, level: LogLevel) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  format: 'text',
  context: 'app',
  timestamps: true,
  service: 'wiktextract',
};

function getServiceFromEnv(): string {
  return process.env['SERVICE_NAME'] ?? 'wiktextract';
}

/**
 * Get log level from environment variable
 */
function getLogLevelFromEnv(): LogLevel {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['NODE_ENV'] === 'development' ? 'debug' : 'info';
}

/**
 * Get log format from environment variable
 */
function getLogFormatFromEnv(): 'text' | 'json' {
  const envFormat = process.env['LOG_FORMAT']?.toLowerCase();
  if (envFormat === 'json') {
    return 'json';
  }
  return process.env['NODE_ENV'] === 'production' ? 'json' : 'text';
}

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

/**
 * Format a log entry as human-readable text
 */
function formatText(entry: LogEntry, config: LoggerConfig): string {
  const parts: string[] = [];

  if (config.timestamps) {
    const time = new Date(entry.timestamp).toLocaleTimeString('en-US', {
      hour12: false,
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    parts.push(`${COLORS.dim}${time}${COLORS.reset}`);
  }

  parts.push(`${LEVEL_COLORS[entry.level]}${LEVEL_LABELS[entry.level]}${COLORS.reset}`);
  parts.push(`${COLORS.cyan}[${entry.context}]${COLORS.reset}`);

  if (entry.page !== undefined) {
    parts.push(`${COLORS.dim}<${entry.page}>${COLORS.reset}`);
  }

  if (entry.operation) {
    parts.push(`${COLORS.dim}(${entry.operation})${COLORS.reset}`);
  }

  parts.push(entry.message);

  if (entry.data && Object.keys(entry.data).length > 0) {
    const dataStr = Object.entries(entry.data)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(' ');
    parts.push(`${COLORS.dim}${dataStr}${COLORS.reset}`);
  }

  let output = parts.join(' ');
  if (entry.stack) {
    output += `\n${COLORS.dim}${entry.stack}${COLORS.reset}`;
  }
  return output;
}

/**
 * Logger class for structured logging
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly minLevel: number;
  private readonly service: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      level: config.level ?? getLogLevelFromEnv(),
      format: config.format ?? getLogFormatFromEnv(),
      service: config.service ?? getServiceFromEnv(),
    };
    this.minLevel = LOG_LEVEL_VALUES[this.config.level];
    this.service = this.config.service ?? 'wiktextract';
  }

  /**
   * Check if a log level should be output
   */
  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= this.minLevel;
  }

  private write(entry: LogEntry): void {
    const output =
      this.config.format === 'json'
        ? JSON.stringify(entry)
        : formatText(entry, this.config);

    if (this.config.sink) {
      this.config.sink(output, entry.level);
      return;
    }
    // stdout carries extracted records in the CLI, so every log line goes to stderr
    console.error(output);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const pageContext = getPageContext();

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.config.context,
      message,
      service: this.service,
    };

    if (pageContext) {
      entry.page = pageContext.page;
      if (pageContext.worker !== undefined) {
        entry.worker = pageContext.worker;
      }
    }

    if (this.config.defaultFields) {
      entry.data = { ...this.config.defaultFields };
    }

    if (pageContext?.fields) {
      entry.data = { ...entry.data, ...pageContext.fields };
    }

    if (data) {
      const error = data['error'];
      if (error instanceof Error) {
        if (error.stack) {
          entry.stack = error.stack;
        }
        data = { ...data, error: error.message };
      }
      entry.data = { ...entry.data, ...data };
    }

    if (operation) {
      entry.operation = operation;
    }

    this.write(entry);
  }

  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('debug', message, data, operation);
  }

  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('info', message, data, operation);
  }

  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('warn', message, data, operation);
  }

  error(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('error', message, data, operation);
  }

  /**
   * Log an error with full stack trace
   */
  errorWithStack(
    message: string,
    error: Error,
    data?: Record<string, unknown>,
    operation?: string
  ): void {
    this.log('error', message, { ...data, error, errorName: error.name }, operation);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    return new Logger({
      ...this.config,
      context: `${this.config.context}:${context}`,
    });
  }

  /**
   * Create a child logger with additional default fields
   */
  withFields(fields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: { ...this.config.defaultFields, ...fields },
    });
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config };
  }
}

/**
 * Logger provider interface for dependency injection
 */
export interface LoggerProvider {
  createLogger(context: string): Logger;
}

class DefaultLoggerProvider implements LoggerProvider {
  private readonly loggerCache = new Map<string, Logger>();

  createLogger(context: string): Logger {
    let logger = this.loggerCache.get(context);
    if (!logger) {
      logger = new Logger({ context });
      this.loggerCache.set(context, logger);
    }
    return logger;
  }
}

let loggerProvider: LoggerProvider = new DefaultLoggerProvider();

export function getLoggerProvider(): LoggerProvider {
  return loggerProvider;
}

/**
 * Set a custom logger provider (useful for testing)
 * @returns The previous logger provider for restoration
 */
export function setLoggerProvider(provider: LoggerProvider): LoggerProvider {
  const previous = loggerProvider;
  loggerProvider = provider;
  return previous;
}

/**
 * Reset to the default logger provider
 */
export function resetLoggerProvider(): void {
  loggerProvider = new DefaultLoggerProvider();
}

/**
 * Create a logger for a specific module
 * Uses the current logger provider (supports dependency injection)
 */
export function createLogger(context: string): Logger {
  return loggerProvider.createLogger(context);
}
