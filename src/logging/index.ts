// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE — Structured Logs with Component Context
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig } from '../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LogContext {
  component?: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOG LEVELS
// ─────────────────────────────────────────────────────────────────────────────────

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel];
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Writes to stderr: an export is often streamed to stdout and log lines
 * must not end up inside it.
 */
export class Logger {
  private context: LogContext;
  private minLevel: LogLevel;
  private jsonFormat: boolean;

  constructor(context: LogContext = {}) {
    this.context = context;
    const config = loadConfig();
    this.minLevel = config.logging.level;
    this.jsonFormat = config.logging.json;
  }

  private formatEntry(level: LogLevel, message: string, extra?: Partial<LogEntry>): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...extra,
    };
  }

  private output(entry: LogEntry): void {
    if (this.jsonFormat) {
      console.error(JSON.stringify(entry));
      return;
    }

    const component = entry.component ? `[${entry.component}]` : '';
    const duration = entry.duration !== undefined ? ` ${entry.duration}ms` : '';

    console.error(
      `${entry.timestamp} ${entry.level.toUpperCase().padEnd(5)} ${component} ${entry.message}${duration}`
    );

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      console.error('  ', JSON.stringify(entry.metadata));
    }

    if (entry.error) {
      console.error(`  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        console.error('  ', entry.error.stack.split('\n').slice(1, 4).join('\n  '));
      }
    }
  }

  private log(level: LogLevel, message: string, extra?: Partial<LogEntry>): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.output(this.formatEntry(level, message, extra));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // PUBLIC API
  // ─────────────────────────────────────────────────────────────────────────────

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, { metadata });
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, { metadata });
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, { metadata });
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('error', message, {
      metadata,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
      } : undefined,
    });
  }

  fatal(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('fatal', message, {
      metadata,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
      } : undefined,
    });
  }

  time(message: string, startTime: number, metadata?: Record<string, unknown>): void {
    const duration = Date.now() - startTime;
    this.log('info', message, { duration, metadata });
  }

  child(context: Partial<LogContext>): Logger {
    return new Logger({ ...this.context, ...context });
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINGLETON ROOT LOGGER
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: Logger | null = null;

export function getLogger(context?: LogContext): Logger {
  if (!rootLogger) {
    rootLogger = new Logger();
  }
  if (context) {
    return rootLogger.child(context);
  }
  return rootLogger;
}

/**
 * Drop the cached root logger so the next call picks up a reloaded config.
 */
export function resetLogger(): void {
  rootLogger = null;
}

// Component-specific loggers
export const loggers = {
  export: () => getLogger({ component: 'export' }),
  table: () => getLogger({ component: 'table' }),
};
