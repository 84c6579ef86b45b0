/**
 * @fileoverview Logging for the engine bridge
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output for production
 * - Pretty printing for development
 * - Context-aware child loggers
 * - Performance tracking
 *
 * Everything goes to stderr: stdout belongs to the MCP stdio transport.
 */

import pino from 'pino';
import { getLoggingContext } from './log-context.js';

// =============================================================================
// Types
// =============================================================================

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

export interface LogContext {
  component?: string;
  enginePath?: string;
  [key: string]: unknown;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Create a configured pino logger instance
 */
function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  const pretty = options.pretty ?? process.env.NODE_ENV !== 'production';

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'chess-uci',
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin: () => ({ ...getLoggingContext() }),
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        name: bindings.name,
      }),
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

export class UciLogger {
  private pino: pino.Logger;
  private context: LogContext;

  /**
   * Child loggers pass their pino instance to avoid creating a new transport
   */
  constructor(options: LoggerOptions = {}, context: LogContext = {}, pinoLogger?: pino.Logger) {
    this.pino = pinoLogger ?? createPinoLogger(options);
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): UciLogger {
    return new UciLogger({}, { ...this.context, ...context }, this.pino.child(context));
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  setLevel(level: LogLevel): void {
    this.pino.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.pino.trace(data ?? {}, msg);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(data ?? {}, msg);
  }

  /**
   * Log at error level; an Error argument is logged under `err`
   */
  error(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else {
      this.pino.error(error ?? {}, msg);
    }
  }

  fatal(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.fatal({ err: error }, msg);
    } else {
      this.pino.fatal(error ?? {}, msg);
    }
  }

  /**
   * Start a timer for performance tracking
   */
  startTimer(label: string): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} completed`, { durationMs: duration.toFixed(2) });
    };
  }

  /**
   * Log with timing wrapper
   */
  async timed<T>(label: string, fn: () => Promise<T>, level: Exclude<LogLevel, 'silent'> = 'debug'): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      const duration = performance.now() - start;
      this.pino[level]({ durationMs: duration.toFixed(2) }, `${label} completed`);
      return result;
    } catch (error) {
      const duration = performance.now() - start;
      this.error(`${label} failed`, {
        durationMs: duration.toFixed(2),
        err: error instanceof Error ? error : new Error(String(error)),
      });
      throw error;
    }
  }
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Create a component logger on a fresh pino root.
 * Each caller owns the returned instance; nothing is cached here.
 */
export function createLogger(component: string, options?: LoggerOptions, context?: LogContext): UciLogger {
  return new UciLogger(options).child({ component, ...context });
}

/**
 * Logger that discards everything (tests, embedding without output)
 */
export function createSilentLogger(): UciLogger {
  return new UciLogger({ level: 'silent', pretty: false });
}
