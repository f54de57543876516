/**
 * @fileoverview Centralized logging for the paperkit tools
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output for production
 * - Pretty printing on stderr for interactive use
 * - Component child loggers
 * - AsyncLocalStorage context (run id, state, method) on every record
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
  /** Destination for JSON output; ignored when pretty printing */
  destination?: pino.DestinationStream;
}

export interface LogContext {
  component?: string;
  [key: string]: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// =============================================================================
// Logger Factory
// =============================================================================

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return fromEnv !== undefined && isLogLevel(fromEnv) ? fromEnv : 'info';
}

function defaultPretty(): boolean {
  const env = process.env.NODE_ENV;
  return env !== 'production' && env !== 'test';
}

/**
 * Create a configured pino logger instance
 */
function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? defaultLevel();
  const pretty = options.pretty ?? defaultPretty();

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'paperkit',
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin: () => ({ ...getLoggingContext() }),
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        host: bindings.hostname,
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

  // Keep stdout free for command output
  return pino(pinoOptions, options.destination ?? pino.destination(2));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

export class PaperkitLogger {
  private readonly pino: pino.Logger;
  private readonly context: LogContext;

  constructor(options: LoggerOptions = {}, context: LogContext = {}, instance?: pino.Logger) {
    this.pino = instance ?? createPinoLogger(options);
    this.context = context;
  }

  /**
   * Create a child logger with additional context.
   * Reuses the parent's pino destination.
   */
  child(context: LogContext): PaperkitLogger {
    return new PaperkitLogger({}, { ...this.context, ...context }, this.pino.child(context));
  }

  get bindings(): LogContext {
    return { ...this.context };
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

  /** An Error is logged under `err` so pino serializes its stack */
  error(msg: string, error?: Error | Record<string, unknown>): void {
    this.pino.error(error instanceof Error ? { err: error } : (error ?? {}), msg);
  }

  /**
   * Returns a callback that logs `<label> completed` with the elapsed time at debug.
   */
  startTimer(label: string): () => void {
    const start = performance.now();
    return () => this.debug(`${label} completed`, { durationMs: elapsedSince(start) });
  }

  /**
   * Run `fn`, logging its duration on success and an error record on failure.
   * The failure is rethrown unchanged.
   */
  async timed<T>(label: string, fn: () => Promise<T>, level: 'debug' | 'info' = 'debug'): Promise<T> {
    const start = performance.now();
    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.error(`${label} failed`, {
        durationMs: elapsedSince(start),
        err: error instanceof Error ? error : new Error(String(error)),
      });
      throw error;
    }
    this[level](`${label} completed`, { durationMs: elapsedSince(start) });
    return result;
  }
}

function elapsedSince(start: number): string {
  return (performance.now() - start).toFixed(2);
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: PaperkitLogger | null = null;

/**
 * Get the default logger instance. Options only apply on first use.
 */
export function getLogger(options?: LoggerOptions): PaperkitLogger {
  if (!defaultLogger) {
    defaultLogger = new PaperkitLogger(options);
  }
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): PaperkitLogger {
  return getLogger().child({ component, ...context });
}

/**
 * Reset the default logger (for testing and for CLIs that configure it late)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
