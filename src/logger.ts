/**
 * Structured logging to stderr.
 *
 * stdout belongs to the MCP stdio transport, so every entry is written with
 * console.error as a single JSON line.
 */

import { LOG_LEVEL } from './config.js';
import { FfmpegError } from './types/errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogContext = {
  component?: string;
  tool?: string;
  trackId?: string;
  [key: string]: unknown;
};

export interface ILogger {
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, error?: unknown, extra?: Record<string, unknown>): void;
  child(context: Partial<LogContext>): ILogger;
}

export class Logger implements ILogger {
  constructor(
    private readonly context: LogContext = {},
    private readonly level: LogLevel = LOG_LEVEL,
    private readonly write: (line: string) => void = line => console.error(line)
  ) { }

  private log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const entry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...extra,
    };

    const cleanEntry = Object.fromEntries(Object.entries(entry).filter(([, v]) => v !== undefined));
    this.write(JSON.stringify(cleanEntry));
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this.log('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this.log('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this.log('warn', message, extra);
  }

  error(message: string, error?: unknown, extra?: Record<string, unknown>): void {
    const errorData: Record<string, unknown> = {};

    if (error instanceof FfmpegError) {
      errorData.errorMessage = error.message;
      errorData.exitCode = error.exitCode;
      errorData.command = error.command;
    } else if (error instanceof Error) {
      errorData.errorMessage = error.message;
      errorData.errorName = error.name;
    } else if (error !== undefined) {
      errorData.errorMessage = String(error);
    }

    this.log('error', message, { ...errorData, ...extra });
  }

  child(context: Partial<LogContext>): ILogger {
    return new Logger({ ...this.context, ...context }, this.level, this.write);
  }
}

/**
 * Runs `fn` and logs how long it took, or how long it ran before failing.
 */
export async function withTiming<T>(
  logger: ILogger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();

  try {
    const result = await fn();
    logger.debug(`${operation} took ${Date.now() - startTime}ms`, { operation, durationMs: Date.now() - startTime });
    return result;
  } catch (error) {
    logger.debug(`${operation} raised after ${Date.now() - startTime}ms`, { operation, durationMs: Date.now() - startTime });
    throw error;
  }
}

export const logger: ILogger = new Logger({ service: 'mcp-sub2clip' });
