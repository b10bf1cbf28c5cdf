/**
 * Structured JSON logger for the commune resolver
 *
 * All logs go to stderr so that stdout stays free for whatever host embeds the resolver.
 */

import { getContext } from './request-context.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

class Logger {
  private minLevel: LogLevel;
  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  /**
   * Set the minimum log level
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levelPriority[level] >= this.levelPriority[this.minLevel];
  }

  /**
   * Write a log entry to stderr
   */
  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const active = getContext();
    const merged: LogContext =
      active?.generationId !== undefined && context?.generationId === undefined
        ? { ...context, generationId: active.generationId }
        : { ...context };

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
    };

    console.error(JSON.stringify(entry));
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  /**
   * Log an error object with stack trace
   */
  logError(error: Error, context?: LogContext): void {
    this.error(error.message, {
      ...context,
      errorName: error.name,
      stack: error.stack,
    });
  }

  /**
   * Log the start of a match call. Only the query length is logged at info,
   * the raw text goes to debug since it is user input.
   */
  logMatchStart(query: string, generationId: number, requestId?: string): void {
    this.info('Match started', {
      requestId,
      generationId,
      queryLength: query.length,
    });
    this.debug('Match query', { requestId, query });
  }

  /**
   * Log the decision of a match call
   */
  logMatchEnd(
    method: string,
    confidence: number,
    latencyMs: number,
    requestId?: string,
    matchedCommune?: string | null
  ): void {
    this.info('Match completed', {
      requestId,
      method,
      confidence,
      latencyMs,
      ...(matchedCommune ? { matchedCommune } : {}),
    });
  }

  /**
   * Log an outbound provider call (LLM or embeddings)
   */
  logProviderCall(
    provider: string,
    outcome: 'success' | 'error',
    latencyMs: number,
    requestId?: string,
    errorCode?: string
  ): void {
    this.debug('Provider call', {
      requestId,
      provider,
      outcome,
      latencyMs,
      ...(errorCode && { errorCode }),
    });
  }
}

// Singleton logger instance
const logger = new Logger();

export { logger };
