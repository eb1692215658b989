/**
 * Structured logging utility with environment-aware verbosity
 * Replaces ad-hoc console.log statements with consistent, filterable logging
 */

import { captureError } from './sentry';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  component?: string;
  action?: string;
  userId?: string;
  tenantId?: string;
  jobId?: string;
  requestId?: string;
  [key: string]: unknown;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(v: string): v is LogLevel {
  return (LEVELS as string[]).includes(v);
}

function resolveMinLevel(): LogLevel {
  const explicit = (process.env.LOG_LEVEL || '').trim().toLowerCase();
  if (isLogLevel(explicit)) return explicit;
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

export class Logger {
  private minLevel: LogLevel;

  constructor(
    private readonly defaultContext: LogContext = {},
    minLevel?: LogLevel
  ) {
    this.minLevel = minLevel ?? resolveMinLevel();
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const component = context?.component ? `[${context.component}]` : '';
    const action = context?.action ? `[${context.action}]` : '';
    return `${timestamp} ${level.toUpperCase()} ${component}${action} ${message}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) return;

    const merged: LogContext = { ...this.defaultContext, ...context };
    const formattedMessage = this.formatMessage(level, message, merged);
    const contextData = Object.keys(merged).length ? merged : undefined;

    switch (level) {
      case 'debug':
        console.debug(formattedMessage, contextData);
        break;
      case 'info':
        console.info(formattedMessage, contextData);
        break;
      case 'warn':
        console.warn(formattedMessage, contextData);
        break;
      case 'error':
        console.error(formattedMessage, contextData, error);
        if (error) captureError(error, merged);
        break;
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const err = error === undefined || error instanceof Error ? error : new Error(String(error));
    this.log('error', message, context, err);
  }

  /**
   * Create a child logger with default context
   */
  child(defaultContext: LogContext): Logger {
    return new Logger({ ...this.defaultContext, ...defaultContext }, this.minLevel);
  }
}

// Export singleton instance
export const logger = new Logger();

/**
 * Create a logger for a specific component
 */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}
