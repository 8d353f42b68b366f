/**
 * Logger - Simple structured logging utility
 *
 * Provides consistent log format with tags and levels.
 *
 * Format: [LEVEL] [TAG] message { context }
 */

import { LOG_LEVEL } from './config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Simple logger with consistent formatting.
 *
 * @example
 * const log = createLogger('REGISTRY');
 * log.info('Client connected', { clientId: 'abc', active: 3 });
 * // Output: [INFO ] [REGISTRY] Client connected clientId="abc" active=3
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Format context object for display
 */
export function formatContext(context: LogContext | undefined): string {
  if (!context || Object.keys(context).length === 0) {
    return '';
  }

  // Compact format for small objects, JSON for larger
  const entries = Object.entries(context);
  if (entries.length <= 3 && entries.every(([, v]) => typeof v !== 'object')) {
    return ' ' + entries.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(' ');
  }

  return ' ' + JSON.stringify(context);
}

/**
 * Create a logger with a specific tag
 */
export function createLogger(tag: string, minLevel: LogLevel = LOG_LEVEL): Logger {
  const log = (level: LogLevel, message: string, context?: LogContext) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;

    const levelStr = level.toUpperCase().padEnd(5);
    const contextStr = formatContext(context);
    const output = `[${levelStr}] [${tag}] ${message}${contextStr}`;

    switch (level) {
      case 'debug':
        console.debug(output);
        break;
      case 'info':
        console.log(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'error':
        console.error(output);
        break;
    }
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
  };
}

// Pre-created loggers for common modules
export const serverLog = createLogger('SERVER');
export const registryLog = createLogger('REGISTRY');
export const streamLog = createLogger('STREAM');
export const adminLog = createLogger('ADMIN');
