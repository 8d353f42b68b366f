/**
 * Server Configuration
 *
 * Centralized configuration for all server constants.
 * Environment variables override defaults.
 */

import type { LogLevel } from './logger.js';

/**
 * Read a non-negative integer from the environment, falling back on
 * missing or malformed values
 */
export function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

// ─────────────────────────────────────────────────────────────
// Server
// ─────────────────────────────────────────────────────────────

const DEFAULT_PORT = 3000;

/**
 * Server port - from environment or default
 */
export const PORT = readInt(process.env.SSE_HUB_PORT ?? process.env.PORT, DEFAULT_PORT);

/** Listen address (all interfaces by default) */
export const HOST = process.env.SSE_HUB_HOST || '0.0.0.0';

// ─────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────

/** Outbound messages buffered per connection before producers suspend */
export const MESSAGE_BUFFER = readInt(process.env.SSE_HUB_MESSAGE_BUFFER, 10);

/** Registry requests buffered before submitters suspend */
export const REQUEST_BUFFER = readInt(process.env.SSE_HUB_REQUEST_BUFFER, 10);

// ─────────────────────────────────────────────────────────────
// Event stream (all in milliseconds)
// ─────────────────────────────────────────────────────────────

/** Keep-alive comment interval, 0 disables */
export const HEARTBEAT_MS = readInt(process.env.SSE_HUB_HEARTBEAT_MS, 15 * 1000);

/** Reconnect delay advertised to EventSource clients */
export const RETRY_MS = readInt(process.env.SSE_HUB_RETRY_MS, 3 * 1000);

// ─────────────────────────────────────────────────────────────
// Logging
// ─────────────────────────────────────────────────────────────

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const envLogLevel = (process.env.SSE_HUB_LOG_LEVEL || '').toLowerCase();

/** Minimum level written by loggers */
export const LOG_LEVEL: LogLevel = isLogLevel(envLogLevel) ? envLogLevel : 'info';
