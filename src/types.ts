/**
 * Shared types for sse-hub
 */

// Server-push message placed on a connection's outbound channel
export interface SseMessage {
  id?: string;
  event?: string;
  data: string;
  retry?: number;
}

// Registry lifecycle
export type RegistryState = 'serving' | 'closed';

// Summary of a live connection for the admin API
export interface ClientSummary {
  id: string;
  connectedAt: string;
  pending: number;
}

/**
 * Thrown when sending on a channel that has been closed.
 * Pending senders are rejected with it when the channel closes under them.
 */
export class ChannelClosedError extends Error {
  constructor() {
    super('Channel is closed');
    this.name = 'ChannelClosedError';
  }
}

/**
 * Thrown for any registry request submitted after close() began.
 */
export class RegistryClosedError extends Error {
  constructor(public readonly operation: string) {
    super(`Connection registry is closed (${operation})`);
    this.name = 'RegistryClosedError';
  }
}
