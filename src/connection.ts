/**
 * Connection - One live server-push subscriber
 *
 * Passed by reference: every holder sees the same outbound channel and
 * lifetime. Fields are never reassigned after creation; only the outbound
 * channel's contents change.
 */

import { Channel } from './channel.js';
import type { SseMessage } from './types.js';

export interface Connection<W = unknown> {
  readonly id: string;
  /** Messages waiting to be written to the subscriber */
  readonly outbound: Channel<SseMessage>;
  /** Aborted when the connection should close. Owned by the caller of add(). */
  readonly lifetime: AbortController;
  /** Opaque sink the transport layer writes to */
  readonly transport: W;
  readonly connectedAt: Date;
}

export interface ConnectionOptions<W> {
  id: string;
  transport: W;
  lifetime: AbortController;
  bufferSize: number;
}

export function createConnection<W>(options: ConnectionOptions<W>): Connection<W> {
  return {
    id: options.id,
    outbound: new Channel<SseMessage>(options.bufferSize),
    lifetime: options.lifetime,
    transport: options.transport,
    connectedAt: new Date(),
  };
}
