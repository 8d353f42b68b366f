/**
 * ConnectionRegistry - Tracks live server-push connections
 *
 * One owner loop holds the live map and serves requests from a bounded
 * request channel strictly in submission order. Callers never touch the map;
 * each request carries its own reply, so a caller waits only on its answer.
 *
 * Two reads skip the queue and may be stale against in-flight requests:
 * active(), and the count returned by add().
 *
 * Separation of concerns:
 * - This class: membership, snapshots, teardown signalling
 * - routes/events.ts: handshake and writing bytes to the subscriber
 *
 * @remarks Unit test all changes - see tests/unit/connection-registry.test.ts
 */

import { Channel } from './channel.js';
import { createConnection, type Connection } from './connection.js';
import { registryLog } from './logger.js';
import { ChannelClosedError, RegistryClosedError, type RegistryState } from './types.js';

interface Reply<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

type RegistryRequest<W> =
  | { type: 'insert'; connection: Connection<W> }
  | { type: 'remove'; id: string; expected?: Connection<W>; reply: Reply<number> }
  | { type: 'list'; reply: Reply<Connection<W>[]> }
  | { type: 'lookup'; id: string; reply: Reply<Connection<W> | undefined> };

export interface RegistryOptions {
  /** Outbound channel capacity for each new connection */
  messageBuffer?: number;
  /** Request channel capacity; only affects submitter backpressure */
  requestBuffer?: number;
}

export interface AddResult<W> {
  connection: Connection<W>;
  /** Live count before this insert was applied (best-effort) */
  active: number;
}

export type Visitor<W> = (connection: Connection<W>) => void | Promise<void>;

const DEFAULT_BUFFER = 10;

export class ConnectionRegistry<W = unknown> {
  // Touched only by serve(), apart from the size reads
  private live = new Map<string, Connection<W>>();
  private requests: Channel<RegistryRequest<W>>;
  private state: RegistryState = 'serving';
  private serving: Promise<void>;
  readonly messageBuffer: number;

  constructor(options: RegistryOptions = {}) {
    this.messageBuffer = options.messageBuffer ?? DEFAULT_BUFFER;
    this.requests = new Channel<RegistryRequest<W>>(options.requestBuffer ?? DEFAULT_BUFFER);
    this.serving = this.serve();
  }

  get closed(): boolean {
    return this.state === 'closed';
  }

  /**
   * Register a new connection. Returns once the insert is queued, not applied.
   * A live entry with the same id is torn down and replaced.
   * @throws RegistryClosedError after close()
   */
  async add(lifetime: AbortController, transport: W, id: string): Promise<AddResult<W>> {
    const connection = createConnection({
      id,
      transport,
      lifetime,
      bufferSize: this.messageBuffer,
    });
    const active = this.live.size;
    await this.submit('add', { type: 'insert', connection });
    return { connection, active };
  }

  /**
   * Remove a connection and abort its lifetime. Absent ids are a no-op.
   * When `expected` is given, the entry is only removed if it is that record,
   * so a stale handler cannot evict the connection that replaced it.
   * @returns live count right after the removal
   */
  remove(id: string, expected?: Connection<W>): Promise<number> {
    return this.call<number>('remove', (reply) => ({ type: 'remove', id, expected, reply }));
  }

  /**
   * Live count, read without going through the queue
   */
  active(): number {
    return this.live.size;
  }

  /**
   * Snapshot of all live connections, order unspecified
   */
  clients(): Promise<Connection<W>[]> {
    return this.call<Connection<W>[]>('clients', (reply) => ({ type: 'list', reply }));
  }

  /**
   * Visit a snapshot of live connections one at a time, in the caller.
   * Later visits may see connections that have since been removed.
   */
  async range(visit: Visitor<W>): Promise<void> {
    const snapshot = await this.clients();
    for (const connection of snapshot) {
      await visit(connection);
    }
  }

  /**
   * Look up one connection by id
   */
  client(id: string): Promise<Connection<W> | undefined> {
    return this.call<Connection<W> | undefined>('client', (reply) => ({ type: 'lookup', id, reply }));
  }

  /**
   * Stop accepting requests, serve those already queued, then tear down
   * every remaining connection. Idempotent.
   */
  async close(): Promise<void> {
    if (this.state === 'serving') {
      this.state = 'closed';
      this.requests.close();
      registryLog.info('Closing registry', { active: this.live.size, queued: this.requests.size });
    }
    await this.serving;
  }

  private call<T>(operation: string, build: (reply: Reply<T>) => RegistryRequest<W>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.submit(operation, build({ resolve, reject })).catch(reject);
    });
  }

  private async submit(operation: string, request: RegistryRequest<W>): Promise<void> {
    if (this.state === 'closed') {
      throw new RegistryClosedError(operation);
    }
    try {
      await this.requests.send(request);
    } catch (error) {
      // Closed while waiting for queue space
      if (error instanceof ChannelClosedError) {
        throw new RegistryClosedError(operation);
      }
      throw error;
    }
  }

  private async serve(): Promise<void> {
    for await (const request of this.requests) {
      try {
        this.handle(request);
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        registryLog.error('Request failed', { type: request.type, error: err.message });
        if (request.type !== 'insert') {
          request.reply.reject(err);
        }
      }
    }
    this.release();
  }

  private handle(request: RegistryRequest<W>): void {
    switch (request.type) {
      case 'insert': {
        const { connection } = request;
        const prior = this.live.get(connection.id);
        if (prior && prior !== connection) {
          // Replacing would otherwise orphan the prior record's channel
          retire(prior);
          registryLog.warn('Replaced connection with duplicate id', { clientId: connection.id });
        }
        this.live.set(connection.id, connection);
        registryLog.debug('Inserted connection', { clientId: connection.id, active: this.live.size });
        break;
      }

      case 'remove': {
        const current = this.live.get(request.id);
        if (current && (!request.expected || request.expected === current)) {
          retire(current);
          this.live.delete(request.id);
          registryLog.debug('Removed connection', { clientId: request.id, active: this.live.size });
        }
        request.reply.resolve(this.live.size);
        break;
      }

      case 'list':
        request.reply.resolve([...this.live.values()]);
        break;

      case 'lookup':
        request.reply.resolve(this.live.get(request.id));
        break;
    }
  }

  private release(): void {
    for (const connection of this.live.values()) {
      try {
        retire(connection);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        registryLog.error('Failed to release connection', { clientId: connection.id, error: message });
      }
    }
    const released = this.live.size;
    this.live.clear();
    registryLog.info('Registry closed', { released });
  }
}

/**
 * Signal a connection to close and stop accepting outbound messages.
 * Buffered messages stay readable for the transport to flush.
 */
function retire<W>(connection: Connection<W>): void {
  connection.lifetime.abort();
  connection.outbound.close();
}
