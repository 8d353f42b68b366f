/**
 * Event Stream Route
 *
 * GET /events - Server-Sent Events handshake
 *
 * Registers the connection, then writes everything pushed into its outbound
 * channel until the connection's lifetime is aborted (eviction, replacement,
 * shutdown) or the subscriber goes away.
 */

import { Router, type Request, type Response } from 'express';
import { randomUUID } from 'crypto';
import type { Connection } from '../connection.js';
import type { AddResult, ConnectionRegistry } from '../connection-registry.js';
import { apiError } from '../api-error.js';
import { HEARTBEAT_MS, RETRY_MS } from '../config.js';
import { streamLog } from '../logger.js';
import { formatComment, formatMessage } from '../sse-message.js';
import { RegistryClosedError } from '../types.js';

export interface EventStreamOptions {
  /** Keep-alive comment interval, 0 disables */
  heartbeatMs?: number;
  /** Reconnect delay advertised to the client */
  retryMs?: number;
}

const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  'Connection': 'keep-alive',
  'X-Accel-Buffering': 'no', // Disable nginx buffering
};

/**
 * Client id from ?client=, then X-Client-Id, else a fresh UUID
 */
export function resolveClientId(req: Request): string {
  const fromQuery = req.query.client;
  if (typeof fromQuery === 'string' && fromQuery) {
    return fromQuery;
  }
  const fromHeader = req.header('x-client-id');
  if (fromHeader) {
    return fromHeader;
  }
  return randomUUID();
}

/**
 * Build the streaming handler. Resolves once the response has ended.
 */
export function createEventStreamHandler(
  registry: ConnectionRegistry<Response>,
  options: EventStreamOptions = {}
): (req: Request, res: Response) => Promise<void> {
  const heartbeatMs = options.heartbeatMs ?? HEARTBEAT_MS;
  const retryMs = options.retryMs ?? RETRY_MS;

  return async (req, res) => {
    const clientId = resolveClientId(req);
    const lifetime = new AbortController();

    // Remove this record only; a replacement under the same id stays
    const release = (connection: Connection<Response>) => {
      if (lifetime.signal.aborted) return;

      registry.remove(clientId, connection)
        .then((remaining) => {
          streamLog.info('Client disconnected', { clientId, active: remaining });
        })
        .catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          streamLog.warn('Remove on disconnect failed', { clientId, error: message });
        })
        .finally(() => lifetime.abort());
    };

    // Listen before registering: the subscriber may leave while add() is pending
    let registered: Connection<Response> | undefined;
    let disconnected = false;
    req.on('close', () => {
      disconnected = true;
      if (registered) release(registered);
    });

    let added: AddResult<Response>;
    try {
      added = await registry.add(lifetime, res, clientId);
    } catch (error) {
      if (error instanceof RegistryClosedError) {
        apiError.unavailable(res, 'Server is shutting down');
        return;
      }
      const message = error instanceof Error ? error.message : String(error);
      streamLog.error('Failed to register client', { clientId, error: message });
      apiError.internal(res, message);
      return;
    }
    const { connection, active } = added;
    registered = connection;

    // Writes after the subscriber left would surface as stream errors.
    // Returns false when the socket buffer is full.
    const write = (chunk: string): boolean => {
      if (res.writableEnded || res.destroyed) {
        return true;
      }
      return res.write(chunk);
    };

    // Resolves on 'drain', or early once the stream is torn down
    const drained = () => new Promise<void>((resolve) => {
      const done = () => {
        res.off('drain', done);
        res.off('close', done);
        lifetime.signal.removeEventListener('abort', done);
        resolve();
      };
      res.once('drain', done);
      res.once('close', done);
      lifetime.signal.addEventListener('abort', done, { once: true });
    });

    res.status(200).set(SSE_HEADERS);
    res.flushHeaders();
    write(formatComment(`connected ${clientId}`));
    write(`retry: ${retryMs}\n\n`);
    streamLog.info('Client connected', { clientId, active: active + 1 });

    const heartbeat = heartbeatMs > 0
      ? setInterval(() => write(formatComment('ping')), heartbeatMs)
      : undefined;

    const stop = () => {
      clearInterval(heartbeat);
      connection.outbound.close();
    };

    // The registry may already have torn this record down (replaced or evicted)
    if (lifetime.signal.aborted) {
      stop();
    } else {
      lifetime.signal.addEventListener('abort', stop, { once: true });
    }

    if (disconnected) {
      release(connection);
    }

    // Take the next message only once the socket has room, so a slow
    // subscriber backs up its outbound channel instead of process memory.
    // After teardown, whatever was buffered is flushed without waiting.
    for await (const message of connection.outbound) {
      if (!write(formatMessage(message)) && !lifetime.signal.aborted && !res.destroyed) {
        await drained();
      }
    }

    if (!res.writableEnded) {
      res.end();
    }
  };
}

/**
 * Router exposing GET /events
 */
export function createEventRoutes(
  registry: ConnectionRegistry<Response>,
  options: EventStreamOptions = {}
): Router {
  const router = Router();
  const handler = createEventStreamHandler(registry, options);

  router.get('/events', (req: Request, res: Response) => {
    handler(req, res).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      streamLog.error('Stream handler failed', { error: message });
      if (!res.headersSent) {
        apiError.internal(res, message);
      } else if (!res.writableEnded) {
        res.end();
      }
    });
  });

  return router;
}
