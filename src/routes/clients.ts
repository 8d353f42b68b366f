/**
 * Client Admin Routes
 *
 * GET    /api/clients              - List live clients
 * GET    /api/clients/count        - Live count (unsynchronized read)
 * GET    /api/clients/:id          - One client
 * POST   /api/clients/:id/messages - Push a message to one client
 * POST   /api/broadcast            - Push a message to every live client
 * DELETE /api/clients/:id          - Evict a client
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { Connection } from '../connection.js';
import type { ConnectionRegistry } from '../connection-registry.js';
import { apiError, sendData } from '../api-error.js';
import { adminLog } from '../logger.js';
import { toMessage } from '../sse-message.js';
import { ChannelClosedError, RegistryClosedError, type ClientSummary, type SseMessage } from '../types.js';

export const messageBodySchema = z.object({
  event: z.string().min(1).optional(),
  id: z.string().optional(),
  retry: z.number().int().nonnegative().optional(),
  data: z.unknown(),
}).refine(body => body.data !== undefined, { message: 'Required', path: ['data'] });

export type MessageBody = z.infer<typeof messageBodySchema>;

type Handler = (req: Request, res: Response) => Promise<void>;

export function summarize<W>(connection: Connection<W>): ClientSummary {
  return {
    id: connection.id,
    connectedAt: connection.connectedAt.toISOString(),
    pending: connection.outbound.size,
  };
}

/**
 * Validate a message body, replying with VALIDATION_ERROR on failure
 */
function parseMessage(req: Request, res: Response): SseMessage | null {
  const result = messageBodySchema.safeParse(req.body);
  if (!result.success) {
    const message = result.error.issues
      .map(issue => issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
      .join('; ');
    apiError.validation(res, message);
    return null;
  }
  const { data, event, id, retry } = result.data;
  return toMessage(data, { event, id, retry });
}

/**
 * Map registry shutdown to 503, anything else to 500
 */
function guard(name: string, handler: Handler): Handler {
  return async (req, res) => {
    try {
      await handler(req, res);
    } catch (error) {
      if (error instanceof RegistryClosedError) {
        apiError.unavailable(res, 'Server is shutting down');
        return;
      }
      const message = error instanceof Error ? error.message : String(error);
      adminLog.error(`${name} failed`, { error: message });
      apiError.internal(res, message);
    }
  };
}

export function createClientHandlers<W>(registry: ConnectionRegistry<W>) {
  return {
    list: guard('list', async (_req, res) => {
      const clients = await registry.clients();
      sendData(res, { active: clients.length, clients: clients.map(summarize) });
    }),

    count: guard('count', async (_req, res) => {
      sendData(res, { active: registry.active() });
    }),

    get: guard('get', async (req, res) => {
      const id = req.params.id;
      const connection = await registry.client(id);
      if (!connection) {
        apiError.notFound(res, `Client not found: ${id}`);
        return;
      }
      sendData(res, summarize(connection));
    }),

    push: guard('push', async (req, res) => {
      const message = parseMessage(req, res);
      if (!message) return;

      const id = req.params.id;
      const connection = await registry.client(id);
      if (!connection) {
        apiError.notFound(res, `Client not found: ${id}`);
        return;
      }

      try {
        // Suspends while the client's buffer is full
        await connection.outbound.send(message);
      } catch (error) {
        if (error instanceof ChannelClosedError) {
          apiError.notFound(res, `Client disconnected: ${id}`);
          return;
        }
        throw error;
      }
      sendData(res, { delivered: 1 });
    }),

    broadcast: guard('broadcast', async (req, res) => {
      const message = parseMessage(req, res);
      if (!message) return;

      let delivered = 0;
      let skipped = 0;
      // Best effort: a full or closed client is skipped rather than awaited
      await registry.range((connection) => {
        if (connection.outbound.trySend(message)) {
          delivered++;
        } else {
          skipped++;
        }
      });

      if (skipped > 0) {
        adminLog.warn('Broadcast skipped clients', { delivered, skipped });
      }
      sendData(res, { delivered, skipped });
    }),

    evict: guard('evict', async (req, res) => {
      const id = req.params.id;
      const active = await registry.remove(id);
      adminLog.info('Evicted client', { clientId: id, active });
      sendData(res, { active });
    }),
  };
}

export function createClientRoutes<W>(registry: ConnectionRegistry<W>): Router {
  const router = Router();
  const handlers = createClientHandlers(registry);

  // Handlers never reject - guard() answers every failure
  const route = (handler: Handler) => (req: Request, res: Response) => {
    void handler(req, res);
  };

  router.get('/clients', route(handlers.list));
  router.get('/clients/count', route(handlers.count));
  router.get('/clients/:id', route(handlers.get));
  router.post('/clients/:id/messages', route(handlers.push));
  router.delete('/clients/:id', route(handlers.evict));
  router.post('/broadcast', route(handlers.broadcast));

  return router;
}
