/**
 * SSE Hub Server
 *
 * Main entry point - sets up Express, the connection registry and routes.
 */

import express, { type Response } from 'express';
import { createServer } from 'http';
import { ConnectionRegistry } from './src/connection-registry.js';
import { createEventRoutes } from './src/routes/events.js';
import { createClientRoutes } from './src/routes/clients.js';
import { HEARTBEAT_MS, HOST, MESSAGE_BUFFER, PORT, REQUEST_BUFFER, RETRY_MS } from './src/config.js';
import { serverLog } from './src/logger.js';

const registry = new ConnectionRegistry<Response>({
  messageBuffer: MESSAGE_BUFFER,
  requestBuffer: REQUEST_BUFFER,
});

const app = express();

// Middleware

app.use(express.json());

// Routes

app.use(createEventRoutes(registry, { heartbeatMs: HEARTBEAT_MS, retryMs: RETRY_MS }));
app.use('/api', createClientRoutes(registry));

// Server Lifecycle

const server = createServer(app);

server.listen(PORT, HOST, () => {
  serverLog.info('Server running', { url: `http://${HOST}:${PORT}` });
  serverLog.info('Registry ready', { messageBuffer: MESSAGE_BUFFER, requestBuffer: REQUEST_BUFFER });
});

let shuttingDown = false;

// Graceful shutdown: closing the registry ends every open stream,
// which lets server.close() finish
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  serverLog.info('Shutting down gracefully', { signal, active: registry.active() });

  await registry.close();
  await new Promise<void>((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      serverLog.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    });
  });
}

process.on('unhandledRejection', (reason) => {
  serverLog.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
});
