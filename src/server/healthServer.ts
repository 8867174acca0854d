import express from 'express';
import type { Server } from 'node:http';
import { logger } from '../shared/logging/logger';

export const HEALTH_RESPONSE_TEXT = 'Discord bot is running';

/**
 * Liveness endpoint for the hosting platform: every GET answers 200 with a plain-text
 * body. Requests are not logged.
 */
export function createHealthApp(): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.get('*', (_req, res) => {
    res.status(200).type('text/plain').send(HEALTH_RESPONSE_TEXT);
  });
  return app;
}

export function startHealthServer(port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createHealthApp().listen(port);
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      const boundPort = address && typeof address === 'object' ? address.port : port;
      logger.info({ port: boundPort }, 'Health server listening');
      resolve(server);
    });
  });
}

export function stopHealthServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
