import type { Server } from 'node:http';
import express from 'express';
import { createLogger } from './utils/logger.js';
import { createWebhookRouter, type WebhookUpdateHandler } from './adapters/telegram/webhookRouter.js';

const logger = createLogger({ component: 'server' });

export function createApp(adapter: WebhookUpdateHandler, secretToken?: string): express.Express {
  const app = express();

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.use('/webhook', createWebhookRouter(adapter, secretToken));

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(
  adapter: WebhookUpdateHandler,
  port: number,
  host: string = '0.0.0.0',
  secretToken?: string
): Promise<Server> {
  const app = createApp(adapter, secretToken);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
    server.once('error', reject);
  });
}
