import { timingSafeEqual } from 'node:crypto';
import type { Router } from 'express';
import express from 'express';
import type { TelegramAdapter } from './TelegramAdapter.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';

export const SECRET_TOKEN_HEADER = 'x-telegram-bot-api-secret-token';

export type WebhookUpdateHandler = Pick<TelegramAdapter, 'handleWebhook'>;

function secretMatches(expected: string, received: string | undefined): boolean {
  if (received === undefined) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Receives Telegram updates in webhook mode. When a secret is configured,
 * requests without Telegram's matching header are rejected before any
 * translation work is queued.
 */
export function createWebhookRouter(handler: WebhookUpdateHandler, secretToken?: string): Router {
  const logger = createLogger({ component: 'webhookRouter' });
  const router = express.Router();

  router.post('/telegram', express.json(), async (req, res) => {
    const requestLogger = logger.child({ correlationId: generateCorrelationId() });

    if (secretToken && !secretMatches(secretToken, req.get(SECRET_TOKEN_HEADER))) {
      requestLogger.warn({ ip: req.ip }, 'Rejected webhook request with missing or wrong secret token');
      res.status(401).json({ ok: false, error: 'Unauthorized' });
      return;
    }

    try {
      requestLogger.debug({ updateId: req.body?.update_id }, 'Received webhook update');
      await handler.handleWebhook(req.body);
      res.status(200).json({ ok: true });
    } catch (error) {
      requestLogger.error({ error }, 'Error processing webhook');
      res.status(500).json({ ok: false, error: 'Internal server error' });
    }
  });

  router.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  return router;
}
