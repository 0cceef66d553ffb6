// This module registers the Telegram webhook endpoint that feeds updates into the bot service.

import { timingSafeEqual } from 'node:crypto';
import type { FastifyInstance } from 'fastify';
import { telegramUpdateSchema, updateToTrigger } from '../telegram/updates.js';
import type { Trigger } from '../types/domain.js';
import { AppError } from '../utils/errors.js';

export const WEBHOOK_PATH = '/telegram/webhook';
const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

export interface WebhookRouteOptions {
  secret?: string;
  dispatch: (trigger: Trigger) => Promise<void>;
}

// This helper compares secrets in constant time.
function secretMatches(expected: string, provided: unknown): boolean {
  if (typeof provided !== 'string') {
    return false;
  }

  const left = Buffer.from(expected, 'utf8');
  const right = Buffer.from(provided, 'utf8');
  return left.length === right.length && timingSafeEqual(left, right);
}

export function registerWebhookRoutes(app: FastifyInstance, options: WebhookRouteOptions): void {
  // This endpoint acknowledges immediately; the update is processed as a separate task.
  app.post(WEBHOOK_PATH, async (request) => {
    if (options.secret && !secretMatches(options.secret, request.headers[SECRET_HEADER])) {
      throw new AppError(401, 'unauthorized', 'Webhook secret mismatch.');
    }

    const parsed = telegramUpdateSchema.safeParse(request.body);
    if (!parsed.success) {
      request.log.warn(
        { event: 'telegram_webhook_update_unparseable', issues: parsed.error.issues.length },
        'telegram_webhook_update_unparseable'
      );
      return { ok: true, accepted: false };
    }

    const trigger = updateToTrigger(parsed.data);
    if (!trigger) {
      return { ok: true, accepted: false };
    }

    void options.dispatch(trigger);
    return { ok: true, accepted: true };
  });
}
