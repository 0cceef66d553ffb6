// This module wraps Telegram Bot API calls with timeouts, retries, and schema-checked response mapping.

import { setTimeout as sleep } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { AppError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { telegramUpdateSchema, type TelegramUpdate } from './updates.js';

export interface TelegramClientConfig {
  baseUrl: string;
  token: string;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface InlineKeyboardButton {
  text: string;
  callback_data: string;
}

export interface InlineKeyboardMarkup {
  inline_keyboard: InlineKeyboardButton[][];
}

export interface TelegramDocument {
  fileName: string;
  contentType: string;
  bytes: Uint8Array;
  caption?: string;
}

const apiEnvelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
  parameters: z
    .object({
      retry_after: z.number().optional()
    })
    .optional()
});

const sentMessageSchema = z.object({
  message_id: z.number(),
  chat: z.object({ id: z.union([z.number(), z.string()]) })
});

const updateIdSchema = z.object({ update_id: z.number() });

export interface TelegramUpdateBatch {
  updates: TelegramUpdate[];
  lastUpdateId: number | null;
}

export interface SentMessage {
  messageId: string;
  chatId: string;
}

// This class executes Telegram Bot API methods for one bot token.
export class TelegramClient {
  private readonly config: TelegramClientConfig;
  private readonly baseUrl: string;
  private readonly logger?: FastifyBaseLogger;

  public constructor(config: TelegramClientConfig, logger?: FastifyBaseLogger) {
    this.config = config;
    this.baseUrl = config.baseUrl.endsWith('/') ? config.baseUrl.slice(0, -1) : config.baseUrl;
    this.logger = logger?.child({
      component: 'telegram_client'
    });
  }

  // This helper applies exponential backoff with jitter between retries, honoring server retry hints.
  private async waitWithBackoff(attempt: number, retryAfterSeconds?: number): Promise<number> {
    const jitter = Math.floor(Math.random() * 100);
    const delay =
      retryAfterSeconds !== undefined ? retryAfterSeconds * 1000 + jitter : this.config.retryBaseDelayMs * 2 ** attempt + jitter;
    await sleep(delay);
    return delay;
  }

  // This helper writes one structured client event only when a logger is available.
  private log(level: 'debug' | 'info' | 'warn' | 'error', event: string, details?: Record<string, unknown>): void {
    const sanitizedDetails = sanitizeForLog(details ?? {});
    this.logger?.[level](
      {
        event,
        ...(typeof sanitizedDetails === 'object' && sanitizedDetails !== null ? sanitizedDetails : {})
      },
      event
    );
  }

  // The token is part of the path, so this URL must never be logged.
  private buildUrl(method: string): string {
    return `${this.baseUrl}/bot${this.config.token}/${method}`;
  }

  // This helper executes one API method with timeout and bounded retry policy for transient failures.
  private async call(method: string, body: Record<string, unknown> | FormData, timeoutMs?: number): Promise<unknown> {
    const maxAttempts = Math.max(1, this.config.maxRetries + 1);
    const startedAt = Date.now();
    const isMultipart = body instanceof FormData;

    this.log('debug', 'telegram_request_started', { method, multipart: isMultipart, maxAttempts });

    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      const abortController = new AbortController();
      const timer = setTimeout(() => abortController.abort(), timeoutMs ?? this.config.requestTimeoutMs);
      const attemptNumber = attempt + 1;

      try {
        const response = await fetch(this.buildUrl(method), {
          method: 'POST',
          headers: isMultipart ? undefined : { 'Content-Type': 'application/json' },
          body: isMultipart ? body : JSON.stringify(body),
          signal: abortController.signal
        });

        const parsed = apiEnvelopeSchema.safeParse(await response.json().catch(() => null));
        const envelope = parsed.success ? parsed.data : null;

        if (response.status === 429 || (response.status >= 500 && response.status <= 599)) {
          if (attempt < maxAttempts - 1) {
            const delayMs = await this.waitWithBackoff(attempt, envelope?.parameters?.retry_after);
            this.log('warn', 'telegram_request_retry_scheduled', {
              method,
              attempt: attemptNumber,
              status: response.status,
              delayMs
            });
            continue;
          }
        }

        if (!envelope || !envelope.ok) {
          const description = envelope?.description ?? `HTTP ${response.status}`;
          this.log('error', 'telegram_request_api_error', {
            method,
            attempt: attemptNumber,
            status: response.status,
            description
          });
          throw new AppError(response.status >= 400 ? response.status : 502, 'telegram_api_error', description, {
            method,
            errorCode: envelope?.error_code ?? response.status
          });
        }

        this.log('debug', 'telegram_request_completed', {
          method,
          attemptsUsed: attemptNumber,
          durationMs: Date.now() - startedAt
        });
        return envelope.result;
      } catch (error) {
        if (error instanceof AppError) {
          throw error;
        }

        if (attempt >= maxAttempts - 1) {
          const message = error instanceof Error ? error.message : 'unknown transport error';
          this.log('error', 'telegram_request_failed_transport', {
            method,
            attempt: attemptNumber,
            error: errorForLog(error)
          });
          throw new AppError(502, 'transport_error', `Telegram request failed: ${message}`, { method });
        }

        const delayMs = await this.waitWithBackoff(attempt);
        this.log('warn', 'telegram_request_retry_transport', {
          method,
          attempt: attemptNumber,
          delayMs,
          error: errorForLog(error)
        });
      } finally {
        clearTimeout(timer);
      }
    }

    throw new AppError(502, 'transport_error', 'Telegram request failed after retries.', { method });
  }

  private toSentMessage(result: unknown): SentMessage {
    const parsed = sentMessageSchema.safeParse(result);
    if (!parsed.success) {
      return { messageId: '', chatId: '' };
    }

    return { messageId: String(parsed.data.message_id), chatId: String(parsed.data.chat.id) };
  }

  // This method long-polls for updates; unparseable payloads are skipped but still advance the offset.
  public async getUpdates(options: { offset?: number; timeoutSeconds: number }): Promise<TelegramUpdateBatch> {
    const result = await this.call(
      'getUpdates',
      {
        offset: options.offset,
        timeout: options.timeoutSeconds,
        allowed_updates: ['message', 'callback_query']
      },
      this.config.requestTimeoutMs + options.timeoutSeconds * 1000
    );

    const items = Array.isArray(result) ? result : [];
    const updates: TelegramUpdate[] = [];
    let lastUpdateId: number | null = null;

    for (const item of items) {
      const id = updateIdSchema.safeParse(item);
      if (id.success) {
        lastUpdateId = lastUpdateId === null ? id.data.update_id : Math.max(lastUpdateId, id.data.update_id);
      }

      const parsed = telegramUpdateSchema.safeParse(item);
      if (parsed.success) {
        updates.push(parsed.data);
      } else {
        this.log('warn', 'telegram_update_unparseable', { issues: parsed.error.issues.length });
      }
    }

    return { updates, lastUpdateId };
  }

  public async sendMessage(chatId: string, text: string, replyMarkup?: InlineKeyboardMarkup): Promise<SentMessage> {
    const result = await this.call('sendMessage', {
      chat_id: chatId,
      text,
      reply_markup: replyMarkup
    });
    return this.toSentMessage(result);
  }

  public async editMessageText(
    chatId: string,
    messageId: string,
    text: string,
    replyMarkup?: InlineKeyboardMarkup
  ): Promise<void> {
    await this.call('editMessageText', {
      chat_id: chatId,
      message_id: Number(messageId),
      text,
      reply_markup: replyMarkup
    });
  }

  public async answerCallbackQuery(callbackQueryId: string, text?: string, showAlert = false): Promise<void> {
    await this.call('answerCallbackQuery', {
      callback_query_id: callbackQueryId,
      text,
      show_alert: showAlert
    });
  }

  // This method uploads one in-memory file as a multipart document.
  public async sendDocument(chatId: string, document: TelegramDocument): Promise<SentMessage> {
    const form = new FormData();
    form.set('chat_id', chatId);
    if (document.caption) {
      form.set('caption', document.caption);
    }
    form.set('document', new Blob([document.bytes], { type: document.contentType }), document.fileName);

    const result = await this.call('sendDocument', form);
    return this.toSentMessage(result);
  }

  public async setWebhook(url: string, secretToken?: string): Promise<boolean> {
    const result = await this.call('setWebhook', {
      url,
      secret_token: secretToken,
      allowed_updates: ['message', 'callback_query']
    });
    return result === true;
  }

  public async deleteWebhook(): Promise<void> {
    await this.call('deleteWebhook', { drop_pending_updates: false });
  }
}
