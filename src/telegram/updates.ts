// This module validates inbound Telegram updates and maps them into transport-neutral triggers.

import { z } from 'zod';
import type { Trigger } from '../types/domain.js';

const telegramUserSchema = z.object({
  id: z.number(),
  is_bot: z.boolean().optional(),
  username: z.string().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional()
});

const telegramChatSchema = z.object({
  id: z.number()
});

const telegramMessageSchema = z.object({
  message_id: z.number(),
  chat: telegramChatSchema,
  from: telegramUserSchema.optional(),
  text: z.string().optional()
});

const telegramCallbackQuerySchema = z.object({
  id: z.string(),
  from: telegramUserSchema,
  message: z
    .object({
      message_id: z.number(),
      chat: telegramChatSchema
    })
    .optional(),
  data: z.string().optional()
});

export const telegramUpdateSchema = z.object({
  update_id: z.number(),
  message: telegramMessageSchema.optional(),
  callback_query: telegramCallbackQuerySchema.optional()
});

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;
type TelegramUser = z.infer<typeof telegramUserSchema>;

// This helper picks the name shown in greetings, reports, and admin notifications.
export function displayNameFor(user: TelegramUser): string {
  return user.username ?? user.first_name ?? String(user.id);
}

// This function maps one update to a trigger, or null when the update carries nothing actionable.
export function updateToTrigger(update: TelegramUpdate): Trigger | null {
  const callback = update.callback_query;
  if (callback) {
    if (!callback.message || callback.data === undefined) {
      return null;
    }

    return {
      kind: 'callback',
      conversationId: String(callback.message.chat.id),
      messageId: String(callback.message.message_id),
      userId: String(callback.from.id),
      displayName: displayNameFor(callback.from),
      payload: callback.data,
      callbackId: callback.id
    };
  }

  const message = update.message;
  if (message && message.from && message.text !== undefined) {
    return {
      kind: 'command',
      conversationId: String(message.chat.id),
      messageId: String(message.message_id),
      userId: String(message.from.id),
      displayName: displayNameFor(message.from),
      payload: message.text
    };
  }

  return null;
}
