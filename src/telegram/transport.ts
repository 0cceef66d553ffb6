// This module adapts the Telegram client to the transport-neutral chat interface used by the bot service.

import type { ChatTransport, DocumentRequest, MenuButton, RenderRequest } from '../types/domain.js';
import { AppError } from '../utils/errors.js';
import type { InlineKeyboardMarkup, TelegramClient } from './client.js';

export interface TelegramTransportOptions {
  client: TelegramClient;
  buttonsPerRow: number;
}

// This helper lays out item buttons in fixed-width rows, nav buttons on one row, and each control on its own row.
export function layoutKeyboard(buttons: readonly MenuButton[], buttonsPerRow: number): InlineKeyboardMarkup | undefined {
  if (buttons.length === 0) {
    return undefined;
  }

  const width = Math.max(1, buttonsPerRow);
  const rows: InlineKeyboardMarkup['inline_keyboard'] = [];
  const toKey = (button: MenuButton) => ({ text: button.label, callback_data: button.payload });

  const items = buttons.filter((button) => button.role === 'item');
  for (let index = 0; index < items.length; index += width) {
    rows.push(items.slice(index, index + width).map(toKey));
  }

  const nav = buttons.filter((button) => button.role === 'nav');
  if (nav.length > 0) {
    rows.push(nav.map(toKey));
  }

  for (const control of buttons.filter((button) => button.role === 'control')) {
    rows.push([toKey(control)]);
  }

  return { inline_keyboard: rows };
}

// This helper recognizes the harmless error Telegram returns when an edit would not change anything.
export function isMessageNotModified(error: unknown): boolean {
  return error instanceof AppError && error.message.includes('message is not modified');
}

export class TelegramTransport implements ChatTransport {
  private readonly client: TelegramClient;
  private readonly buttonsPerRow: number;

  public constructor(options: TelegramTransportOptions) {
    this.client = options.client;
    this.buttonsPerRow = options.buttonsPerRow;
  }

  public async render(request: RenderRequest): Promise<void> {
    const keyboard = layoutKeyboard(request.buttons ?? [], this.buttonsPerRow);

    if (request.messageId === undefined) {
      await this.client.sendMessage(request.conversationId, request.text, keyboard);
      return;
    }

    try {
      await this.client.editMessageText(request.conversationId, request.messageId, request.text, keyboard);
    } catch (error) {
      if (!isMessageNotModified(error)) {
        throw error;
      }
    }
  }

  public async sendDocument(request: DocumentRequest): Promise<void> {
    await this.client.sendDocument(request.conversationId, {
      fileName: request.fileName,
      contentType: request.contentType,
      bytes: request.bytes,
      caption: request.caption
    });
  }

  public async acknowledge(callbackId: string, notice?: { text: string; alert: boolean }): Promise<void> {
    await this.client.answerCallbackQuery(callbackId, notice?.text, notice?.alert ?? false);
  }
}
