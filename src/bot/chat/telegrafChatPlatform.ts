import axios from 'axios';
import path from 'path';
import { Markup, TelegramError, type Telegram } from 'telegraf';
import MessageGoneError from '../../errors/MessageGoneError.js';
import { toServiceError } from '../../errors/googleErrors.js';
import type { ChatControls, ChatPlatform, DownloadedFile, SendOptions } from './types.js';

const GONE_DESCRIPTIONS = [
  'message to delete not found',
  "message can't be deleted",
  'message to edit not found',
  'message is not modified',
  "message can't be edited",
];

export const isMessageGone = (error: unknown): boolean =>
  error instanceof TelegramError &&
  error.code === 400 &&
  GONE_DESCRIPTIONS.some((description) => error.description.toLowerCase().includes(description));

export const toReplyMarkup = (controls: ChatControls | undefined) => {
  if (!controls) {
    return undefined;
  }
  switch (controls.kind) {
    case 'reply':
      return Markup.keyboard(controls.rows).resize().reply_markup;
    case 'inline':
      return Markup.inlineKeyboard(
        controls.rows.map((row) => row.map((button) => Markup.button.callback(button.text, button.data))),
      ).reply_markup;
    case 'remove':
      return Markup.removeKeyboard().reply_markup;
    case 'none':
      return undefined;
  }
};

export class TelegrafChatPlatform implements ChatPlatform {
  constructor(private readonly telegram: Telegram) {}

  async send(chatId: number, text: string, options: SendOptions = {}): Promise<number> {
    const message = await this.telegram.sendMessage(chatId, text, {
      reply_markup: toReplyMarkup(options.controls),
      parse_mode: options.format === 'html' ? 'HTML' : undefined,
      link_preview_options: { is_disabled: true },
    });
    return message.message_id;
  }

  async edit(chatId: number, messageId: number, text: string, controls?: ChatControls): Promise<void> {
    const markup = controls?.kind === 'inline' ? toReplyMarkup(controls) : undefined;
    try {
      await this.telegram.editMessageText(chatId, messageId, undefined, text, {
        reply_markup: markup && 'inline_keyboard' in markup ? markup : undefined,
      });
    } catch (error) {
      if (isMessageGone(error)) {
        throw new MessageGoneError(messageId);
      }
      throw error;
    }
  }

  async delete(chatId: number, messageId: number): Promise<void> {
    try {
      await this.telegram.deleteMessage(chatId, messageId);
    } catch (error) {
      if (isMessageGone(error)) {
        throw new MessageGoneError(messageId);
      }
      throw error;
    }
  }

  async download(fileReference: string): Promise<DownloadedFile> {
    try {
      const link = await this.telegram.getFileLink(fileReference);
      const response = await axios.get<ArrayBuffer>(link.href, { responseType: 'arraybuffer', timeout: 30_000 });
      return {
        content: Buffer.from(response.data),
        extension: path.extname(link.pathname).toLowerCase(),
      };
    } catch (error) {
      throw toServiceError('telegram.download', error);
    }
  }
}
