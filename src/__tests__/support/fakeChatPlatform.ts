import MessageGoneError from '../../errors/MessageGoneError';
import type { ChatControls, ChatPlatform, DownloadedFile, SendOptions } from '../../bot/chat/types';

export type SentMessage = { chatId: number; messageId: number; text: string; options?: SendOptions };
export type EditedMessage = { chatId: number; messageId: number; text: string; controls?: ChatControls };

export class FakeChatPlatform implements ChatPlatform {
  sent: SentMessage[] = [];
  edited: EditedMessage[] = [];
  deleted: number[] = [];
  files = new Map<string, DownloadedFile>();
  gone = new Set<number>();
  failSendsTo = new Set<number>();
  private nextId = 100;

  async send(chatId: number, text: string, options?: SendOptions): Promise<number> {
    if (this.failSendsTo.has(chatId)) {
      throw new Error(`chat ${chatId} is unreachable`);
    }
    this.nextId += 1;
    this.sent.push({ chatId, messageId: this.nextId, text, options });
    return this.nextId;
  }

  async edit(chatId: number, messageId: number, text: string, controls?: ChatControls): Promise<void> {
    if (this.gone.has(messageId)) {
      throw new MessageGoneError(messageId);
    }
    this.edited.push({ chatId, messageId, text, controls });
  }

  async delete(_chatId: number, messageId: number): Promise<void> {
    if (this.gone.has(messageId)) {
      throw new MessageGoneError(messageId);
    }
    this.gone.add(messageId);
    this.deleted.push(messageId);
  }

  async download(fileReference: string): Promise<DownloadedFile> {
    const file = this.files.get(fileReference);
    if (!file) {
      throw new Error(`unknown file ${fileReference}`);
    }
    return file;
  }

  lastSent(): SentMessage {
    const message = this.sent[this.sent.length - 1];
    if (!message) {
      throw new Error('nothing was sent');
    }
    return message;
  }

  clear(): void {
    this.sent = [];
    this.edited = [];
    this.deleted = [];
  }
}
