export type InlineButton = { text: string; data: string };

export type ChatControls =
  | { kind: 'reply'; rows: string[][] }
  | { kind: 'inline'; rows: InlineButton[][] }
  | { kind: 'remove' }
  | { kind: 'none' };

export type SendOptions = {
  controls?: ChatControls;
  format?: 'html';
};

export type DownloadedFile = {
  content: Buffer;
  extension: string;
};

export interface ChatPlatform {
  send(chatId: number, text: string, options?: SendOptions): Promise<number>;
  /** Throws MessageGoneError when the message cannot be edited anymore. */
  edit(chatId: number, messageId: number, text: string, controls?: ChatControls): Promise<void>;
  /** Throws MessageGoneError when the message was already deleted. */
  delete(chatId: number, messageId: number): Promise<void>;
  download(fileReference: string): Promise<DownloadedFile>;
}

export type ChatUser = {
  userId: number;
  chatId: number;
  displayName: string | null;
};

export type ChatEvent = ChatUser &
  (
    | { kind: 'command'; command: 'start' | 'menu'; messageId: number }
    | { kind: 'text'; text: string; messageId: number }
    | { kind: 'photo'; fileReference: string; sentAt: Date; messageId: number }
    | { kind: 'callback'; data: string; messageId: number | null }
  );
