import { TelegramError, type Telegram } from 'telegraf';
import MessageGoneError from '../../../errors/MessageGoneError';
import { isMessageGone, TelegrafChatPlatform, toReplyMarkup } from '../telegrafChatPlatform';

const badRequest = (description: string) => new TelegramError({ error_code: 400, description });

describe('isMessageGone', () => {
  it('recognizes deleted and uneditable messages', () => {
    expect(isMessageGone(badRequest('Bad Request: message to delete not found'))).toBe(true);
    expect(isMessageGone(badRequest("Bad Request: message can't be edited"))).toBe(true);
  });

  it('leaves other failures alone', () => {
    expect(isMessageGone(badRequest('Bad Request: chat not found'))).toBe(false);
    expect(isMessageGone(new TelegramError({ error_code: 429, description: 'Too Many Requests' }))).toBe(false);
    expect(isMessageGone(new Error('message to delete not found'))).toBe(false);
  });
});

describe('toReplyMarkup', () => {
  it('builds reply, inline and remove keyboards', () => {
    expect(toReplyMarkup({ kind: 'reply', rows: [['A', 'B']] })).toEqual({
      keyboard: [['A', 'B']],
      resize_keyboard: true,
    });
    expect(toReplyMarkup({ kind: 'inline', rows: [[{ text: 'Go', data: 'go' }]] })).toEqual({
      inline_keyboard: [[{ text: 'Go', callback_data: 'go', hide: false }]],
    });
    expect(toReplyMarkup({ kind: 'remove' })).toEqual({ remove_keyboard: true });
    expect(toReplyMarkup({ kind: 'none' })).toBeUndefined();
    expect(toReplyMarkup(undefined)).toBeUndefined();
  });
});

describe('TelegrafChatPlatform', () => {
  it('maps a vanished message to MessageGoneError on delete', async () => {
    const telegram = {
      deleteMessage: jest.fn().mockRejectedValue(badRequest('Bad Request: message to delete not found')),
    } as unknown as Telegram;

    await expect(new TelegrafChatPlatform(telegram).delete(1, 9)).rejects.toBeInstanceOf(MessageGoneError);
  });

  it('sends html with the reply markup and returns the message id', async () => {
    const sendMessage = jest.fn().mockResolvedValue({ message_id: 31 });
    const telegram = { sendMessage } as unknown as Telegram;

    await expect(
      new TelegrafChatPlatform(telegram).send(5, '<b>hi</b>', { format: 'html', controls: { kind: 'remove' } }),
    ).resolves.toBe(31);
    expect(sendMessage).toHaveBeenCalledWith(5, '<b>hi</b>', {
      reply_markup: { remove_keyboard: true },
      parse_mode: 'HTML',
      link_preview_options: { is_disabled: true },
    });
  });
});
