import type { Context, Telegraf } from 'telegraf';
import { errorMessage } from '../errors/userMessages.js';
import logger from '../utils/logger.js';
import type { ChatUser } from './chat/types.js';
import type { ConversationController } from './controllers/conversationController.js';

const userOf = (ctx: Context): ChatUser | null => {
  if (!ctx.from || !ctx.chat) {
    return null;
  }
  const fullName = [ctx.from.first_name, ctx.from.last_name].filter(Boolean).join(' ').trim();
  return {
    userId: ctx.from.id,
    chatId: ctx.chat.id,
    displayName: fullName || (ctx.from.username ? `@${ctx.from.username}` : null),
  };
};

/** Maps Telegram updates from private chats onto conversation events. */
export const registerBotHandlers = (bot: Telegraf, controller: ConversationController): void => {
  bot.use(async (ctx, next) => {
    if (ctx.chat && ctx.chat.type !== 'private') {
      return;
    }
    await next();
  });

  bot.start(async (ctx) => {
    const user = userOf(ctx);
    if (user) {
      await controller.handleEvent({ ...user, kind: 'command', command: 'start', messageId: ctx.message.message_id });
    }
  });

  bot.command('menu', async (ctx) => {
    const user = userOf(ctx);
    if (user) {
      await controller.handleEvent({ ...user, kind: 'command', command: 'menu', messageId: ctx.message.message_id });
    }
  });

  bot.on('text', async (ctx) => {
    const user = userOf(ctx);
    if (user) {
      await controller.handleEvent({ ...user, kind: 'text', text: ctx.message.text, messageId: ctx.message.message_id });
    }
  });

  bot.on('photo', async (ctx) => {
    const user = userOf(ctx);
    const largest = ctx.message.photo.at(-1);
    if (user && largest) {
      await controller.handleEvent({
        ...user,
        kind: 'photo',
        fileReference: largest.file_id,
        sentAt: new Date(ctx.message.date * 1000),
        messageId: ctx.message.message_id,
      });
    }
  });

  bot.on('callback_query', async (ctx) => {
    const user = userOf(ctx);
    const query = ctx.callbackQuery;
    await ctx.answerCbQuery();
    if (user && 'data' in query) {
      await controller.handleEvent({
        ...user,
        kind: 'callback',
        data: query.data,
        messageId: query.message?.message_id ?? null,
      });
    }
  });

  bot.catch((error, ctx) => {
    logger.error(`[telegram] Update ${ctx.update.update_id} failed: ${errorMessage(error)}`);
  });
};
