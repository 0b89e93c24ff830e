import MessageGoneError from '../../errors/MessageGoneError.js';
import logger from '../../utils/logger.js';
import type { ChatPlatform } from './types.js';

export type MessageRole = 'prompt' | 'bot' | 'user';

export type MessageTracker = {
  promptId: number | null;
  botMessageIds: number[];
  userMessageIds: number[];
};

export const beginStep = (): MessageTracker => ({ promptId: null, botMessageIds: [], userMessageIds: [] });

export const recordMessage = (tracker: MessageTracker, role: MessageRole, messageId: number): void => {
  switch (role) {
    case 'prompt':
      if (tracker.promptId !== null && tracker.promptId !== messageId) {
        tracker.botMessageIds.push(tracker.promptId);
      }
      tracker.promptId = messageId;
      break;
    case 'bot':
      tracker.botMessageIds.push(messageId);
      break;
    case 'user':
      tracker.userMessageIds.push(messageId);
      break;
  }
};

/** Best-effort delete: a message that is already gone is fine, anything else is logged. */
export async function deleteMessageQuietly(chat: ChatPlatform, chatId: number, messageId: number): Promise<void> {
  try {
    await chat.delete(chatId, messageId);
  } catch (error) {
    if (error instanceof MessageGoneError) {
      return;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    logger.warn(`[tracker] Failed to delete message ${messageId} in chat ${chatId}: ${message}`);
  }
}

export const trackedCount = (tracker: MessageTracker): number =>
  (tracker.promptId === null ? 0 : 1) + tracker.botMessageIds.length + tracker.userMessageIds.length;

/**
 * Deletes every tracked message and empties the tracker.
 * Already deleted messages are skipped quietly, other failures are logged and the rest is still attempted.
 * Returns the number of deletions attempted.
 */
export async function flushTracker(chat: ChatPlatform, chatId: number, tracker: MessageTracker): Promise<number> {
  const ids = [
    ...(tracker.promptId === null ? [] : [tracker.promptId]),
    ...tracker.botMessageIds,
    ...tracker.userMessageIds,
  ];
  tracker.promptId = null;
  tracker.botMessageIds = [];
  tracker.userMessageIds = [];

  for (const messageId of ids) {
    await deleteMessageQuietly(chat, chatId, messageId);
  }
  return ids.length;
}
