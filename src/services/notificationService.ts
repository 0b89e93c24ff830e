import type { ChatPlatform } from '../bot/chat/types.js';
import { EXPENSE_LABELS } from '../bot/labels.js';
import { EXPENSE_KEYS, type RowReference, type ShiftSummary } from '../types/shift.js';
import { displayDate, systemClock, type Clock } from '../utils/dates.js';
import { escapeHtml, formatAmount, formatMoney } from '../utils/formatters.js';
import logger from '../utils/logger.js';

const DEDUPE_TTL_MS = 10 * 60 * 1000;

export type ShiftNotifierOptions = {
  chat: ChatPlatform;
  groupChatId: number | null;
  enabled: boolean;
  clock?: Clock;
  ttlMs?: number;
};

const materialsLine = (summary: ShiftSummary): string => {
  const { pvdMeters, pvcTubes, tape } = summary.materials;
  const parts: string[] = [];
  if (pvdMeters > 0) {
    parts.push(`PVD ${formatAmount(pvdMeters)} m`);
  }
  if (pvcTubes > 0) {
    parts.push(`PVC ${formatAmount(pvcTubes)} pcs`);
  }
  if (tape > 0) {
    parts.push(`Tape ${formatAmount(tape)} pcs`);
  }
  return parts.length > 0 ? parts.join('; ') : '—';
};

export const formatShiftClosedMessage = (summary: ShiftSummary, brigadier: string): string => {
  const ship = summary.expenses.ship ? escapeHtml(summary.expenses.ship) : '—';
  const holds = summary.expenses.holds !== null ? ` (holds: ${summary.expenses.holds})` : '';
  const expenseLines = EXPENSE_KEYS.filter((key) => summary.expenses.amounts[key] > 0).map(
    (key) => `• ${EXPENSE_LABELS[key]}: ${formatMoney(summary.expenses.amounts[key])}`,
  );
  const crew = [summary.crew.driver, ...summary.crew.workers]
    .filter((name): name is string => Boolean(name))
    .map(escapeHtml);

  const lines = [
    '<b>✅ Shift closed</b>',
    `📅 ${displayDate(summary.shiftDate)}`,
    `👤 Brigadier: ${escapeHtml(brigadier)}`,
    `🚢 Ship: ${ship}${holds}`,
    '',
    '💸 Expenses:',
    ...(expenseLines.length > 0 ? expenseLines : ['—']),
    `<b>Total: ${formatMoney(summary.expenses.total)}</b>`,
    '',
    `📦 Materials: ${materialsLine(summary)}`,
  ];
  if (summary.materials.photosLink) {
    lines.push(`🖼 <a href="${escapeHtml(summary.materials.photosLink)}">Photos</a>`);
  }
  lines.push(`👥 Crew: ${crew.length > 0 ? crew.join(', ') : '—'}`);
  return lines.join('\n');
};

/** Posts the closed-shift summary to the operations group, at most once per row within the dedupe window. */
export class ShiftNotifier {
  private readonly notifiedUntil = new Map<RowReference, number>();
  private readonly clock: Clock;
  private readonly ttlMs: number;

  constructor(private readonly options: ShiftNotifierOptions) {
    this.clock = options.clock ?? systemClock;
    this.ttlMs = options.ttlMs ?? DEDUPE_TTL_MS;
  }

  wasNotifiedRecently(row: RowReference): boolean {
    const now = this.clock().getTime();
    for (const [cachedRow, expiresAt] of this.notifiedUntil) {
      if (expiresAt <= now) {
        this.notifiedUntil.delete(cachedRow);
      }
    }
    return this.notifiedUntil.has(row);
  }

  /** Never throws; returns true when the message reached the group. */
  async notifyShiftClosed(summary: ShiftSummary, brigadier: string): Promise<boolean> {
    if (this.wasNotifiedRecently(summary.row)) {
      logger.info(`[notify] Row ${summary.row} already announced, skipping`);
      return false;
    }
    // Marked before sending so a retried close cannot post twice
    this.notifiedUntil.set(summary.row, this.clock().getTime() + this.ttlMs);

    const { chat, groupChatId, enabled } = this.options;
    if (!enabled) {
      logger.debug(`[notify] Group notifications disabled, row ${summary.row} not announced`);
      return false;
    }
    if (groupChatId === null) {
      logger.warn(`[notify] GROUP_CHAT_ID is not configured, row ${summary.row} not announced`);
      return false;
    }

    try {
      await chat.send(groupChatId, formatShiftClosedMessage(summary, brigadier), { format: 'html' });
      logger.info(`[notify] Row ${summary.row} announced to group ${groupChatId}`);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`[notify] Failed to announce row ${summary.row} to group ${groupChatId}: ${message}`);
      return false;
    }
  }
}
