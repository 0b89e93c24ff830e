import type { RowReference, SectionFlags, SectionKey, ShiftProgress } from '../types/shift.js';
import type { SessionStore } from './sessionStore.js';

export type ShiftSession = {
  shiftDate: string;
  row: RowReference;
  sections: SectionFlags;
  closed: boolean;
};

/** Cached view of the user's open shift; synced from storage when the dashboard or menu loads a row, updated in place by saves. */
export class ShiftSessionService {
  constructor(private readonly store: SessionStore<ShiftSession>) {}

  async get(userId: number): Promise<ShiftSession | undefined> {
    return this.store.get(userId);
  }

  async sync(userId: number, row: RowReference, progress: ShiftProgress): Promise<ShiftSession> {
    const cached = await this.store.get(userId);
    const session: ShiftSession =
      cached && cached.shiftDate === progress.shiftDate
        ? { ...cached, row, sections: { ...progress.sections }, closed: progress.closed }
        : { shiftDate: progress.shiftDate, row, sections: { ...progress.sections }, closed: progress.closed };
    await this.store.set(userId, session);
    return session;
  }

  async markSectionDone(userId: number, section: SectionKey): Promise<void> {
    const cached = await this.store.get(userId);
    if (!cached) {
      return;
    }
    await this.store.set(userId, { ...cached, sections: { ...cached.sections, [section]: true } });
  }

  async markClosed(userId: number): Promise<void> {
    const cached = await this.store.get(userId);
    if (!cached) {
      return;
    }
    await this.store.set(userId, { ...cached, closed: true });
  }

  async reset(userId: number): Promise<void> {
    await this.store.delete(userId);
  }
}
