export type LockToken = {
  readonly userId: number;
  readonly id: symbol;
};

type LockSlot = { holder: symbol | null };

/**
 * Non-blocking per-user lock guarding shift row creation.
 * Slots are created on first use and kept for the life of the process.
 */
export class UserLockService {
  private readonly slots = new Map<number, LockSlot>();

  tryAcquire(userId: number): LockToken | null {
    let slot = this.slots.get(userId);
    if (!slot) {
      slot = { holder: null };
      this.slots.set(userId, slot);
    }
    if (slot.holder !== null) {
      return null;
    }
    const id = Symbol(`lock:${userId}`);
    slot.holder = id;
    return { userId, id };
  }

  release(token: LockToken): void {
    const slot = this.slots.get(token.userId);
    // A stale token must not free a lock taken by someone else
    if (slot && slot.holder === token.id) {
      slot.holder = null;
    }
  }

  isHeld(userId: number): boolean {
    return this.slots.get(userId)?.holder != null;
  }
}
