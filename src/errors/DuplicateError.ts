export type DuplicateReason = 'telegram-id' | 'full-name' | 'archived';

export default class DuplicateError extends Error {
  reason: DuplicateReason;

  constructor(reason: DuplicateReason, message: string) {
    super(message);
    this.name = 'DuplicateError';
    this.reason = reason;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DuplicateError);
    }
  }
}
