import { fail, ok, type Result, type ValidationFailure } from './result.js';

const AMOUNT_PATTERN = /^[0-9]{1,9}$/;

export const amountHint = (skipToken: string): string =>
  `Enter digits only (whole amount, no spaces or signs) or press “${skipToken}”.`;

export const parseAmount = (
  text: string | null | undefined,
  skipToken: string,
): Result<number, ValidationFailure> => {
  const value = (text ?? '').trim();
  if (value.length === 0) {
    return fail('InvalidAmount', amountHint(skipToken));
  }
  if (value === skipToken) {
    return ok(0);
  }
  if (!AMOUNT_PATTERN.test(value)) {
    return fail('InvalidAmount', amountHint(skipToken));
  }
  return ok(Number.parseInt(value, 10));
};

export const HOLDS_MIN = 1;
export const HOLDS_MAX = 7;

export const parseHolds = (text: string | null | undefined): Result<number, ValidationFailure> => {
  const value = (text ?? '').trim();
  if (!/^[0-9]$/.test(value)) {
    return fail('InvalidHolds', `Choose the number of holds from ${HOLDS_MIN} to ${HOLDS_MAX}.`);
  }
  const holds = Number.parseInt(value, 10);
  if (holds < HOLDS_MIN || holds > HOLDS_MAX) {
    return fail('InvalidHolds', `Choose the number of holds from ${HOLDS_MIN} to ${HOLDS_MAX}.`);
  }
  return ok(holds);
};
