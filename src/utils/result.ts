export type Result<Value, Failure> = { ok: true; value: Value } | { ok: false; error: Failure };

export type ValidationFailure = {
  code: 'InvalidAmount' | 'InvalidName' | 'InvalidShipName' | 'InvalidHolds' | 'InvalidSelection';
  hint: string;
};

export const ok = <Value>(value: Value): Result<Value, never> => ({ ok: true, value });

export const fail = (code: ValidationFailure['code'], hint: string): Result<never, ValidationFailure> => ({
  ok: false,
  error: { code, hint },
});
