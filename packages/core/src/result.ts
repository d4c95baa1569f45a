import type { PyvmError } from "./errors.js";

export type Result<T, E extends PyvmError = PyvmError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E extends PyvmError>(error: E): Result<never, E> {
  return { ok: false, error };
}
