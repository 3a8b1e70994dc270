import type { SessionId } from "../typedefs.js";

/**
 * Expected, recoverable outcomes of session operations. They are returned to
 * the caller as values and never thrown.
 */
export type FailureReason =
  | "not_found"
  | "invalid_card"
  | "already_revealed"
  | "invalid_avatar"
  | "avatar_unavailable";

export interface SessionFailure {
  readonly reason: FailureReason;
  readonly message: string;
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: SessionFailure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(reason: FailureReason, message: string): Result<T> {
  return { ok: false, error: { reason, message } };
}

export function notFound<T>(sessionId: SessionId): Result<T> {
  return fail("not_found", `Session not found: ${sessionId}`);
}
