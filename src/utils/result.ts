/**
 * Outcome of a command or a step inside one.
 *
 * `domain` failures are the user's to fix and are shown as written. `unexpected` failures wrap
 * an error the user had no part in; only the dispatcher decides how those are presented.
 */
export type Failure =
  | { kind: "domain"; message: string }
  | { kind: "unexpected"; message: string; error: Error };

export type Result<T> = { ok: true; value: T } | { ok: false; failure: Failure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function domainError(message: string): { ok: false; failure: Failure } {
  return { ok: false, failure: { kind: "domain", message } };
}

export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}

export function unexpectedError(error: unknown): { ok: false; failure: Failure } {
  const err = toError(error);
  return { ok: false, failure: { kind: "unexpected", message: err.message, error: err } };
}
