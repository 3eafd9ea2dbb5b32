/**
 * Outcome of a core database operation. Nothing in the core throws past its
 * own boundary; callers branch on `ok` instead.
 */
export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export function success<T>(value: T): OperationResult<T> {
  return { ok: true, value };
}

export function failure<T>(error: unknown): OperationResult<T> {
  return { ok: false, error: errorMessage(error) };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
