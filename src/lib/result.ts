/**
 * Tagged success/failure value for operations whose failure is an expected outcome
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Runs `next` only when `result` succeeded; the first failure short-circuits the chain
 */
export async function andThenAsync<T, U, E>(
  result: Result<T, E>,
  next: (value: T) => Promise<Result<U, E>>
): Promise<Result<U, E>> {
  return result.ok ? next(result.value) : result;
}
