/**
 * Store operation results
 *
 * Store adapters report failure as a value instead of throwing, so callers
 * that walk many entities can keep going after one of them fails.
 */

export type StoreResult<T = void> =
  | { success: true; data: T }
  | { success: false; error: string };

export function ok<T>(data: T): StoreResult<T> {
  return { success: true, data };
}

export function fail(error: unknown): StoreResult<never> {
  return { success: false, error: errorMessage(error) };
}

/**
 * Run an operation that may throw and capture the outcome.
 */
export async function attempt<T>(
  operation: () => Promise<T>
): Promise<StoreResult<T>> {
  try {
    return ok(await operation());
  } catch (err) {
    return fail(err);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  if (
    error &&
    typeof error === "object" &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}
