export const VERSION = "0.1.0";

// Exit codes
export const EXIT_OK = 0;
export const EXIT_STARTUP = 1;

export type ResourceKind = "images" | "containers" | "volumes";

export type Result<T> = { ok: true; value: T } | { ok: false; error: Error };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: unknown): Result<T> {
  return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
}

/** Run work and capture its outcome instead of throwing. */
export async function settle<T>(work: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await work());
  } catch (err: unknown) {
    return fail(err);
  }
}
