/**
 * @file Result Type
 *
 * Success/failure envelope used at every fallible pipeline boundary.
 * Callers branch on `ok` instead of catching.
 *
 * @module
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/** Wrap a success value. */
export function result_ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

/** Wrap a failure reason. */
export function result_fail<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

/** Render an unknown thrown value as text. */
export function errorMessage_resolve(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
