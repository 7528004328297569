import type { CalcError } from './errors.js';

/**
 * Outcome of a pipeline stage. Failures propagate by early return.
 */
export type Result<T> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: CalcError };

export function ok<T>(value: T): Result<T> {
    return { ok: true, value };
}

export function fail(error: CalcError): Result<never> {
    return { ok: false, error };
}
