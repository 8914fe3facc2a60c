/**
 * @fileoverview Result type utilities for type-safe error handling.
 * Provides helper functions for creating and transforming Result types
 * without using exceptions.
 *
 * @module utils/result
 */

import type { Result } from '../types/base.js';

/**
 * Creates a successful Result containing the given value.
 *
 * @example
 * const result = ok(42);
 * // result: { ok: true, value: 42 }
 */
export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

/**
 * Creates a failed Result containing the given error.
 *
 * @example
 * const result = err({ type: 'io', message: 'ENOENT' });
 * // result: { ok: false, error: { type: 'io', message: 'ENOENT' } }
 */
export function err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

/**
 * Transforms the success value of a Result using the provided function.
 * If the Result is an error, returns the error unchanged.
 *
 * @example
 * const doubled = mapResult(ok(5), x => x * 2);
 * // doubled: { ok: true, value: 10 }
 */
export function mapResult<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => U
): Result<U, E> {
    if (result.ok) {
        return { ok: true, value: fn(result.value) };
    }
    return result;
}

/**
 * Chains operations that return Results, flattening the nested Result.
 * If the input Result is an error, returns the error unchanged.
 *
 * @example
 * const parsed = flatMapResult(readResult, text => parseConfigText(text, path));
 */
export function flatMapResult<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => Result<U, E>
): Result<U, E> {
    if (result.ok) {
        return fn(result.value);
    }
    return result;
}

/**
 * Formats an unknown thrown value as a message string.
 */
export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
