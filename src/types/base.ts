/**
 * @fileoverview Foundational types for objclint.
 * This module contains branded types, position/range interfaces, and result types.
 * Zero imports - this is the base layer of the type system.
 *
 * @module types/base
 */

// ============================================================
// Branded Types
// ============================================================

/**
 * Branded type for source file paths as they are reported.
 * Prevents accidental mixing of file paths with identifiers or messages.
 *
 * @example
 * const file = toFilePath('Sources/XYZPhotoView.m');
 */
export type FilePath = string & { readonly __brand: 'FilePath' };

/**
 * Brands a plain string as a FilePath.
 */
export function toFilePath(path: string): FilePath {
    return path as FilePath;
}

// ============================================================
// Position and Range Types
// ============================================================

/**
 * Position in a document.
 * Uses zero-based line and character indices.
 */
export interface Position {
    /** Zero-based line number */
    readonly line: number;
    /** Zero-based character offset on the line */
    readonly character: number;
}

/**
 * Range in a document defined by start and end positions.
 * The range is inclusive of start and exclusive of end.
 */
export interface Range {
    /** Start position (inclusive) */
    readonly start: Position;
    /** End position (exclusive) */
    readonly end: Position;
}

/**
 * Source location combining a file path with a range.
 * Used to pinpoint declarations and violations.
 */
export interface SourceLocation {
    /** Path of the source file */
    readonly file: FilePath;
    /** Range within the file */
    readonly range: Range;
}

// ============================================================
// Result Types
// ============================================================

/**
 * Result type for operations that can fail.
 * Provides type-safe error handling without exceptions.
 *
 * @typeParam T - The success value type
 * @typeParam E - The error type (defaults to Error)
 *
 * @example
 * function parseSeverity(raw: string): Result<RuleSeverity, string> {
 *   if (raw !== 'error' && raw !== 'warning' && raw !== 'off') {
 *     return { ok: false, error: `Unknown severity "${raw}"` };
 *   }
 *   return { ok: true, value: raw };
 * }
 */
export type Result<T, E = Error> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

/**
 * Async result type for asynchronous operations that can fail.
 * Wraps Result in a Promise for async/await compatibility.
 */
export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;
