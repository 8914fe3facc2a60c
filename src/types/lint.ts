/**
 * @fileoverview Lint types for objclint.
 * Defines interfaces for lint results, rule metadata, and reports.
 * Imports from types/base.ts for location types.
 *
 * @module types/lint
 */

import type { FilePath, SourceLocation } from './base.js';
import type { LintRule, LintSeverity } from './config.js';

// Note: LintSeverity in config.ts includes 'off' for configuration,
// but lint results use a runtime severity that excludes 'off'
export type { LintRule } from './config.js';

// ============================================================
// Lint Severity for Results
// ============================================================

/**
 * Severity level for lint results.
 * Unlike LintSeverity in config.ts (which includes 'off'),
 * this type represents actual reported severities.
 * - error: Issue that fails the run
 * - warning: Issue that should be addressed
 * - info: Informational message
 */
export type LintResultSeverity = 'error' | 'warning' | 'info';

// ============================================================
// Lint Result Types
// ============================================================

/**
 * A single rule violation.
 *
 * @example
 * const result: LintResult = {
 *   rule: 'class-prefix',
 *   severity: 'warning',
 *   message: 'Class "PhotoView" should start with the prefix "XYZ"',
 *   location: {
 *     file: toFilePath('Sources/PhotoView.h'),
 *     range: { start: { line: 3, character: 11 }, end: { line: 3, character: 20 } }
 *   },
 *   suggestion: 'Rename to "XYZPhotoView"'
 * };
 */
export interface LintResult {
    /** The lint rule that was violated */
    readonly rule: LintRule;
    /** Severity of the lint issue */
    readonly severity: LintResultSeverity;
    /** Human-readable message describing the issue */
    readonly message: string;
    /** Location in the source file where the issue was found */
    readonly location: SourceLocation;
    /** Actionable suggestion for fixing the issue */
    readonly suggestion?: string;
}

// ============================================================
// Rule Metadata
// ============================================================

/**
 * Category a rule belongs to.
 */
export type RuleCategory = 'naming' | 'whitespace';

/**
 * Public description of a rule, as listed by `--list-rules`.
 */
export interface RuleMetadata {
    readonly id: LintRule;
    readonly category: RuleCategory;
    readonly description: string;
    readonly defaultSeverity: LintSeverity;
}

// ============================================================
// Report Types
// ============================================================

/**
 * Lint results for one file.
 */
export interface FileReport {
    readonly file: FilePath;
    readonly results: readonly LintResult[];
    readonly errorCount: number;
    readonly warningCount: number;
    readonly infoCount: number;
}

/**
 * Totals across a lint run.
 */
export interface ReportSummary {
    readonly fileCount: number;
    readonly filesWithProblems: number;
    readonly errorCount: number;
    readonly warningCount: number;
    readonly infoCount: number;
}

/**
 * Aggregated result of a lint run.
 */
export interface LintReport {
    readonly files: readonly FileReport[];
    readonly summary: ReportSummary;
}
