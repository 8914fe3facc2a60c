/**
 * @fileoverview Formatting helpers shared by the report renderers.
 *
 * @module core/renderer/shared
 */

import type { LintResult, ReportSummary } from '../../types/lint.js';

/**
 * `count word` with a plain `s` plural.
 */
export const plural = (count: number, word: string): string => `${count} ${word}${count === 1 ? '' : 's'}`;

/**
 * 1-based line and column of a result's start.
 */
export function displayPosition(result: LintResult): { readonly line: number; readonly column: number } {
    const { start } = result.location.range;
    return { line: start.line + 1, column: start.character + 1 };
}

/**
 * `3 problems (1 error, 2 warnings, 0 infos)`
 */
export function describeTotals(summary: ReportSummary): string {
    const problems = summary.errorCount + summary.warningCount + summary.infoCount;
    return (
        `${plural(problems, 'problem')} ` +
        `(${plural(summary.errorCount, 'error')}, ${plural(summary.warningCount, 'warning')}, ${plural(summary.infoCount, 'info')})`
    );
}
