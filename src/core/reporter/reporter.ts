/**
 * @fileoverview Aggregates per-file lint results into a report and decides
 * the process exit code.
 * Layer 2 - imports from Layer 0 (types/) and the linter.
 *
 * @module core/reporter/reporter
 */

import type { FileReport, LintReport, LintResult, LintResultSeverity } from '../../types/lint.js';
import type { FileLintResult } from '../linter/linter.js';

function countSeverity(results: readonly LintResult[], severity: LintResultSeverity): number {
    return results.filter((result) => result.severity === severity).length;
}

function toFileReport({ file, results }: FileLintResult): FileReport {
    return {
        file,
        results,
        errorCount: countSeverity(results, 'error'),
        warningCount: countSeverity(results, 'warning'),
        infoCount: countSeverity(results, 'info'),
    };
}

/**
 * Builds a report from per-file results. Files without problems stay in the
 * report with an empty result list, in input order.
 */
export function createReport(fileResults: readonly FileLintResult[]): LintReport {
    const files = fileResults.map(toFileReport);
    return {
        files,
        summary: {
            fileCount: files.length,
            filesWithProblems: files.filter((file) => file.results.length > 0).length,
            errorCount: files.reduce((sum, file) => sum + file.errorCount, 0),
            warningCount: files.reduce((sum, file) => sum + file.warningCount, 0),
            infoCount: files.reduce((sum, file) => sum + file.infoCount, 0),
        },
    };
}

/**
 * Exit code of a lint run: 1 when there are errors or more warnings than
 * `maxWarnings` allows, else 0. A negative `maxWarnings` allows any number.
 */
export function exitCodeFor(report: LintReport, maxWarnings: number): 0 | 1 {
    const { errorCount, warningCount } = report.summary;
    if (errorCount > 0) return 1;
    if (maxWarnings >= 0 && warningCount > maxWarnings) return 1;
    return 0;
}
