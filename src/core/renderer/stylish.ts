/**
 * @fileoverview Stylish renderer: results grouped under their file with
 * aligned columns, followed by a totals line.
 *
 * @example
 * Sources/Feed.h
 *   3:12  warning  Class "Feed" should start with the prefix "XYZ"  class-prefix
 *
 * 1 problem (0 errors, 1 warning, 0 infos)
 *
 * @module core/renderer/stylish
 */

import type { FileReport, LintReport } from '../../types/lint.js';
import { describeTotals, displayPosition, plural } from './shared.js';

function renderFile(file: FileReport): string {
    const rows = file.results.map((result) => {
        const { line, column } = displayPosition(result);
        return { position: `${line}:${column}`, result };
    });
    const positionWidth = Math.max(...rows.map((row) => row.position.length));
    const severityWidth = Math.max(...rows.map((row) => row.result.severity.length));

    const lines = rows.map(
        ({ position, result }) =>
            `  ${position.padEnd(positionWidth)}  ${result.severity.padEnd(severityWidth)}  ${result.message}  ${result.rule}`
    );
    return [file.file, ...lines].join('\n');
}

export function renderStylish(report: LintReport): string {
    const { summary } = report;
    if (summary.filesWithProblems === 0) {
        return `No problems found in ${plural(summary.fileCount, 'file')}.\n`;
    }

    const sections = report.files.filter((file) => file.results.length > 0).map(renderFile);
    return `${sections.join('\n\n')}\n\n${describeTotals(summary)}\n`;
}
