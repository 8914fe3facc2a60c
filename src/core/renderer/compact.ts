/**
 * @fileoverview Compact renderer: one `file:line:col: severity: message [rule]`
 * line per result, the format editors and CI annotators parse.
 *
 * @module core/renderer/compact
 */

import type { LintReport } from '../../types/lint.js';
import { displayPosition } from './shared.js';

export function renderCompact(report: LintReport): string {
    const lines = report.files.flatMap((file) =>
        file.results.map((result) => {
            const { line, column } = displayPosition(result);
            return `${file.file}:${line}:${column}: ${result.severity}: ${result.message} [${result.rule}]`;
        })
    );
    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
