/**
 * @fileoverview Markdown renderer: a totals line and one table per file with
 * problems, suitable for pull request comments.
 * Layer 2 - imports only from Layer 0 (types).
 *
 * @module core/renderer/markdown
 */

import type { FileReport, LintReport } from '../../types/lint.js';
import { describeTotals, displayPosition, plural } from './shared.js';

// ============================================================
// Helper Functions
// ============================================================

const escapeMarkdown = (text: string): string =>
    text.replace(/\|/g, '\\|').replace(/</g, '&lt;').replace(/>/g, '&gt;');

// ============================================================
// Render Functions
// ============================================================

function renderFileTable(file: FileReport): string {
    const header = '| Line | Column | Severity | Rule | Message |\n|------|--------|----------|------|---------|';
    const rows = file.results.map((result) => {
        const { line, column } = displayPosition(result);
        return `| ${line} | ${column} | ${result.severity} | \`${result.rule}\` | ${escapeMarkdown(result.message)} |`;
    });
    return `## \`${file.file}\`\n\n${header}\n${rows.join('\n')}`;
}

export function renderMarkdown(report: LintReport): string {
    const { summary } = report;
    const lines: string[] = ['# objclint report', ''];

    if (summary.filesWithProblems === 0) {
        lines.push(`No problems found in ${plural(summary.fileCount, 'file')}.`);
        return `${lines.join('\n')}\n`;
    }

    lines.push(`**${describeTotals(summary)}** in ${summary.filesWithProblems} of ${plural(summary.fileCount, 'file')}.`);
    for (const file of report.files) {
        if (file.results.length === 0) continue;
        lines.push('', renderFileTable(file));
    }
    return `${lines.join('\n')}\n`;
}
