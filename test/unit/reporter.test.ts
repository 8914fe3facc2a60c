/**
 * @fileoverview Unit tests for report aggregation and rendering.
 * @module test/unit/reporter
 */

import { describe, it, expect } from 'vitest';
import { createReport, exitCodeFor } from '../../src/core/reporter/reporter.js';
import { render, renderCompact, renderJson, renderMarkdown, renderStylish } from '../../src/core/renderer/index.js';
import { toFilePath } from '../../src/types/base.js';
import type { LintRule } from '../../src/types/config.js';
import type { LintResult, LintResultSeverity } from '../../src/types/lint.js';

const FEED = toFilePath('Sources/Feed.h');
const CLEAN = toFilePath('Sources/Clean.h');

function result(rule: LintRule, severity: LintResultSeverity, message: string, line: number, character: number): LintResult {
    return {
        rule,
        severity,
        message,
        location: {
            file: FEED,
            range: { start: { line, character }, end: { line, character: character + 1 } },
        },
    };
}

const prefixWarning = result('class-prefix', 'warning', 'Class "Feed" should start with the prefix "XYZ"', 2, 11);
const trailingError = result('no-trailing-whitespace', 'error', 'Line has trailing whitespace', 10, 6);

const report = createReport([
    { file: FEED, results: [prefixWarning, trailingError] },
    { file: CLEAN, results: [] },
]);

const cleanReport = createReport([
    { file: FEED, results: [] },
    { file: CLEAN, results: [] },
]);

describe('createReport', () => {
    it('counts results per file and in total', () => {
        expect(report.files.map((file) => [file.file, file.errorCount, file.warningCount, file.infoCount])).toEqual([
            ['Sources/Feed.h', 1, 1, 0],
            ['Sources/Clean.h', 0, 0, 0],
        ]);
        expect(report.summary).toEqual({
            fileCount: 2,
            filesWithProblems: 1,
            errorCount: 1,
            warningCount: 1,
            infoCount: 0,
        });
    });
});

describe('exitCodeFor', () => {
    const warningsOnly = createReport([{ file: FEED, results: [prefixWarning, prefixWarning] }]);

    it('fails on any error', () => {
        expect(exitCodeFor(report, -1)).toBe(1);
    });

    it('fails when warnings exceed the maximum', () => {
        expect(exitCodeFor(warningsOnly, 1)).toBe(1);
        expect(exitCodeFor(warningsOnly, 2)).toBe(0);
        expect(exitCodeFor(warningsOnly, -1)).toBe(0);
    });

    it('passes a clean run even with zero warnings allowed', () => {
        expect(exitCodeFor(cleanReport, 0)).toBe(0);
    });
});

describe('renderStylish', () => {
    it('groups aligned rows under their file', () => {
        expect(renderStylish(report)).toBe(
            [
                'Sources/Feed.h',
                '  3:12  warning  Class "Feed" should start with the prefix "XYZ"  class-prefix',
                '  11:7  error    Line has trailing whitespace  no-trailing-whitespace',
                '',
                '2 problems (1 error, 1 warning, 0 infos)',
                '',
            ].join('\n')
        );
    });

    it('summarizes a clean run', () => {
        expect(renderStylish(cleanReport)).toBe('No problems found in 2 files.\n');
        expect(renderStylish(createReport([{ file: CLEAN, results: [] }]))).toBe('No problems found in 1 file.\n');
    });
});

describe('renderCompact', () => {
    it('writes one line per result', () => {
        expect(renderCompact(report)).toBe(
            'Sources/Feed.h:3:12: warning: Class "Feed" should start with the prefix "XYZ" [class-prefix]\n' +
                'Sources/Feed.h:11:7: error: Line has trailing whitespace [no-trailing-whitespace]\n'
        );
    });

    it('writes nothing for a clean run', () => {
        expect(renderCompact(cleanReport)).toBe('');
    });
});

describe('renderMarkdown', () => {
    it('writes a table per file with problems', () => {
        expect(renderMarkdown(report)).toBe(
            [
                '# objclint report',
                '',
                '**2 problems (1 error, 1 warning, 0 infos)** in 1 of 2 files.',
                '',
                '## `Sources/Feed.h`',
                '',
                '| Line | Column | Severity | Rule | Message |',
                '|------|--------|----------|------|---------|',
                '| 3 | 12 | warning | `class-prefix` | Class "Feed" should start with the prefix "XYZ" |',
                '| 11 | 7 | error | `no-trailing-whitespace` | Line has trailing whitespace |',
                '',
            ].join('\n')
        );
    });

    it('escapes table syntax in messages', () => {
        const escaped = createReport([
            { file: FEED, results: [result('class-prefix', 'warning', 'a | b <c>', 0, 0)] },
        ]);
        expect(renderMarkdown(escaped)).toContain('| 1 | 1 | warning | `class-prefix` | a \\| b &lt;c&gt; |');
    });

    it('summarizes a clean run', () => {
        expect(renderMarkdown(cleanReport)).toBe('# objclint report\n\nNo problems found in 2 files.\n');
    });
});

describe('renderJson', () => {
    it('serializes the whole report', () => {
        const output = renderJson(report);
        expect(output.endsWith('\n')).toBe(true);
        const parsed: unknown = JSON.parse(output);
        expect(parsed).toEqual(report);
    });
});

describe('render', () => {
    it('dispatches on the output format', () => {
        expect(render(report, 'compact')).toBe(renderCompact(report));
        expect(render(report, 'stylish')).toBe(renderStylish(report));
        expect(render(report, 'markdown')).toBe(renderMarkdown(report));
        expect(render(report, 'json')).toBe(renderJson(report));
    });
});
