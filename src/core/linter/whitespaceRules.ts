/**
 * @fileoverview Pure whitespace and formatting rule functions.
 * Line rules read the raw source lines; pointer spacing reads the type
 * tokens of extracted declarations.
 * Layer 2 - imports only from types/ (Layer 0) and rules.ts.
 *
 * @module core/linter/whitespaceRules
 */

import type { FilePath, Range } from '../../types/base.js';
import type { Declaration } from '../../types/declarations.js';
import type { LintResult } from '../../types/lint.js';
import type { Token } from '../../types/tokens.js';
import { createLintResult, type RuleContext } from './rules.js';

// ============================================================
// Source Text
// ============================================================

/**
 * Raw text of a file split into lines (terminators removed).
 */
export interface SourceText {
    readonly file: FilePath;
    readonly text: string;
    readonly lines: readonly string[];
}

/**
 * Builds a SourceText, splitting on `\n`, `\r\n` and lone `\r`.
 */
export function toSourceText(file: FilePath, text: string): SourceText {
    return { file, text, lines: text.split(/\r\n|\r|\n/) };
}

function lineRange(line: number, start: number, end: number): Range {
    return { start: { line, character: start }, end: { line, character: end } };
}

// ============================================================
// Line Rules
// ============================================================

/**
 * Indentation uses the configured style. With tabs, alignment spaces after
 * the leading tabs and a single space before a `*` comment continuation are
 * allowed.
 */
export function checkIndentStyle(source: SourceText, context: RuleContext): readonly LintResult[] {
    const results: LintResult[] = [];
    const useTabs = context.whitespace.indent === 'tabs';

    source.lines.forEach((line, index) => {
        const indent = /^[ \t]*/.exec(line)?.[0] ?? '';
        if (indent.length === 0 || indent.length === line.length) return;

        if (useTabs) {
            const commentContinuation = indent === ' ' && line.charAt(1) === '*';
            if (indent.startsWith(' ') && !commentContinuation) {
                results.push(
                    createLintResult(
                        'indent-style',
                        context.severity,
                        'Indentation should use tabs instead of spaces',
                        { file: source.file, range: lineRange(index, 0, indent.length) }
                    )
                );
            }
        } else if (indent.includes('\t')) {
            results.push(
                createLintResult(
                    'indent-style',
                    context.severity,
                    'Indentation should use spaces instead of tabs',
                    { file: source.file, range: lineRange(index, 0, indent.length) }
                )
            );
        }
    });

    return results;
}

/**
 * Lines do not end with spaces or tabs.
 */
export function checkTrailingWhitespace(source: SourceText, context: RuleContext): readonly LintResult[] {
    const results: LintResult[] = [];
    source.lines.forEach((line, index) => {
        const match = /[ \t]+$/.exec(line);
        if (match === null) return;
        results.push(
            createLintResult(
                'no-trailing-whitespace',
                context.severity,
                'Line has trailing whitespace',
                { file: source.file, range: lineRange(index, match.index, line.length) }
            )
        );
    });
    return results;
}

/**
 * Display width of a line with tabs expanded to the next tab stop.
 */
export function displayWidth(line: string, tabWidth: number): number {
    let column = 0;
    for (const ch of line) {
        column += ch === '\t' ? tabWidth - (column % tabWidth) : 1;
    }
    return column;
}

/**
 * Lines are no wider than `whitespace.maxLineLength` columns.
 */
export function checkMaxLineLength(source: SourceText, context: RuleContext): readonly LintResult[] {
    const { maxLineLength, tabWidth } = context.whitespace;
    const results: LintResult[] = [];
    source.lines.forEach((line, index) => {
        const width = displayWidth(line, tabWidth);
        if (width <= maxLineLength) return;
        results.push(
            createLintResult(
                'max-line-length',
                context.severity,
                `Line is ${width} columns wide; the limit is ${maxLineLength}`,
                { file: source.file, range: lineRange(index, 0, line.length) }
            )
        );
    });
    return results;
}

/**
 * Non-empty files end with a line terminator.
 */
export function checkNewlineAtEof(source: SourceText, context: RuleContext): readonly LintResult[] {
    if (source.text.length === 0 || /[\r\n]$/.test(source.text)) return [];
    const lastIndex = source.lines.length - 1;
    const lastLength = source.lines[lastIndex]?.length ?? 0;
    return [
        createLintResult(
            'newline-at-eof',
            context.severity,
            'File should end with a newline',
            { file: source.file, range: lineRange(lastIndex, lastLength, lastLength) }
        ),
    ];
}

// ============================================================
// Pointer Spacing
// ============================================================

function isStar(token: Token | undefined): boolean {
    return token !== undefined && token.kind === 'punctuation' && token.text === '*';
}

function touches(left: Token, right: Token): boolean {
    return left.offset + left.text.length === right.offset;
}

/**
 * Checks the stars of one type: a space before each star that follows the
 * type name, and none between the last star and the declared name.
 */
function checkStars(
    file: FilePath,
    typeTokens: readonly Token[],
    nameToken: Token | null,
    context: RuleContext
): LintResult[] {
    const results: LintResult[] = [];

    typeTokens.forEach((token, index) => {
        if (!isStar(token)) return;

        const previous = typeTokens[index - 1];
        if (previous !== undefined && !isStar(previous) && touches(previous, token)) {
            results.push(
                createLintResult(
                    'pointer-asterisk-spacing',
                    context.severity,
                    `Missing space between "${previous.text}" and "*"`,
                    { file, range: token.range },
                    `Write "${previous.text} *"`
                )
            );
        }

        const isLast = index === typeTokens.length - 1;
        if (isLast && nameToken !== null && !touches(token, nameToken)) {
            results.push(
                createLintResult(
                    'pointer-asterisk-spacing',
                    context.severity,
                    `"*" should be attached to the name "${nameToken.text}"`,
                    { file, range: token.range },
                    `Write "*${nameToken.text}"`
                )
            );
        }
    });

    return results;
}

/**
 * In declaration types the `*` is separated from the type and binds to the
 * name: `NSString *title`, `(NSString *)`, `NSString *XYZMakeTitle(void)`.
 */
export function checkPointerAsteriskSpacing(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    const { file } = declaration.location;
    switch (declaration.kind) {
        case 'property':
        case 'ivar':
        case 'constant':
        case 'variable':
            return checkStars(file, declaration.typeTokens, declaration.nameToken, context);
        case 'function':
            return checkStars(file, declaration.returnType, declaration.nameToken, context);
        case 'method':
            return [
                ...checkStars(file, declaration.returnType, null, context),
                ...declaration.parameters.flatMap((parameter) =>
                    checkStars(file, parameter.typeTokens, null, context)
                ),
            ];
        default:
            return [];
    }
}
