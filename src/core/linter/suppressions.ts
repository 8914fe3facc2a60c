/**
 * @fileoverview Inline suppression comments.
 *
 * - `objclint-disable [rules]` ... `objclint-enable [rules]` turn rules off
 *   for a range of the file
 * - `objclint-disable-line [rules]` covers the line the comment starts on
 * - `objclint-disable-next-line [rules]` covers the line after the comment
 *
 * No rule list means every rule. Rule lists are separated by spaces or commas.
 *
 * @module core/linter/suppressions
 */

import type { Position } from '../../types/base.js';
import type { LintResult } from '../../types/lint.js';
import type { Token } from '../../types/tokens.js';

export type SuppressionKind = 'disable' | 'enable' | 'disable-line' | 'disable-next-line';

export interface SuppressionDirective {
    readonly kind: SuppressionKind;
    /** Empty for "all rules" */
    readonly rules: readonly string[];
    /** Start of the comment holding the directive */
    readonly position: Position;
    /** Line a line directive applies to (unused for range directives) */
    readonly line: number;
}

const DIRECTIVE = /objclint-(disable-next-line|disable-line|disable|enable)\b([^\n*]*)/;

function isSuppressionKind(value: string): value is SuppressionKind {
    return value === 'disable' || value === 'enable' || value === 'disable-line' || value === 'disable-next-line';
}

function comparePositions(a: Position, b: Position): number {
    return a.line - b.line || a.character - b.character;
}

/**
 * Reads suppression directives from the comment tokens of a file.
 */
export function parseSuppressions(tokens: readonly Token[]): readonly SuppressionDirective[] {
    const directives: SuppressionDirective[] = [];

    for (const token of tokens) {
        if (token.kind !== 'comment') continue;
        const match = DIRECTIVE.exec(token.text);
        const kind = match?.[1];
        if (match === null || kind === undefined || !isSuppressionKind(kind)) continue;

        const rules = (match[2] ?? '')
            .split(/[\s,]+/)
            .filter((rule) => rule.length > 0);
        const line = kind === 'disable-next-line' ? token.range.end.line + 1 : token.range.start.line;

        directives.push({ kind, rules, position: token.range.start, line });
    }

    return directives;
}

interface RangeState {
    all: boolean;
    readonly rules: Set<string>;
    /** Rules re-enabled while `all` is set */
    readonly except: Set<string>;
}

function replay(state: RangeState, directive: SuppressionDirective): void {
    if (directive.kind === 'disable') {
        if (directive.rules.length === 0) {
            state.all = true;
            state.except.clear();
            return;
        }
        for (const rule of directive.rules) {
            if (state.all) state.except.delete(rule);
            else state.rules.add(rule);
        }
        return;
    }

    if (directive.rules.length === 0) {
        state.all = false;
        state.rules.clear();
        state.except.clear();
        return;
    }
    for (const rule of directive.rules) {
        if (state.all) state.except.add(rule);
        state.rules.delete(rule);
    }
}

function isRangeSuppressed(result: LintResult, rangeDirectives: readonly SuppressionDirective[]): boolean {
    const state: RangeState = { all: false, rules: new Set(), except: new Set() };
    for (const directive of rangeDirectives) {
        if (comparePositions(directive.position, result.location.range.start) > 0) break;
        replay(state, directive);
    }
    return state.all ? !state.except.has(result.rule) : state.rules.has(result.rule);
}

function isLineSuppressed(result: LintResult, lineDirectives: readonly SuppressionDirective[]): boolean {
    const { line } = result.location.range.start;
    return lineDirectives.some(
        (directive) =>
            directive.line === line && (directive.rules.length === 0 || directive.rules.includes(result.rule))
    );
}

/**
 * Drops results covered by a suppression directive.
 */
export function applySuppressions(
    results: readonly LintResult[],
    directives: readonly SuppressionDirective[]
): LintResult[] {
    if (directives.length === 0) return [...results];

    const rangeDirectives = directives
        .filter((directive) => directive.kind === 'disable' || directive.kind === 'enable')
        .sort((a, b) => comparePositions(a.position, b.position));
    const lineDirectives = directives.filter(
        (directive) => directive.kind === 'disable-line' || directive.kind === 'disable-next-line'
    );

    return results.filter(
        (result) => !isLineSuppressed(result, lineDirectives) && !isRangeSuppressed(result, rangeDirectives)
    );
}
