/**
 * @fileoverview Lint orchestration.
 * Runs the enabled rules over extracted declarations and source lines,
 * skips implementation-site declarations that repeat an interface, applies
 * inline suppressions and sorts the results.
 * Layer 2 - imports from Layer 0 (types/), Layer 1 and the rule modules.
 *
 * @module core/linter/linter
 */

import type { FilePath } from '../../types/base.js';
import type { LintConfig, LintSeverity } from '../../types/config.js';
import type { Declaration, FileDeclarations } from '../../types/declarations.js';
import type { LintResult, LintResultSeverity } from '../../types/lint.js';
import { extractDeclarations } from '../extractor/declarations.js';
import { tokenize } from '../tokenizer/tokenizer.js';
import { createLogger } from '../../utils/logger.js';
import { RULES } from './registry.js';
import type { RuleContext } from './rules.js';
import { applySuppressions, parseSuppressions } from './suppressions.js';
import { toSourceText } from './whitespaceRules.js';

const log = createLogger('linter');

/**
 * Source of one file to lint.
 */
export interface SourceFile {
    readonly file: FilePath;
    readonly text: string;
}

/**
 * Lint results of one file.
 */
export interface FileLintResult {
    readonly file: FilePath;
    readonly results: readonly LintResult[];
}

// ============================================================
// Helper Functions
// ============================================================

/**
 * Converts a LintSeverity config value to a LintResultSeverity.
 * Returns null if the rule is disabled ('off').
 */
function toResultSeverity(severity: LintSeverity): LintResultSeverity | null {
    if (severity === 'off') {
        return null;
    }
    return severity;
}

function compareResults(a: LintResult, b: LintResult): number {
    const left = a.location.range.start;
    const right = b.location.range.start;
    return left.line - right.line || left.character - right.character || a.rule.localeCompare(b.rule);
}

// ============================================================
// Interface Keys
// ============================================================

/**
 * Identity of a declaration that may appear at both its interface and its
 * implementation site, or null for declarations that never repeat.
 *
 * @example
 * // - (void)reload; inside @interface XYZFeed (Paging)
 * declarationKey(method); // 'method:XYZFeed(Paging):-reload'
 */
export function declarationKey(declaration: Declaration): string | null {
    switch (declaration.kind) {
        case 'class':
            return `class:${declaration.name}`;
        case 'category':
            return `category:${declaration.className}(${declaration.categoryName})`;
        case 'method': {
            const { container } = declaration;
            const owner = container.categoryName.length > 0 ? `${container.name}(${container.categoryName})` : container.name;
            return `method:${owner}:${declaration.isClassMethod ? '+' : '-'}${declaration.selector}`;
        }
        case 'function':
            return `function:${declaration.name}`;
        default:
            return null;
    }
}

function isInterfaceSite(declaration: Declaration): boolean {
    switch (declaration.kind) {
        case 'class':
        case 'category':
        case 'method':
            return declaration.site === 'interface';
        case 'function':
            return !declaration.isDefinition;
        default:
            return false;
    }
}

/**
 * Collects the keys of everything declared at an interface site: classes,
 * categories and methods in `@interface`/`@protocol`, and function prototypes.
 */
export function collectInterfaceKeys(extractions: readonly FileDeclarations[]): ReadonlySet<string> {
    const keys = new Set<string>();
    for (const extraction of extractions) {
        for (const declaration of extraction.declarations) {
            if (!isInterfaceSite(declaration)) continue;
            const key = declarationKey(declaration);
            if (key !== null) keys.add(key);
        }
    }
    return keys;
}

function isRepeatedImplementation(declaration: Declaration, interfaceKeys: ReadonlySet<string>): boolean {
    if (isInterfaceSite(declaration)) return false;
    const key = declarationKey(declaration);
    return key !== null && interfaceKeys.has(key);
}

// ============================================================
// Linting
// ============================================================

/**
 * Lints one extracted file.
 *
 * @param extraction - Declarations and tokens of the file
 * @param text - Raw text of the file, for the line rules
 * @param interfaceKeys - Interface keys of the whole run; defaults to this file's own
 * @returns Results sorted by line, column and rule id
 */
export function lintDeclarations(
    extraction: FileDeclarations,
    text: string,
    config: LintConfig,
    interfaceKeys: ReadonlySet<string> = collectInterfaceKeys([extraction])
): LintResult[] {
    const results: LintResult[] = [];
    const source = toSourceText(extraction.file, text);
    const declarations = extraction.declarations.filter(
        (declaration) => !isRepeatedImplementation(declaration, interfaceKeys)
    );

    for (const rule of RULES) {
        const severity = toResultSeverity(config.rules[rule.id]);
        if (severity === null) continue;

        const context: RuleContext = { severity, naming: config.naming, whitespace: config.whitespace };
        if (rule.scope === 'source') {
            results.push(...rule.check(source, context));
        } else {
            for (const declaration of declarations) {
                results.push(...rule.check(declaration, context));
            }
        }
    }

    const kept = applySuppressions(results, parseSuppressions(extraction.tokens));
    log.debug(
        `${extraction.file}: ${declarations.length} declarations, ${kept.length} problems` +
            (kept.length < results.length ? ` (${results.length - kept.length} suppressed)` : '')
    );

    return kept.sort(compareResults);
}

/**
 * Tokenizes, extracts and lints a single source text.
 *
 * @example
 * lintSource(toFilePath('XYZFeed.h'), '@interface Feed : NSObject\n@end\n', getDefault().linting);
 * // [{ rule: 'class-prefix', message: 'Class "Feed" should start with ...', ... }]
 */
export function lintSource(file: FilePath, text: string, config: LintConfig): LintResult[] {
    const extraction = extractDeclarations(file, tokenize(text));
    return lintDeclarations(extraction, text, config);
}

/**
 * Lints several files together, so that implementations in `.m` files are
 * not reported again for what their headers already declare.
 */
export function lintFiles(files: readonly SourceFile[], config: LintConfig): FileLintResult[] {
    const extracted = files.map((source) => ({
        source,
        extraction: extractDeclarations(source.file, tokenize(source.text)),
    }));
    const interfaceKeys = collectInterfaceKeys(extracted.map(({ extraction }) => extraction));

    return extracted.map(({ source, extraction }) => ({
        file: source.file,
        results: lintDeclarations(extraction, source.text, config, interfaceKeys),
    }));
}
