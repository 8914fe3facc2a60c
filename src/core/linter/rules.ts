/**
 * @fileoverview Pure naming rule functions.
 * Each rule takes one declaration and returns LintResult[]; rules that do
 * not apply to the declaration's kind return an empty array.
 * Layer 2 - imports only from types/ (Layer 0) and utils/ (Layer 1).
 *
 * @module core/linter/rules
 */

import type { SourceLocation } from '../../types/base.js';
import type { LintRule, NamingConfig, WhitespaceConfig } from '../../types/config.js';
import type { Declaration, MethodDeclaration } from '../../types/declarations.js';
import type { LintResult, LintResultSeverity } from '../../types/lint.js';
import {
    categoryMethodPrefix,
    describePrefix,
    hasRequiredPrefix,
    isLowerCamelCase,
    isUpperCamelCase,
    lastWord,
    stripCategoryMethodPrefix,
    toLowerCamelCase,
    toUpperCamelCase,
} from '../../utils/naming.js';

// ============================================================
// Rule Context
// ============================================================

/**
 * Everything a rule needs besides its input.
 */
export interface RuleContext {
    /** Severity to report with (never 'off': disabled rules are not run) */
    readonly severity: LintResultSeverity;
    readonly naming: NamingConfig;
    readonly whitespace: WhitespaceConfig;
}

// ============================================================
// Helper Functions
// ============================================================

/**
 * Creates a LintResult, adding the suggestion only when there is one.
 */
export function createLintResult(
    rule: LintRule,
    severity: LintResultSeverity,
    message: string,
    location: SourceLocation,
    suggestion?: string
): LintResult {
    return {
        rule,
        severity,
        message,
        location,
        ...(suggestion !== undefined && suggestion.length > 0 && { suggestion }),
    };
}

function configuredPrefix(naming: NamingConfig): string | null {
    const prefix = naming.classPrefix;
    return prefix !== undefined && prefix.length > 0 ? prefix : null;
}

/**
 * Prefixed UpperCamelCase check shared by protocols, constants, enumerations
 * and functions.
 */
function checkPrefixedUpperCamel(
    rule: LintRule,
    label: string,
    name: string,
    location: SourceLocation,
    context: RuleContext,
    checkedName: string = name
): readonly LintResult[] {
    if (isUpperCamelCase(checkedName) && hasRequiredPrefix(checkedName, context.naming)) {
        return [];
    }
    const prefix = configuredPrefix(context.naming);
    const camel = toUpperCamelCase(checkedName);
    const renamed = prefix !== null && !camel.startsWith(prefix) ? `${prefix}${camel}` : camel;
    // keep what precedes the checked part (the `k` of `kXYZRowHeight`)
    const suggestion = name.slice(0, name.length - checkedName.length) + renamed;
    return [
        createLintResult(
            rule,
            context.severity,
            `${label} "${name}" should be UpperCamelCase and start with ${describePrefix(context.naming)}`,
            location,
            suggestion !== name ? `Rename to "${suggestion}"` : undefined
        ),
    ];
}

/**
 * True when a method lives in a named category on a class the project does
 * not own (any class, when no prefix is configured).
 */
function isForeignCategoryMethod(method: MethodDeclaration, naming: NamingConfig): boolean {
    const { container } = method;
    if (container.kind !== 'category' || container.categoryName.length === 0) return false;
    const prefix = configuredPrefix(naming);
    return prefix === null || !container.name.startsWith(prefix);
}

const CATEGORY_PREFIX_EXEMPT: ReadonlySet<string> = new Set(['load', 'initialize']);

// ============================================================
// Class Rules
// ============================================================

/**
 * Class names carry the project prefix.
 */
export function checkClassPrefix(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'class') return [];
    if (hasRequiredPrefix(declaration.name, context.naming)) return [];

    const prefix = configuredPrefix(context.naming);
    return [
        createLintResult(
            'class-prefix',
            context.severity,
            `Class "${declaration.name}" should start with ${describePrefix(context.naming)}`,
            declaration.location,
            prefix !== null ? `Rename to "${prefix}${declaration.name}"` : undefined
        ),
    ];
}

/**
 * Class names are UpperCamelCase.
 */
export function checkClassNameCase(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'class' || isUpperCamelCase(declaration.name)) return [];
    return [
        createLintResult(
            'class-name-case',
            context.severity,
            `Class "${declaration.name}" should be UpperCamelCase`,
            declaration.location,
            `Rename to "${toUpperCamelCase(declaration.name)}"`
        ),
    ];
}

/**
 * A subclass name ends with the last word of its superclass name, so
 * `XYZPhotoViewController : UIViewController` reads as a view controller.
 */
export function checkClassHierarchySuffix(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'class' || declaration.superclass === null) return [];
    const { superclass } = declaration;
    if (context.naming.hierarchyExempt.includes(superclass)) return [];

    const suffix = lastWord(superclass);
    if (declaration.name.endsWith(suffix)) return [];

    return [
        createLintResult(
            'class-hierarchy-suffix',
            context.severity,
            `Class "${declaration.name}" should end with "${suffix}" to show that it inherits from "${superclass}"`,
            declaration.location,
            `Rename to "${declaration.name}${suffix}"`
        ),
    ];
}

// ============================================================
// Protocol and Category Rules
// ============================================================

/**
 * Protocol names are prefixed UpperCamelCase.
 */
export function checkProtocolName(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'protocol') return [];
    return checkPrefixedUpperCamel('protocol-name', 'Protocol', declaration.name, declaration.location, context);
}

/**
 * Named categories are UpperCamelCase. Class extensions have no name to check.
 */
export function checkCategoryNameCase(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'category' || declaration.categoryName.length === 0) return [];
    if (isUpperCamelCase(declaration.categoryName)) return [];
    return [
        createLintResult(
            'category-name-case',
            context.severity,
            `Category "${declaration.className} (${declaration.categoryName})" should have an UpperCamelCase name`,
            declaration.location,
            `Rename to "${toUpperCamelCase(declaration.categoryName)}"`
        ),
    ];
}

/**
 * Methods added to classes the project does not own start with a lowercase
 * prefix and an underscore (`xyz_trimmedString`).
 */
export function checkCategoryMethodPrefix(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'method' || !isForeignCategoryMethod(declaration, context.naming)) return [];

    const firstKeyword = declaration.keywords[0] ?? '';
    if (CATEGORY_PREFIX_EXEMPT.has(firstKeyword)) return [];

    const prefix = configuredPrefix(context.naming);
    const expected = prefix !== null ? prefix.toLowerCase() : null;
    const actual = categoryMethodPrefix(firstKeyword);

    if (actual !== null && actual.length >= 2 && (expected === null || actual === expected)) {
        return [];
    }

    const label = expected !== null ? `"${expected}_"` : 'a lowercase prefix and an underscore';
    const { container } = declaration;
    return [
        createLintResult(
            'category-method-prefix',
            context.severity,
            `Method "${declaration.selector}" in category "${container.name} (${container.categoryName})" should start with ${label}`,
            declaration.location,
            expected !== null ? `Rename to "${expected}_${stripCategoryMethodPrefix(firstKeyword)}"` : undefined
        ),
    ];
}

// ============================================================
// Method Rules
// ============================================================

/**
 * Every selector keyword is lowerCamelCase. The first keyword of a category
 * method is checked without its `xyz_` prefix.
 */
export function checkMethodNameCase(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'method') return [];
    const inCategory = declaration.container.kind === 'category' && declaration.container.categoryName.length > 0;

    for (const [index, keyword] of declaration.keywords.entries()) {
        if (keyword.length === 0) continue;
        const bare = index === 0 && inCategory ? stripCategoryMethodPrefix(keyword) : keyword;
        if (!isLowerCamelCase(bare)) {
            return [
                createLintResult(
                    'method-name-case',
                    context.severity,
                    `Selector keyword "${keyword}" in "${declaration.selector}" should be lowerCamelCase`,
                    declaration.location,
                    `Rename to "${toLowerCamelCase(bare)}"`
                ),
            ];
        }
    }
    return [];
}

/**
 * Accessors are named after the value they return: `title`, not `getTitle`.
 * Unary and single-keyword selectors are checked; `getBytes:length:` style
 * selectors fill caller buffers and are left alone.
 */
export function checkMethodNoGetPrefix(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'method' || declaration.keywords.length > 1) return [];
    const keyword = declaration.keywords[0];
    if (keyword === undefined) return [];

    const bare = stripCategoryMethodPrefix(keyword);
    const match = /^get([A-Z].*)$/.exec(bare);
    const rest = match?.[1];
    if (rest === undefined) return [];

    const renamed = rest.charAt(0).toLowerCase() + rest.slice(1);
    const suffix = declaration.selector.endsWith(':') ? ':' : '';
    return [
        createLintResult(
            'method-no-get-prefix',
            context.severity,
            `Accessor "${declaration.selector}" should not start with "get"`,
            declaration.location,
            `Rename to "${renamed}${suffix}"`
        ),
    ];
}

/**
 * Method parameter names are lowerCamelCase.
 */
export function checkMethodParameterName(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'method') return [];
    return declaration.parameters
        .filter((parameter) => !isLowerCamelCase(parameter.name))
        .map((parameter) =>
            createLintResult(
                'method-parameter-name',
                context.severity,
                `Parameter "${parameter.name}" of "${declaration.selector}" should be lowerCamelCase`,
                parameter.location,
                `Rename to "${toLowerCamelCase(parameter.name)}"`
            )
        );
}

// ============================================================
// Property and Variable Rules
// ============================================================

/**
 * Property names are lowerCamelCase.
 */
export function checkPropertyNameCase(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'property' || isLowerCamelCase(declaration.name)) return [];
    return [
        createLintResult(
            'property-name-case',
            context.severity,
            `Property "${declaration.name}" should be lowerCamelCase`,
            declaration.location,
            `Rename to "${toLowerCamelCase(declaration.name)}"`
        ),
    ];
}

/**
 * Instance variables start with an underscore.
 */
export function checkIvarUnderscorePrefix(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'ivar' || declaration.name.startsWith('_')) return [];
    return [
        createLintResult(
            'ivar-underscore-prefix',
            context.severity,
            `Instance variable "${declaration.name}" should start with an underscore`,
            declaration.location,
            `Rename to "_${declaration.name}"`
        ),
    ];
}

/**
 * Instance variables (after their underscore) and file-scope variables are
 * lowerCamelCase.
 */
export function checkVariableNameCase(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'ivar' && declaration.kind !== 'variable') return [];
    const bare = declaration.kind === 'ivar' ? declaration.name.replace(/^_/, '') : declaration.name;
    if (bare.length === 0 || isLowerCamelCase(bare)) return [];

    const label = declaration.kind === 'ivar' ? 'Instance variable' : 'Variable';
    const renamed = (declaration.kind === 'ivar' ? '_' : '') + toLowerCamelCase(bare);
    return [
        createLintResult(
            'variable-name-case',
            context.severity,
            `${label} "${declaration.name}" should be lowerCamelCase`,
            declaration.location,
            `Rename to "${renamed}"`
        ),
    ];
}

// ============================================================
// Constant Rules
// ============================================================

/**
 * Constants are prefixed UpperCamelCase, optionally after a `k`.
 */
export function checkConstantName(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'constant') return [];
    const { name } = declaration;
    const bare = context.naming.allowKPrefix && /^k[A-Z]/.test(name) ? name.slice(1) : name;
    return checkPrefixedUpperCamel('constant-name', 'Constant', name, declaration.location, context, bare);
}

const NUMERIC_LITERAL = /^\(?\s*[-+]?\s*(?:\d[\w.]*|\.\d[\w.]*)\s*\)?$/;
const STRING_LITERAL = /^@?"(?:[^"\\]|\\.)*"$/;

/**
 * Object-like macros whose value is a literal should be typed constants.
 */
export function checkNoDefineConstants(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'macro' || declaration.parameters !== null) return [];
    const { value } = declaration;
    if (!NUMERIC_LITERAL.test(value) && !STRING_LITERAL.test(value)) return [];

    const type = STRING_LITERAL.test(value) && value.startsWith('@') ? 'NSString * const' : 'const';
    return [
        createLintResult(
            'no-define-constants',
            context.severity,
            `Macro "${declaration.name}" defines a constant; declare a typed constant instead`,
            declaration.location,
            `Use "static ${type}" for a file-local value or an "extern" constant for a public one`
        ),
    ];
}

// ============================================================
// Enumeration Rules
// ============================================================

/**
 * Named enumerations are prefixed UpperCamelCase.
 */
export function checkEnumName(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'enum' || declaration.name.length === 0) return [];
    return checkPrefixedUpperCamel('enum-name', 'Enumeration', declaration.name, declaration.location, context);
}

/**
 * Enumerators start with the name of their enumeration.
 */
export function checkEnumValuePrefix(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'enum' || declaration.name.length === 0) return [];
    const enumName = declaration.name;

    return declaration.enumerators
        .filter((enumerator) => {
            const next = enumerator.name.charAt(enumName.length);
            return !enumerator.name.startsWith(enumName) || !/[A-Z0-9]/.test(next);
        })
        .map((enumerator) =>
            createLintResult(
                'enum-value-prefix',
                context.severity,
                `Enumerator "${enumerator.name}" should start with "${enumName}"`,
                enumerator.location,
                `Rename to "${enumName}${toUpperCamelCase(enumerator.name)}"`
            )
        );
}

// ============================================================
// Function Rules
// ============================================================

/**
 * Non-static C functions are prefixed UpperCamelCase.
 */
export function checkFunctionName(declaration: Declaration, context: RuleContext): readonly LintResult[] {
    if (declaration.kind !== 'function' || declaration.isStatic) return [];
    if (context.naming.functionExempt.includes(declaration.name)) return [];
    return checkPrefixedUpperCamel('function-name', 'Function', declaration.name, declaration.location, context);
}
