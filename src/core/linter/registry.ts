/**
 * @fileoverview Rule registry: metadata and check function for every rule.
 * Layer 2 - imports from Layer 0 (types/) and the rule modules.
 *
 * @module core/linter/registry
 */

import type { LintRule, LintRulesConfig } from '../../types/config.js';
import type { Declaration } from '../../types/declarations.js';
import type { LintResult, RuleMetadata } from '../../types/lint.js';
import {
    checkCategoryMethodPrefix,
    checkCategoryNameCase,
    checkClassHierarchySuffix,
    checkClassNameCase,
    checkClassPrefix,
    checkConstantName,
    checkEnumName,
    checkEnumValuePrefix,
    checkFunctionName,
    checkIvarUnderscorePrefix,
    checkMethodNameCase,
    checkMethodNoGetPrefix,
    checkMethodParameterName,
    checkNoDefineConstants,
    checkPropertyNameCase,
    checkProtocolName,
    checkVariableNameCase,
    type RuleContext,
} from './rules.js';
import {
    checkIndentStyle,
    checkMaxLineLength,
    checkNewlineAtEof,
    checkPointerAsteriskSpacing,
    checkTrailingWhitespace,
    type SourceText,
} from './whitespaceRules.js';

export type DeclarationCheck = (declaration: Declaration, context: RuleContext) => readonly LintResult[];
export type SourceCheck = (source: SourceText, context: RuleContext) => readonly LintResult[];

/**
 * A rule runs either once per extracted declaration or once per file.
 */
export type RuleDefinition = RuleMetadata &
    (
        | { readonly scope: 'declaration'; readonly check: DeclarationCheck }
        | { readonly scope: 'source'; readonly check: SourceCheck }
    );

export const RULES: readonly RuleDefinition[] = [
    {
        id: 'class-prefix',
        category: 'naming',
        description: 'Class names start with the project prefix',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkClassPrefix,
    },
    {
        id: 'class-name-case',
        category: 'naming',
        description: 'Class names are UpperCamelCase',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkClassNameCase,
    },
    {
        id: 'class-hierarchy-suffix',
        category: 'naming',
        description: 'Class names end with the last word of their superclass name',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkClassHierarchySuffix,
    },
    {
        id: 'protocol-name',
        category: 'naming',
        description: 'Protocol names are prefixed UpperCamelCase',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkProtocolName,
    },
    {
        id: 'category-name-case',
        category: 'naming',
        description: 'Category names are UpperCamelCase',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkCategoryNameCase,
    },
    {
        id: 'category-method-prefix',
        category: 'naming',
        description: 'Category methods on foreign classes start with a lowercase prefix and an underscore',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkCategoryMethodPrefix,
    },
    {
        id: 'method-name-case',
        category: 'naming',
        description: 'Selector keywords are lowerCamelCase',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkMethodNameCase,
    },
    {
        id: 'method-no-get-prefix',
        category: 'naming',
        description: 'Accessor methods do not start with "get"',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkMethodNoGetPrefix,
    },
    {
        id: 'method-parameter-name',
        category: 'naming',
        description: 'Method parameter names are lowerCamelCase',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkMethodParameterName,
    },
    {
        id: 'property-name-case',
        category: 'naming',
        description: 'Property names are lowerCamelCase',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkPropertyNameCase,
    },
    {
        id: 'ivar-underscore-prefix',
        category: 'naming',
        description: 'Instance variables start with an underscore',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkIvarUnderscorePrefix,
    },
    {
        id: 'variable-name-case',
        category: 'naming',
        description: 'Instance and global variables are lowerCamelCase',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkVariableNameCase,
    },
    {
        id: 'constant-name',
        category: 'naming',
        description: 'Constants are prefixed UpperCamelCase, optionally after a "k"',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkConstantName,
    },
    {
        id: 'no-define-constants',
        category: 'naming',
        description: 'Literal values are typed constants rather than #define macros',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkNoDefineConstants,
    },
    {
        id: 'enum-name',
        category: 'naming',
        description: 'Enumeration names are prefixed UpperCamelCase',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkEnumName,
    },
    {
        id: 'enum-value-prefix',
        category: 'naming',
        description: 'Enumerators start with the enumeration name',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkEnumValuePrefix,
    },
    {
        id: 'function-name',
        category: 'naming',
        description: 'Non-static C functions are prefixed UpperCamelCase',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkFunctionName,
    },
    {
        id: 'indent-style',
        category: 'whitespace',
        description: 'Indentation uses the configured style (tabs by default)',
        defaultSeverity: 'warning',
        scope: 'source',
        check: checkIndentStyle,
    },
    {
        id: 'no-trailing-whitespace',
        category: 'whitespace',
        description: 'Lines do not end with spaces or tabs',
        defaultSeverity: 'warning',
        scope: 'source',
        check: checkTrailingWhitespace,
    },
    {
        id: 'max-line-length',
        category: 'whitespace',
        description: 'Lines are no wider than the configured maximum',
        defaultSeverity: 'off',
        scope: 'source',
        check: checkMaxLineLength,
    },
    {
        id: 'newline-at-eof',
        category: 'whitespace',
        description: 'Files end with a newline',
        defaultSeverity: 'warning',
        scope: 'source',
        check: checkNewlineAtEof,
    },
    {
        id: 'pointer-asterisk-spacing',
        category: 'whitespace',
        description: 'The "*" of a pointer type binds to the name, not the type',
        defaultSeverity: 'warning',
        scope: 'declaration',
        check: checkPointerAsteriskSpacing,
    },
];

const RULES_BY_ID: ReadonlyMap<string, RuleDefinition> = new Map(RULES.map((rule) => [rule.id, rule]));

/**
 * Type guard for rule ids read from config files, flags and directives.
 */
export function isLintRule(value: string): value is LintRule {
    return RULES_BY_ID.has(value);
}

export function getRule(id: LintRule): RuleDefinition | undefined {
    return RULES_BY_ID.get(id);
}

/**
 * Metadata of every rule, in registry order.
 */
export function listRules(): readonly RuleMetadata[] {
    return RULES.map(({ id, category, description, defaultSeverity }) => ({
        id,
        category,
        description,
        defaultSeverity,
    }));
}

/**
 * Default severity of every rule.
 */
export const DEFAULT_RULE_SEVERITIES: LintRulesConfig = {
    'class-prefix': 'warning',
    'class-name-case': 'warning',
    'class-hierarchy-suffix': 'warning',
    'protocol-name': 'warning',
    'category-name-case': 'warning',
    'category-method-prefix': 'warning',
    'method-name-case': 'warning',
    'method-no-get-prefix': 'warning',
    'method-parameter-name': 'warning',
    'property-name-case': 'warning',
    'ivar-underscore-prefix': 'warning',
    'variable-name-case': 'warning',
    'constant-name': 'warning',
    'no-define-constants': 'warning',
    'enum-name': 'warning',
    'enum-value-prefix': 'warning',
    'function-name': 'warning',
    'indent-style': 'warning',
    'no-trailing-whitespace': 'warning',
    'max-line-length': 'off',
    'newline-at-eof': 'warning',
    'pointer-asterisk-spacing': 'warning',
};
