/**
 * @fileoverview Configuration types for objclint.
 * Defines all configuration interfaces for .objclint.json files.
 * Zero imports from other project files - this is Layer 0.
 *
 * @module types/config
 */

// ============================================================
// Lint Rule Types
// ============================================================

/**
 * Available lint rules.
 * Naming rules check declarations; whitespace rules check source lines.
 */
export type LintRule =
    | 'class-prefix'
    | 'class-name-case'
    | 'class-hierarchy-suffix'
    | 'protocol-name'
    | 'category-name-case'
    | 'category-method-prefix'
    | 'method-name-case'
    | 'method-no-get-prefix'
    | 'method-parameter-name'
    | 'property-name-case'
    | 'ivar-underscore-prefix'
    | 'variable-name-case'
    | 'constant-name'
    | 'no-define-constants'
    | 'enum-name'
    | 'enum-value-prefix'
    | 'function-name'
    | 'indent-style'
    | 'no-trailing-whitespace'
    | 'max-line-length'
    | 'newline-at-eof'
    | 'pointer-asterisk-spacing';

/**
 * Severity level for lint rules.
 * - error: Fails the lint run
 * - warning: Reports but doesn't fail
 * - off: Rule is disabled
 */
export type LintSeverity = 'error' | 'warning' | 'off';

/**
 * Output formats for lint reports.
 * - stylish: Grouped, human-readable terminal output
 * - compact: One line per problem, editor friendly
 * - json: The full report as JSON
 * - markdown: A table per file, for pull request comments
 */
export type OutputFormat = 'stylish' | 'compact' | 'json' | 'markdown';

/**
 * Indentation style enforced by `indent-style`.
 */
export type IndentStyle = 'tabs' | 'spaces';

// ============================================================
// Source Configuration
// ============================================================

/**
 * Configuration for source file selection.
 */
export interface SourceConfig {
    /** Glob patterns for files to include */
    readonly include: readonly string[];
    /** Glob patterns for files to exclude */
    readonly exclude: readonly string[];
    /** Whether to follow symbolic links */
    readonly followSymlinks: boolean;
}

// ============================================================
// Lint Configuration
// ============================================================

/**
 * Configuration for lint rule severities.
 * Maps each lint rule to its severity level.
 */
export type LintRulesConfig = Record<LintRule, LintSeverity>;

/**
 * Options for the naming rules.
 */
export interface NamingConfig {
    /** Required project prefix (e.g. 'XYZ'); any prefix is accepted when unset */
    readonly classPrefix?: string;
    /** Minimum length of an inferred uppercase prefix */
    readonly minPrefixLength: number;
    /** Whether constants may start with a lowercase `k` */
    readonly allowKPrefix: boolean;
    /** Superclasses whose subclasses need not repeat their last word */
    readonly hierarchyExempt: readonly string[];
    /** C function names exempt from `function-name` */
    readonly functionExempt: readonly string[];
}

/**
 * Options for the whitespace rules.
 */
export interface WhitespaceConfig {
    /** Indentation style */
    readonly indent: IndentStyle;
    /** Width a tab expands to when measuring line length */
    readonly tabWidth: number;
    /** Maximum line width for `max-line-length` */
    readonly maxLineLength: number;
}

/**
 * Configuration for linting.
 */
export interface LintConfig {
    /** Rule severities */
    readonly rules: LintRulesConfig;
    readonly naming: NamingConfig;
    readonly whitespace: WhitespaceConfig;
}

// ============================================================
// Output Configuration
// ============================================================

/**
 * Configuration for report output.
 */
export interface OutputConfig {
    /** Report format */
    readonly format: OutputFormat;
    /** Warnings tolerated before the run fails; -1 tolerates any number */
    readonly maxWarnings: number;
}

// ============================================================
// Root Configuration
// ============================================================

/**
 * Complete objclint configuration.
 */
export interface ObjclintConfig {
    /** Config schema version */
    readonly version: 1;
    readonly source: SourceConfig;
    readonly linting: LintConfig;
    readonly output: OutputConfig;
}

/**
 * Shape accepted from a config file: every section and field optional.
 */
export interface PartialObjclintConfig {
    readonly version?: 1;
    readonly source?: Partial<SourceConfig>;
    readonly linting?: {
        readonly rules?: Partial<LintRulesConfig>;
        readonly naming?: Partial<NamingConfig>;
        readonly whitespace?: Partial<WhitespaceConfig>;
    };
    readonly output?: Partial<OutputConfig>;
}
