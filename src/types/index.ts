/**
 * @fileoverview Barrel file for objclint type definitions.
 * Re-exports all types from Layer 0 type modules.
 *
 * @module types
 */

// Base types (foundational, no dependencies)
export type {
    FilePath,
    Position,
    Range,
    SourceLocation,
    Result,
    AsyncResult,
} from './base.js';
export { toFilePath } from './base.js';

// Config types (no dependencies)
export type {
    LintRule,
    LintSeverity,
    OutputFormat,
    IndentStyle,
    SourceConfig,
    LintRulesConfig,
    NamingConfig,
    WhitespaceConfig,
    LintConfig,
    OutputConfig,
    ObjclintConfig,
    PartialObjclintConfig,
} from './config.js';

// Token types (depends on: base)
export type { TokenKind, Token } from './tokens.js';

// Declaration types (depends on: base, tokens)
export type {
    DeclarationKind,
    DeclarationSite,
    StorageClass,
    ContainerRef,
    ClassDeclaration,
    CategoryDeclaration,
    ProtocolDeclaration,
    ParameterDeclaration,
    MethodDeclaration,
    PropertyDeclaration,
    IvarDeclaration,
    ConstantDeclaration,
    VariableDeclaration,
    EnumeratorDeclaration,
    EnumStyle,
    EnumDeclaration,
    FunctionDeclaration,
    MacroDeclaration,
    Declaration,
    FileDeclarations,
} from './declarations.js';

// Lint types (depends on: base, config)
export type {
    LintResultSeverity,
    LintResult,
    RuleCategory,
    RuleMetadata,
    FileReport,
    ReportSummary,
    LintReport,
} from './lint.js';
