/**
 * @fileoverview objclint library entry point.
 *
 * @example
 * import { getDefault, lintSource, toFilePath } from 'objclint';
 *
 * const results = lintSource(toFilePath('Feed.h'), source, getDefault().linting);
 *
 * @module objclint
 */

export * from './types/index.js';
export * from './utils/index.js';

export { tokenize, isSignificant } from './core/tokenizer/tokenizer.js';
export { extractDeclarations } from './core/extractor/declarations.js';
export {
    lintDeclarations,
    lintSource,
    lintFiles,
    collectInterfaceKeys,
    declarationKey,
} from './core/linter/linter.js';
export type { SourceFile, FileLintResult } from './core/linter/linter.js';
export { listRules, getRule, isLintRule, RULES, DEFAULT_RULE_SEVERITIES } from './core/linter/registry.js';
export type { RuleDefinition } from './core/linter/registry.js';
export { parseSuppressions, applySuppressions } from './core/linter/suppressions.js';
export type { SuppressionDirective, SuppressionKind } from './core/linter/suppressions.js';
export { createReport, exitCodeFor } from './core/reporter/reporter.js';
export { render, renderStylish, renderCompact, renderJson, renderMarkdown } from './core/renderer/index.js';

export { CONFIG_FILE, getDefault, loadConfig, saveConfig, validateConfig, parseConfig, mergeConfigs } from './state/config.js';
export type { ConfigError } from './state/config.js';
export { runLint, discoverFiles } from './commands/lint.js';
export type { LintRunOptions, LintRunError } from './commands/lint.js';
export { VERSION } from './version.js';
