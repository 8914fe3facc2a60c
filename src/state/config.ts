/**
 * @fileoverview Configuration management for objclint.
 * Handles loading, saving, validation, and merging of .objclint.json files.
 *
 * @module state/config
 */

import { readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { AsyncResult, Result } from '../types/base.js';
import type {
    LintConfig,
    LintRule,
    NamingConfig,
    ObjclintConfig,
    OutputConfig,
    PartialObjclintConfig,
    SourceConfig,
    WhitespaceConfig,
} from '../types/config.js';
import { DEFAULT_RULE_SEVERITIES, isLintRule } from '../core/linter/registry.js';
import { createLogger } from '../utils/logger.js';
import { err, errorMessage, flatMapResult, mapResult, ok } from '../utils/result.js';

const log = createLogger('config');

// ============================================================
// Types
// ============================================================

/**
 * Error types for configuration operations.
 */
export type ConfigError =
    | { readonly type: 'io'; readonly message: string }
    | { readonly type: 'parse'; readonly message: string }
    | { readonly type: 'validation'; readonly message: string };

// ============================================================
// Constants
// ============================================================

export const CONFIG_FILE = '.objclint.json';

/**
 * Default source configuration.
 */
const DEFAULT_SOURCE: SourceConfig = {
    include: ['**/*.{h,m,mm}'],
    exclude: ['**/Pods/**', '**/Carthage/**', '**/build/**', '**/DerivedData/**', '**/node_modules/**'],
    followSymlinks: false,
};

/**
 * Default naming configuration. No project prefix is required until one is set.
 */
const DEFAULT_NAMING: NamingConfig = {
    minPrefixLength: 3,
    allowKPrefix: true,
    hierarchyExempt: ['NSObject', 'NSProxy', 'UIResponder'],
    functionExempt: ['main'],
};

/**
 * Default whitespace configuration.
 */
const DEFAULT_WHITESPACE: WhitespaceConfig = {
    indent: 'tabs',
    tabWidth: 4,
    maxLineLength: 120,
};

/**
 * Default lint configuration.
 */
const DEFAULT_LINT: LintConfig = {
    rules: DEFAULT_RULE_SEVERITIES,
    naming: DEFAULT_NAMING,
    whitespace: DEFAULT_WHITESPACE,
};

/**
 * Default output configuration.
 */
const DEFAULT_OUTPUT: OutputConfig = {
    format: 'stylish',
    maxWarnings: -1,
};

// ============================================================
// Schemas
// ============================================================

const severitySchema = z.enum(['error', 'warning', 'off']);

const ruleIdSchema = z.custom<LintRule>((value) => typeof value === 'string' && isLintRule(value), {
    message: 'Unknown rule',
});

const positiveInt = z.number().int().positive();

const sourceSchema = z
    .object({
        include: z.array(z.string().min(1)).min(1),
        exclude: z.array(z.string().min(1)),
        followSymlinks: z.boolean(),
    })
    .partial()
    .strict();

const namingSchema = z
    .object({
        classPrefix: z.string().regex(/^[A-Z][A-Za-z0-9]*$/, 'Must start with an uppercase letter'),
        minPrefixLength: positiveInt,
        allowKPrefix: z.boolean(),
        hierarchyExempt: z.array(z.string()),
        functionExempt: z.array(z.string()),
    })
    .partial()
    .strict();

const whitespaceSchema = z
    .object({
        indent: z.enum(['tabs', 'spaces']),
        tabWidth: positiveInt,
        maxLineLength: positiveInt,
    })
    .partial()
    .strict();

const configSchema = z
    .object({
        version: z.literal(1),
        source: sourceSchema,
        linting: z
            .object({
                rules: z.record(ruleIdSchema, severitySchema),
                naming: namingSchema,
                whitespace: whitespaceSchema,
            })
            .partial()
            .strict(),
        output: z
            .object({
                format: z.enum(['stylish', 'compact', 'json', 'markdown']),
                maxWarnings: z.number().int().min(-1),
            })
            .partial()
            .strict(),
    })
    .partial()
    .strict();

// ============================================================
// Default Configuration
// ============================================================

/**
 * Returns the default objclint configuration.
 *
 * @example
 * const config = getDefault();
 * console.log(config.linting.whitespace.indent); // 'tabs'
 */
export function getDefault(): ObjclintConfig {
    return {
        version: 1,
        source: DEFAULT_SOURCE,
        linting: DEFAULT_LINT,
        output: DEFAULT_OUTPUT,
    };
}

// ============================================================
// Configuration Validation
// ============================================================

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Validates a parsed object as a (partial) objclint configuration.
 * Unknown keys and unknown rule ids are rejected.
 *
 * @example
 * validateConfig({ output: { format: 'xml' } });
 * // { ok: false, error: { type: 'validation', message: "output.format: Invalid enum value. ..." } }
 */
export function validateConfig(obj: unknown): Result<PartialObjclintConfig, ConfigError> {
    const parsed = configSchema.safeParse(obj);
    if (!parsed.success) {
        return err({ type: 'validation', message: formatIssues(parsed.error) });
    }
    return ok(parsed.data);
}

function parseJson(json: string, origin: string): Result<unknown, ConfigError> {
    try {
        const value: unknown = JSON.parse(json);
        return ok(value);
    } catch (e) {
        return err({ type: 'parse', message: `Invalid JSON in ${origin}: ${errorMessage(e)}` });
    }
}

function validateFrom(obj: unknown, origin: string): Result<PartialObjclintConfig, ConfigError> {
    const validated = validateConfig(obj);
    if (!validated.ok) {
        return err({ type: 'validation', message: `Invalid ${origin}: ${validated.error.message}` });
    }
    return validated;
}

/**
 * Parses and validates the text of a config file.
 */
export function parseConfig(json: string, origin: string = CONFIG_FILE): Result<PartialObjclintConfig, ConfigError> {
    return flatMapResult(parseJson(json, origin), (obj) => validateFrom(obj, origin));
}

// ============================================================
// Configuration Loading
// ============================================================

function isMissingFile(e: unknown): boolean {
    return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Loads configuration from a directory or an explicit file path.
 * A directory without .objclint.json yields the defaults; a missing explicit
 * file is an error.
 *
 * @example
 * const result = await loadConfig(process.cwd());
 * if (result.ok) {
 *   console.log(result.value.output.format);
 * }
 */
export async function loadConfig(location: string): AsyncResult<ObjclintConfig, ConfigError> {
    let configPath: string;
    let explicit: boolean;
    try {
        const stats = await stat(location);
        explicit = !stats.isDirectory();
        configPath = explicit ? location : join(location, CONFIG_FILE);
    } catch (e) {
        return err({ type: 'io', message: `Failed to load config from ${location}: ${errorMessage(e)}` });
    }

    let content: string;
    try {
        content = await readFile(configPath, 'utf8');
    } catch (e) {
        if (!explicit && isMissingFile(e)) {
            log.debug(`No ${CONFIG_FILE} in ${location}, using defaults`);
            return ok(getDefault());
        }
        return err({ type: 'io', message: `Failed to load config: ${errorMessage(e)}` });
    }

    log.debug(`Loaded ${configPath}`);
    // Merge with defaults to ensure all fields are present
    return mapResult(parseConfig(content, configPath), (partial) => mergeConfigs(getDefault(), partial));
}

// ============================================================
// Configuration Saving
// ============================================================

/**
 * Writes configuration to .objclint.json in a directory.
 *
 * @returns AsyncResult with the path written
 */
export async function saveConfig(directory: string, config: ObjclintConfig): AsyncResult<string, ConfigError> {
    const configPath = join(directory, CONFIG_FILE);
    try {
        await writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, 'utf8');
        return ok(configPath);
    } catch (e) {
        return err({ type: 'io', message: `Failed to save config: ${errorMessage(e)}` });
    }
}

// ============================================================
// Configuration Merging
// ============================================================

/**
 * Merges a partial configuration into a base configuration.
 * Override values take precedence; the rule map is merged key by key.
 *
 * @example
 * const merged = mergeConfigs(getDefault(), { linting: { naming: { classPrefix: 'XYZ' } } });
 */
export function mergeConfigs(base: ObjclintConfig, override: PartialObjclintConfig): ObjclintConfig {
    return {
        version: 1,
        source: mergeSource(base.source, override.source),
        linting: mergeLinting(base.linting, override.linting),
        output: mergeOutput(base.output, override.output),
    };
}

function mergeSource(base: SourceConfig, override?: Partial<SourceConfig>): SourceConfig {
    if (!override) return base;
    return {
        include: override.include ?? base.include,
        exclude: override.exclude ?? base.exclude,
        followSymlinks: override.followSymlinks ?? base.followSymlinks,
    };
}

function mergeNaming(base: NamingConfig, override?: Partial<NamingConfig>): NamingConfig {
    if (!override) return base;
    const result: NamingConfig = {
        minPrefixLength: override.minPrefixLength ?? base.minPrefixLength,
        allowKPrefix: override.allowKPrefix ?? base.allowKPrefix,
        hierarchyExempt: override.hierarchyExempt ?? base.hierarchyExempt,
        functionExempt: override.functionExempt ?? base.functionExempt,
    };
    // Handle optional classPrefix
    const classPrefix = override.classPrefix ?? base.classPrefix;
    if (classPrefix !== undefined) {
        return { ...result, classPrefix };
    }
    return result;
}

function mergeWhitespace(base: WhitespaceConfig, override?: Partial<WhitespaceConfig>): WhitespaceConfig {
    if (!override) return base;
    return {
        indent: override.indent ?? base.indent,
        tabWidth: override.tabWidth ?? base.tabWidth,
        maxLineLength: override.maxLineLength ?? base.maxLineLength,
    };
}

function mergeLinting(base: LintConfig, override?: PartialObjclintConfig['linting']): LintConfig {
    if (!override) return base;
    return {
        rules: override.rules ? { ...base.rules, ...override.rules } : base.rules,
        naming: mergeNaming(base.naming, override.naming),
        whitespace: mergeWhitespace(base.whitespace, override.whitespace),
    };
}

function mergeOutput(base: OutputConfig, override?: Partial<OutputConfig>): OutputConfig {
    if (!override) return base;
    return {
        format: override.format ?? base.format,
        maxWarnings: override.maxWarnings ?? base.maxWarnings,
    };
}
