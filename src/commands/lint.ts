/**
 * @fileoverview Lint command: discovers Objective-C sources, lints them as
 * one run and builds the report.
 *
 * @module commands/lint
 */

import { readFile, stat } from 'node:fs/promises';
import { relative, resolve } from 'node:path';
import { glob, hasMagic } from 'glob';
import type { AsyncResult } from '../types/base.js';
import { toFilePath } from '../types/base.js';
import type { ObjclintConfig, SourceConfig } from '../types/config.js';
import type { LintReport } from '../types/lint.js';
import { lintFiles, type SourceFile } from '../core/linter/linter.js';
import { createReport } from '../core/reporter/reporter.js';
import { createLogger } from '../utils/logger.js';
import { err, errorMessage, ok } from '../utils/result.js';

const log = createLogger('lint');

// ============================================================
// Types
// ============================================================

/**
 * Error types for a lint run.
 */
export type LintRunError =
    | { readonly type: 'io'; readonly message: string }
    | { readonly type: 'no-files'; readonly message: string };

export interface LintRunOptions {
    /** Directory paths are resolved against; report paths are relative to it */
    readonly cwd: string;
    /** Files or directories to lint; the working directory when empty */
    readonly paths: readonly string[];
    readonly config: ObjclintConfig;
    /** Lint at most this many files */
    readonly limit?: number;
}

// ============================================================
// File Discovery
// ============================================================

async function expandPatterns(patterns: readonly string[], cwd: string, source: SourceConfig): Promise<string[]> {
    const matches = await glob([...patterns], {
        cwd,
        ignore: [...source.exclude],
        nodir: true,
        follow: source.followSymlinks,
    });
    return matches.map((match) => resolve(cwd, match));
}

/**
 * Resolves files, directories and glob patterns to a sorted, de-duplicated
 * list of absolute file paths. Directories are expanded with the `source`
 * patterns and globs are matched from `cwd` minus `source.exclude`; files
 * named explicitly are kept even when the patterns would not match them.
 */
export async function discoverFiles(
    paths: readonly string[],
    cwd: string,
    source: SourceConfig
): AsyncResult<string[], LintRunError> {
    const targets = paths.length > 0 ? paths : ['.'];
    const files = new Set<string>();

    for (const target of targets) {
        if (hasMagic(target)) {
            for (const file of await expandPatterns([target], cwd, source)) files.add(file);
            continue;
        }

        const absolute = resolve(cwd, target);
        try {
            const stats = await stat(absolute);
            if (stats.isDirectory()) {
                for (const file of await expandPatterns(source.include, absolute, source)) files.add(file);
            } else {
                files.add(absolute);
            }
        } catch (e) {
            return err({ type: 'io', message: `Cannot read ${target}: ${errorMessage(e)}` });
        }
    }

    return ok([...files].sort());
}

// ============================================================
// Lint Run
// ============================================================

async function readSources(files: readonly string[], cwd: string): AsyncResult<SourceFile[], LintRunError> {
    const sources: SourceFile[] = [];
    for (const file of files) {
        try {
            const text = await readFile(file, 'utf8');
            sources.push({ file: toFilePath(relative(cwd, file)), text });
        } catch (e) {
            return err({ type: 'io', message: `Cannot read ${relative(cwd, file)}: ${errorMessage(e)}` });
        }
    }
    return ok(sources);
}

/**
 * Lints the given paths and returns the report.
 *
 * @example
 * const result = await runLint({ cwd: process.cwd(), paths: ['Sources'], config: getDefault() });
 * if (result.ok) {
 *   process.stdout.write(render(result.value, 'stylish'));
 * }
 */
export async function runLint(options: LintRunOptions): AsyncResult<LintReport, LintRunError> {
    const discovered = await discoverFiles(options.paths, options.cwd, options.config.source);
    if (!discovered.ok) {
        return discovered;
    }

    const files = options.limit !== undefined ? discovered.value.slice(0, options.limit) : discovered.value;
    if (files.length === 0) {
        return err({ type: 'no-files', message: 'No Objective-C files matched the given paths' });
    }

    const sources = await readSources(files, options.cwd);
    if (!sources.ok) {
        return sources;
    }

    log.info(`Linting ${files.length} file${files.length === 1 ? '' : 's'}`);
    const report = createReport(lintFiles(sources.value, options.config.linting));
    log.debug(
        `${report.summary.errorCount} errors, ${report.summary.warningCount} warnings in ${report.summary.filesWithProblems} files`
    );
    return ok(report);
}
