/**
 * @fileoverview Smoke tests for core features.
 * Quick sanity checks that the main entry points run end to end over the
 * fixture sources.
 *
 * @module test/smoke/core-features
 */

import { fileURLToPath } from 'node:url';
import { afterEach, describe, it, expect } from 'vitest';
import { runLint } from '../../src/commands/lint.js';
import { main, type CliIO } from '../../src/cli.js';
import { lintSource } from '../../src/core/linter/linter.js';
import { listRules } from '../../src/core/linter/registry.js';
import { getDefault } from '../../src/state/config.js';
import { toFilePath } from '../../src/types/base.js';
import { getLogLevel, setLogLevel } from '../../src/utils/logger.js';

const FIXTURES_DIR = fileURLToPath(new URL('../fixtures/', import.meta.url));

function captureIO(cwd: string): CliIO & { readonly out: string[]; readonly err: string[] } {
    const out: string[] = [];
    const err: string[] = [];
    return { cwd, out, err, stdout: (text) => out.push(text), stderr: (text) => err.push(text) };
}

describe('Smoke: Linting', () => {
    it('lints a clean source without problems', () => {
        const text = '@interface XYZFeed : NSObject\n- (void)reload;\n@end\n';
        expect(lintSource(toFilePath('XYZFeed.h'), text, getDefault().linting)).toEqual([]);
    });

    it('lints an empty file', () => {
        expect(lintSource(toFilePath('Empty.h'), '', getDefault().linting)).toEqual([]);
    });

    it('registers every rule once', () => {
        const ids = listRules().map((rule) => rule.id);
        expect(new Set(ids).size).toBe(ids.length);
    });
});

describe('Smoke: Lint Run', () => {
    it('lints the fixture directory', async () => {
        const result = await runLint({ cwd: FIXTURES_DIR, paths: [], config: getDefault() });
        expect(result.ok).toBe(true);
        if (!result.ok) return;

        expect(result.value.files.map((file) => file.file)).toEqual(['Messy.m', 'XYZFeed.h', 'XYZFeed.m']);
        expect(result.value.summary).toEqual({
            fileCount: 3,
            filesWithProblems: 1,
            errorCount: 0,
            warningCount: 7,
            infoCount: 0,
        });
    });
});

describe('Smoke: CLI', () => {
    const level = getLogLevel();

    afterEach(() => {
        setLogLevel(level);
    });

    it('exits 0 for warnings and 1 once they exceed --max-warnings', async () => {
        const relaxed = captureIO(FIXTURES_DIR);
        expect(await main([], relaxed)).toBe(0);
        expect(relaxed.out.join('')).toMatch(/\n7 problems \(0 errors, 7 warnings, 0 infos\)\n$/);

        const strict = captureIO(FIXTURES_DIR);
        expect(await main(['--max-warnings', '6', '--quiet'], strict)).toBe(1);
    });

    it('lints only the named file', async () => {
        const io = captureIO(FIXTURES_DIR);
        expect(await main(['XYZFeed.m'], io)).toBe(0);
        expect(io.out.join('')).toBe('No problems found in 1 file.\n');
    });
});
