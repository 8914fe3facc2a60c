/**
 * @fileoverview Command line interface.
 *
 * Exit codes: 0 clean run, 1 lint errors or too many warnings, 2 usage,
 * configuration or I/O failure.
 *
 * @module cli
 */

import { access } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { parseArgs } from 'node:util';
import type { LintRule, LintSeverity, OutputFormat, PartialObjclintConfig } from './types/config.js';
import { isLintRule, listRules } from './core/linter/registry.js';
import { exitCodeFor } from './core/reporter/reporter.js';
import { render } from './core/renderer/index.js';
import { runLint } from './commands/lint.js';
import { CONFIG_FILE, getDefault, loadConfig, mergeConfigs, saveConfig } from './state/config.js';
import { createLogger, setLogLevel } from './utils/logger.js';
import { err, errorMessage, ok } from './utils/result.js';
import type { Result } from './types/base.js';
import { VERSION } from './version.js';

const log = createLogger('cli');

// ============================================================
// Types
// ============================================================

/**
 * Where the CLI writes and which directory it runs in.
 */
export interface CliIO {
    readonly cwd: string;
    readonly stdout: (text: string) => void;
    readonly stderr: (text: string) => void;
}

const defaultIO: CliIO = {
    cwd: process.cwd(),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
};

export const USAGE = `Usage: objclint [options] [paths...]

Lints Objective-C sources (.h, .m, .mm) against naming and whitespace conventions.

Options:
  -c, --config <path>        Config file (default: ./${CONFIG_FILE})
  -f, --format <format>      stylish | compact | json | markdown
      --max-warnings <n>     Fail when there are more than n warnings (-1: no limit)
      --rule <id=severity>   Override a rule severity (error | warning | off); repeatable
      --list-rules           List the available rules
      --print-config         Print the effective configuration
      --init                 Write a default ${CONFIG_FILE} to the working directory
      --verbose              Log debug output to stderr
      --quiet                Log nothing to stderr
  -h, --help                 Show this help
  -v, --version              Show the version
`;

const FORMATS: readonly OutputFormat[] = ['stylish', 'compact', 'json', 'markdown'];
const SEVERITIES: readonly LintSeverity[] = ['error', 'warning', 'off'];

// ============================================================
// Argument Parsing
// ============================================================

function parseCliArgs(argv: readonly string[]) {
    return parseArgs({
        args: [...argv],
        allowPositionals: true,
        strict: true,
        options: {
            config: { type: 'string', short: 'c' },
            format: { type: 'string', short: 'f' },
            'max-warnings': { type: 'string' },
            rule: { type: 'string', multiple: true },
            'list-rules': { type: 'boolean' },
            'print-config': { type: 'boolean' },
            init: { type: 'boolean' },
            verbose: { type: 'boolean' },
            quiet: { type: 'boolean' },
            help: { type: 'boolean', short: 'h' },
            version: { type: 'boolean', short: 'v' },
        },
    });
}

type ParsedArgs = ReturnType<typeof parseCliArgs>;

function isOutputFormat(value: string): value is OutputFormat {
    return FORMATS.some((format) => format === value);
}

function isLintSeverity(value: string): value is LintSeverity {
    return SEVERITIES.some((severity) => severity === value);
}

/**
 * Parses `id=severity` pairs from repeated `--rule` flags.
 *
 * @example
 * parseRuleOverrides(['max-line-length=error']);
 * // { ok: true, value: { 'max-line-length': 'error' } }
 */
export function parseRuleOverrides(pairs: readonly string[]): Result<Partial<Record<LintRule, LintSeverity>>, string> {
    const rules: Partial<Record<LintRule, LintSeverity>> = {};
    for (const pair of pairs) {
        const [id = '', severity = ''] = pair.split('=', 2).map((part) => part.trim());
        if (!isLintRule(id)) return err(`Unknown rule "${id}" in --rule ${pair}`);
        if (!isLintSeverity(severity)) return err(`Invalid severity "${severity}" in --rule ${pair}`);
        rules[id] = severity;
    }
    return ok(rules);
}

/**
 * Collects the config overrides given on the command line.
 */
function overridesFrom(values: ParsedArgs['values']): Result<PartialObjclintConfig, string> {
    let format: OutputFormat | undefined;
    if (values.format !== undefined) {
        if (!isOutputFormat(values.format)) {
            return err(`Invalid format "${values.format}"; expected one of ${FORMATS.join(', ')}`);
        }
        format = values.format;
    }

    let maxWarnings: number | undefined;
    if (values['max-warnings'] !== undefined) {
        const raw = values['max-warnings'];
        maxWarnings = Number(raw);
        if (!/^-?\d+$/.test(raw) || maxWarnings < -1) {
            return err(`Invalid --max-warnings "${raw}"; expected an integer of at least -1`);
        }
    }

    const rules = parseRuleOverrides(values.rule ?? []);
    if (!rules.ok) return rules;

    return ok({
        linting: { rules: rules.value },
        output: {
            ...(format !== undefined && { format }),
            ...(maxWarnings !== undefined && { maxWarnings }),
        },
    });
}

// ============================================================
// Subcommands
// ============================================================

function formatRuleList(): string {
    const rules = listRules();
    const idWidth = Math.max(...rules.map((rule) => rule.id.length));
    const lines = rules.map(
        (rule) =>
            `${rule.id.padEnd(idWidth)}  ${rule.category.padEnd(10)}  ${rule.defaultSeverity.padEnd(7)}  ${rule.description}`
    );
    return `${lines.join('\n')}\n`;
}

async function fileExists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

async function initConfig(io: CliIO): Promise<number> {
    const target = join(io.cwd, CONFIG_FILE);
    if (await fileExists(target)) {
        io.stderr(`objclint: ${target} already exists\n`);
        return 2;
    }
    const saved = await saveConfig(io.cwd, getDefault());
    if (!saved.ok) {
        io.stderr(`objclint: ${saved.error.message}\n`);
        return 2;
    }
    io.stdout(`Wrote ${saved.value}\n`);
    return 0;
}

// ============================================================
// Main
// ============================================================

/**
 * Runs the CLI and resolves with the process exit code.
 *
 * @example
 * const code = await main(['--format', 'compact', 'Sources']);
 */
export async function main(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
    let parsed: ParsedArgs;
    try {
        parsed = parseCliArgs(argv);
    } catch (e) {
        io.stderr(`objclint: ${errorMessage(e)}\n\n${USAGE}`);
        return 2;
    }
    const { values, positionals } = parsed;

    if (values.verbose === true && values.quiet === true) {
        io.stderr('objclint: --verbose and --quiet cannot be combined\n');
        return 2;
    }
    if (values.verbose === true) setLogLevel('debug');
    if (values.quiet === true) setLogLevel('silent');

    if (values.help === true) {
        io.stdout(USAGE);
        return 0;
    }
    if (values.version === true) {
        io.stdout(`${VERSION}\n`);
        return 0;
    }
    if (values['list-rules'] === true) {
        io.stdout(formatRuleList());
        return 0;
    }
    if (values.init === true) {
        return initConfig(io);
    }

    const loaded = await loadConfig(values.config !== undefined ? resolve(io.cwd, values.config) : io.cwd);
    if (!loaded.ok) {
        io.stderr(`objclint: ${loaded.error.message}\n`);
        return 2;
    }

    const overrides = overridesFrom(values);
    if (!overrides.ok) {
        io.stderr(`objclint: ${overrides.error}\n`);
        return 2;
    }
    const config = mergeConfigs(loaded.value, overrides.value);

    if (values['print-config'] === true) {
        io.stdout(`${JSON.stringify(config, null, 2)}\n`);
        return 0;
    }

    log.debug(`Paths: ${positionals.length > 0 ? positionals.join(', ') : '(working directory)'}`);
    const result = await runLint({ cwd: io.cwd, paths: positionals, config });
    if (!result.ok) {
        io.stderr(`objclint: ${result.error.message}\n`);
        return 2;
    }

    io.stdout(render(result.value, config.output.format));
    return exitCodeFor(result.value, config.output.maxWarnings);
}
