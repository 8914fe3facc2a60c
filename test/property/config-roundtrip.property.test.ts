/**
 * @fileoverview Property test for configuration round-trip consistency.
 * Verifies that an ObjclintConfig survives serialization, validation and
 * merging over the defaults without data loss.
 *
 * @module test/property/config-roundtrip.property.test
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import type {
    IndentStyle,
    LintRulesConfig,
    LintSeverity,
    ObjclintConfig,
    OutputFormat,
} from '../../src/types/config.js';
import { listRules } from '../../src/core/linter/registry.js';
import { getDefault, mergeConfigs, validateConfig } from '../../src/state/config.js';

// ============================================================
// Arbitrary Generators
// ============================================================

const arbOutputFormat: fc.Arbitrary<OutputFormat> = fc.constantFrom('stylish', 'compact', 'json', 'markdown');

const arbLintSeverity: fc.Arbitrary<LintSeverity> = fc.constantFrom('error', 'warning', 'off');

const arbIndentStyle: fc.Arbitrary<IndentStyle> = fc.constantFrom('tabs', 'spaces');

const arbGlobPattern = fc.stringMatching(/^(\*\*\/)?[a-z*]+(\.[a-z*]+)?$/);

const arbTypeName = fc.stringMatching(/^[A-Z][A-Za-z0-9]{0,12}$/);

/**
 * Generates a severity for every registered rule.
 */
const arbLintRulesConfig: fc.Arbitrary<LintRulesConfig> = fc
    .array(arbLintSeverity, { minLength: listRules().length, maxLength: listRules().length })
    .map((severities) => {
        const rules: LintRulesConfig = { ...getDefault().linting.rules };
        listRules().forEach((rule, index) => {
            rules[rule.id] = severities[index] ?? rule.defaultSeverity;
        });
        return rules;
    });

const arbSourceConfig = fc.record({
    include: fc.array(arbGlobPattern, { minLength: 1, maxLength: 5 }),
    exclude: fc.array(arbGlobPattern, { minLength: 0, maxLength: 5 }),
    followSymlinks: fc.boolean(),
});

const arbNamingConfig = fc.record(
    {
        classPrefix: arbTypeName,
        minPrefixLength: fc.integer({ min: 1, max: 6 }),
        allowKPrefix: fc.boolean(),
        hierarchyExempt: fc.array(arbTypeName, { maxLength: 4 }),
        functionExempt: fc.array(fc.stringMatching(/^[a-z][A-Za-z0-9]{0,12}$/), { maxLength: 4 }),
    },
    // classPrefix is left out of some records
    { requiredKeys: ['minPrefixLength', 'allowKPrefix', 'hierarchyExempt', 'functionExempt'] }
);

const arbWhitespaceConfig = fc.record({
    indent: arbIndentStyle,
    tabWidth: fc.integer({ min: 1, max: 8 }),
    maxLineLength: fc.integer({ min: 40, max: 240 }),
});

const arbOutputConfig = fc.record({
    format: arbOutputFormat,
    maxWarnings: fc.integer({ min: -1, max: 500 }),
});

/**
 * Generates a complete, valid ObjclintConfig.
 */
const arbObjclintConfig: fc.Arbitrary<ObjclintConfig> = fc
    .record({
        source: arbSourceConfig,
        rules: arbLintRulesConfig,
        naming: arbNamingConfig,
        whitespace: arbWhitespaceConfig,
        output: arbOutputConfig,
    })
    .map(({ source, rules, naming, whitespace, output }): ObjclintConfig => ({
        version: 1,
        source,
        linting: { rules, naming, whitespace },
        output,
    }));

// ============================================================
// Properties
// ============================================================

describe('Property: Configuration Round-Trip', () => {
    it('validates and restores any serialized config', () => {
        fc.assert(
            fc.property(arbObjclintConfig, (config) => {
                const parsed: unknown = JSON.parse(JSON.stringify(config));
                const validated = validateConfig(parsed);
                expect(validated.ok).toBe(true);
                if (!validated.ok) return;

                expect(mergeConfigs(getDefault(), validated.value)).toEqual(config);
            }),
            { numRuns: 100 }
        );
    });

    it('leaves a config unchanged when merging an empty override', () => {
        fc.assert(
            fc.property(arbObjclintConfig, (config) => {
                expect(mergeConfigs(config, {})).toEqual(config);
            }),
            { numRuns: 100 }
        );
    });

    it('lets the override win for every rule it sets', () => {
        fc.assert(
            fc.property(arbObjclintConfig, arbLintRulesConfig, (config, rules) => {
                const merged = mergeConfigs(config, { linting: { rules } });
                expect(merged.linting.rules).toEqual(rules);
                expect(merged.linting.naming).toEqual(config.linting.naming);
            }),
            { numRuns: 50 }
        );
    });
});
