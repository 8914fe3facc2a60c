/**
 * @fileoverview Property tests for the tokenizer.
 * Tokens must cover the source exactly: every token's text is the slice at
 * its offset, tokens never overlap, and only whitespace falls between them.
 *
 * @module test/property/tokenizer.property.test
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import type { Position } from '../../src/types/base.js';
import { tokenize } from '../../src/core/tokenizer/tokenizer.js';

// ============================================================
// Arbitrary Generators
// ============================================================

const SOURCE_CHARS = [
    'a', 'Z', '_', '$', 'e', 'x', '0', '7',
    '@', '#', '/', '*', '"', "'", '\\', '.', '-', '>', '+',
    '(', ')', '{', '}', '[', ']', '<', ';', ':', ',', '^',
    ' ', '\t', '\n', '\r', 'é',
];

/** Short texts dense in comment, string and directive delimiters. */
const arbSource = fc.stringOf(fc.constantFrom(...SOURCE_CHARS), { maxLength: 200 });

/** Same alphabet with `\n` as the only line terminator. */
const arbUnixSource = fc.stringOf(fc.constantFrom(...SOURCE_CHARS.filter((ch) => ch !== '\r')), {
    maxLength: 200,
});

/** Builds a token stream from whole Objective-C fragments. */
const arbFragmentSource = fc
    .array(
        fc.constantFrom(
            '@interface', '@end', 'XYZFeed', ':', 'NSObject', '- (void)reload;', '/* note */',
            '// line', '@"text"', "'c'", '#define XYZ_MAX 3', '0x1Fp-2', '...', '->', '\\'
        ),
        { maxLength: 30 }
    )
    .chain((parts) => fc.constantFrom(' ', '\n', '').map((separator) => parts.join(separator)));

function positionAt(text: string, offset: number): Position {
    const lines = text.slice(0, offset).split('\n');
    return { line: lines.length - 1, character: (lines[lines.length - 1] ?? '').length };
}

// ============================================================
// Properties
// ============================================================

describe('Property: Tokenizer Coverage', () => {
    it('slices every token text from its offset', () => {
        fc.assert(
            fc.property(fc.oneof(arbSource, arbFragmentSource), (text) => {
                for (const token of tokenize(text)) {
                    expect(token.text.length).toBeGreaterThan(0);
                    expect(text.slice(token.offset, token.offset + token.text.length)).toBe(token.text);
                }
            }),
            { numRuns: 200 }
        );
    });

    it('emits tokens in order without overlap, separated only by whitespace', () => {
        fc.assert(
            fc.property(fc.oneof(arbSource, arbFragmentSource), (text) => {
                let end = 0;
                for (const token of tokenize(text)) {
                    expect(token.offset).toBeGreaterThanOrEqual(end);
                    expect(text.slice(end, token.offset)).toMatch(/^[ \t\f\v\r\n]*$/);
                    end = token.offset + token.text.length;
                }
                expect(text.slice(end)).toMatch(/^[ \t\f\v\r\n]*$/);
            }),
            { numRuns: 200 }
        );
    });

    it('reports positions that match the offsets', () => {
        fc.assert(
            fc.property(arbUnixSource, (text) => {
                for (const token of tokenize(text)) {
                    expect(token.range.start).toEqual(positionAt(text, token.offset));
                    expect(token.range.end).toEqual(positionAt(text, token.offset + token.text.length));
                }
            }),
            { numRuns: 200 }
        );
    });
});
