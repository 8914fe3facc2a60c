/**
 * @fileoverview Token types produced by the Objective-C tokenizer.
 * Imports only from types/base.ts - Layer 0 of the type system.
 *
 * @module types/tokens
 */

import type { Range } from './base.js';

/**
 * Kind of lexical token.
 *
 * - `identifier`: names and C keywords alike (`NSString`, `static`, `const`)
 * - `at-keyword`: compiler directives such as `@interface` or `@property`
 * - `directive`: a whole preprocessor line, continuation lines included
 * - `comment`: line or block comment, delimiters included
 */
export type TokenKind =
    | 'identifier'
    | 'at-keyword'
    | 'number'
    | 'string'
    | 'char'
    | 'punctuation'
    | 'comment'
    | 'directive';

/**
 * A single token of Objective-C source text.
 *
 * @example
 * const token: Token = {
 *   kind: 'at-keyword',
 *   text: '@interface',
 *   offset: 0,
 *   range: { start: { line: 0, character: 0 }, end: { line: 0, character: 10 } }
 * };
 */
export interface Token {
    /** Lexical category */
    readonly kind: TokenKind;
    /** Exact source text of the token */
    readonly text: string;
    /** Zero-based character offset of the first character */
    readonly offset: number;
    /** Source range covered by the token */
    readonly range: Range;
}
