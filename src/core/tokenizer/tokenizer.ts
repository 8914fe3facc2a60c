/**
 * @fileoverview Objective-C tokenizer.
 * Lexes source text into a flat token stream that is just rich enough for
 * declaration extraction. Never throws: malformed input degrades into
 * punctuation tokens or literals that end at end of line.
 * Layer 1 - imports only from types/ (Layer 0).
 *
 * @module core/tokenizer/tokenizer
 */

import type { Position } from '../../types/base.js';
import type { Token, TokenKind } from '../../types/tokens.js';

// ============================================================
// Character Classes
// ============================================================

const isIdentifierStart = (ch: string): boolean => /[A-Za-z_$]/.test(ch);
const isIdentifierPart = (ch: string): boolean => /[A-Za-z0-9_$]/.test(ch);
const isDigit = (ch: string): boolean => ch >= '0' && ch <= '9';
const isBlank = (ch: string): boolean => ch === ' ' || ch === '\t' || ch === '\f' || ch === '\v';

// ============================================================
// Lexer
// ============================================================

/**
 * Cursor over the source text that tracks zero-based line and column.
 */
class Lexer {
    private pos = 0;
    private line = 0;
    private column = 0;
    /** True while only blanks have been seen since the last newline */
    private atLineStart = true;
    private readonly tokens: Token[] = [];

    constructor(private readonly text: string) {}

    run(): readonly Token[] {
        while (this.pos < this.text.length) {
            this.next();
        }
        return this.tokens;
    }

    private peek(ahead = 0): string {
        return this.text.charAt(this.pos + ahead);
    }

    private advance(): void {
        const ch = this.text.charAt(this.pos);
        this.pos++;
        if (ch === '\n') {
            this.line++;
            this.column = 0;
        } else if (ch === '\r' && this.peek() !== '\n') {
            // lone carriage return ends a line too
            this.line++;
            this.column = 0;
        } else if (ch !== '\r') {
            this.column++;
        }
    }

    private position(): Position {
        return { line: this.line, character: this.column };
    }

    private next(): void {
        const ch = this.peek();

        if (ch === '\n' || ch === '\r') {
            this.advance();
            this.atLineStart = true;
            return;
        }
        if (isBlank(ch)) {
            this.advance();
            return;
        }

        const startOffset = this.pos;
        const start = this.position();
        const kind = this.scan(ch);
        this.atLineStart = false;

        this.tokens.push({
            kind,
            text: this.text.slice(startOffset, this.pos),
            offset: startOffset,
            range: { start, end: this.position() },
        });
    }

    /**
     * Consumes one token starting at `ch` and returns its kind.
     */
    private scan(ch: string): TokenKind {
        if (ch === '#' && this.atLineStart) {
            this.scanDirective();
            return 'directive';
        }
        if (ch === '/' && this.peek(1) === '/') {
            this.scanToLineEnd();
            return 'comment';
        }
        if (ch === '/' && this.peek(1) === '*') {
            this.scanBlockComment();
            return 'comment';
        }
        if (ch === '@' && this.peek(1) === '"') {
            this.advance();
            this.scanQuoted('"');
            return 'string';
        }
        if (ch === '@' && isIdentifierStart(this.peek(1))) {
            this.advance();
            this.scanIdentifier();
            return 'at-keyword';
        }
        if (ch === '"') {
            this.scanQuoted('"');
            return 'string';
        }
        if (ch === "'") {
            this.scanQuoted("'");
            return 'char';
        }
        if (isDigit(ch) || (ch === '.' && isDigit(this.peek(1)))) {
            this.scanNumber();
            return 'number';
        }
        if (isIdentifierStart(ch)) {
            this.scanIdentifier();
            return 'identifier';
        }
        if (ch === '.' && this.peek(1) === '.' && this.peek(2) === '.') {
            this.advance();
            this.advance();
            this.advance();
            return 'punctuation';
        }
        if (ch === '-' && this.peek(1) === '>') {
            this.advance();
            this.advance();
            return 'punctuation';
        }
        this.advance();
        return 'punctuation';
    }

    private scanIdentifier(): void {
        while (this.pos < this.text.length && isIdentifierPart(this.peek())) {
            this.advance();
        }
    }

    private scanNumber(): void {
        while (this.pos < this.text.length) {
            const ch = this.peek();
            if (/[eEpP]/.test(ch) && (this.peek(1) === '+' || this.peek(1) === '-')) {
                // Hex literals use e as a digit; only a following sign makes it an exponent.
                this.advance();
                this.advance();
            } else if (/[A-Za-z0-9_.]/.test(ch)) {
                this.advance();
            } else {
                break;
            }
        }
    }

    private scanToLineEnd(): void {
        while (this.pos < this.text.length) {
            const ch = this.peek();
            if (ch === '\n' || ch === '\r') break;
            this.advance();
        }
    }

    private scanBlockComment(): void {
        this.advance();
        this.advance();
        while (this.pos < this.text.length) {
            if (this.peek() === '*' && this.peek(1) === '/') {
                this.advance();
                this.advance();
                return;
            }
            this.advance();
        }
    }

    /**
     * Consumes a quoted literal. An unterminated literal stops before the newline.
     */
    private scanQuoted(quote: string): void {
        this.advance();
        while (this.pos < this.text.length) {
            const ch = this.peek();
            if (ch === '\\') {
                this.advance();
                if (this.pos < this.text.length) this.advance();
                continue;
            }
            if (ch === '\n' || ch === '\r') return;
            this.advance();
            if (ch === quote) return;
        }
    }

    /**
     * Consumes a preprocessor line, following backslash continuations.
     */
    private scanDirective(): void {
        while (this.pos < this.text.length) {
            const ch = this.peek();
            if (ch === '\\' && (this.peek(1) === '\n' || this.peek(1) === '\r')) {
                this.advance();
                if (this.peek() === '\r' && this.peek(1) === '\n') this.advance();
                this.advance();
                continue;
            }
            if (ch === '\n' || ch === '\r') return;
            this.advance();
        }
    }
}

// ============================================================
// Public API
// ============================================================

/**
 * Lexes Objective-C source into tokens.
 * Whitespace is dropped; comments and preprocessor lines are kept as tokens.
 *
 * @example
 * tokenize('@interface XYZPhotoView : UIView').map(t => t.text);
 * // ['@interface', 'XYZPhotoView', ':', 'UIView']
 */
export function tokenize(text: string): readonly Token[] {
    return new Lexer(text).run();
}

/**
 * True for tokens the extractor parses: everything but comments and directives.
 */
export function isSignificant(token: Token): boolean {
    return token.kind !== 'comment' && token.kind !== 'directive';
}
