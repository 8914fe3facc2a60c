/**
 * @fileoverview Declaration extraction for Objective-C source.
 * Walks the token stream and records the declarations the naming rules need:
 * containers (classes, categories, protocols) and their members, file-scope
 * constants, variables, enumerations, C functions, and `#define` macros.
 * Method and function bodies are skipped by brace matching; nothing inside
 * them is extracted.
 * Layer 2 - imports from types/ (Layer 0) and the tokenizer (Layer 1).
 *
 * @module core/extractor/declarations
 */

import type { FilePath, Position, SourceLocation } from '../../types/base.js';
import type { Token } from '../../types/tokens.js';
import type {
    ContainerRef,
    Declaration,
    DeclarationSite,
    EnumeratorDeclaration,
    EnumStyle,
    FileDeclarations,
    MacroDeclaration,
    ParameterDeclaration,
    StorageClass,
} from '../../types/declarations.js';
import { isSignificant } from '../tokenizer/tokenizer.js';

// ============================================================
// Constants
// ============================================================

const ENUM_MACROS: ReadonlyMap<string, EnumStyle> = new Map([
    ['NS_ENUM', 'ns-enum'],
    ['NS_CLOSED_ENUM', 'ns-enum'],
    ['NS_ERROR_ENUM', 'ns-enum'],
    ['CF_ENUM', 'ns-enum'],
    ['CF_CLOSED_ENUM', 'ns-enum'],
    ['NS_OPTIONS', 'ns-options'],
    ['CF_OPTIONS', 'ns-options'],
]);

const EXTERN_MACROS: ReadonlySet<string> = new Set([
    'extern',
    'FOUNDATION_EXPORT',
    'FOUNDATION_EXTERN',
    'UIKIT_EXTERN',
    'APPKIT_EXTERN',
    'OBJC_EXTERN',
    'CF_EXPORT',
]);

/** Macros that stand alone at file scope, without a terminating semicolon */
const BARE_MACROS: ReadonlySet<string> = new Set([
    'NS_ASSUME_NONNULL_BEGIN',
    'NS_ASSUME_NONNULL_END',
    'CF_ASSUME_NONNULL_BEGIN',
    'CF_ASSUME_NONNULL_END',
    'CF_EXTERN_C_BEGIN',
    'CF_EXTERN_C_END',
    'NS_HEADER_AUDIT_BEGIN',
    'NS_HEADER_AUDIT_END',
]);

/** Annotation macros that may trail a declarator (`NS_UNAVAILABLE`, `__unused`) */
const TRAILING_ANNOTATION = /^(?:(?:NS|CF|UIKIT|APPKIT|API|OBJC|UI)_[A-Z0-9_]+|__\w+)$/;

/** Directives that end any statement in progress */
const STRUCTURAL_KEYWORDS: ReadonlySet<string> = new Set([
    '@interface',
    '@implementation',
    '@protocol',
    '@end',
    '@class',
    '@import',
    '@property',
    '@synthesize',
    '@dynamic',
    '@optional',
    '@required',
    '@public',
    '@private',
    '@protected',
    '@package',
    '@compatibility_alias',
]);

const DEFINE_HEAD = /^#[ \t]*define[ \t]+([A-Za-z_$][\w$]*)/;

// ============================================================
// Token Helpers
// ============================================================

function isPunct(token: Token | undefined, text: string): boolean {
    return token !== undefined && token.kind === 'punctuation' && token.text === text;
}

function isIdent(token: Token | undefined, text?: string): boolean {
    return token !== undefined && token.kind === 'identifier' && (text === undefined || token.text === text);
}

/**
 * Index of the token closing the group opened at `start`, or -1.
 */
function findClosing(tokens: readonly Token[], start: number, open: string, close: string): number {
    let depth = 0;
    for (let i = start; i < tokens.length; i++) {
        const token = tokens[i];
        if (isPunct(token, open)) depth++;
        else if (isPunct(token, close)) {
            depth--;
            if (depth === 0) return i;
        }
    }
    return -1;
}

/**
 * Splits tokens at commas that are not nested in parentheses or brackets.
 */
function splitTopLevel(tokens: readonly Token[], separator: string): Token[][] {
    const parts: Token[][] = [[]];
    let depth = 0;
    for (const token of tokens) {
        if (isPunct(token, '(') || isPunct(token, '[') || isPunct(token, '{')) depth++;
        else if (isPunct(token, ')') || isPunct(token, ']') || isPunct(token, '}')) depth--;

        if (depth === 0 && isPunct(token, separator)) {
            parts.push([]);
        } else {
            parts[parts.length - 1]?.push(token);
        }
    }
    return parts;
}

/**
 * Index of the first top-level occurrence of a punctuation token, or -1.
 */
function indexOfTopLevel(tokens: readonly Token[], text: string): number {
    let depth = 0;
    for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];
        if (depth === 0 && isPunct(token, text)) return i;
        if (isPunct(token, '(') || isPunct(token, '[')) depth++;
        else if (isPunct(token, ')') || isPunct(token, ']')) depth--;
    }
    return -1;
}

/**
 * Removes trailing annotations (`API_AVAILABLE(ios(13))`, `NS_UNAVAILABLE`,
 * `__attribute__((unused))`) from a declarator.
 */
function stripTrailingAnnotations(tokens: readonly Token[]): readonly Token[] {
    let end = tokens.length;
    for (;;) {
        const last = tokens[end - 1];
        if (isPunct(last, ')')) {
            let depth = 0;
            let open = -1;
            for (let i = end - 1; i >= 0; i--) {
                if (isPunct(tokens[i], ')')) depth++;
                else if (isPunct(tokens[i], '(')) {
                    depth--;
                    if (depth === 0) {
                        open = i;
                        break;
                    }
                }
            }
            const callee = tokens[open - 1];
            if (open <= 0 || callee === undefined || !TRAILING_ANNOTATION.test(callee.text)) break;
            end = open - 1;
        } else if (last !== undefined && last.kind === 'identifier' && TRAILING_ANNOTATION.test(last.text) && end > 1) {
            end--;
        } else {
            break;
        }
    }
    return tokens.slice(0, end);
}

/**
 * A declarator split into its type tokens and its name.
 */
interface Declarator {
    readonly typeTokens: readonly Token[];
    readonly nameToken: Token;
}

/**
 * Reads the declared name from one declarator (`NSString *const Foo = @"x"`).
 * Initializers, array bounds, bit-field widths and trailing annotations are
 * ignored; the name is the last remaining identifier.
 */
function readDeclarator(tokens: readonly Token[]): Declarator | null {
    let end = tokens.length;
    for (const cut of ['=', '[', ':']) {
        const idx = indexOfTopLevel(tokens.slice(0, end), cut);
        if (idx >= 0) end = idx;
    }
    const head = stripTrailingAnnotations(tokens.slice(0, end));
    const nameToken = head[head.length - 1];
    if (nameToken === undefined || nameToken.kind !== 'identifier') return null;
    return { typeTokens: head.slice(0, -1), nameToken };
}

/**
 * Reads all declarators of a declaration statement. Declarators after the
 * first carry only their own pointer stars as type tokens.
 */
function readDeclarators(tokens: readonly Token[]): Declarator[] {
    const declarators: Declarator[] = [];
    for (const part of splitTopLevel(tokens, ',')) {
        const declarator = readDeclarator(part);
        if (declarator !== null) declarators.push(declarator);
    }
    const first = declarators[0];
    if (first === undefined || first.typeTokens.length === 0) return [];
    return declarators;
}

function storageOf(tokens: readonly Token[]): StorageClass {
    if (tokens.some((t) => isIdent(t, 'static'))) return 'static';
    if (tokens.some((t) => t.kind === 'identifier' && EXTERN_MACROS.has(t.text))) return 'extern';
    return 'global';
}

const NULLABILITY_QUALIFIERS: ReadonlySet<string> = new Set([
    '_Nonnull',
    '_Nullable',
    '_Nullable_result',
    '_Null_unspecified',
    '__nonnull',
    '__nullable',
    '__null_unspecified',
]);

/**
 * The object itself is const when `const` directly precedes the name
 * (`NSString * const Foo`, `NSString *const _Nonnull Foo`) or qualifies a
 * non-pointer type (`const CGFloat Foo`).
 */
function isConstObject(typeTokens: readonly Token[]): boolean {
    let end = typeTokens.length;
    while (end > 0 && NULLABILITY_QUALIFIERS.has(typeTokens[end - 1]?.text ?? '')) end--;
    const last = typeTokens[end - 1];
    if (isIdent(last, 'const')) return true;
    const hasPointer = typeTokens.some((t) => isPunct(t, '*'));
    return !hasPointer && typeTokens.some((t) => isIdent(t, 'const'));
}

// ============================================================
// Extractor
// ============================================================

class DeclarationExtractor {
    private i = 0;
    private readonly tokens: readonly Token[];
    private readonly out: Declaration[] = [];

    constructor(private readonly file: FilePath, allTokens: readonly Token[]) {
        this.tokens = allTokens.filter(isSignificant);
    }

    run(): Declaration[] {
        while (this.i < this.tokens.length) {
            this.parseTopLevelItem();
        }
        return this.out;
    }

    // --------------------------------------------------------
    // Cursor
    // --------------------------------------------------------

    private peek(ahead = 0): Token | undefined {
        return this.tokens[this.i + ahead];
    }

    private location(token: Token): SourceLocation {
        return { file: this.file, range: token.range };
    }

    /**
     * Consumes a `{ ... }` group starting at the cursor, or to end of input.
     */
    private skipBraces(): void {
        const close = findClosing(this.tokens, this.i, '{', '}');
        this.i = close < 0 ? this.tokens.length : close + 1;
    }

    /**
     * Consumes a `( ... )` group starting at the cursor and returns its contents.
     */
    private readParenGroup(): Token[] {
        const close = findClosing(this.tokens, this.i, '(', ')');
        const end = close < 0 ? this.tokens.length : close;
        const inner = this.tokens.slice(this.i + 1, end);
        this.i = close < 0 ? this.tokens.length : close + 1;
        return inner;
    }

    /**
     * Consumes through the next `;`, stopping early at a container keyword.
     */
    private skipStatement(): void {
        while (this.i < this.tokens.length) {
            const token = this.peek();
            if (token === undefined) return;
            if (token.kind === 'at-keyword' && this.isContainerKeyword(token)) return;
            this.i++;
            if (isPunct(token, ';')) return;
        }
    }

    private isContainerKeyword(token: Token): boolean {
        if (token.text === '@protocol') return !this.isProtocolExpression();
        return token.text === '@interface' || token.text === '@implementation' || token.text === '@end';
    }

    /**
     * True when the cursor is at `@protocol(Name)`, an expression rather
     * than a declaration.
     */
    private isProtocolExpression(): boolean {
        const token = this.peek();
        return token !== undefined && token.text === '@protocol' && isPunct(this.peek(1), '(');
    }

    /**
     * Reads `<A, B>` at the cursor and returns the identifiers in it.
     */
    private readAngleList(): string[] {
        if (!isPunct(this.peek(), '<')) return [];
        const close = findClosing(this.tokens, this.i, '<', '>');
        const end = close < 0 ? this.tokens.length : close;
        const names = this.tokens
            .slice(this.i + 1, end)
            .filter((t) => t.kind === 'identifier')
            .map((t) => t.text);
        this.i = close < 0 ? this.tokens.length : close + 1;
        return names;
    }

    // --------------------------------------------------------
    // File Scope
    // --------------------------------------------------------

    private parseTopLevelItem(): void {
        const token = this.peek();
        if (token === undefined) return;

        if (token.kind === 'at-keyword' && !this.isProtocolExpression()) {
            this.parseAtKeyword(token);
            return;
        }
        if (isPunct(token, '}') || (token.kind === 'identifier' && BARE_MACROS.has(token.text))) {
            this.i++;
            return;
        }
        this.parseStatement();
    }

    private parseAtKeyword(token: Token): void {
        switch (token.text) {
            case '@interface':
                this.parseInterface('interface');
                return;
            case '@implementation':
                this.parseInterface('implementation');
                return;
            case '@protocol':
                this.parseProtocol();
                return;
            case '@class':
            case '@import':
            case '@compatibility_alias':
                this.i++;
                this.skipStatement();
                return;
            default:
                this.i++;
        }
    }

    /**
     * Parses one C-level statement: a declaration ending in `;`, or a
     * construct with a brace body (function, enum, struct, initializer).
     */
    private parseStatement(): void {
        const statement: Token[] = [];
        let depth = 0;

        while (this.i < this.tokens.length) {
            const token = this.peek();
            if (token === undefined) break;
            if (depth === 0) {
                const isBoundary = token.kind === 'at-keyword' && STRUCTURAL_KEYWORDS.has(token.text) &&
                    !this.isProtocolExpression();
                if (isBoundary || isPunct(token, '}')) {
                    return;
                }
                if (isPunct(token, ';')) {
                    this.i++;
                    this.analyzeDeclaration(statement);
                    return;
                }
                if (isPunct(token, '{')) {
                    this.parseBraceStatement(statement);
                    return;
                }
            }
            if (isPunct(token, '(') || isPunct(token, '[')) depth++;
            else if (isPunct(token, ')') || isPunct(token, ']')) depth = Math.max(0, depth - 1);
            statement.push(token);
            this.i++;
        }
    }

    /**
     * Handles a statement whose head is followed by `{` at the cursor.
     */
    private parseBraceStatement(head: readonly Token[]): void {
        const enumIndex = head.findIndex((t) => t.kind === 'identifier' && (t.text === 'enum' || ENUM_MACROS.has(t.text)));
        if (enumIndex >= 0) {
            this.parseEnum(head, enumIndex);
            return;
        }

        if (head.some((t) => isIdent(t, 'struct') || isIdent(t, 'union'))) {
            this.skipBraces();
            this.skipStatement();
            return;
        }

        const first = head[0];
        if (head.length === 2 && isIdent(first, 'extern') && head[1]?.kind === 'string') {
            // extern "C" { ... }: the contents stay at file scope
            this.i++;
            return;
        }

        if (indexOfTopLevel(head, '=') >= 0) {
            this.analyzeDeclaration(head);
            this.skipBraces();
            this.skipStatement();
            return;
        }

        const last = stripTrailingAnnotations(head);
        if (isPunct(last[last.length - 1], ')')) {
            this.analyzeFunction(head, true);
        }
        this.skipBraces();
    }

    /**
     * Classifies a `;`-terminated statement as a function prototype, a
     * constant, or a variable.
     */
    private analyzeDeclaration(statement: readonly Token[]): void {
        if (statement.length < 2 || isIdent(statement[0], 'typedef')) return;

        const paren = indexOfTopLevel(statement, '(');
        const assign = indexOfTopLevel(statement, '=');
        if (paren >= 0 && (assign < 0 || paren < assign)) {
            const next = statement[paren + 1];
            // function pointers and blocks are not linted
            if (isPunct(next, '*') || isPunct(next, '^')) return;
            this.analyzeFunction(statement, false);
            return;
        }

        const storage = storageOf(statement);
        for (const declarator of readDeclarators(statement)) {
            const { nameToken, typeTokens } = declarator;
            const base = { name: nameToken.text, location: this.location(nameToken), nameToken, typeTokens };
            if (isConstObject(typeTokens)) {
                this.out.push({ kind: 'constant', ...base, storage });
            } else {
                this.out.push({ kind: 'variable', ...base, storage });
            }
        }
    }

    private analyzeFunction(statement: readonly Token[], isDefinition: boolean): void {
        const paren = indexOfTopLevel(statement, '(');
        const nameToken = statement[paren - 1];
        if (paren < 2 || nameToken === undefined || nameToken.kind !== 'identifier') return;

        this.out.push({
            kind: 'function',
            name: nameToken.text,
            location: this.location(nameToken),
            nameToken,
            returnType: statement.slice(0, paren - 1),
            isStatic: statement.slice(0, paren).some((t) => isIdent(t, 'static')),
            isDefinition,
        });
    }

    // --------------------------------------------------------
    // Enumerations
    // --------------------------------------------------------

    /**
     * Parses an enumeration whose head is `head` and whose body starts at the cursor.
     */
    private parseEnum(head: readonly Token[], keywordIndex: number): void {
        const keyword = head[keywordIndex];
        if (keyword === undefined) return;

        const style: EnumStyle = ENUM_MACROS.get(keyword.text) ?? 'c-enum';
        let nameToken: Token | undefined;

        if (style === 'c-enum') {
            const next = head[keywordIndex + 1];
            if (next !== undefined && next.kind === 'identifier') nameToken = next;
        } else {
            const args = head.slice(keywordIndex + 1);
            const close = findClosing(args, 0, '(', ')');
            const inner = args.slice(1, close < 0 ? args.length : close);
            const second = splitTopLevel(inner, ',')[1];
            nameToken = second?.find((t) => t.kind === 'identifier');
        }

        const enumerators = this.readEnumerators();

        // typedef enum { ... } Name;
        const trailing: Token[] = [];
        while (this.i < this.tokens.length && !isPunct(this.peek(), ';')) {
            const token = this.peek();
            if (token === undefined || token.kind === 'at-keyword') break;
            trailing.push(token);
            this.i++;
        }
        if (isPunct(this.peek(), ';')) this.i++;
        if (nameToken === undefined && isIdent(head[0], 'typedef')) {
            nameToken = trailing.find((t) => t.kind === 'identifier');
        }

        const anchor = nameToken ?? keyword;
        this.out.push({
            kind: 'enum',
            name: nameToken?.text ?? '',
            location: this.location(anchor),
            nameToken: anchor,
            style,
            enumerators,
        });
    }

    private readEnumerators(): EnumeratorDeclaration[] {
        const close = findClosing(this.tokens, this.i, '{', '}');
        const end = close < 0 ? this.tokens.length : close;
        const body = this.tokens.slice(this.i + 1, end);
        this.i = close < 0 ? this.tokens.length : close + 1;

        const enumerators: EnumeratorDeclaration[] = [];
        for (const entry of splitTopLevel(body, ',')) {
            const nameToken = entry[0];
            if (nameToken === undefined || nameToken.kind !== 'identifier') continue;
            enumerators.push({ name: nameToken.text, location: this.location(nameToken), nameToken });
        }
        return enumerators;
    }

    // --------------------------------------------------------
    // Containers
    // --------------------------------------------------------

    /**
     * Parses `@interface` or `@implementation` through its `@end`.
     */
    private parseInterface(site: DeclarationSite): void {
        this.i++;
        const nameToken = this.peek();
        if (nameToken === undefined || nameToken.kind !== 'identifier') return;
        this.i++;

        // lightweight generics: @interface XYZBox<ObjectType> : NSObject
        if (isPunct(this.peek(), '<')) {
            const close = findClosing(this.tokens, this.i, '<', '>');
            const after = this.tokens[close + 1];
            if (close >= 0 && (isPunct(after, ':') || isPunct(after, '('))) {
                this.i = close + 1;
            }
        }

        let container: ContainerRef;
        if (isPunct(this.peek(), '(')) {
            const inner = this.readParenGroup();
            const categoryToken = inner.find((t) => t.kind === 'identifier');
            const categoryName = categoryToken?.text ?? '';
            const anchor = categoryToken ?? nameToken;
            const protocols = this.readAngleList();
            container = { kind: 'category', name: nameToken.text, categoryName };
            this.out.push({
                kind: 'category',
                name: categoryName,
                location: this.location(anchor),
                nameToken: anchor,
                className: nameToken.text,
                categoryName,
                protocols,
                site,
            });
        } else {
            let superclass: string | null = null;
            if (isPunct(this.peek(), ':')) {
                this.i++;
                const superToken = this.peek();
                if (superToken !== undefined && superToken.kind === 'identifier') {
                    superclass = superToken.text;
                    this.i++;
                }
            }
            const protocols = this.readAngleList();
            container = { kind: 'class', name: nameToken.text, categoryName: '' };
            this.out.push({
                kind: 'class',
                name: nameToken.text,
                location: this.location(nameToken),
                nameToken,
                superclass,
                protocols,
                site,
            });
        }

        if (isPunct(this.peek(), '{')) {
            this.parseIvarBlock(container);
        }
        this.parseContainerBody(container, site);
    }

    /**
     * Parses `@protocol Name <Parents> ... @end`. Forward declarations and
     * `@protocol(Name)` expressions are skipped.
     */
    private parseProtocol(): void {
        this.i++;
        const nameToken = this.peek();
        if (nameToken === undefined || nameToken.kind !== 'identifier') return;
        this.i++;

        if (isPunct(this.peek(), ',') || isPunct(this.peek(), ';')) {
            this.skipStatement();
            return;
        }

        const protocols = this.readAngleList();
        if (isPunct(this.peek(), ';')) {
            // @protocol XYZFoo <NSObject>; is a forward declaration too
            this.i++;
            return;
        }

        this.out.push({
            kind: 'protocol',
            name: nameToken.text,
            location: this.location(nameToken),
            nameToken,
            protocols,
        });
        this.parseContainerBody({ kind: 'protocol', name: nameToken.text, categoryName: '' }, 'interface');
    }

    private parseContainerBody(container: ContainerRef, site: DeclarationSite): void {
        while (this.i < this.tokens.length) {
            const token = this.peek();
            if (token === undefined) return;

            if (token.kind === 'at-keyword') {
                switch (token.text) {
                    case '@end':
                        this.i++;
                        return;
                    case '@protocol':
                        if (!this.isProtocolExpression()) return;
                        this.parseStatement();
                        continue;
                    case '@interface':
                    case '@implementation':
                        return;
                    case '@property':
                        this.parseProperty(container);
                        continue;
                    case '@synthesize':
                    case '@dynamic':
                    case '@class':
                        this.i++;
                        this.skipStatement();
                        continue;
                    default:
                        // @optional, @required, visibility keywords
                        this.i++;
                        continue;
                }
            }

            if (isPunct(token, '-') || isPunct(token, '+')) {
                this.parseMethod(container, site);
                continue;
            }
            if (isPunct(token, '}') || isPunct(token, ';') ||
                (token.kind === 'identifier' && BARE_MACROS.has(token.text))) {
                this.i++;
                continue;
            }
            if (isPunct(token, '{')) {
                this.skipBraces();
                continue;
            }
            this.parseStatement();
        }
    }

    private parseIvarBlock(container: ContainerRef): void {
        const close = findClosing(this.tokens, this.i, '{', '}');
        const end = close < 0 ? this.tokens.length : close;
        this.i++;

        let statement: Token[] = [];
        while (this.i < end) {
            const token = this.peek();
            if (token === undefined) break;
            if (token.kind === 'at-keyword') {
                this.i++;
                continue;
            }
            if (isPunct(token, '{')) {
                // inline struct types
                const inner = findClosing(this.tokens, this.i, '{', '}');
                this.i = inner < 0 ? end : inner + 1;
                continue;
            }
            this.i++;
            if (isPunct(token, ';')) {
                this.pushIvars(statement, container);
                statement = [];
            } else {
                statement.push(token);
            }
        }
        this.pushIvars(statement, container);
        this.i = close < 0 ? this.tokens.length : close + 1;
    }

    private pushIvars(statement: readonly Token[], container: ContainerRef): void {
        for (const { nameToken, typeTokens } of readDeclarators(statement)) {
            this.out.push({
                kind: 'ivar',
                name: nameToken.text,
                location: this.location(nameToken),
                nameToken,
                typeTokens,
                container,
            });
        }
    }

    private parseProperty(container: ContainerRef): void {
        this.i++;
        let attributes: string[] = [];
        if (isPunct(this.peek(), '(')) {
            attributes = splitTopLevel(this.readParenGroup(), ',')
                .map((group) => group.map((t) => t.text).join(''))
                .filter((attribute) => attribute.length > 0);
        }

        const statement: Token[] = [];
        while (this.i < this.tokens.length) {
            const token = this.peek();
            if (token === undefined || token.kind === 'at-keyword' || isPunct(token, '}')) break;
            this.i++;
            if (isPunct(token, ';')) break;
            statement.push(token);
        }

        for (const { nameToken, typeTokens } of readDeclarators(statement)) {
            this.out.push({
                kind: 'property',
                name: nameToken.text,
                location: this.location(nameToken),
                nameToken,
                attributes,
                typeTokens,
                container,
            });
        }
    }

    /**
     * Parses a method declaration or definition starting at `-` or `+`.
     */
    private parseMethod(container: ContainerRef, site: DeclarationSite): void {
        const sign = this.peek();
        this.i++;
        const returnType = isPunct(this.peek(), '(') ? this.readParenGroup() : [];

        const first = this.peek();
        if (first === undefined || first.kind !== 'identifier') {
            this.skipMethodTail();
            return;
        }

        const keywords: string[] = [];
        const parameters: ParameterDeclaration[] = [];
        let isVariadic = false;
        const isKeywordSelector = isPunct(this.peek(1), ':');

        if (isKeywordSelector) {
            for (;;) {
                const current = this.peek();
                let keyword: string;
                if (current !== undefined && current.kind === 'identifier' && isPunct(this.peek(1), ':')) {
                    keyword = current.text;
                    this.i += 2;
                } else if (isPunct(current, ':')) {
                    keyword = '';
                    this.i++;
                } else {
                    break;
                }

                const typeTokens = isPunct(this.peek(), '(') ? this.readParenGroup() : [];
                keywords.push(keyword);
                const paramToken = this.peek();
                if (paramToken !== undefined && paramToken.kind === 'identifier') {
                    this.i++;
                    parameters.push({
                        name: paramToken.text,
                        keyword,
                        typeTokens,
                        location: this.location(paramToken),
                        nameToken: paramToken,
                    });
                }
            }
            if (isPunct(this.peek(), ',') && isPunct(this.peek(1), '...')) {
                this.i += 2;
                isVariadic = true;
            }
        } else {
            keywords.push(first.text);
            this.i++;
        }

        const selector = isKeywordSelector
            ? keywords.map((k) => `${k}:`).join('')
            : first.text;

        this.out.push({
            kind: 'method',
            name: selector,
            location: this.location(first),
            nameToken: first,
            selector,
            keywords,
            isClassMethod: isPunct(sign, '+'),
            container,
            site,
            returnType,
            parameters,
            isVariadic,
        });

        this.skipMethodTail();
    }

    /**
     * Skips trailing attribute macros, then the `;` or the method body.
     */
    private skipMethodTail(): void {
        while (this.i < this.tokens.length) {
            const token = this.peek();
            if (token === undefined) return;
            if (isPunct(token, ';')) {
                this.i++;
                return;
            }
            if (isPunct(token, '{')) {
                this.skipBraces();
                return;
            }
            if (token.kind === 'identifier') {
                this.i++;
            } else if (isPunct(token, '(')) {
                this.readParenGroup();
            } else {
                return;
            }
        }
    }
}

// ============================================================
// Macros
// ============================================================

/**
 * Position of a character inside a (possibly multi-line) token.
 */
function positionWithin(token: Token, index: number): Position {
    const before = token.text.slice(0, index);
    const newlines = before.split(/\r\n|\r|\n/);
    if (newlines.length === 1) {
        return { line: token.range.start.line, character: token.range.start.character + index };
    }
    const lastLine = newlines[newlines.length - 1] ?? '';
    return { line: token.range.start.line + newlines.length - 1, character: lastLine.length };
}

function stripDirectiveComments(text: string): string {
    return text
        .replace(/\\\r?\n/g, ' ')
        .replace(/\/\*[\s\S]*?(\*\/|$)/g, ' ')
        .replace(/\/\/.*$/gm, '')
        .trim();
}

/**
 * Reads a `#define` directive token as a macro declaration.
 */
function readMacro(file: FilePath, directive: Token): MacroDeclaration | null {
    const head = DEFINE_HEAD.exec(directive.text);
    const name = head?.[1];
    if (head === null || name === undefined) return null;

    const nameIndex = head[0].length - name.length;
    const start = positionWithin(directive, nameIndex);
    const nameToken: Token = {
        kind: 'identifier',
        text: name,
        offset: directive.offset + nameIndex,
        range: { start, end: { line: start.line, character: start.character + name.length } },
    };

    const rest = stripDirectiveComments(directive.text.slice(head[0].length));
    let parameters: string[] | null = null;
    let value = rest;
    if (directive.text.charAt(head[0].length) === '(') {
        const close = rest.indexOf(')');
        const list = close < 0 ? rest.slice(1) : rest.slice(1, close);
        parameters = list.split(',').map((p) => p.trim()).filter((p) => p.length > 0);
        value = close < 0 ? '' : rest.slice(close + 1).trim();
    }

    return {
        kind: 'macro',
        name,
        location: { file, range: nameToken.range },
        nameToken,
        parameters,
        value,
    };
}

// ============================================================
// Public API
// ============================================================

/**
 * Extracts the declarations of one file from its token stream.
 * Declarations are returned in source order of their name tokens.
 *
 * @example
 * const text = '@interface XYZPhotoView : UIView\n@end\n';
 * const { declarations } = extractDeclarations(toFilePath('XYZPhotoView.h'), tokenize(text));
 * // declarations[0]: { kind: 'class', name: 'XYZPhotoView', superclass: 'UIView', ... }
 */
export function extractDeclarations(file: FilePath, tokens: readonly Token[]): FileDeclarations {
    const declarations: Declaration[] = new DeclarationExtractor(file, tokens).run();

    for (const token of tokens) {
        if (token.kind !== 'directive') continue;
        const macro = readMacro(file, token);
        if (macro !== null) declarations.push(macro);
    }

    declarations.sort((a, b) => a.nameToken.offset - b.nameToken.offset);
    return { file, declarations, tokens };
}
