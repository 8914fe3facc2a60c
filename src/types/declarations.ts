/**
 * @fileoverview Declaration types for objclint.
 * Defines the declarations the extractor recognizes in Objective-C source:
 * classes, categories, protocols, methods, properties, instance variables,
 * constants, variables, enumerations, C functions and macros.
 * Imports from types/base.ts and types/tokens.ts - Layer 0 of the type system.
 *
 * @module types/declarations
 */

import type { FilePath, SourceLocation } from './base.js';
import type { Token } from './tokens.js';

// ============================================================
// Shared Types
// ============================================================

/**
 * Kind of declaration extracted from source code.
 */
export type DeclarationKind =
    | 'class'
    | 'category'
    | 'protocol'
    | 'method'
    | 'property'
    | 'ivar'
    | 'constant'
    | 'variable'
    | 'enum'
    | 'function'
    | 'macro';

/**
 * Whether a container was declared or implemented.
 * - interface: `@interface` or `@protocol`
 * - implementation: `@implementation`
 */
export type DeclarationSite = 'interface' | 'implementation';

/**
 * Storage class of a file-scope variable or constant.
 */
export type StorageClass = 'static' | 'extern' | 'global';

/**
 * The class, category or protocol a member belongs to.
 */
export interface ContainerRef {
    readonly kind: 'class' | 'category' | 'protocol';
    /** Class or protocol name */
    readonly name: string;
    /** Category name; empty for classes, protocols and class extensions */
    readonly categoryName: string;
}

/**
 * Properties shared by every declaration.
 */
interface DeclarationBase {
    /** Declared name as it appears in source */
    readonly name: string;
    /** Location of the name token */
    readonly location: SourceLocation;
    /** The token carrying the name */
    readonly nameToken: Token;
}

// ============================================================
// Container Declarations
// ============================================================

/**
 * `@interface XYZPhotoView : UIView <XYZZoomable>` or
 * `@implementation XYZPhotoView`.
 */
export interface ClassDeclaration extends DeclarationBase {
    readonly kind: 'class';
    /** Superclass name, or null for implementations and root classes */
    readonly superclass: string | null;
    /** Adopted protocols */
    readonly protocols: readonly string[];
    readonly site: DeclarationSite;
}

/**
 * `@interface NSString (XYZAdditions)`. The declaration's name is the
 * category name; a class extension has an empty category name and is
 * located at the class name.
 */
export interface CategoryDeclaration extends DeclarationBase {
    readonly kind: 'category';
    /** The extended class */
    readonly className: string;
    /** Category name, empty for a class extension */
    readonly categoryName: string;
    readonly protocols: readonly string[];
    readonly site: DeclarationSite;
}

/**
 * `@protocol XYZZoomable <NSObject>` with a body.
 */
export interface ProtocolDeclaration extends DeclarationBase {
    readonly kind: 'protocol';
    /** Inherited protocols */
    readonly protocols: readonly string[];
}

// ============================================================
// Member Declarations
// ============================================================

/**
 * One keyword of a method selector with its parameter.
 */
export interface ParameterDeclaration {
    /** Parameter name */
    readonly name: string;
    /** Selector keyword preceding the colon (may be empty) */
    readonly keyword: string;
    /** Tokens between the parentheses of the parameter type */
    readonly typeTokens: readonly Token[];
    readonly location: SourceLocation;
    readonly nameToken: Token;
}

/**
 * `- (void)setTitle:(NSString *)title animated:(BOOL)animated;`
 */
export interface MethodDeclaration extends DeclarationBase {
    readonly kind: 'method';
    /** Full selector, e.g. `setTitle:animated:` */
    readonly selector: string;
    /** Selector keywords in order (`['setTitle', 'animated']`) */
    readonly keywords: readonly string[];
    /** True for `+` methods */
    readonly isClassMethod: boolean;
    readonly container: ContainerRef;
    readonly site: DeclarationSite;
    /** Tokens between the parentheses of the return type */
    readonly returnType: readonly Token[];
    readonly parameters: readonly ParameterDeclaration[];
    /** True when the selector ends with `, ...` */
    readonly isVariadic: boolean;
}

/**
 * `@property (nonatomic, copy) NSString *title;`
 */
export interface PropertyDeclaration extends DeclarationBase {
    readonly kind: 'property';
    /** Attribute list entries, e.g. `nonatomic`, `getter=isEnabled` */
    readonly attributes: readonly string[];
    /** Type tokens preceding the name */
    readonly typeTokens: readonly Token[];
    readonly container: ContainerRef;
}

/**
 * An instance variable declared in an `@interface` or `@implementation`
 * brace block.
 */
export interface IvarDeclaration extends DeclarationBase {
    readonly kind: 'ivar';
    readonly typeTokens: readonly Token[];
    readonly container: ContainerRef;
}

// ============================================================
// File-scope Declarations
// ============================================================

/**
 * `static NSString * const XYZErrorDomain = @"...";`
 */
export interface ConstantDeclaration extends DeclarationBase {
    readonly kind: 'constant';
    readonly typeTokens: readonly Token[];
    readonly storage: StorageClass;
}

/**
 * `static NSInteger instanceCount = 0;`
 */
export interface VariableDeclaration extends DeclarationBase {
    readonly kind: 'variable';
    readonly typeTokens: readonly Token[];
    readonly storage: StorageClass;
}

/**
 * One enumerator of an enumeration.
 */
export interface EnumeratorDeclaration {
    readonly name: string;
    readonly location: SourceLocation;
    readonly nameToken: Token;
}

/**
 * Enumeration style.
 * - ns-enum: `NS_ENUM`, `NS_CLOSED_ENUM` or `NS_ERROR_ENUM`
 * - ns-options: `NS_OPTIONS`
 * - c-enum: plain `enum`
 */
export type EnumStyle = 'ns-enum' | 'ns-options' | 'c-enum';

/**
 * `typedef NS_ENUM(NSInteger, XYZColor) { XYZColorRed, XYZColorBlue };`
 * Anonymous enumerations have an empty name and are located at `enum`.
 */
export interface EnumDeclaration extends DeclarationBase {
    readonly kind: 'enum';
    readonly style: EnumStyle;
    readonly enumerators: readonly EnumeratorDeclaration[];
}

/**
 * A C function prototype or definition.
 */
export interface FunctionDeclaration extends DeclarationBase {
    readonly kind: 'function';
    /** Tokens before the name: storage, qualifiers and the return type */
    readonly returnType: readonly Token[];
    readonly isStatic: boolean;
    /** True when a body follows */
    readonly isDefinition: boolean;
}

/**
 * `#define XYZ_TIMEOUT 30` or `#define XYZ_MAX(a, b) ...`
 */
export interface MacroDeclaration extends DeclarationBase {
    readonly kind: 'macro';
    /** Parameter names for function-like macros, null for object-like ones */
    readonly parameters: readonly string[] | null;
    /** Replacement text with comments removed */
    readonly value: string;
}

/**
 * Any declaration the extractor recognizes.
 */
export type Declaration =
    | ClassDeclaration
    | CategoryDeclaration
    | ProtocolDeclaration
    | MethodDeclaration
    | PropertyDeclaration
    | IvarDeclaration
    | ConstantDeclaration
    | VariableDeclaration
    | EnumDeclaration
    | FunctionDeclaration
    | MacroDeclaration;

// ============================================================
// Extraction Result
// ============================================================

/**
 * All declarations found in one file, in source order.
 */
export interface FileDeclarations {
    readonly file: FilePath;
    readonly declarations: readonly Declaration[];
    /** Full token stream, comments and directives included */
    readonly tokens: readonly Token[];
}
