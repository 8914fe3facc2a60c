/**
 * @fileoverview Identifier case and prefix helpers shared by the naming rules.
 *
 * @module utils/naming
 */

const UPPER_CAMEL = /^[A-Z][A-Za-z0-9]*$/;
const LOWER_CAMEL = /^[a-z][A-Za-z0-9]*$/;
const PREFIXED = /^([A-Z]+)([A-Z][a-z0-9].*)$/;
const WORD = /[A-Z]+(?![a-z])|[A-Z]?[a-z0-9]+/g;
const CATEGORY_PREFIX = /^([a-z][a-z0-9]*)_/;

/**
 * Prefix requirements, as configured under `linting.naming`.
 */
export interface PrefixOptions {
    readonly classPrefix?: string | undefined;
    readonly minPrefixLength: number;
}

/** `XYZPhotoView`, `Photo2`. */
export function isUpperCamelCase(name: string): boolean {
    return UPPER_CAMEL.test(name);
}

/** `photoView`, `url2`. */
export function isLowerCamelCase(name: string): boolean {
    return LOWER_CAMEL.test(name);
}

/**
 * Splits an uppercase namespace prefix from the rest of a name.
 * The last capital of a leading run starts the first word.
 *
 * @returns The prefix and remainder, or null when the name has no prefix
 *
 * @example
 * splitPrefix('XYZPhotoView'); // { prefix: 'XYZ', rest: 'PhotoView' }
 * splitPrefix('Photo');        // null
 */
export function splitPrefix(name: string): { readonly prefix: string; readonly rest: string } | null {
    const match = PREFIXED.exec(name);
    if (match === null || match[1] === undefined || match[2] === undefined) {
        return null;
    }
    return { prefix: match[1], rest: match[2] };
}

/**
 * Checks that a name carries the project prefix: the configured one, or an
 * inferred uppercase prefix of at least `minPrefixLength` letters.
 */
export function hasRequiredPrefix(name: string, options: PrefixOptions): boolean {
    const configured = options.classPrefix;
    if (configured !== undefined && configured.length > 0) {
        if (!name.startsWith(configured)) return false;
        const next = name.charAt(configured.length);
        return /[A-Z0-9]/.test(next);
    }
    const split = splitPrefix(name);
    return split !== null && split.prefix.length >= options.minPrefixLength;
}

/**
 * Describes the prefix a name is expected to carry, for messages.
 */
export function describePrefix(options: PrefixOptions): string {
    const configured = options.classPrefix;
    if (configured !== undefined && configured.length > 0) {
        return `the prefix "${configured}"`;
    }
    return `an uppercase prefix of at least ${options.minPrefixLength} letters`;
}

/**
 * Splits a camel-case identifier into words, keeping acronyms together.
 *
 * @example
 * splitWords('NSURLSessionTask'); // ['NSURL', 'Session', 'Task']
 */
export function splitWords(name: string): readonly string[] {
    return name.match(WORD) ?? [];
}

/**
 * Last camel-case word of a name, or the name itself when it has none.
 */
export function lastWord(name: string): string {
    const words = splitWords(name);
    return words[words.length - 1] ?? name;
}

/**
 * Lowercase category method prefix (`xyz_`) of a selector keyword, if any.
 */
export function categoryMethodPrefix(keyword: string): string | null {
    const match = CATEGORY_PREFIX.exec(keyword);
    return match?.[1] ?? null;
}

/**
 * Removes a lowercase category method prefix (`xyz_`) from a selector keyword.
 */
export function stripCategoryMethodPrefix(keyword: string): string {
    return keyword.replace(CATEGORY_PREFIX, '');
}

/**
 * Converts a name to lowerCamelCase, for rename suggestions.
 *
 * @example
 * toLowerCamelCase('Photo_count'); // 'photoCount'
 */
export function toLowerCamelCase(name: string): string {
    const parts = name.split(/_+/).filter((p) => p.length > 0);
    const joined = parts
        .map((p, i) => (i === 0 ? p : p.charAt(0).toUpperCase() + p.slice(1)))
        .join('');
    if (/^[A-Z]+$/.test(joined)) return joined.toLowerCase();
    return joined.charAt(0).toLowerCase() + joined.slice(1);
}

/**
 * Converts a name to UpperCamelCase, for rename suggestions.
 *
 * @example
 * toUpperCamelCase('MAX_ROW_COUNT'); // 'MaxRowCount'
 */
export function toUpperCamelCase(name: string): string {
    const parts = name.split(/_+/).filter((p) => p.length > 0);
    return parts
        .map((p) => {
            const word = /^[A-Z0-9]+$/.test(p) ? p.toLowerCase() : p;
            return word.charAt(0).toUpperCase() + word.slice(1);
        })
        .join('');
}
