/**
 * @fileoverview Unit tests for the naming rules.
 * @module test/unit/rules
 */

import { describe, it, expect } from 'vitest';
import { extractDeclarations } from '../../src/core/extractor/declarations.js';
import type { DeclarationCheck } from '../../src/core/linter/registry.js';
import {
    checkCategoryMethodPrefix,
    checkCategoryNameCase,
    checkClassHierarchySuffix,
    checkClassNameCase,
    checkClassPrefix,
    checkConstantName,
    checkEnumName,
    checkEnumValuePrefix,
    checkFunctionName,
    checkIvarUnderscorePrefix,
    checkMethodNameCase,
    checkMethodNoGetPrefix,
    checkMethodParameterName,
    checkNoDefineConstants,
    checkPropertyNameCase,
    checkProtocolName,
    checkVariableNameCase,
    type RuleContext,
} from '../../src/core/linter/rules.js';
import { tokenize } from '../../src/core/tokenizer/tokenizer.js';
import { getDefault } from '../../src/state/config.js';
import { toFilePath } from '../../src/types/base.js';
import type { NamingConfig } from '../../src/types/config.js';
import type { LintResult } from '../../src/types/lint.js';

function createContext(naming: Partial<NamingConfig> = {}): RuleContext {
    const defaults = getDefault().linting;
    return {
        severity: 'warning',
        naming: { ...defaults.naming, ...naming },
        whitespace: defaults.whitespace,
    };
}

function check(rule: DeclarationCheck, source: string, naming: Partial<NamingConfig> = {}): LintResult[] {
    const context = createContext(naming);
    const { declarations } = extractDeclarations(toFilePath('Test.h'), tokenize(source));
    return declarations.flatMap((declaration) => [...rule(declaration, context)]);
}

const messages = (results: readonly LintResult[]): string[] => results.map((r) => r.message);
const suggestions = (results: readonly LintResult[]): (string | undefined)[] => results.map((r) => r.suggestion);

describe('class rules', () => {
    describe('checkClassPrefix', () => {
        it('reports a class without an inferred prefix at its name', () => {
            const [result, ...rest] = check(checkClassPrefix, '@interface Feed : NSObject\n@end\n');
            expect(rest).toEqual([]);
            expect(result).toEqual({
                rule: 'class-prefix',
                severity: 'warning',
                message: 'Class "Feed" should start with an uppercase prefix of at least 3 letters',
                location: {
                    file: 'Test.h',
                    range: { start: { line: 0, character: 11 }, end: { line: 0, character: 15 } },
                },
            });
        });

        it('accepts any prefix of the minimum length when none is configured', () => {
            expect(check(checkClassPrefix, '@interface XYZFeed : NSObject\n@end\n')).toEqual([]);
            expect(check(checkClassPrefix, '@interface XYFeed : NSObject\n@end\n')).toHaveLength(1);
            expect(check(checkClassPrefix, '@interface XYFeed : NSObject\n@end\n', { minPrefixLength: 2 })).toEqual([]);
        });

        it('requires the configured prefix and suggests adding it', () => {
            const results = check(checkClassPrefix, '@interface Feed : NSObject\n@end\n', { classPrefix: 'XYZ' });
            expect(messages(results)).toEqual(['Class "Feed" should start with the prefix "XYZ"']);
            expect(suggestions(results)).toEqual(['Rename to "XYZFeed"']);

            expect(check(checkClassPrefix, '@interface XYZFeed : NSObject\n@end\n', { classPrefix: 'XYZ' })).toEqual([]);
            expect(check(checkClassPrefix, '@interface ABCFeed : NSObject\n@end\n', { classPrefix: 'XYZ' })).toHaveLength(1);
            expect(check(checkClassPrefix, '@interface XYZfeed : NSObject\n@end\n', { classPrefix: 'XYZ' })).toHaveLength(1);
        });

        it('reports with the configured severity', () => {
            const context: RuleContext = { ...createContext(), severity: 'error' };
            const { declarations } = extractDeclarations(toFilePath('Test.h'), tokenize('@interface Feed\n@end\n'));
            const [declaration] = declarations;
            expect(declaration).toBeDefined();
            if (declaration === undefined) return;
            expect(checkClassPrefix(declaration, context)[0]?.severity).toBe('error');
        });
    });

    it('checkClassNameCase suggests an UpperCamelCase name', () => {
        const results = check(checkClassNameCase, '@interface XYZ_photoView : UIView\n@end\n');
        expect(messages(results)).toEqual(['Class "XYZ_photoView" should be UpperCamelCase']);
        expect(suggestions(results)).toEqual(['Rename to "XyzPhotoView"']);
        expect(check(checkClassNameCase, '@interface XYZPhotoView : UIView\n@end\n')).toEqual([]);
    });

    describe('checkClassHierarchySuffix', () => {
        it('requires the last word of the superclass', () => {
            const results = check(checkClassHierarchySuffix, '@interface XYZPhotoView : UIViewController\n@end\n');
            expect(messages(results)).toEqual([
                'Class "XYZPhotoView" should end with "Controller" to show that it inherits from "UIViewController"',
            ]);
            expect(suggestions(results)).toEqual(['Rename to "XYZPhotoViewController"']);
        });

        it('accepts matching names, exempt superclasses and implementations', () => {
            expect(
                check(checkClassHierarchySuffix, '@interface XYZPhotoViewController : UIViewController\n@end\n')
            ).toEqual([]);
            expect(check(checkClassHierarchySuffix, '@interface XYZFeed : NSObject\n@end\n')).toEqual([]);
            expect(check(checkClassHierarchySuffix, '@implementation XYZFeed\n@end\n')).toEqual([]);
        });

        it('uses the configured exemptions', () => {
            const source = '@interface XYZFeed : XYZModel\n@end\n';
            expect(check(checkClassHierarchySuffix, source)).toHaveLength(1);
            expect(check(checkClassHierarchySuffix, source, { hierarchyExempt: ['XYZModel'] })).toEqual([]);
        });
    });
});

describe('protocol and category rules', () => {
    it('checkProtocolName requires a prefixed UpperCamelCase name', () => {
        const results = check(checkProtocolName, '@protocol feedDelegate <NSObject>\n@end\n', { classPrefix: 'XYZ' });
        expect(messages(results)).toEqual([
            'Protocol "feedDelegate" should be UpperCamelCase and start with the prefix "XYZ"',
        ]);
        expect(suggestions(results)).toEqual(['Rename to "XYZFeedDelegate"']);
        expect(check(checkProtocolName, '@protocol XYZFeedDelegate <NSObject>\n@end\n')).toEqual([]);
    });

    it('checkCategoryNameCase checks named categories only', () => {
        const results = check(checkCategoryNameCase, '@interface NSString (xyz_additions)\n@end\n');
        expect(messages(results)).toEqual([
            'Category "NSString (xyz_additions)" should have an UpperCamelCase name',
        ]);
        expect(suggestions(results)).toEqual(['Rename to "XyzAdditions"']);
        expect(check(checkCategoryNameCase, '@interface XYZFeed ()\n@end\n')).toEqual([]);
    });

    describe('checkCategoryMethodPrefix', () => {
        const source = [
            '@interface NSString (XYZAdditions)',
            '- (NSString *)trimmed;',
            '+ (void)load;',
            '- (NSString *)xyz_reversed;',
            '- (NSString *)abc_upper;',
            '@end',
        ].join('\n');

        it('requires the lowercase configured prefix on foreign classes', () => {
            const results = check(checkCategoryMethodPrefix, source, { classPrefix: 'XYZ' });
            expect(messages(results)).toEqual([
                'Method "trimmed" in category "NSString (XYZAdditions)" should start with "xyz_"',
                'Method "abc_upper" in category "NSString (XYZAdditions)" should start with "xyz_"',
            ]);
            expect(suggestions(results)).toEqual(['Rename to "xyz_trimmed"', 'Rename to "xyz_upper"']);
            expect(results.map((r) => r.location.range.start.line)).toEqual([1, 4]);
        });

        it('accepts any lowercase prefix when none is configured', () => {
            const results = check(checkCategoryMethodPrefix, source);
            expect(messages(results)).toEqual([
                'Method "trimmed" in category "NSString (XYZAdditions)" should start with a lowercase prefix and an underscore',
            ]);
            expect(results[0]?.suggestion).toBeUndefined();
        });

        it('skips categories on the project\'s own classes and class extensions', () => {
            const own = '@interface XYZFeed (Paging)\n- (void)loadNextPage;\n@end\n';
            expect(check(checkCategoryMethodPrefix, own, { classPrefix: 'XYZ' })).toEqual([]);
            expect(check(checkCategoryMethodPrefix, '@interface NSString ()\n- (void)trim;\n@end\n')).toEqual([]);
        });
    });
});

describe('method rules', () => {
    it('checkMethodNameCase reports the first keyword that is not lowerCamelCase', () => {
        const results = check(
            checkMethodNameCase,
            '@interface XYZFeed : NSObject\n- (void)setTitle:(NSString *)title ForState:(NSInteger)state;\n@end\n'
        );
        expect(messages(results)).toEqual([
            'Selector keyword "ForState" in "setTitle:ForState:" should be lowerCamelCase',
        ]);
        expect(suggestions(results)).toEqual(['Rename to "forState"']);
    });

    it('checkMethodNameCase ignores the category prefix in categories only', () => {
        expect(
            check(checkMethodNameCase, '@interface NSString (XYZAdditions)\n- (NSString *)xyz_trimmedString;\n@end\n')
        ).toEqual([]);

        const results = check(checkMethodNameCase, '@interface XYZFeed : NSObject\n- (void)xyz_reload;\n@end\n');
        expect(suggestions(results)).toEqual(['Rename to "xyzReload"']);
    });

    it('checkMethodNoGetPrefix flags unary and single-keyword getters', () => {
        const source = [
            '@interface XYZFeed : NSObject',
            '- (NSString *)getName;',
            '- (NSString *)getTitleForIndex:(NSInteger)index;',
            '- (void)getBytes:(void *)buffer length:(NSUInteger)length;',
            '- (id)getter;',
            '@end',
        ].join('\n');
        const results = check(checkMethodNoGetPrefix, source);
        expect(messages(results)).toEqual([
            'Accessor "getName" should not start with "get"',
            'Accessor "getTitleForIndex:" should not start with "get"',
        ]);
        expect(suggestions(results)).toEqual(['Rename to "name"', 'Rename to "titleForIndex:"']);
    });

    it('checkMethodParameterName reports at the parameter', () => {
        const results = check(
            checkMethodParameterName,
            '@interface XYZFeed : NSObject\n- (void)setTitle:(NSString *)Title;\n@end\n'
        );
        expect(messages(results)).toEqual(['Parameter "Title" of "setTitle:" should be lowerCamelCase']);
        expect(suggestions(results)).toEqual(['Rename to "title"']);
        expect(results[0]?.location.range.start).toEqual({ line: 1, character: 29 });
    });
});

describe('property and variable rules', () => {
    it('checkPropertyNameCase suggests a lowerCamelCase name', () => {
        const source = [
            '@interface XYZFeed : NSObject',
            '@property (nonatomic) NSString *Title;',
            '@property (nonatomic) NSURL *URL;',
            '@property (nonatomic) NSString *title;',
            '@end',
        ].join('\n');
        const results = check(checkPropertyNameCase, source);
        expect(messages(results)).toEqual([
            'Property "Title" should be lowerCamelCase',
            'Property "URL" should be lowerCamelCase',
        ]);
        expect(suggestions(results)).toEqual(['Rename to "title"', 'Rename to "url"']);
    });

    it('checkIvarUnderscorePrefix requires a leading underscore', () => {
        const source = '@interface XYZFeed : NSObject {\n\tNSString *title;\n\tNSString *_name;\n}\n@end\n';
        const results = check(checkIvarUnderscorePrefix, source);
        expect(messages(results)).toEqual(['Instance variable "title" should start with an underscore']);
        expect(suggestions(results)).toEqual(['Rename to "_title"']);
    });

    it('checkVariableNameCase checks instance variables after their underscore', () => {
        const source = '@interface XYZFeed : NSObject {\n\tNSString *_Title;\n\tNSString *_name;\n}\n@end\n';
        const results = check(checkVariableNameCase, source);
        expect(messages(results)).toEqual(['Instance variable "_Title" should be lowerCamelCase']);
        expect(suggestions(results)).toEqual(['Rename to "_title"']);
    });

    it('checkVariableNameCase checks file-scope variables', () => {
        const results = check(checkVariableNameCase, 'static NSInteger Instance_count = 0;\nNSString *globalName;\n');
        expect(messages(results)).toEqual(['Variable "Instance_count" should be lowerCamelCase']);
        expect(suggestions(results)).toEqual(['Rename to "instanceCount"']);
    });
});

describe('constant rules', () => {
    describe('checkConstantName', () => {
        it('accepts prefixed names with or without a k', () => {
            const source = 'static NSString * const XYZErrorDomain = @"x";\nstatic const CGFloat kXYZRowHeight = 44.0;\n';
            expect(check(checkConstantName, source)).toEqual([]);
        });

        it('keeps the k when suggesting a prefix', () => {
            const source = 'static const CGFloat kRowHeight = 44.0;\n';
            const unprefixed = check(checkConstantName, source);
            expect(messages(unprefixed)).toEqual([
                'Constant "kRowHeight" should be UpperCamelCase and start with an uppercase prefix of at least 3 letters',
            ]);
            expect(unprefixed[0]?.suggestion).toBeUndefined();

            expect(suggestions(check(checkConstantName, source, { classPrefix: 'XYZ' }))).toEqual([
                'Rename to "kXYZRowHeight"',
            ]);
        });

        it('converts macro-style names', () => {
            const results = check(checkConstantName, 'NSString * const ERROR_DOMAIN = @"x";\n', { classPrefix: 'XYZ' });
            expect(suggestions(results)).toEqual(['Rename to "XYZErrorDomain"']);
        });

        it('rejects the k when it is not allowed', () => {
            const source = 'static const CGFloat kXYZRowHeight = 44.0;\n';
            expect(check(checkConstantName, source, { allowKPrefix: false })).toHaveLength(1);
        });

        it('ignores variables', () => {
            expect(check(checkConstantName, 'static NSInteger counter = 0;\n')).toEqual([]);
        });
    });

    describe('checkNoDefineConstants', () => {
        it('flags numeric and string literal macros', () => {
            const source = '#define XYZ_TIMEOUT 30\n#define XYZ_NAME @"feed"\n#define XYZ_NEG (-1)\n';
            const results = check(checkNoDefineConstants, source);
            expect(messages(results)).toEqual([
                'Macro "XYZ_TIMEOUT" defines a constant; declare a typed constant instead',
                'Macro "XYZ_NAME" defines a constant; declare a typed constant instead',
                'Macro "XYZ_NEG" defines a constant; declare a typed constant instead',
            ]);
            expect(suggestions(results)).toEqual([
                'Use "static const" for a file-local value or an "extern" constant for a public one',
                'Use "static NSString * const" for a file-local value or an "extern" constant for a public one',
                'Use "static const" for a file-local value or an "extern" constant for a public one',
            ]);
        });

        it('leaves function-like, empty and aliasing macros alone', () => {
            const source = '#define XYZ_MAX(a, b) ((a) > (b) ? (a) : (b))\n#define XYZ_DEBUG\n#define XYZ_ALIAS XYZ_OTHER\n';
            expect(check(checkNoDefineConstants, source)).toEqual([]);
        });
    });
});

describe('enumeration rules', () => {
    it('checkEnumName requires a prefixed name', () => {
        const results = check(checkEnumName, 'typedef NS_ENUM(NSInteger, FeedState) { FeedStateIdle };\n');
        expect(messages(results)).toEqual([
            'Enumeration "FeedState" should be UpperCamelCase and start with an uppercase prefix of at least 3 letters',
        ]);
        expect(check(checkEnumName, 'enum { XYZAnonymous };\n')).toEqual([]);
    });

    it('checkEnumValuePrefix reports enumerators without the enumeration name', () => {
        const source = 'typedef NS_ENUM(NSInteger, XYZFeedState) {\n\tXYZFeedStateIdle,\n\tXYZFeedState2,\n\tFinished\n};\n';
        const results = check(checkEnumValuePrefix, source);
        expect(messages(results)).toEqual(['Enumerator "Finished" should start with "XYZFeedState"']);
        expect(suggestions(results)).toEqual(['Rename to "XYZFeedStateFinished"']);
        expect(results[0]?.location.range.start).toEqual({ line: 3, character: 1 });
    });
});

describe('checkFunctionName', () => {
    it('checks exported functions', () => {
        const results = check(checkFunctionName, 'void logIt(void);\nvoid XYZLog(void);\n');
        expect(messages(results)).toEqual([
            'Function "logIt" should be UpperCamelCase and start with an uppercase prefix of at least 3 letters',
        ]);
        expect(suggestions(results)).toEqual(['Rename to "LogIt"']);
    });

    it('skips static and exempt functions', () => {
        const source = 'static void helper(void) {}\nint main(int argc, char *argv[]) { return 0; }\n';
        expect(check(checkFunctionName, source)).toEqual([]);
    });
});

it('rules return nothing for declarations of other kinds', () => {
    const source = '@interface XYZFeed : NSObject\n@property (nonatomic) NSString *Title;\n@end\n';
    expect(check(checkClassNameCase, source)).toEqual([]);
    expect(check(checkFunctionName, source)).toEqual([]);
    expect(check(checkEnumName, source)).toEqual([]);
});
