/**
 * @fileoverview Barrel file for utility functions.
 * Re-exports all utilities from the utils/ directory.
 * Layer 1 - pure utility functions that import only from types/.
 *
 * @module utils
 */

// Result type helpers for type-safe error handling
export { ok, err, mapResult, flatMapResult, errorMessage } from './result.js';

// Identifier case and prefix helpers used by the naming rules
export {
    isUpperCamelCase,
    isLowerCamelCase,
    splitPrefix,
    hasRequiredPrefix,
    splitWords,
    toLowerCamelCase,
    toUpperCamelCase,
} from './naming.js';

// Scoped stderr logging
export { createLogger, setLogLevel, getLogLevel } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
