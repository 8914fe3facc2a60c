#!/usr/bin/env node
/**
 * @fileoverview objclint CLI entry point.
 *
 * @module bin/objclint
 */

import { main } from '../cli.js';

main(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error('[objclint] Fatal error:', error);
        process.exit(2);
    }
);
