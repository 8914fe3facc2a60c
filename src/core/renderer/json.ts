/**
 * @fileoverview JSON renderer. Positions stay zero-based, as in the report.
 *
 * @module core/renderer/json
 */

import type { LintReport } from '../../types/lint.js';

export function renderJson(report: LintReport): string {
    return `${JSON.stringify(report, null, 2)}\n`;
}
