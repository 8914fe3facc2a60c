/**
 * @fileoverview Report renderers, selected by output format.
 *
 * @module core/renderer
 */

import type { OutputFormat } from '../../types/config.js';
import type { LintReport } from '../../types/lint.js';
import { renderCompact } from './compact.js';
import { renderJson } from './json.js';
import { renderMarkdown } from './markdown.js';
import { renderStylish } from './stylish.js';

export { renderCompact } from './compact.js';
export { renderJson } from './json.js';
export { renderMarkdown } from './markdown.js';
export { renderStylish } from './stylish.js';

const RENDERERS: Record<OutputFormat, (report: LintReport) => string> = {
    stylish: renderStylish,
    compact: renderCompact,
    json: renderJson,
    markdown: renderMarkdown,
};

/**
 * Renders a report in the given format. Output ends with a newline unless empty.
 */
export function render(report: LintReport, format: OutputFormat): string {
    return RENDERERS[format](report);
}
