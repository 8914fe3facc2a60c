/**
 * @fileoverview MCP Tools registration.
 * @module mcp/tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import { runLint } from '../../commands/lint.js';
import { lintSource } from '../../core/linter/linter.js';
import { listRules } from '../../core/linter/registry.js';
import { createReport } from '../../core/reporter/reporter.js';
import { loadConfig } from '../../state/config.js';
import { toFilePath } from '../../types/base.js';
import type { LintReport, LintResult } from '../../types/lint.js';

// ============================================================
// Helper Functions
// ============================================================

export interface ToolOptions {
  /** Directory that config and relative paths resolve against */
  readonly projectRoot?: string;
}

function getProjectRoot(options: ToolOptions): string {
  return options.projectRoot ?? process.cwd();
}

/**
 * Result shape with 1-based positions, as editors show them.
 */
function toOutput(result: LintResult) {
  const { start } = result.location.range;
  return {
    rule: result.rule,
    severity: result.severity,
    message: result.message,
    line: start.line + 1,
    column: start.character + 1,
    ...(result.suggestion !== undefined && { suggestion: result.suggestion }),
  };
}

function reportOutput(report: LintReport) {
  return {
    summary: report.summary,
    files: report.files
      .filter(f => f.results.length > 0)
      .map(f => ({ file: f.file, problems: f.results.map(toOutput) })),
  };
}

function textResult(value: unknown) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
  };
}

function errorResult(message: string) {
  return {
    content: [{ type: 'text' as const, text: message }],
    isError: true,
  };
}

// ============================================================
// Tool Registration
// ============================================================

export function registerTools(server: McpServer, options: ToolOptions = {}): void {
  // --------------------------------------------------------
  // objclint_lint_source
  // --------------------------------------------------------
  server.tool(
    'objclint_lint_source',
    'Lint Objective-C source text against the project naming and whitespace conventions. Uses the .objclint.json of the project root when present.',
    {
      source: z.string().describe('Objective-C source text (header or implementation)'),
      fileName: z.string().default('Untitled.m').describe('File name reported with each problem'),
    },
    async ({ source, fileName }) => {
      const config = await loadConfig(getProjectRoot(options));
      if (!config.ok) {
        return errorResult(config.error.message);
      }

      const file = toFilePath(fileName);
      const report = createReport([{ file, results: lintSource(file, source, config.value.linting) }]);
      return textResult({
        summary: report.summary,
        problems: report.files.flatMap(f => f.results.map(toOutput)),
      });
    }
  );

  // --------------------------------------------------------
  // objclint_lint_files
  // --------------------------------------------------------
  server.tool(
    'objclint_lint_files',
    'Lint Objective-C files on disk. Directories are expanded with the configured include and exclude patterns, globs are matched from the project root; headers and implementations are linted together.',
    {
      path: z.string().optional().describe('File, directory or glob (e.g. "Sources/**/*.h") to lint, relative to the project root. Defaults to the whole project.'),
      limit: z.number().int().min(1).max(1000).default(200).describe('Maximum number of files to lint'),
    },
    async ({ path: targetPath, limit }) => {
      const projectRoot = getProjectRoot(options);
      const config = await loadConfig(projectRoot);
      if (!config.ok) {
        return errorResult(config.error.message);
      }

      const result = await runLint({
        cwd: projectRoot,
        paths: targetPath !== undefined ? [targetPath] : [],
        config: config.value,
        limit,
      });
      if (!result.ok) {
        return errorResult(result.error.message);
      }
      return textResult(reportOutput(result.value));
    }
  );

  // --------------------------------------------------------
  // objclint_list_rules
  // --------------------------------------------------------
  server.tool(
    'objclint_list_rules',
    'List the lint rules with their category, description and default severity.',
    {
      category: z.enum(['naming', 'whitespace']).optional().describe('Only list rules of this category'),
    },
    async ({ category }) => {
      const rules = listRules().filter(rule => category === undefined || rule.category === category);
      return textResult({ rules });
    }
  );
}
