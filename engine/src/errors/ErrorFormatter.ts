/**
 * Error Formatter
 *
 * Formats graph errors for CLI display.
 *
 * USAGE:
 * =====
 * ```typescript
 * console.error(formatError(error));
 * console.error(formatErrorSummary(error, false));
 * ```
 *
 * @module errors
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { GraphError } from './GraphError.js';
import { ErrorSeverity } from './ErrorCodes.js';

function palette(useColors: boolean): ChalkInstance {
  return useColors ? chalk : new Chalk({ level: 0 });
}

/**
 * Format error for CLI display
 *
 * @param useColors - Whether to use ANSI colors (default: true)
 * @param verbose - Show exit code, category and context (default: false)
 */
export function formatError(
  error: GraphError,
  useColors: boolean = true,
  verbose: boolean = false
): string {
  const c = palette(useColors);
  const color = severityColor(error.severity, c);
  const lines: string[] = [];

  lines.push(`${color(`${severityIcon(error.severity)} ${error.name}`)} ${c.gray(`[${error.code}]`)}`);

  if (error.path) {
    lines.push(c.dim(`at ${c.cyan(error.path)}`));
  }

  lines.push('');
  lines.push(c.bold(error.message));

  if (error.hint) {
    lines.push('');
    lines.push(`${c.blue('→ Hint:')} ${error.hint}`);
  }

  if (verbose) {
    lines.push('');
    lines.push(`${c.dim('Exit Code:')} ${error.exitCode}`);
    lines.push(`${c.dim('Category:')} ${error.category}`);
    if (error.isUserError) {
      lines.push(`${c.dim('Flags:')} User-fixable`);
    }

    if (error.diagnostic.context && Object.keys(error.diagnostic.context).length > 0) {
      lines.push('');
      lines.push(c.dim('Context:'));
      lines.push(c.gray(JSON.stringify(error.diagnostic.context, null, 2)));
    }
  }

  return lines.join('\n');
}

/**
 * One-line error summary
 *
 * @example
 * ```typescript
 * formatErrorSummary(ResolutionError.notFound('x'), false);
 * // "✗ AGR-V-001 at x: Agent "x" not found in graph"
 * ```
 */
export function formatErrorSummary(error: GraphError, useColors: boolean = true): string {
  const c = palette(useColors);
  const color = severityColor(error.severity, c);
  const path = error.path ? ` at ${error.path}` : '';

  return `${color(`${severityIcon(error.severity)} ${error.code}`)}${path}: ${c.bold(error.message)}`;
}

function severityIcon(severity: ErrorSeverity): string {
  switch (severity) {
    case ErrorSeverity.ERROR:
      return '\u2717'; // ✗
    case ErrorSeverity.WARNING:
      return '\u26A0'; // ⚠
    case ErrorSeverity.INFO:
      return '\u2139'; // ℹ
  }
}

function severityColor(severity: ErrorSeverity, c: ChalkInstance): ChalkInstance {
  switch (severity) {
    case ErrorSeverity.ERROR:
      return c.red;
    case ErrorSeverity.WARNING:
      return c.yellow;
    case ErrorSeverity.INFO:
      return c.blue;
  }
}
