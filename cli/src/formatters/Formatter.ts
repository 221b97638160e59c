/**
 * Base Formatter Interface
 *
 * All formatters must implement this interface.
 * Formatters are the ONLY place where console output is allowed in the CLI.
 *
 * Separation of Concerns:
 * - Command: loads the graph and builds a view
 * - Formatter: decides how the view looks and where it goes (stdout/stderr)
 */

import type { CheckView, GraphView, ResolutionView, ValidationView } from '../types/CliViews.js';

/**
 * Formatter options
 */
export interface FormatterOptions {
  /** Show error codes, exit codes and context */
  verbose?: boolean;

  /** Disable colors (for CI/CD or terminals without color support) */
  noColor?: boolean;
}

export interface Formatter {
  /**
   * Display a rendered graph with its summary
   */
  showGraph(view: GraphView): void;

  /**
   * Display the execution order for one agent
   */
  showResolution(view: ResolutionView): void;

  /**
   * Display dangling dependencies and cycles for the whole graph
   */
  showCheck(view: CheckView): void;

  /**
   * Display the validation report for one agent
   */
  showValidation(view: ValidationView): void;

  showError(error: Error): void;

  showWarning(message: string): void;
}
