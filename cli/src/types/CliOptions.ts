/**
 * CLI Command Options
 *
 * Command-line options for the `agentgraph` commands, as commander hands them
 * to the action handlers.
 */

/**
 * Options every command accepts
 */
export interface CliCommonOptions {
  /**
   * Project root holding `.agentgraph/`
   */
  root?: string;

  /**
   * Output mode
   */
  output?: string;

  /**
   * Debug logging from the engine
   */
  verbose?: boolean;

  /**
   * commander sets this to false for `--no-color`
   */
  color?: boolean;
}

/**
 * `agentgraph graph` options
 */
export interface CliGraphOptions extends CliCommonOptions {
  format?: string;
  maxDepth?: number;
  includeVersions?: boolean;
  highlightCycles?: boolean;
}

/**
 * `agentgraph resolve` options
 */
export interface CliResolveOptions extends CliCommonOptions {
  format?: string;
  transitive?: boolean;
}

/**
 * `agentgraph check` options
 */
export type CliCheckOptions = CliCommonOptions;
