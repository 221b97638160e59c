/**
 * Agent Graph Error Codes
 *
 * Structured error codes for the agent dependency engine.
 *
 * TWO-LAYER SYSTEM:
 * ================
 * 1. Exit Codes: process termination codes used by the CLI
 *    - Example: ExitCodes.CIRCULAR_DEPENDENCY (104) for a cycle found during resolve
 *
 * 2. Error Codes (AGR-XX-NNN): diagnostic codes for precise error identification
 *    - Used internally by the engine
 *    - Map onto exit codes for process termination
 *
 * Categories:
 * - S: Schema/Structure errors (frontmatter, config, render format)
 * - V: Validation/Logic errors (unknown agents, circular deps)
 * - R: Runtime errors (file access, engine state)
 *
 * ADDING NEW ERRORS:
 * =================
 * 1. Add error code enum value below
 * 2. Add description in getErrorDescription()
 * 3. Add suggested action in getSuggestedAction()
 * 4. Add exit code mapping in getExitCodeForError() if it differs from the category default
 *
 * @module errors
 */

/**
 * Process exit codes for the agentgraph CLI
 */
export enum ExitCodes {
  SUCCESS = 0,
  GENERAL_ERROR = 1,

  // Input problems (100-199)
  INVALID_FORMAT = 101,
  INVALID_SCHEMA = 103,
  CIRCULAR_DEPENDENCY = 104,
  VALIDATION_FAILED = 105,
  MISSING_DEPENDENCY = 106,
  INVALID_CONFIG = 107,

  // System problems (500-599)
  INTERNAL_ERROR = 500,
  FILESYSTEM_ERROR = 506,
}

export enum GraphErrorCode {
  // ============================================================================
  // SCHEMA ERRORS (S) - Structure problems
  // Exit Code: ExitCodes.INVALID_SCHEMA (103)
  // ============================================================================

  /** Requested render format is not supported */
  SCHEMA_UNSUPPORTED_FORMAT = 'AGR-S-001',

  /** Agent file has no YAML frontmatter */
  SCHEMA_MISSING_FRONTMATTER = 'AGR-S-002',

  /** Frontmatter or config is not valid YAML */
  SCHEMA_PARSE_ERROR = 'AGR-S-003',

  /** A field has the wrong type or is missing */
  SCHEMA_INVALID_FIELD = 'AGR-S-004',

  /** Discovery configuration is invalid */
  SCHEMA_INVALID_CONFIG = 'AGR-S-005',

  // ============================================================================
  // VALIDATION ERRORS (V) - Graph logic problems
  // Exit Code: ExitCodes.VALIDATION_FAILED (105)
  // ============================================================================

  /** Agent (requested or declared as dependency) is not in the graph */
  VALIDATION_AGENT_NOT_FOUND = 'AGR-V-001',

  /** Agents depend on each other in a loop */
  VALIDATION_CIRCULAR_DEPENDENCY = 'AGR-V-002',

  // ============================================================================
  // RUNTIME ERRORS (R) - Engine state and infrastructure
  // Exit Code: ExitCodes.INTERNAL_ERROR (500)
  // ============================================================================

  /** Engine queried before a graph snapshot was loaded */
  RUNTIME_GRAPH_NOT_LOADED = 'AGR-R-001',

  /** Agent file could not be read */
  RUNTIME_FILE_UNREADABLE = 'AGR-R-002',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Stops the current command */
  ERROR = 'error',

  /** Reported, command continues */
  WARNING = 'warning',

  /** Informational message */
  INFO = 'info',
}

/**
 * Get human-readable category name from error code
 *
 * @example
 * ```typescript
 * getErrorCategory(GraphErrorCode.VALIDATION_CIRCULAR_DEPENDENCY);
 * // Returns: "Validation Error"
 * ```
 */
export function getErrorCategory(code: GraphErrorCode): string {
  if (code.startsWith('AGR-S-')) return 'Schema Error';
  if (code.startsWith('AGR-V-')) return 'Validation Error';
  if (code.startsWith('AGR-R-')) return 'Runtime Error';
  return 'Unknown Error';
}

/**
 * Get detailed description for an error code
 */
export function getErrorDescription(code: GraphErrorCode): string {
  const descriptions: Record<GraphErrorCode, string> = {
    [GraphErrorCode.SCHEMA_UNSUPPORTED_FORMAT]: 'The requested output format is not one of text, json or graphviz.',
    [GraphErrorCode.SCHEMA_MISSING_FRONTMATTER]: 'Agent definition files must start with a YAML frontmatter block between "---" lines.',
    [GraphErrorCode.SCHEMA_PARSE_ERROR]: 'YAML syntax error prevents parsing. Check indentation and quoting.',
    [GraphErrorCode.SCHEMA_INVALID_FIELD]: 'A frontmatter field is missing or has the wrong type.',
    [GraphErrorCode.SCHEMA_INVALID_CONFIG]: 'The discovery configuration contains an invalid value.',

    [GraphErrorCode.VALIDATION_AGENT_NOT_FOUND]: 'An agent name does not match any discovered agent definition.',
    [GraphErrorCode.VALIDATION_CIRCULAR_DEPENDENCY]: 'Agents depend on each other in a circular way (A needs B, B needs A).',

    [GraphErrorCode.RUNTIME_GRAPH_NOT_LOADED]: 'The engine has no dependency graph yet. Load agents before querying.',
    [GraphErrorCode.RUNTIME_FILE_UNREADABLE]: 'An agent definition file could not be read from disk.',
  };

  return descriptions[code] || 'Unknown error occurred';
}

/**
 * Map error code to process exit code
 */
export function getExitCodeForError(code: GraphErrorCode): ExitCodes {
  if (code.startsWith('AGR-S-')) {
    if (code === GraphErrorCode.SCHEMA_PARSE_ERROR) {
      return ExitCodes.INVALID_FORMAT;
    }
    if (code === GraphErrorCode.SCHEMA_INVALID_CONFIG) {
      return ExitCodes.INVALID_CONFIG;
    }
    return ExitCodes.INVALID_SCHEMA;
  }

  if (code.startsWith('AGR-V-')) {
    if (code === GraphErrorCode.VALIDATION_CIRCULAR_DEPENDENCY) {
      return ExitCodes.CIRCULAR_DEPENDENCY;
    }
    if (code === GraphErrorCode.VALIDATION_AGENT_NOT_FOUND) {
      return ExitCodes.MISSING_DEPENDENCY;
    }
    return ExitCodes.VALIDATION_FAILED;
  }

  if (code === GraphErrorCode.RUNTIME_FILE_UNREADABLE) {
    return ExitCodes.FILESYSTEM_ERROR;
  }

  return ExitCodes.INTERNAL_ERROR;
}

/**
 * Check if an error code is fixable by editing agent definitions or flags
 */
export function isUserError(code: GraphErrorCode): boolean {
  return code.startsWith('AGR-S-') || code.startsWith('AGR-V-');
}

/**
 * Get suggested action for an error code
 */
export function getSuggestedAction(code: GraphErrorCode): string {
  const actions: Record<GraphErrorCode, string> = {
    [GraphErrorCode.SCHEMA_UNSUPPORTED_FORMAT]: 'Use one of: text, json, graphviz',
    [GraphErrorCode.SCHEMA_MISSING_FRONTMATTER]: 'Add a "---" delimited YAML header with name and description',
    [GraphErrorCode.SCHEMA_PARSE_ERROR]: 'Fix YAML syntax errors',
    [GraphErrorCode.SCHEMA_INVALID_FIELD]: 'Check the field against the agent definition format',
    [GraphErrorCode.SCHEMA_INVALID_CONFIG]: 'Fix the value in .agentgraph/config.yaml or the environment',

    [GraphErrorCode.VALIDATION_AGENT_NOT_FOUND]: 'Check the agent name for typos or add the missing definition',
    [GraphErrorCode.VALIDATION_CIRCULAR_DEPENDENCY]: 'Break the dependency cycle',

    [GraphErrorCode.RUNTIME_GRAPH_NOT_LOADED]: 'Call load() or loadRecords() first',
    [GraphErrorCode.RUNTIME_FILE_UNREADABLE]: 'Check that the file exists and is readable',
  };

  return actions[code] || 'Review error details';
}
