/**
 * Base Graph Error Class
 *
 * Foundation for all engine errors with diagnostic capabilities.
 * Provides structured error information for the CLI and library callers.
 *
 * ARCHITECTURE:
 * - Error codes (AGR-XX-NNN): Structured codes for error identification
 * - Exit codes: Process exit codes for shell scripts
 * - Severity levels: ERROR, WARNING, INFO
 * - Context + hints: Help users debug and fix issues
 *
 * @module errors
 */

import {
  GraphErrorCode,
  ErrorSeverity,
  ExitCodes,
  getErrorCategory,
  getErrorDescription,
  getExitCodeForError,
  getSuggestedAction,
  isUserError,
} from './ErrorCodes.js';

/**
 * Diagnostic error information
 */
export interface GraphErrorDiagnostic {
  /** Structured error code (e.g., AGR-V-002) */
  code: GraphErrorCode;

  /** Human-readable error message */
  message: string;

  /** Process exit code (derived from the code when omitted) */
  exitCode?: ExitCodes;

  /** Where the problem is (an agent name, a file path, a config key) */
  path?: string;

  /** Optional suggestion for fixing the error */
  hint?: string;

  severity: ErrorSeverity;

  /** Additional context data for debugging */
  context?: Record<string, unknown>;
}

/**
 * Base error class for all engine errors
 *
 * @example
 * ```typescript
 * throw new GraphError({
 *   code: GraphErrorCode.VALIDATION_AGENT_NOT_FOUND,
 *   message: 'Agent "reviewer" not found in graph',
 *   path: 'reviewer',
 *   severity: ErrorSeverity.ERROR,
 * });
 * ```
 */
export class GraphError extends Error {
  public readonly diagnostic: Required<Pick<GraphErrorDiagnostic, 'exitCode' | 'hint'>> & GraphErrorDiagnostic;

  public readonly timestamp: Date;

  constructor(diagnostic: GraphErrorDiagnostic) {
    super(diagnostic.message);
    this.name = getErrorCategory(diagnostic.code);
    this.diagnostic = {
      ...diagnostic,
      exitCode: diagnostic.exitCode ?? getExitCodeForError(diagnostic.code),
      hint: diagnostic.hint ?? getSuggestedAction(diagnostic.code),
    };
    this.timestamp = new Date();

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get code(): GraphErrorCode {
    return this.diagnostic.code;
  }

  get exitCode(): ExitCodes {
    return this.diagnostic.exitCode;
  }

  get path(): string | undefined {
    return this.diagnostic.path;
  }

  get hint(): string {
    return this.diagnostic.hint;
  }

  get severity(): ErrorSeverity {
    return this.diagnostic.severity;
  }

  get description(): string {
    return getErrorDescription(this.code);
  }

  /**
   * True if the user can fix this by editing agent definitions or flags
   */
  get isUserError(): boolean {
    return isUserError(this.code);
  }

  get category(): string {
    return getErrorCategory(this.code);
  }

  /**
   * Format error as string for logging/display
   */
  toString(): string {
    let msg = `${this.name} [${this.code}]`;

    if (this.path) {
      msg += ` at ${this.path}`;
    }

    msg += `\n\n${this.message}`;

    if (this.hint) {
      msg += `\n\nHint: ${this.hint}`;
    }

    if (this.diagnostic.context && Object.keys(this.diagnostic.context).length > 0) {
      msg += `\n\nContext: ${JSON.stringify(this.diagnostic.context, null, 2)}`;
    }

    return msg;
  }

  /**
   * Convert to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      code: this.code,
      exitCode: this.exitCode,
      message: this.message,
      description: this.description,
      path: this.path,
      hint: this.hint,
      severity: this.severity,
      context: this.diagnostic.context,
      timestamp: this.timestamp.toISOString(),
      isUserError: this.isUserError,
    };
  }

  /**
   * Simplified error object for CLI display
   */
  toSimpleObject(): {
    code: string;
    message: string;
    hint?: string;
    path?: string;
  } {
    return {
      code: this.code,
      message: this.message,
      hint: this.hint,
      path: this.path,
    };
  }
}

/**
 * Narrow an unknown thrown value to a GraphError
 */
export function isGraphError(value: unknown): value is GraphError {
  return value instanceof GraphError;
}
