/**
 * Graph, Definition and Config Errors
 *
 * Specific error types with factory methods for diagnostic-rich errors.
 *
 * USAGE:
 * =====
 * ```typescript
 * // Bad: Generic error
 * throw new Error('agent not found');
 *
 * // Good: Structured error with diagnostics
 * throw ResolutionError.notFound('reviewer');
 * ```
 *
 * @module errors
 */

import { GraphError, type GraphErrorDiagnostic } from './GraphError.js';
import { GraphErrorCode, ErrorSeverity, ExitCodes } from './ErrorCodes.js';

/**
 * Resolution error (query-scoped graph problems)
 *
 * Used for:
 * - Unknown agents, requested or declared as a dependency
 * - Circular dependencies met during a cycle-intolerant walk
 */
export class ResolutionError extends GraphError {
  constructor(diagnostic: GraphErrorDiagnostic) {
    super({
      ...diagnostic,
      severity: ErrorSeverity.ERROR,
      exitCode: diagnostic.exitCode ?? ExitCodes.VALIDATION_FAILED,
    });
  }

  /**
   * @param name - The agent name that is absent from the graph
   * @param requestedBy - The agent that declared it as a dependency, if any
   */
  static notFound(name: string, requestedBy?: string): ResolutionError {
    const message = requestedBy
      ? `Agent "${requestedBy}" depends on "${name}", which is not in the graph`
      : `Agent "${name}" not found in graph`;

    return new ResolutionError({
      code: GraphErrorCode.VALIDATION_AGENT_NOT_FOUND,
      message,
      exitCode: ExitCodes.MISSING_DEPENDENCY,
      path: requestedBy ?? name,
      hint: requestedBy
        ? `Add an agent definition named "${name}" or remove it from the dependencies of "${requestedBy}"`
        : `Check that "${name}" is spelled correctly and has a definition file`,
      severity: ErrorSeverity.ERROR,
      context: requestedBy ? { agent: name, requestedBy } : { agent: name },
    });
  }

  /**
   * @param cycle - Agents on the loop, in traversal order
   */
  static circularDependency(cycle: readonly string[]): ResolutionError {
    return new ResolutionError({
      code: GraphErrorCode.VALIDATION_CIRCULAR_DEPENDENCY,
      message: `Circular dependency detected: ${[...cycle, cycle[0]].join(' → ')}`,
      exitCode: ExitCodes.CIRCULAR_DEPENDENCY,
      path: cycle[0],
      hint: 'Remove one of the dependencies to break the cycle',
      severity: ErrorSeverity.ERROR,
      context: { cycle: [...cycle] },
    });
  }

  /**
   * Agents on the cycle when this is a circular-dependency error, otherwise empty
   */
  get cycle(): readonly string[] {
    const cycle = this.diagnostic.context?.cycle;
    return Array.isArray(cycle) ? cycle.filter((name): name is string => typeof name === 'string') : [];
  }
}

/**
 * Render error (bad output request)
 */
export class RenderError extends GraphError {
  static unsupportedFormat(format: string, supported: readonly string[]): RenderError {
    return new RenderError({
      code: GraphErrorCode.SCHEMA_UNSUPPORTED_FORMAT,
      message: `Unsupported format: "${format}"`,
      path: 'format',
      hint: `Use one of: ${supported.join(', ')}`,
      severity: ErrorSeverity.ERROR,
      context: { format, supported: [...supported] },
    });
  }
}

/**
 * Agent definition file errors
 *
 * Raised by the loader; discovery catches them per file and counts them.
 */
export class DefinitionError extends GraphError {
  static missingFrontmatter(filePath: string): DefinitionError {
    return new DefinitionError({
      code: GraphErrorCode.SCHEMA_MISSING_FRONTMATTER,
      message: 'No YAML frontmatter found',
      path: filePath,
      severity: ErrorSeverity.ERROR,
    });
  }

  static invalidYaml(filePath: string, reason: string): DefinitionError {
    return new DefinitionError({
      code: GraphErrorCode.SCHEMA_PARSE_ERROR,
      message: `Invalid YAML syntax: ${reason}`,
      path: filePath,
      severity: ErrorSeverity.ERROR,
      context: { reason },
    });
  }

  static invalidField(filePath: string, field: string, reason: string): DefinitionError {
    return new DefinitionError({
      code: GraphErrorCode.SCHEMA_INVALID_FIELD,
      message: `Invalid field "${field}": ${reason}`,
      path: filePath,
      hint: field === 'name' || field === 'description'
        ? `Add a non-empty "${field}" to the frontmatter`
        : undefined,
      severity: ErrorSeverity.ERROR,
      context: { field, reason },
    });
  }

  static unreadable(filePath: string, reason: string): DefinitionError {
    return new DefinitionError({
      code: GraphErrorCode.RUNTIME_FILE_UNREADABLE,
      message: `Failed to read agent file: ${reason}`,
      path: filePath,
      severity: ErrorSeverity.ERROR,
      context: { reason },
    });
  }
}

/**
 * Discovery configuration errors
 */
export class ConfigError extends GraphError {
  static invalid(path: string, reason: string): ConfigError {
    return new ConfigError({
      code: GraphErrorCode.SCHEMA_INVALID_CONFIG,
      message: `Invalid configuration at ${path}: ${reason}`,
      path,
      severity: ErrorSeverity.ERROR,
      context: { reason },
    });
  }
}

/**
 * Engine used out of order
 */
export class EngineStateError extends GraphError {
  static graphNotLoaded(operation: string): EngineStateError {
    return new EngineStateError({
      code: GraphErrorCode.RUNTIME_GRAPH_NOT_LOADED,
      message: `Cannot run ${operation}: no dependency graph has been loaded`,
      severity: ErrorSeverity.ERROR,
      context: { operation },
    });
  }
}
