/**
 * Error Infrastructure
 *
 * Diagnostic errors shared by the graph modules, the loader and the CLI.
 *
 * @module errors
 */

export * from './ErrorCodes.js';
export * from './GraphError.js';
export * from './GraphErrors.js';
export * from './ErrorFormatter.js';
