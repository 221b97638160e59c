/**
 * Engine Configuration
 *
 * User-facing configuration for AgentGraphEngine.
 * All options are optional; resolveEngineConfig fills in defaults.
 *
 * @module core
 */

import { createEngineLogger, type EngineLogger } from '../logging/EngineLogger.js';

/**
 * Logging level for engine output
 */
export type EngineLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Engine configuration options
 *
 * @example
 * ```ts
 * const engine = new AgentGraphEngine({ logLevel: 'debug', colors: false });
 * ```
 */
export interface AgentGraphEngineConfig {
  /**
   * Minimum level that reaches the log sink
   * @default 'info'
   */
  logLevel?: EngineLogLevel;

  /**
   * Shorthand for logLevel 'debug'
   * @default false
   */
  verbose?: boolean;

  /**
   * Colour text log output
   * @default true
   */
  colors?: boolean;

  /**
   * Use this logger instead of creating one; null disables logging
   */
  logger?: EngineLogger | null;
}

export interface ResolvedEngineConfig {
  logLevel: EngineLogLevel;
  verbose: boolean;
  colors: boolean;
  logger: EngineLogger | null;
}

export function resolveEngineConfig(config: AgentGraphEngineConfig = {}): ResolvedEngineConfig {
  const verbose = config.verbose ?? false;
  const logLevel = verbose ? 'debug' : config.logLevel ?? 'info';
  const colors = config.colors ?? true;

  const logger = config.logger !== undefined
    ? config.logger
    : createEngineLogger(logLevel, { colors });

  return { logLevel, verbose, colors, logger };
}
