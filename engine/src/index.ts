/**
 * AgentGraph Engine - Agent Dependency Graph & Resolution
 *
 * @example
 * ```ts
 * import { AgentGraphEngine, AgentLoader, loadDiscoveryConfig } from '@agentgraph/engine';
 *
 * const config = await loadDiscoveryConfig(process.cwd());
 * const engine = new AgentGraphEngine();
 * await engine.load(new AgentLoader({ projectRoot: process.cwd(), config }));
 *
 * console.log(engine.resolve('deploy'));
 * ```
 */

// ============================================================================
// PRIMARY EXPORT - Start here!
// ============================================================================

export { AgentGraphEngine } from './core/AgentGraphEngine.js';

export {
  resolveEngineConfig,
  type AgentGraphEngineConfig,
  type ResolvedEngineConfig,
  type EngineLogLevel,
} from './core/EngineConfig.js';

// ============================================================================
// TYPES
// ============================================================================

export type * from './types/graph-types.js';
export type * from './types/discovery-types.js';
export * from './types/log-types.js';

// ============================================================================
// ADVANCED - Graph algorithms, discovery and diagnostics
// ============================================================================

export * from './graph/index.js';
export * from './loader/index.js';
export * from './errors/index.js';
export * from './logging/index.js';
