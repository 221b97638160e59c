/**
 * Loader Module
 *
 * Discovery configuration and the filesystem agent supplier.
 * I/O-aware, graph-agnostic.
 *
 * @module loader
 */

export * from './DiscoveryConfig.js';
export * from './AgentLoader.js';
