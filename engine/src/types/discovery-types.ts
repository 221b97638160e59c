/**
 * Discovery Types
 *
 * Contract between the engine and whatever supplies agent records.
 *
 * @module types
 */

import type { GraphError } from '../errors/GraphError.js';
import type { AgentSource } from '../loader/DiscoveryConfig.js';
import type { AgentRecord } from './graph-types.js';

/**
 * An agent parsed from a definition file
 */
export interface AgentDefinition extends AgentRecord {
  readonly description: string;
  readonly author?: string;
  readonly tags: readonly string[];
  /** Markdown body below the frontmatter */
  readonly content: string;
  readonly filePath: string;
  readonly source?: AgentSource;
}

/**
 * Outcome of one discovery pass.
 * Files that failed to parse are only counted; `agents` holds the parsed subset.
 */
export interface DiscoveryResult<T extends AgentRecord = AgentRecord> {
  agents: T[];
  /** Number of agents in `agents` */
  total: number;
  errorCount: number;
  errors: GraphError[];
  timeTakenMs: number;
}

/**
 * Anything that can produce agent records for a graph
 */
export interface AgentRecordSupplier<T extends AgentRecord = AgentRecord> {
  discover(): Promise<DiscoveryResult<T>>;
}
