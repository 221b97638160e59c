/**
 * Graph Types
 *
 * Shared data model for the dependency graph and its reports.
 * Every payload here is a concrete type; nothing leaves the engine as an open map.
 *
 * @module types
 */

/**
 * An agent record as supplied by discovery
 */
export interface AgentRecord {
  /** Unique graph key, non-empty */
  readonly name: string;
  /** Free-form version, never parsed by the engine */
  readonly version?: string;
  /** Dependency names in declaration order */
  readonly dependencies: readonly string[];
}

/**
 * A node in the dependency graph
 */
export type AgentNode = AgentRecord;

/**
 * Immutable dependency graph snapshot
 */
export interface DependencyGraph {
  /** All agents indexed by name */
  readonly agents: ReadonlyMap<string, AgentNode>;
  /**
   * Adjacency list: name → dependency names, declaration order, no duplicates.
   * Targets may be absent from `agents` (dangling dependencies).
   */
  readonly edges: ReadonlyMap<string, readonly string[]>;
}

/**
 * Names forming a loop, from the re-entered agent to the agent whose edge closes it
 */
export type Cycle = readonly string[];

/**
 * A declared dependency without a node
 */
export interface DanglingDependency {
  /** Agent that declares the dependency */
  readonly agent: string;
  /** Declared name that has no node */
  readonly dependency: string;
}

/**
 * Graph statistics
 */
export interface GraphSummary {
  readonly totalNodes: number;
  readonly totalEdges: number;
  readonly maxDepth: number;
  readonly disconnectedNodes: number;
  readonly circularDependencyCount: number;
}

export interface GraphNodeJson {
  readonly id: string;
  readonly name: string;
  readonly version?: string;
}

export interface GraphEdgeJson {
  readonly from: string;
  readonly to: string;
}

/**
 * JSON view of the graph
 */
export interface GraphDataJson {
  readonly nodes: readonly GraphNodeJson[];
  readonly edges: readonly GraphEdgeJson[];
}

export type RenderFormat = 'text' | 'json' | 'graphviz';

export interface RenderOptions {
  /** Stop the text tree at this depth; 0 means unlimited */
  readonly maxDepth?: number;
  /** Append versions to text lines and DOT labels */
  readonly includeVersions?: boolean;
  /** Include the detected cycle paths in the result */
  readonly highlightCycles?: boolean;
}

/**
 * Output of a render request
 */
export interface RenderResult {
  readonly format: RenderFormat;
  readonly graphData: string;
  /** Structured payload, present for the json format */
  readonly jsonData?: GraphDataJson;
  readonly summary: GraphSummary;
  /** Detected cycles; empty unless highlightCycles was requested */
  readonly cycles: readonly Cycle[];
}

/**
 * One entry of a resolution order
 */
export interface ResolvedAgent {
  readonly name: string;
  readonly version?: string;
}

/**
 * Result of validating one agent against the graph
 */
export interface ValidationReport {
  readonly agentName: string;
  readonly valid: boolean;
  readonly issues: readonly string[];
  /** Execution order, empty when resolution failed */
  readonly resolvedDependencies: readonly string[];
}
