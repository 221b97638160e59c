/**
 * GraphBuilder
 *
 * Builds the dependency graph from agent records.
 * This is pure construction - NO validation, NO ordering.
 *
 * Responsibilities:
 * 1. Register agents by name
 * 2. Append dependency edges, never twice for the same pair
 * 3. Freeze the result into an immutable snapshot
 *
 * What it does NOT do:
 * - Does NOT check that edge targets exist (dangling dependencies are kept
 *   and reported later by DependencyResolver.findDanglingDependencies)
 * - Does NOT check for cycles (that's CycleDetector's job)
 * - Does NOT order agents (that's DependencyResolver's job)
 */

import type { AgentNode, AgentRecord, DependencyGraph } from '../types/graph-types.js';

export class GraphBuilder {
  private readonly agents = new Map<string, AgentNode>();
  private readonly edges = new Map<string, string[]>();

  /**
   * Register an agent. A later agent with the same name replaces the earlier one.
   */
  addAgent(node: AgentNode): this {
    this.agents.set(node.name, node);

    if (!this.edges.has(node.name)) {
      this.edges.set(node.name, []);
    }

    return this;
  }

  /**
   * Add a dependency edge `from → to` unless it is already present.
   * Neither end has to be registered.
   */
  addEdge(from: string, to: string): this {
    let dependencies = this.edges.get(from);
    if (!dependencies) {
      dependencies = [];
      this.edges.set(from, dependencies);
    }

    if (!dependencies.includes(to)) {
      dependencies.push(to);
    }

    return this;
  }

  /**
   * Freeze the current state into a snapshot.
   * The builder may keep being used; earlier snapshots are unaffected.
   */
  build(): DependencyGraph {
    const frozenEdges = new Map<string, readonly string[]>();
    for (const [name, dependencies] of this.edges) {
      frozenEdges.set(name, Object.freeze([...dependencies]));
    }

    return Object.freeze({
      agents: new Map(this.agents),
      edges: frozenEdges,
    });
  }
}

/**
 * Build a graph from discovered records.
 *
 * Every record becomes a node first, then edges are added in record order
 * and declaration order.
 */
export function buildGraphFromDiscovery(records: readonly AgentRecord[]): DependencyGraph {
  const builder = new GraphBuilder();

  for (const record of records) {
    builder.addAgent({
      name: record.name,
      version: record.version,
      dependencies: Object.freeze([...record.dependencies]),
    });
  }

  for (const record of records) {
    for (const dependency of record.dependencies) {
      builder.addEdge(record.name, dependency);
    }
  }

  return builder.build();
}

/**
 * All agents sorted by name
 */
export function getSortedAgents(graph: DependencyGraph): AgentNode[] {
  return [...graph.agents.values()].sort((a, b) => compareNames(a.name, b.name));
}

/**
 * Ordinal string comparison, stable across locales
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * One-line-per-agent description of the graph
 *
 * @example
 * ```
 * Graph: 2 agents, 1 edges
 *   a: depends on [b]
 *   b: depends on []
 * ```
 */
export function describeGraph(graph: DependencyGraph): string {
  let totalEdges = 0;
  for (const dependencies of graph.edges.values()) {
    totalEdges += dependencies.length;
  }

  const lines = [`Graph: ${graph.agents.size} agents, ${totalEdges} edges`];
  for (const agent of getSortedAgents(graph)) {
    lines.push(`  ${agent.name}: depends on [${(graph.edges.get(agent.name) ?? []).join(', ')}]`);
  }

  return lines.join('\n') + '\n';
}
