/**
 * GraphAnalyzer
 *
 * Aggregate statistics over a dependency graph.
 *
 * Depth is cycle-tolerant: an agent met again on the current path counts as
 * depth 0 instead of failing. Each dependency's depth is recomputed for every
 * parent with no memoisation, so dense graphs cost exponential time here.
 */

import type { DependencyGraph, GraphSummary } from '../types/graph-types.js';
import { CycleDetector } from './CycleDetector.js';

export class GraphAnalyzer {
  static summarize(graph: DependencyGraph): GraphSummary {
    let totalEdges = 0;
    for (const dependencies of graph.edges.values()) {
      totalEdges += dependencies.length;
    }

    let maxDepth = 0;
    for (const name of graph.agents.keys()) {
      maxDepth = Math.max(maxDepth, this.calculateDepth(graph, name));
    }

    return {
      totalNodes: graph.agents.size,
      totalEdges,
      maxDepth,
      disconnectedNodes: this.countDisconnected(graph),
      circularDependencyCount: CycleDetector.detectCycles(graph).length,
    };
  }

  /**
   * Longest dependency chain below `name`, with a fresh path guard per call.
   */
  static calculateDepth(graph: DependencyGraph, name: string): number {
    return this.depth(graph, name, new Set<string>());
  }

  /**
   * Agents left unmarked after sweeping every component.
   *
   * NOTE: the sweep is restarted from every unmarked agent, so every agent
   * ends up marked and this is always 0. Redefining it (e.g. agents
   * unreachable from one designated root) is a behaviour change, not a fix.
   */
  static countDisconnected(graph: DependencyGraph): number {
    const marked = new Set<string>();

    for (const name of graph.agents.keys()) {
      if (!marked.has(name)) {
        this.markConnected(graph, name, marked);
      }
    }

    let markedAgents = 0;
    for (const name of marked) {
      if (graph.agents.has(name)) {
        markedAgents++;
      }
    }

    return graph.agents.size - markedAgents;
  }

  /**
   * Mark everything connected to `name`, following edges both ways.
   */
  static markConnected(graph: DependencyGraph, name: string, marked: Set<string>): void {
    if (marked.has(name)) {
      return;
    }
    marked.add(name);

    for (const dependency of graph.edges.get(name) ?? []) {
      this.markConnected(graph, dependency, marked);
    }

    for (const [from, dependencies] of graph.edges) {
      if (dependencies.includes(name)) {
        this.markConnected(graph, from, marked);
      }
    }
  }

  private static depth(graph: DependencyGraph, name: string, onPath: Set<string>): number {
    if (onPath.has(name)) {
      return 0;
    }

    onPath.add(name);
    let max = 0;
    for (const dependency of graph.edges.get(name) ?? []) {
      max = Math.max(max, 1 + this.depth(graph, dependency, onPath));
    }
    onPath.delete(name);

    return max;
  }
}
