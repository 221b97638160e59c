/**
 * CycleDetector
 *
 * Detects cycles in the dependency graph using Depth-First Search (DFS).
 *
 * Algorithm: iterative DFS with
 * - visited: node fully explored
 * - recStack: node currently on the active DFS path
 * - path: names on the current path, in order
 *
 * A cycle exists if a dependency is already on recStack. A self loop
 * (a → a) is a one-node cycle.
 *
 * detectCycles re-seeds the search from every agent with fresh state, so a
 * cycle that is unreachable from earlier seeds is still found.
 * Cost: O(V·(V+E)).
 *
 * What it does NOT do:
 * - Does NOT order the graph (that's DependencyResolver's job)
 * - Does NOT fail (that's DependencyResolver's job too)
 */

import type { Cycle, DependencyGraph } from '../types/graph-types.js';
import { getSortedAgents } from './GraphBuilder.js';

export class CycleDetector {
  /**
   * Find the first cycle reachable from `start`.
   *
   * @returns The loop from the re-entered agent to the agent closing it,
   *          or undefined when no cycle is reachable
   */
  static findCycle(graph: DependencyGraph, start: string): Cycle | undefined {
    const visited = new Set<string>([start]);
    const recStack = new Set<string>([start]);
    const path: string[] = [start];
    const next: number[] = [0];

    while (path.length > 0) {
      const top = path.length - 1;
      const nodeId = path[top];
      const dependencies = graph.edges.get(nodeId) ?? [];

      if (next[top] >= dependencies.length) {
        recStack.delete(nodeId);
        path.pop();
        next.pop();
        continue;
      }

      const dependency = dependencies[next[top]++];
      if (recStack.has(dependency)) {
        return Object.freeze(path.slice(path.indexOf(dependency)));
      }

      if (!visited.has(dependency)) {
        visited.add(dependency);
        recStack.add(dependency);
        path.push(dependency);
        next.push(0);
      }
    }

    return undefined;
  }

  /**
   * Find every distinct cycle, seeding the search from each agent in name order.
   * Rotations of one loop ([a, b] and [b, a]) are reported once, as first found.
   */
  static detectCycles(graph: DependencyGraph): Cycle[] {
    const cycles: Cycle[] = [];
    const seen = new Set<string>();

    for (const agent of getSortedAgents(graph)) {
      const cycle = this.findCycle(graph, agent.name);
      if (!cycle) {
        continue;
      }

      const key = this.canonicalKey(cycle);
      if (!seen.has(key)) {
        seen.add(key);
        cycles.push(cycle);
      }
    }

    return cycles;
  }

  static hasCycle(graph: DependencyGraph): boolean {
    for (const name of graph.agents.keys()) {
      if (this.findCycle(graph, name)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Rotation-independent identity of a loop: rotate so the smallest name leads.
   */
  private static canonicalKey(cycle: Cycle): string {
    let start = 0;
    for (let i = 1; i < cycle.length; i++) {
      if (cycle[i] < cycle[start]) {
        start = i;
      }
    }
    return [...cycle.slice(start), ...cycle.slice(0, start)].join('\u0000');
  }
}
