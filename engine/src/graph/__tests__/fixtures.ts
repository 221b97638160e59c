import type { AgentRecord, DependencyGraph } from '../../types/graph-types.js';
import { buildGraphFromDiscovery } from '../GraphBuilder.js';

/**
 * Build a graph from `name: [deps]` pairs, in the order given
 */
export function graphOf(adjacency: Record<string, string[]>, versions: Record<string, string> = {}): DependencyGraph {
  const records: AgentRecord[] = Object.entries(adjacency).map(([name, dependencies]) =>
    versions[name] ? { name, version: versions[name], dependencies } : { name, dependencies }
  );
  return buildGraphFromDiscovery(records);
}

/**
 * `agent-0 → agent-1 → … → agent-(length-1)`, optionally closed back to agent-0
 */
export function chainOf(length: number, closed = false): Record<string, string[]> {
  const adjacency: Record<string, string[]> = {};
  for (let i = 0; i < length; i++) {
    const last = i === length - 1;
    adjacency[`agent-${i}`] = last ? (closed ? ['agent-0'] : []) : [`agent-${i + 1}`];
  }
  return adjacency;
}

/**
 * Seeded random DAG over n0..n(size-1). Edges only point at higher indexes.
 */
export function generatedDag(size: number, seed: number): Record<string, string[]> {
  let state = seed;
  const random = (bound: number): number => {
    state = (state * 48271) % 2147483647;
    return state % bound;
  };

  const adjacency: Record<string, string[]> = {};
  for (let i = 0; i < size; i++) {
    const dependencies: string[] = [];
    const remaining = size - i - 1;
    const count = remaining > 0 ? random(4) : 0;
    for (let k = 0; k < count; k++) {
      const target = `n${i + 1 + random(remaining)}`;
      if (!dependencies.includes(target)) {
        dependencies.push(target);
      }
    }
    adjacency[`n${i}`] = dependencies;
  }
  return adjacency;
}
