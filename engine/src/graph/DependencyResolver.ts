/**
 * DependencyResolver
 *
 * Computes the execution order for one agent: everything it depends on,
 * dependencies first, then the agent itself.
 *
 * Algorithm: DFS with post-order emission, driven by an explicit frame stack.
 * - Dependencies are visited in declaration order (never sorted)
 * - A node already emitted is not emitted again (shared dependencies appear
 *   once, at the position of their first resolution)
 * - Agents on the current path are tracked; meeting one again is a back edge
 *
 * Failures are scoped to the query; the graph snapshot is never touched, so
 * resolving an acyclic agent still works after another agent failed.
 *
 * Dangling dependencies fail the walk with NotFound. Callers that want a
 * non-failing pre-check use findDanglingDependencies instead.
 */

import { ResolutionError } from '../errors/GraphErrors.js';
import type { AgentNode, DanglingDependency, DependencyGraph } from '../types/graph-types.js';
import { compareNames } from './GraphBuilder.js';

interface ResolveFrame {
  name: string;
  /** Index of the next dependency to visit */
  next: number;
}

export class DependencyResolver {
  /**
   * Resolve the ordered agents that must run before, and including, `name`.
   *
   * @throws ResolutionError NotFound when `name` or a reachable dependency has no node
   * @throws ResolutionError CircularDependency when a back edge is met
   */
  static resolveDependencies(graph: DependencyGraph, name: string): AgentNode[] {
    if (!graph.agents.has(name)) {
      throw ResolutionError.notFound(name);
    }

    const emitted = new Set<string>();
    const onPath = new Set<string>([name]);
    const path: ResolveFrame[] = [{ name, next: 0 }];
    const order: AgentNode[] = [];

    while (path.length > 0) {
      const frame = path[path.length - 1];
      const dependencies = graph.edges.get(frame.name) ?? [];

      if (frame.next < dependencies.length) {
        const dependency = dependencies[frame.next++];

        if (onPath.has(dependency)) {
          const start = path.findIndex((entry) => entry.name === dependency);
          throw ResolutionError.circularDependency(path.slice(start).map((entry) => entry.name));
        }

        if (emitted.has(dependency)) {
          continue;
        }

        if (!graph.agents.has(dependency)) {
          throw ResolutionError.notFound(dependency, frame.name);
        }

        onPath.add(dependency);
        path.push({ name: dependency, next: 0 });
        continue;
      }

      path.pop();
      onPath.delete(frame.name);
      emitted.add(frame.name);

      const node = graph.agents.get(frame.name);
      if (node) {
        order.push(node);
      }
    }

    return order;
  }

  /**
   * List every declared dependency that has no node. Never throws.
   * Agents in name order, dependencies in declaration order.
   */
  static findDanglingDependencies(graph: DependencyGraph): DanglingDependency[] {
    const dangling: DanglingDependency[] = [];
    const names = [...graph.edges.keys()].sort(compareNames);

    for (const agent of names) {
      for (const dependency of graph.edges.get(agent) ?? []) {
        if (!graph.agents.has(dependency)) {
          dangling.push({ agent, dependency });
        }
      }
    }

    return dangling;
  }
}
