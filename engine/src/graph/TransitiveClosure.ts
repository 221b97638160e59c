/**
 * TransitiveClosure
 *
 * Collects every agent reachable from a start agent through dependency edges.
 *
 * More permissive than DependencyResolver: cycles and dangling dependencies
 * are not errors here. A visited set guarantees termination on any graph,
 * so callers may use it without running a cycle check first. The walk keeps
 * its own stack, so chain length is not bounded by the call stack.
 */

import { ResolutionError } from '../errors/GraphErrors.js';
import type { DependencyGraph } from '../types/graph-types.js';

export class TransitiveClosure {
  /**
   * All names reachable from `name`, excluding `name` itself, each once,
   * in pre-order discovery order.
   *
   * @throws ResolutionError NotFound when `name` has no node
   */
  static getTransitiveDeps(graph: DependencyGraph, name: string): string[] {
    if (!graph.agents.has(name)) {
      throw ResolutionError.notFound(name);
    }

    const visited = new Set<string>([name]);
    const result: string[] = [];

    const stack: Array<{ name: string; next: number }> = [{ name, next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const dependencies = graph.edges.get(frame.name) ?? [];
      if (frame.next >= dependencies.length) {
        stack.pop();
        continue;
      }

      const dependency = dependencies[frame.next++];
      if (visited.has(dependency)) {
        continue;
      }
      visited.add(dependency);
      result.push(dependency);
      stack.push({ name: dependency, next: 0 });
    }

    return result;
  }
}
