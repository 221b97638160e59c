/**
 * AgentValidator
 *
 * Checks one agent against the graph and reports every problem at once,
 * instead of stopping at the first like DependencyResolver does.
 *
 * Issues reported:
 * - a cycle reachable from the agent
 * - dependencies without a node, anywhere below the agent
 */

import { ResolutionError } from '../errors/GraphErrors.js';
import type { DependencyGraph, ValidationReport } from '../types/graph-types.js';
import { CycleDetector } from './CycleDetector.js';
import { DependencyResolver } from './DependencyResolver.js';
import { TransitiveClosure } from './TransitiveClosure.js';

export class AgentValidator {
  /**
   * @throws ResolutionError NotFound when `name` has no node
   */
  static validate(graph: DependencyGraph, name: string): ValidationReport {
    const reachable = [name, ...TransitiveClosure.getTransitiveDeps(graph, name)];
    const issues: string[] = [];

    const cycle = CycleDetector.findCycle(graph, name);
    if (cycle) {
      issues.push(`Circular dependency detected: ${[...cycle, cycle[0]].join(' → ')}`);
    }

    for (const agent of reachable) {
      for (const dependency of graph.edges.get(agent) ?? []) {
        if (!graph.agents.has(dependency)) {
          issues.push(`Agent "${agent}" depends on non-existent agent "${dependency}"`);
        }
      }
    }

    let resolvedDependencies: string[] = [];
    try {
      resolvedDependencies = DependencyResolver.resolveDependencies(graph, name).map((node) => node.name);
    } catch (error) {
      // Already reported above
      if (!(error instanceof ResolutionError)) {
        throw error;
      }
    }

    return {
      agentName: name,
      valid: issues.length === 0,
      issues,
      resolvedDependencies,
    };
  }
}

/**
 * Plain-text report
 *
 * @example
 * ```
 * Agent: deploy
 * Valid: true
 * Dependencies (in execution order):
 *   1. build
 *   2. deploy
 * ```
 */
export function formatValidationReport(report: ValidationReport): string {
  const lines = [`Agent: ${report.agentName}`, `Valid: ${report.valid}`];

  if (report.issues.length > 0) {
    lines.push('Issues:');
    for (const issue of report.issues) {
      lines.push(`  - ${issue}`);
    }
  }

  if (report.resolvedDependencies.length > 0) {
    lines.push('Dependencies (in execution order):');
    report.resolvedDependencies.forEach((dep, i) => {
      lines.push(`  ${i + 1}. ${dep}`);
    });
  }

  return lines.join('\n') + '\n';
}
