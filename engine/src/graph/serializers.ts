/**
 * Graph Serializers
 *
 * Stateless renderings of a finished graph: text tree, JSON and Graphviz DOT.
 * Agents are emitted in name order and dependencies in declaration order, so
 * the same graph always renders to the same bytes.
 */

import type { DependencyGraph, GraphDataJson, GraphEdgeJson, GraphNodeJson } from '../types/graph-types.js';
import { compareNames, getSortedAgents } from './GraphBuilder.js';

/**
 * Render every agent as an indented dependency tree.
 *
 * One visited set is shared across the whole pass: an agent is expanded
 * once, under whichever parent reaches it first, and later occurrences
 * (cycles and plain shared dependencies alike) print as `name (circular)`.
 *
 * @param maxDepth - Stop descending at this depth; 0 means unlimited
 * @param includeVersions - Append ` (version)` when the agent has one
 *
 * @example
 * ```
 * └── a
 *     └── b
 *
 * └── c
 *
 * ```
 */
export function renderTextTree(
  graph: DependencyGraph,
  maxDepth: number = 0,
  includeVersions: boolean = false
): string {
  const visited = new Set<string>();
  let out = '';

  const renderNode = (name: string, prefix: string, depth: number): void => {
    if (maxDepth > 0 && depth >= maxDepth) {
      return;
    }

    if (visited.has(name)) {
      out += `${prefix}└── ${name} (circular)\n`;
      return;
    }
    visited.add(name);

    const version = graph.agents.get(name)?.version;
    const suffix = includeVersions && version ? ` (${version})` : '';
    out += `${prefix}└── ${name}${suffix}\n`;

    for (const dependency of graph.edges.get(name) ?? []) {
      renderNode(dependency, prefix + '    ', depth + 1);
    }
  };

  for (const agent of getSortedAgents(graph)) {
    if (!visited.has(agent.name)) {
      renderNode(agent.name, '', 0);
      out += '\n';
    }
  }

  return out;
}

/**
 * Structured node/edge payload, one edge per adjacency entry
 */
export function toGraphJson(graph: DependencyGraph): GraphDataJson {
  const nodes: GraphNodeJson[] = getSortedAgents(graph).map((agent) =>
    agent.version
      ? { id: agent.name, name: agent.name, version: agent.version }
      : { id: agent.name, name: agent.name }
  );

  const edges: GraphEdgeJson[] = [];
  for (const from of [...graph.edges.keys()].sort(compareNames)) {
    for (const to of graph.edges.get(from) ?? []) {
      edges.push({ from, to });
    }
  }

  return { nodes, edges };
}

/**
 * Graphviz DOT source. The version label line is omitted when the agent has
 * no version or versions were not requested.
 */
export function renderGraphviz(graph: DependencyGraph, includeVersions: boolean = false): string {
  const lines = ['digraph {'];

  for (const agent of getSortedAgents(graph)) {
    const id = quote(agent.name);
    const label = includeVersions && agent.version
      ? `${escape(agent.name)}\\n${escape(agent.version)}`
      : escape(agent.name);
    lines.push(`  ${id} [label="${label}"];`);
  }

  for (const { from, to } of toGraphJson(graph).edges) {
    lines.push(`  ${quote(from)} -> ${quote(to)};`);
  }

  lines.push('}');
  return lines.join('\n') + '\n';
}

function escape(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function quote(value: string): string {
  return `"${escape(value)}"`;
}
