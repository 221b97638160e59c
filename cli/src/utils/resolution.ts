/**
 * Resolution Summaries
 *
 * Plain-text and JSON renderings of a resolved execution order.
 * The agent itself is always last in the order and is left out of the
 * dependency lines.
 */

import type { ResolutionView } from '../types/CliViews.js';

export interface ResolutionJson {
  agentName: string;
  dependencies: Array<{ name: string; version?: string; order: number }>;
  transitiveDependencies?: string[];
  summary: string;
}

/**
 * @example
 * ```
 * Dependencies for deploy (execution order):
 * 1. build v1.0.0
 * 2. test
 * ```
 */
export function formatResolutionList(view: ResolutionView): string {
  let out = `Dependencies for ${view.agentName} (execution order):\n`;
  view.dependencies.forEach((dep, i) => {
    if (dep.name === view.agentName) {
      return;
    }
    out += `${i + 1}. ${dep.name}${dep.version ? ` v${dep.version}` : ''}\n`;
  });
  return out;
}

/**
 * @example
 * ```
 * deploy
 *   └─ build (v1.0.0)
 *   └─ test
 * ```
 */
export function formatResolutionTree(view: ResolutionView): string {
  let out = `${view.agentName}\n`;
  for (const dep of view.dependencies) {
    if (dep.name === view.agentName) {
      continue;
    }
    out += `  └─ ${dep.name}${dep.version ? ` (v${dep.version})` : ''}\n`;
  }
  return out;
}

export function formatResolutionSummary(view: ResolutionView): string {
  switch (view.format) {
    case 'tree':
      return formatResolutionTree(view);
    case 'json':
      return `Resolved ${countDependencies(view)} dependencies for agent "${view.agentName}"`;
    case 'list':
      return formatResolutionList(view);
  }
}

export function toResolutionJson(view: ResolutionView): ResolutionJson {
  return {
    agentName: view.agentName,
    dependencies: view.dependencies.map((dep, i) =>
      dep.version
        ? { name: dep.name, version: dep.version, order: i + 1 }
        : { name: dep.name, order: i + 1 }
    ),
    ...(view.transitiveDependencies ? { transitiveDependencies: [...view.transitiveDependencies] } : {}),
    summary: formatResolutionSummary(view),
  };
}

function countDependencies(view: ResolutionView): number {
  return view.dependencies.filter((dep) => dep.name !== view.agentName).length;
}
