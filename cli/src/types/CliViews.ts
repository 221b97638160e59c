/**
 * CLI Views
 *
 * What the commands hand to a formatter. Formatters decide how each one
 * looks; commands never print.
 */

import type {
  Cycle,
  DanglingDependency,
  RenderResult,
  ResolvedAgent,
  ValidationReport,
} from '@agentgraph/engine';

export type ResolutionFormat = 'list' | 'tree' | 'json';

export const RESOLUTION_FORMATS: readonly ResolutionFormat[] = ['list', 'tree', 'json'];

export function isResolutionFormat(value: string): value is ResolutionFormat {
  return RESOLUTION_FORMATS.some((format) => format === value);
}

/**
 * Discovery counters shown next to results
 */
export interface DiscoveryStats {
  total: number;
  errorCount: number;
}

export interface GraphView {
  result: RenderResult;
  discovery: DiscoveryStats;
}

export interface ResolutionView {
  agentName: string;
  format: ResolutionFormat;
  /** Execution order, the agent itself last */
  dependencies: readonly ResolvedAgent[];
  transitiveDependencies?: readonly string[];
}

/**
 * Whole-graph health check
 */
export interface CheckView {
  discovery: DiscoveryStats;
  dangling: readonly DanglingDependency[];
  cycles: readonly Cycle[];
}

export interface ValidationView {
  report: ValidationReport;
}
