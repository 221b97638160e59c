/**
 * Human-Readable Formatter
 *
 * Formats results for human consumption.
 * Uses symbols and colors for clear, scannable output.
 *
 * Symbols:
 * - ✔ Success
 * - ✖ Failure
 * - ⚠ Warning
 */

import { Chalk, type ChalkInstance } from 'chalk';
import {
  formatError,
  formatValidationReport,
  isGraphError,
  type Cycle,
} from '@agentgraph/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';
import type { CheckView, GraphView, ResolutionView, ValidationView } from '../types/CliViews.js';
import { formatResolutionSummary, toResolutionJson } from '../utils/resolution.js';

export const Symbols = {
  success: '✔',
  failure: '✖',
  warning: '⚠',
} as const;

export function formatCycle(cycle: Cycle): string {
  return [...cycle, cycle[0]].join(' → ');
}

/**
 * Human-readable formatter
 */
export class HumanFormatter implements Formatter {
  private readonly options: FormatterOptions;
  private readonly c: ChalkInstance;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
    this.c = options.noColor ? new Chalk({ level: 0 }) : new Chalk();
  }

  showGraph({ result, discovery }: GraphView): void {
    console.log(result.graphData.trimEnd());
    console.log();

    const { summary } = result;
    console.log(this.c.bold('Summary:'));
    console.log(`  Agents:        ${summary.totalNodes}`);
    console.log(`  Dependencies:  ${summary.totalEdges}`);
    console.log(`  Max depth:     ${summary.maxDepth}`);
    console.log(`  Disconnected:  ${summary.disconnectedNodes}`);
    console.log(`  Cycles:        ${summary.circularDependencyCount}`);

    if (result.cycles.length > 0) {
      console.log();
      console.log(this.c.red.bold('Circular dependencies:'));
      for (const cycle of result.cycles) {
        console.log(this.c.red(`  ${formatCycle(cycle)}`));
      }
    }

    this.showDiscoveryErrors(discovery.errorCount);
  }

  showResolution(view: ResolutionView): void {
    if (view.format === 'json') {
      console.log(JSON.stringify(toResolutionJson(view), null, 2));
      return;
    }

    console.log(formatResolutionSummary(view).trimEnd());

    if (view.transitiveDependencies) {
      console.log();
      const list = view.transitiveDependencies.length > 0 ? view.transitiveDependencies.join(', ') : '(none)';
      console.log(`${this.c.bold('Transitive dependencies:')} ${list}`);
    }
  }

  showCheck({ discovery, dangling, cycles }: CheckView): void {
    if (dangling.length === 0 && cycles.length === 0) {
      console.log(this.c.green(`${Symbols.success} ${discovery.total} agents, no dangling dependencies, no cycles`));
      this.showDiscoveryErrors(discovery.errorCount);
      return;
    }

    if (dangling.length > 0) {
      console.log(this.c.red.bold(`${Symbols.failure} Dangling dependencies:`));
      for (const { agent, dependency } of dangling) {
        console.log(`  ${agent} → ${this.c.red(dependency)}`);
      }
    }

    if (cycles.length > 0) {
      console.log(this.c.red.bold(`${Symbols.failure} Circular dependencies:`));
      for (const cycle of cycles) {
        console.log(`  ${formatCycle(cycle)}`);
      }
    }

    this.showDiscoveryErrors(discovery.errorCount);
  }

  showValidation({ report }: ValidationView): void {
    const status = report.valid
      ? this.c.green(`${Symbols.success} ${report.agentName} is valid`)
      : this.c.red(`${Symbols.failure} ${report.agentName} has problems`);
    console.log(status);
    console.log(formatValidationReport(report).trimEnd());
  }

  showError(error: Error): void {
    if (isGraphError(error)) {
      console.error(formatError(error, !this.options.noColor, this.options.verbose ?? false));
      return;
    }
    console.error(this.c.red(`${Symbols.failure} ${error.message}`));
  }

  showWarning(message: string): void {
    console.error(this.c.yellow(`${Symbols.warning} ${message}`));
  }

  private showDiscoveryErrors(errorCount: number): void {
    if (errorCount > 0) {
      console.log();
      this.showWarning(`${errorCount} agent definition(s) could not be loaded`);
    }
  }
}
