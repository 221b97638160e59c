/**
 * Check Command
 *
 * Without an agent: lists dangling dependencies and cycles across the
 * whole graph. With an agent: validates everything reachable from it.
 *
 * Usage:
 *   agentgraph check
 *   agentgraph check deploy -o json
 *
 * Exit codes:
 *   0   - No problems
 *   104 - Cycles found
 *   105 - Agent failed validation
 *   106 - Dangling dependencies found, or agent not found
 */

import { ExitCodes, type AgentGraphEngine } from '@agentgraph/engine';
import type { Command } from 'commander';
import { createFormatter } from '../formatters/createFormatter.js';
import type { CliCheckOptions } from '../types/CliOptions.js';
import type { CheckView, DiscoveryStats } from '../types/CliViews.js';
import { addCommonOptions, fail, loadProject } from '../utils/project.js';

/**
 * Register the check command
 */
export function registerCheckCommand(program: Command): void {
  addCommonOptions(
    program
      .command('check [agent]')
      .description('Report dangling dependencies and cycles, or validate one agent')
  ).action(checkGraph);
}

export function buildCheckView(engine: AgentGraphEngine, discovery: DiscoveryStats): CheckView {
  return {
    discovery,
    dangling: engine.danglingDependencies(),
    cycles: engine.cycles(),
  };
}

/**
 * Cycles take precedence over dangling dependencies
 */
export function checkExitCode(view: CheckView): ExitCodes {
  if (view.cycles.length > 0) {
    return ExitCodes.CIRCULAR_DEPENDENCY;
  }
  if (view.dangling.length > 0) {
    return ExitCodes.MISSING_DEPENDENCY;
  }
  return ExitCodes.SUCCESS;
}

async function checkGraph(agentName: string | undefined, options: CliCheckOptions): Promise<void> {
  const formatter = createFormatter(options.output, {
    verbose: options.verbose,
    noColor: options.color === false,
  });

  try {
    const { engine, discovery } = await loadProject(options);

    if (agentName) {
      const report = engine.validateAgent(agentName);
      formatter.showValidation({ report });
      process.exit(report.valid ? ExitCodes.SUCCESS : ExitCodes.VALIDATION_FAILED);
    }

    const view = buildCheckView(engine, discovery);
    formatter.showCheck(view);
    process.exit(checkExitCode(view));
  } catch (error) {
    fail(formatter, error);
  }
}
