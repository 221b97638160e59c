/**
 * Resolve Command
 *
 * Prints the execution order for one agent: every dependency before the
 * agents that need it, the agent itself last.
 *
 * Usage:
 *   agentgraph resolve deploy
 *   agentgraph resolve deploy -f tree --transitive
 *
 * Exit codes:
 *   0   - Resolved
 *   104 - Circular dependency
 *   106 - Agent or one of its dependencies not found
 */

import { RenderError, type AgentGraphEngine } from '@agentgraph/engine';
import type { Command } from 'commander';
import { createFormatter } from '../formatters/createFormatter.js';
import type { CliResolveOptions } from '../types/CliOptions.js';
import { RESOLUTION_FORMATS, isResolutionFormat, type ResolutionView } from '../types/CliViews.js';
import { addCommonOptions, fail, loadProject } from '../utils/project.js';

/**
 * Register the resolve command
 */
export function registerResolveCommand(program: Command): void {
  addCommonOptions(
    program
      .command('resolve <agent>')
      .description('Show the execution order for an agent')
      .option('-f, --format <format>', 'Summary format (list|tree|json)', 'list')
      .option('--transitive', 'Also list every transitive dependency')
  ).action(resolveAgent);
}

/**
 * Build the resolution view for `agentName`
 *
 * @throws RenderError for an unknown summary format
 * @throws ResolutionError when the agent cannot be resolved
 */
export function buildResolutionView(
  engine: AgentGraphEngine,
  agentName: string,
  format: string,
  transitive: boolean
): ResolutionView {
  if (!isResolutionFormat(format)) {
    throw RenderError.unsupportedFormat(format, RESOLUTION_FORMATS);
  }

  const dependencies = engine.resolve(agentName);
  return {
    agentName,
    format,
    dependencies,
    ...(transitive ? { transitiveDependencies: engine.transitiveDependencies(agentName) } : {}),
  };
}

async function resolveAgent(agentName: string, options: CliResolveOptions): Promise<void> {
  const formatter = createFormatter(options.output, {
    verbose: options.verbose,
    noColor: options.color === false,
  });

  try {
    const { engine } = await loadProject(options);
    formatter.showResolution(
      buildResolutionView(engine, agentName, options.format ?? 'list', options.transitive ?? false)
    );
  } catch (error) {
    fail(formatter, error);
  }
}
