/**
 * Graph Command
 *
 * Renders the whole agent dependency graph.
 *
 * Usage:
 *   agentgraph graph
 *   agentgraph graph -f graphviz --include-versions > agents.dot
 *   agentgraph graph --max-depth 2 --highlight-cycles
 *
 * Exit codes:
 *   0   - Graph rendered
 *   103 - Unsupported format
 */

import { InvalidArgumentError, type Command } from 'commander';
import { createFormatter } from '../formatters/createFormatter.js';
import type { CliGraphOptions } from '../types/CliOptions.js';
import { addCommonOptions, fail, loadProject } from '../utils/project.js';

/**
 * Register the graph command
 */
export function registerGraphCommand(program: Command): void {
  addCommonOptions(
    program
      .command('graph')
      .description('Render the agent dependency graph')
      .option('-f, --format <format>', 'Graph format (text|json|graphviz)', 'text')
      .option('--max-depth <n>', 'Stop the text tree at this depth (0 = unlimited)', parseDepth, 0)
      .option('--include-versions', 'Show agent versions')
      .option('--highlight-cycles', 'List circular dependencies')
  ).action(renderGraph);
}

export function parseDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return depth;
}

async function renderGraph(options: CliGraphOptions): Promise<void> {
  const formatter = createFormatter(options.output, {
    verbose: options.verbose,
    noColor: options.color === false,
  });

  try {
    const { engine, discovery } = await loadProject(options);
    const result = engine.render(options.format ?? 'text', {
      maxDepth: options.maxDepth,
      includeVersions: options.includeVersions ?? false,
      highlightCycles: options.highlightCycles ?? false,
    });

    formatter.showGraph({ result, discovery });
  } catch (error) {
    fail(formatter, error);
  }
}
