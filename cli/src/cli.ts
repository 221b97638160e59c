#!/usr/bin/env node
/**
 * AgentGraph CLI
 *
 * Command-line interface for the agent dependency graph engine.
 * This is the main entry point for the CLI.
 *
 * Usage:
 *   agentgraph graph             Render the dependency graph
 *   agentgraph resolve <agent>   Show the execution order for an agent
 *   agentgraph check [agent]     Find dangling dependencies and cycles
 *   agentgraph --version         Show version
 */

import { Command } from 'commander';
import { ExitCodes } from '@agentgraph/engine';
import { registerCheckCommand } from './commands/check.js';
import { registerGraphCommand } from './commands/graph.js';
import { registerResolveCommand } from './commands/resolve.js';

const VERSION = '0.1.0';

/**
 * Build the program with every command registered
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('agentgraph')
    .description('Dependency graphs and execution order for agent definitions')
    .version(VERSION, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help');

  registerGraphCommand(program);
  registerResolveCommand(program);
  registerCheckCommand(program);

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  console.error('Fatal error:', err.message);
  if (process.env.DEBUG) {
    console.error(err.stack);
  }
  process.exit(ExitCodes.INTERNAL_ERROR);
});
