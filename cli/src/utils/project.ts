/**
 * Project Loading
 *
 * Shared by every command: read the discovery config under the project
 * root, run one discovery pass and hand back a loaded engine.
 */

import { resolve } from 'path';
import {
  AgentGraphEngine,
  AgentLoader,
  ExitCodes,
  createEngineLogger,
  isGraphError,
  loadDiscoveryConfig,
} from '@agentgraph/engine';
import type { Command } from 'commander';
import type { Formatter } from '../formatters/Formatter.js';
import type { CliCommonOptions } from '../types/CliOptions.js';
import type { DiscoveryStats } from '../types/CliViews.js';

export interface LoadedProject {
  engine: AgentGraphEngine;
  discovery: DiscoveryStats;
}

/**
 * Options shared by all commands
 */
export function addCommonOptions(command: Command): Command {
  return command
    .option('-r, --root <dir>', 'Project root containing .agentgraph/')
    .option('-o, --output <type>', 'Output type (human|json)', 'human')
    .option('--verbose', 'Log engine activity')
    .option('--no-color', 'Disable colored output');
}

export async function loadProject(options: CliCommonOptions): Promise<LoadedProject> {
  const projectRoot = resolve(options.root ?? process.cwd());
  const logger = createEngineLogger(options.verbose ? 'debug' : 'warn', {
    colors: options.color !== false,
    source: 'agentgraph',
  });

  const config = await loadDiscoveryConfig(projectRoot);
  const engine = new AgentGraphEngine({ logger });
  const result = await engine.load(new AgentLoader({ projectRoot, config, logger }));

  return {
    engine,
    discovery: { total: result.total, errorCount: result.errorCount },
  };
}

/**
 * Exit code for an error thrown by a command
 */
export function exitCodeFor(error: unknown): number {
  return isGraphError(error) ? error.exitCode : ExitCodes.GENERAL_ERROR;
}

/**
 * Show the error and exit with its code
 */
export function fail(formatter: Formatter, error: unknown): never {
  formatter.showError(error instanceof Error ? error : new Error(String(error)));
  process.exit(exitCodeFor(error));
}
