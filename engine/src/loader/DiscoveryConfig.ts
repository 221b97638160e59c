/**
 * Discovery Configuration
 *
 * Where agent definition files are looked for, and in which order.
 *
 * Sources, lowest precedence first:
 * 1. Defaults
 * 2. `.agentgraph/config.yaml` under the project root (key `agent:`)
 * 3. AGENTGRAPH_AGENT_* environment variables
 *
 * @module loader
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { homedir } from 'os';
import { isAbsolute, join, resolve } from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../errors/GraphErrors.js';

export type AgentSource = 'project' | 'user' | 'plugin';

export interface DiscoveryConfig {
  /** Project-level agent directory, relative to the project root unless absolute */
  projectPath: string;
  /** User-level agent directory */
  userPath: string;
  pluginPaths: string[];
  /** Priority order of sources; earlier sources win on name clashes */
  searchOrder: AgentSource[];
  /** Skip missing directories instead of reporting them */
  skipMissing: boolean;
}

const AgentSourceSchema = z.enum(['project', 'user', 'plugin']);

const ConfigFileSchema = z.object({
  agent: z
    .object({
      project_path: z.string().min(1).optional(),
      user_path: z.string().min(1).optional(),
      plugin_paths: z.array(z.string().min(1)).optional(),
      search_order: z.array(AgentSourceSchema).min(1).optional(),
      skip_missing: z.boolean().optional(),
    })
    .strict()
    .optional(),
});

export const CONFIG_FILE = join('.agentgraph', 'config.yaml');

export function createDefaultDiscoveryConfig(): DiscoveryConfig {
  return {
    projectPath: join('.agentgraph', 'agents'),
    userPath: '~/.agentgraph/agents',
    pluginPaths: [],
    searchOrder: ['project', 'user', 'plugin'],
    skipMissing: true,
  };
}

export interface LoadDiscoveryConfigOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

/**
 * Load discovery configuration for a project.
 *
 * @throws ConfigError if the config file or an environment override is invalid
 */
export async function loadDiscoveryConfig(
  projectRoot: string,
  options: LoadDiscoveryConfigOptions = {}
): Promise<DiscoveryConfig> {
  const env = options.env ?? process.env;
  const home = options.homeDir ?? homedir();
  const config = createDefaultDiscoveryConfig();

  const configPath = join(projectRoot, CONFIG_FILE);
  if (existsSync(configPath)) {
    const content = await readFile(configPath, 'utf-8');
    applyConfigFile(config, parseConfigFile(content, configPath));
  }

  applyEnvironment(config, env);

  return {
    ...config,
    projectPath: expandHome(config.projectPath, home),
    userPath: expandHome(config.userPath, home),
    pluginPaths: config.pluginPaths.map((path) => expandHome(path, home)),
  };
}

function parseConfigFile(content: string, configPath: string): z.infer<typeof ConfigFileSchema> {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw ConfigError.invalid(configPath, `YAML syntax error: ${reason}`);
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw ConfigError.invalid(`${configPath}#${where}`, issue.message);
  }

  return result.data;
}

function applyConfigFile(config: DiscoveryConfig, file: z.infer<typeof ConfigFileSchema>): void {
  const agent = file.agent;
  if (!agent) {
    return;
  }

  if (agent.project_path) config.projectPath = agent.project_path;
  if (agent.user_path) config.userPath = agent.user_path;
  if (agent.plugin_paths && agent.plugin_paths.length > 0) config.pluginPaths = agent.plugin_paths;
  if (agent.search_order) config.searchOrder = agent.search_order;
  if (agent.skip_missing !== undefined) config.skipMissing = agent.skip_missing;
}

function applyEnvironment(config: DiscoveryConfig, env: NodeJS.ProcessEnv): void {
  if (env.AGENTGRAPH_AGENT_PROJECT_PATH) {
    config.projectPath = env.AGENTGRAPH_AGENT_PROJECT_PATH;
  }
  if (env.AGENTGRAPH_AGENT_USER_PATH) {
    config.userPath = env.AGENTGRAPH_AGENT_USER_PATH;
  }
  if (env.AGENTGRAPH_AGENT_PLUGIN_PATHS) {
    config.pluginPaths = env.AGENTGRAPH_AGENT_PLUGIN_PATHS.split(':').filter((path) => path.length > 0);
  }
  if (env.AGENTGRAPH_AGENT_SEARCH_ORDER) {
    const order = env.AGENTGRAPH_AGENT_SEARCH_ORDER.split(',').map((source) => source.trim());
    const parsed = z.array(AgentSourceSchema).min(1).safeParse(order);
    if (!parsed.success) {
      throw ConfigError.invalid(
        'AGENTGRAPH_AGENT_SEARCH_ORDER',
        `"${env.AGENTGRAPH_AGENT_SEARCH_ORDER}" must list only project, user or plugin`
      );
    }
    config.searchOrder = parsed.data;
  }
  if (env.AGENTGRAPH_AGENT_SKIP_MISSING) {
    const value = env.AGENTGRAPH_AGENT_SKIP_MISSING;
    config.skipMissing = value === 'true' || value === '1';
  }
}

function expandHome(path: string, home: string): string {
  if (path === '~') {
    return home;
  }
  if (path.startsWith('~/')) {
    return join(home, path.slice(2));
  }
  return path;
}

/**
 * Configured directories in search order, each tagged with its source
 */
export function getAllPaths(config: DiscoveryConfig): Array<{ path: string; source: AgentSource }> {
  const paths: Array<{ path: string; source: AgentSource }> = [];

  for (const source of config.searchOrder) {
    switch (source) {
      case 'project':
        paths.push({ path: config.projectPath, source });
        break;
      case 'user':
        paths.push({ path: config.userPath, source });
        break;
      case 'plugin':
        for (const path of config.pluginPaths) {
          paths.push({ path, source });
        }
        break;
    }
  }

  return paths;
}

/**
 * Resolve a configured path against the project root
 */
export function resolveConfiguredPath(projectRoot: string, path: string): string {
  return isAbsolute(path) ? path : resolve(projectRoot, path);
}

