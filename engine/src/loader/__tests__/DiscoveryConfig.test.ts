import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createDefaultDiscoveryConfig,
  getAllPaths,
  loadDiscoveryConfig,
  resolveConfiguredPath,
  type DiscoveryConfig,
} from '../DiscoveryConfig.js';
import { ConfigError } from '../../errors/GraphErrors.js';

const HOME = '/home/tester';

describe('loadDiscoveryConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'agentgraph-config-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<void> {
    await mkdir(join(root, '.agentgraph'), { recursive: true });
    await writeFile(join(root, '.agentgraph', 'config.yaml'), content);
  }

  it('uses the defaults without a config file', async () => {
    expect(await loadDiscoveryConfig(root, { env: {}, homeDir: HOME })).toEqual({
      projectPath: join('.agentgraph', 'agents'),
      userPath: join(HOME, '.agentgraph/agents'),
      pluginPaths: [],
      searchOrder: ['project', 'user', 'plugin'],
      skipMissing: true,
    });
  });

  it('reads the agent section of the config file', async () => {
    await writeConfig(
      [
        'agent:',
        '  project_path: agents',
        '  plugin_paths: [~/plugins/one, /opt/two]',
        '  search_order: [plugin, project]',
        '  skip_missing: false',
      ].join('\n')
    );

    const config = await loadDiscoveryConfig(root, { env: {}, homeDir: HOME });

    expect(config.projectPath).toBe('agents');
    expect(config.pluginPaths).toEqual([join(HOME, 'plugins/one'), '/opt/two']);
    expect(config.searchOrder).toEqual(['plugin', 'project']);
    expect(config.skipMissing).toBe(false);
  });

  it('treats an empty file as no settings', async () => {
    await writeConfig('');

    const config = await loadDiscoveryConfig(root, { env: {}, homeDir: HOME });

    expect(config.searchOrder).toEqual(['project', 'user', 'plugin']);
  });

  it('lets the environment override the file', async () => {
    await writeConfig('agent:\n  project_path: from-file\n');

    const config = await loadDiscoveryConfig(root, {
      homeDir: HOME,
      env: {
        AGENTGRAPH_AGENT_PROJECT_PATH: 'from-env',
        AGENTGRAPH_AGENT_USER_PATH: '~',
        AGENTGRAPH_AGENT_PLUGIN_PATHS: '/p1::/p2',
        AGENTGRAPH_AGENT_SEARCH_ORDER: 'user, project',
        AGENTGRAPH_AGENT_SKIP_MISSING: '0',
      },
    });

    expect(config).toEqual({
      projectPath: 'from-env',
      userPath: HOME,
      pluginPaths: ['/p1', '/p2'],
      searchOrder: ['user', 'project'],
      skipMissing: false,
    });
  });

  it('rejects an unknown search order source in the file', async () => {
    await writeConfig('agent:\n  search_order: [project, cloud]\n');

    await expect(loadDiscoveryConfig(root, { env: {}, homeDir: HOME })).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects an empty search order', async () => {
    await writeConfig('agent:\n  search_order: []\n');

    await expect(loadDiscoveryConfig(root, { env: {}, homeDir: HOME })).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects an unknown search order source in the environment', async () => {
    await expect(
      loadDiscoveryConfig(root, { env: { AGENTGRAPH_AGENT_SEARCH_ORDER: 'project,cloud' }, homeDir: HOME })
    ).rejects.toThrow('AGENTGRAPH_AGENT_SEARCH_ORDER');
  });

  it('rejects malformed YAML', async () => {
    await writeConfig('agent: [unclosed\n');

    await expect(loadDiscoveryConfig(root, { env: {}, homeDir: HOME })).rejects.toThrow('YAML syntax error');
  });

  it('rejects unknown keys in the agent section', async () => {
    await writeConfig('agent:\n  project_dir: agents\n');

    await expect(loadDiscoveryConfig(root, { env: {}, homeDir: HOME })).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('getAllPaths', () => {
  const config: DiscoveryConfig = {
    projectPath: 'p',
    userPath: '/u',
    pluginPaths: ['/x', '/y'],
    searchOrder: ['plugin', 'project'],
    skipMissing: true,
  };

  it('follows the search order and leaves out unlisted sources', () => {
    expect(getAllPaths(config)).toEqual([
      { path: '/x', source: 'plugin' },
      { path: '/y', source: 'plugin' },
      { path: 'p', source: 'project' },
    ]);
  });
});

describe('resolveConfiguredPath', () => {
  it('anchors relative paths at the project root', () => {
    expect(resolveConfiguredPath('/project', 'agents')).toBe('/project/agents');
    expect(resolveConfiguredPath('/project', '/abs')).toBe('/abs');
  });

  it('defaults the user path under the home directory', () => {
    expect(createDefaultDiscoveryConfig().userPath).toBe('~/.agentgraph/agents');
  });
});
