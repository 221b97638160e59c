import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AgentLoader, extractFrontmatter, parseAgentDefinition } from '../AgentLoader.js';
import type { DiscoveryConfig } from '../DiscoveryConfig.js';
import { DefinitionError } from '../../errors/GraphErrors.js';
import { GraphErrorCode } from '../../errors/ErrorCodes.js';
import { EngineLogger } from '../../logging/EngineLogger.js';
import { LogLevel } from '../../types/log-types.js';

function agentFile(name: string, extra: string[] = []): string {
  return ['---', `name: ${name}`, `description: The ${name} agent`, ...extra, '---', `# ${name}`].join('\n');
}

describe('extractFrontmatter', () => {
  it('splits the YAML header from the body', () => {
    expect(extractFrontmatter('---\nname: a\n---\nbody line\nmore')).toEqual({
      yaml: 'name: a',
      body: 'body line\nmore',
    });
  });

  it('requires the opening delimiter on the first line', () => {
    expect(extractFrontmatter('\n---\nname: a\n---\n')).toBeNull();
  });

  it('requires a closing delimiter', () => {
    expect(extractFrontmatter('---\nname: a\n')).toBeNull();
  });

  it('accepts CRLF line endings', () => {
    expect(extractFrontmatter('---\r\nname: a\r\n---\r\nbody')).toEqual({ yaml: 'name: a', body: 'body' });
  });
});

describe('parseAgentDefinition', () => {
  it('reads every supported field', () => {
    const content = agentFile('deploy', [
      'version: 1.2.0',
      'author: Test Author',
      'tags: [release]',
      'dependencies:',
      '  - build',
      '  - test',
    ]);

    expect(parseAgentDefinition(content, '/agents/deploy.md')).toEqual({
      name: 'deploy',
      description: 'The deploy agent',
      version: '1.2.0',
      author: 'Test Author',
      tags: ['release'],
      dependencies: ['build', 'test'],
      content: '# deploy',
      filePath: '/agents/deploy.md',
    });
  });

  it('defaults tags and dependencies to empty lists', () => {
    const agent = parseAgentDefinition(agentFile('solo'), 'solo.md');

    expect(agent.tags).toEqual([]);
    expect(agent.dependencies).toEqual([]);
    expect(agent.version).toBeUndefined();
  });

  it('turns a numeric version into a string', () => {
    expect(parseAgentDefinition(agentFile('a', ['version: 2']), 'a.md').version).toBe('2');
  });

  it('keeps a numeric version exactly as written', () => {
    expect(parseAgentDefinition(agentFile('a', ['version: 1.0']), 'a.md').version).toBe('1.0');
    expect(parseAgentDefinition(agentFile('a', ['version: 1.10']), 'a.md').version).toBe('1.10');
  });

  it('keeps a malformed version string as is', () => {
    expect(parseAgentDefinition(agentFile('a', ['version: 1.0.0-beta+x']), 'a.md').version).toBe('1.0.0-beta+x');
  });

  it('rejects a file without frontmatter', () => {
    expect(() => parseAgentDefinition('# just markdown', 'a.md')).toThrow('No YAML frontmatter found');
  });

  it('rejects a missing description', () => {
    let caught: unknown;
    try {
      parseAgentDefinition('---\nname: a\n---\n', 'a.md');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DefinitionError);
    if (caught instanceof DefinitionError) {
      expect(caught.code).toBe(GraphErrorCode.SCHEMA_INVALID_FIELD);
      expect(caught.path).toBe('a.md');
      expect(caught.message).toMatch(/^Invalid field "description": /);
    }
  });

  it('rejects a blank name', () => {
    expect(() => parseAgentDefinition("---\nname: '  '\ndescription: d\n---\n", 'a.md')).toThrow(
      'Invalid field "name": name is required'
    );
  });

  it('rejects malformed YAML', () => {
    expect(() => parseAgentDefinition('---\nname: [a\n---\n', 'a.md')).toThrow(/^Invalid YAML syntax/);
  });
});

describe('AgentLoader.discover', () => {
  let root: string;

  const config = (overrides: Partial<DiscoveryConfig> = {}): DiscoveryConfig => ({
    projectPath: 'project-agents',
    userPath: join(root, 'user-agents'),
    pluginPaths: [],
    searchOrder: ['project', 'user', 'plugin'],
    skipMissing: true,
    ...overrides,
  });

  async function write(relative: string, content: string): Promise<void> {
    const path = join(root, relative);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'agentgraph-loader-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('walks nested directories and reads only markdown files', async () => {
    await write('project-agents/b.md', agentFile('b'));
    await write('project-agents/nested/a.md', agentFile('a', ['dependencies: [b]']));
    await write('project-agents/notes.txt', 'ignored');

    const result = await new AgentLoader({ projectRoot: root, config: config() }).discover();

    expect(result.agents.map((agent) => agent.name)).toEqual(['b', 'a']);
    expect(result.agents.map((agent) => agent.source)).toEqual(['project', 'project']);
    expect(result.total).toBe(2);
    expect(result.errorCount).toBe(0);
  });

  it('keeps the first agent found under a name', async () => {
    await write('project-agents/review.md', agentFile('review', ['version: 2.0.0']));
    await write('user-agents/review.md', agentFile('review', ['version: 1.0.0']));
    await write('user-agents/extra.md', agentFile('extra'));

    const result = await new AgentLoader({ projectRoot: root, config: config() }).discover();

    expect(result.agents.map((agent) => [agent.name, agent.version, agent.source])).toEqual([
      ['review', '2.0.0', 'project'],
      ['extra', undefined, 'user'],
    ]);
  });

  it('counts broken files and keeps the rest', async () => {
    await write('project-agents/good.md', agentFile('good'));
    await write('project-agents/no-header.md', '# nothing here');
    await write('project-agents/no-name.md', '---\ndescription: d\n---\n');

    const lines: string[] = [];
    const logger = new EngineLogger({ level: LogLevel.WARN, colors: false, sink: (line) => lines.push(line) });
    const result = await new AgentLoader({ projectRoot: root, config: config(), logger }).discover();

    expect(result.agents.map((agent) => agent.name)).toEqual(['good']);
    expect(result.errorCount).toBe(2);
    expect(result.errors.map((error) => error.code)).toEqual([
      GraphErrorCode.SCHEMA_MISSING_FRONTMATTER,
      GraphErrorCode.SCHEMA_INVALID_FIELD,
    ]);
    expect(lines).toHaveLength(2);
  });

  it('skips missing directories when configured to', async () => {
    const result = await new AgentLoader({ projectRoot: root, config: config() }).discover();

    expect(result).toMatchObject({ agents: [], total: 0, errorCount: 0 });
  });

  it('reports missing directories otherwise', async () => {
    const result = await new AgentLoader({
      projectRoot: root,
      config: config({ skipMissing: false }),
    }).discover();

    expect(result.errorCount).toBe(2);
    expect(result.errors.map((error) => error.path)).toEqual([
      join(root, 'project-agents'),
      join(root, 'user-agents'),
    ]);
  });

  it('labels a plugin directory nested inside the project directory as plugin', async () => {
    await write('project-agents/a.md', agentFile('a'));
    await write('project-agents/vendor/v.md', agentFile('v'));

    const result = await new AgentLoader({
      projectRoot: root,
      config: config({ pluginPaths: ['project-agents/vendor'], searchOrder: ['plugin', 'project'] }),
    }).discover();

    expect(result.agents.map((agent) => [agent.name, agent.source])).toEqual([
      ['v', 'plugin'],
      ['a', 'project'],
    ]);
  });

  it('searches plugin directories in order', async () => {
    await write('plugins/one/x.md', agentFile('x', ['version: "1"']));
    await write('plugins/two/x.md', agentFile('x', ['version: "2"']));

    const result = await new AgentLoader({
      projectRoot: root,
      config: config({ pluginPaths: ['plugins/one', 'plugins/two'], searchOrder: ['plugin'] }),
    }).discover();

    expect(result.agents.map((agent) => [agent.version, agent.source])).toEqual([['1', 'plugin']]);
  });
});
