/**
 * Agent Loader
 *
 * ARCHITECTURAL ROLE:
 * ===================
 * The record supplier for the engine. Reads agent definition files from the
 * configured directories and hands the parsed subset to AgentGraphEngine.
 *
 * Responsibilities:
 * - Walk every configured directory for `*.md` files
 * - Split YAML frontmatter from the markdown body
 * - Validate frontmatter fields
 * - Count files that fail, without stopping
 *
 * Does NOT:
 * - Build or query the dependency graph (that's AgentGraphEngine)
 * - Check that dependencies exist
 *
 * File format:
 * ```
 * ---
 * name: deploy
 * description: Ships the build
 * version: 1.2.0
 * dependencies: [build, test]
 * ---
 * Markdown body...
 * ```
 *
 * @module loader
 */

import type { Dirent } from 'fs';
import { readdir, readFile, stat } from 'fs/promises';
import { extname, join } from 'path';
import YAML, { isMap, isScalar } from 'yaml';
import { z } from 'zod';
import { DefinitionError } from '../errors/GraphErrors.js';
import { GraphError } from '../errors/GraphError.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import type { AgentDefinition, AgentRecordSupplier, DiscoveryResult } from '../types/discovery-types.js';
import {
  getAllPaths,
  resolveConfiguredPath,
  type DiscoveryConfig,
} from './DiscoveryConfig.js';

const FrontmatterSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  description: z.string().trim().min(1, 'description is required'),
  version: z.union([z.string(), z.number()]).transform(String).optional(),
  author: z.string().optional(),
  tags: z.array(z.string()).default([]),
  dependencies: z.array(z.string().min(1)).default([]),
});

export interface FrontmatterParts {
  yaml: string;
  body: string;
}

/**
 * Split a definition file into frontmatter and body.
 * The first line must be `---`; the frontmatter runs to the next `---` line.
 * Returns null when either delimiter is missing.
 */
export function extractFrontmatter(content: string): FrontmatterParts | null {
  const lines = content.split(/\r?\n/);
  if (lines[0] !== '---') {
    return null;
  }

  const closing = lines.indexOf('---', 1);
  if (closing === -1) {
    return null;
  }

  return {
    yaml: lines.slice(1, closing).join('\n'),
    body: lines.slice(closing + 1).join('\n'),
  };
}

/**
 * Parse one agent definition.
 *
 * @throws DefinitionError when the frontmatter is missing, malformed or incomplete
 */
export function parseAgentDefinition(content: string, filePath: string): AgentDefinition {
  const parts = extractFrontmatter(content);
  if (!parts) {
    throw DefinitionError.missingFrontmatter(filePath);
  }

  const result = FrontmatterSchema.safeParse(readFrontmatter(parts.yaml, filePath) ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : 'frontmatter';
    throw DefinitionError.invalidField(filePath, field, issue.message);
  }

  const { name, description, version, author, tags, dependencies } = result.data;
  return {
    name,
    description,
    ...(version !== undefined ? { version } : {}),
    ...(author !== undefined ? { author } : {}),
    tags,
    dependencies,
    content: parts.body,
    filePath,
  };
}

/**
 * Parse the frontmatter YAML. A numeric `version` keeps its source text,
 * so `1.0` stays "1.0" and `1.10` stays "1.10".
 */
function readFrontmatter(yaml: string, filePath: string): unknown {
  const document = YAML.parseDocument(yaml);
  if (document.errors.length > 0) {
    throw DefinitionError.invalidYaml(filePath, document.errors[0].message);
  }

  const data: unknown = document.toJS();
  const contents = document.contents;
  if (!isMap(contents) || typeof data !== 'object' || data === null) {
    return data;
  }

  const version = contents.get('version', true);
  if (isScalar(version) && typeof version.value === 'number' && version.source !== undefined) {
    return { ...data, version: version.source };
  }
  return data;
}

export interface AgentLoaderOptions {
  /** Base for relative configured paths */
  projectRoot: string;
  config: DiscoveryConfig;
  logger?: EngineLogger | null;
}

/**
 * Discovers agents from the filesystem
 *
 * @example
 * ```ts
 * const config = await loadDiscoveryConfig(process.cwd());
 * const loader = new AgentLoader({ projectRoot: process.cwd(), config });
 * const result = await loader.discover();
 * ```
 */
export class AgentLoader implements AgentRecordSupplier<AgentDefinition> {
  private readonly projectRoot: string;
  private readonly config: DiscoveryConfig;
  private readonly logger: EngineLogger | null;

  constructor(options: AgentLoaderOptions) {
    this.projectRoot = options.projectRoot;
    this.config = options.config;
    this.logger = options.logger ?? null;
  }

  /**
   * Walk every configured directory in search order.
   * The first agent found under a name wins.
   */
  async discover(): Promise<DiscoveryResult<AgentDefinition>> {
    const startTime = Date.now();
    const agents: AgentDefinition[] = [];
    const errors: GraphError[] = [];
    const seen = new Set<string>();

    for (const { path, source } of getAllPaths(this.config)) {
      const directory = resolveConfiguredPath(this.projectRoot, path);

      if (!(await isDirectory(directory))) {
        if (!this.config.skipMissing) {
          errors.push(DefinitionError.unreadable(directory, 'agent path does not exist'));
        }
        continue;
      }

      for (const filePath of await this.collectFiles(directory, errors)) {
        let agent: AgentDefinition;
        try {
          const content = await readFile(filePath, 'utf-8');
          agent = parseAgentDefinition(content, filePath);
        } catch (error) {
          const failure = toDefinitionError(error, filePath);
          this.logger?.warn('Skipping agent file', { file: filePath, code: failure.code }, 'discovery');
          errors.push(failure);
          continue;
        }

        if (seen.has(agent.name)) {
          this.logger?.debug('Duplicate agent ignored', { agent: agent.name, file: filePath }, 'discovery');
          continue;
        }
        seen.add(agent.name);
        agents.push({ ...agent, source });
      }
    }

    const result: DiscoveryResult<AgentDefinition> = {
      agents,
      total: agents.length,
      errorCount: errors.length,
      errors,
      timeTakenMs: Date.now() - startTime,
    };

    this.logger?.debug(
      'Discovery finished',
      { agents: result.total, errors: result.errorCount, timeTakenMs: result.timeTakenMs },
      'discovery'
    );

    return result;
  }

  /**
   * `*.md` files below `directory`, depth first, entries in name order
   */
  private async collectFiles(directory: string, errors: GraphError[]): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      errors.push(toDefinitionError(error, directory));
      return [];
    }

    const files: string[] = [];
    const sorted = entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of sorted) {
      const fullPath = join(directory, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.collectFiles(fullPath, errors)));
      } else if (entry.isFile() && extname(entry.name) === '.md') {
        files.push(fullPath);
      }
    }
    return files;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

function toDefinitionError(error: unknown, filePath: string): GraphError {
  if (error instanceof GraphError) {
    return error;
  }
  return DefinitionError.unreadable(filePath, error instanceof Error ? error.message : String(error));
}
