/**
 * AgentGraph Engine - Main Public API
 *
 * Holds one immutable dependency graph snapshot and answers queries
 * against it. Records come from an AgentRecordSupplier (or directly as an
 * array); every load replaces the snapshot with a fresh one.
 *
 * Failed queries never touch the snapshot: after a NotFound or
 * CircularDependency, unrelated queries keep working.
 *
 * @module core
 */

import { EngineStateError } from '../errors/GraphErrors.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { AgentValidator } from '../graph/AgentValidator.js';
import { CycleDetector } from '../graph/CycleDetector.js';
import { DependencyResolver } from '../graph/DependencyResolver.js';
import { GraphAnalyzer } from '../graph/GraphAnalyzer.js';
import { buildGraphFromDiscovery } from '../graph/GraphBuilder.js';
import { GraphRenderer } from '../graph/GraphRenderer.js';
import { TransitiveClosure } from '../graph/TransitiveClosure.js';
import type { AgentRecordSupplier, DiscoveryResult } from '../types/discovery-types.js';
import type {
  AgentRecord,
  Cycle,
  DanglingDependency,
  DependencyGraph,
  GraphSummary,
  RenderOptions,
  RenderResult,
  ResolvedAgent,
  ValidationReport,
} from '../types/graph-types.js';
import { resolveEngineConfig, type AgentGraphEngineConfig, type ResolvedEngineConfig } from './EngineConfig.js';

/**
 * Main engine class
 *
 * @example
 * ```ts
 * const engine = new AgentGraphEngine({ logLevel: 'warn' });
 * await engine.load(new AgentLoader({ projectRoot, config }));
 *
 * const order = engine.resolve('deploy');
 * const view = engine.render('graphviz', { includeVersions: true });
 * ```
 */
export class AgentGraphEngine {
  private readonly config: ResolvedEngineConfig;
  private readonly logger: EngineLogger | null;
  private graph: DependencyGraph | null = null;

  constructor(config: AgentGraphEngineConfig = {}) {
    this.config = resolveEngineConfig(config);
    this.logger = this.config.logger;
  }

  /**
   * Run a discovery pass and build the graph from the records it parsed.
   * Failed records are logged and left out; they never block the build.
   */
  async load<T extends AgentRecord>(supplier: AgentRecordSupplier<T>): Promise<DiscoveryResult<T>> {
    const result = await supplier.discover();

    if (result.errorCount > 0) {
      this.logger?.warn(
        `${result.errorCount} agent definition(s) failed to load`,
        { errors: result.errorCount, loaded: result.total },
        'discovery'
      );
      for (const error of result.errors) {
        this.logger?.debug(error.message, { code: error.code, path: error.path }, 'discovery');
      }
    }

    this.loadRecords(result.agents);
    return result;
  }

  /**
   * Build a fresh snapshot from in-memory records
   */
  loadRecords(records: readonly AgentRecord[]): DependencyGraph {
    const graph = buildGraphFromDiscovery(records);
    this.graph = graph;

    this.logger?.debug('Graph built', {
      agents: graph.agents.size,
      edges: [...graph.edges.values()].reduce((sum, deps) => sum + deps.length, 0),
    });

    return graph;
  }

  /**
   * Current snapshot
   *
   * @throws EngineStateError when nothing has been loaded
   */
  getGraph(): DependencyGraph {
    return this.requireGraph('getGraph');
  }

  isLoaded(): boolean {
    return this.graph !== null;
  }

  /**
   * Execution order for `name`: dependencies first, `name` last
   *
   * @throws ResolutionError NotFound or CircularDependency
   */
  resolve(name: string): ResolvedAgent[] {
    const graph = this.requireGraph('resolve');
    const order = DependencyResolver.resolveDependencies(graph, name).map((node) =>
      node.version ? { name: node.name, version: node.version } : { name: node.name }
    );

    this.logger?.debug('Dependencies resolved', { agent: name, count: order.length });
    return order;
  }

  /**
   * Everything `name` depends on, directly or not, excluding itself.
   * Terminates on cyclic graphs.
   */
  transitiveDependencies(name: string): string[] {
    return TransitiveClosure.getTransitiveDeps(this.requireGraph('transitiveDependencies'), name);
  }

  /**
   * @throws RenderError UnsupportedFormat
   */
  render(format: string, options: RenderOptions = {}): RenderResult {
    const result = GraphRenderer.render(this.requireGraph('render'), format, options);
    this.logger?.debug('Graph rendered', { format: result.format, bytes: result.graphData.length });
    return result;
  }

  /**
   * Declared dependencies with no node. Never fails.
   */
  danglingDependencies(): DanglingDependency[] {
    return DependencyResolver.findDanglingDependencies(this.requireGraph('danglingDependencies'));
  }

  cycles(): Cycle[] {
    const cycles = CycleDetector.detectCycles(this.requireGraph('cycles'));
    this.logger?.debug('Cycles detected', { count: cycles.length });
    return cycles;
  }

  summary(): GraphSummary {
    return GraphAnalyzer.summarize(this.requireGraph('summary'));
  }

  validateAgent(name: string): ValidationReport {
    const report = AgentValidator.validate(this.requireGraph('validateAgent'), name);
    this.logger?.debug('Agent validated', { agent: name, valid: report.valid, issues: report.issues.length });
    return report;
  }

  private requireGraph(operation: string): DependencyGraph {
    if (!this.graph) {
      throw EngineStateError.graphNotLoaded(operation);
    }
    return this.graph;
  }
}
