/**
 * Graph Analysis
 *
 * Tools for building and querying agent dependency graphs:
 * - GraphBuilder: Build the graph from agent records
 * - CycleDetector: Find circular dependencies
 * - DependencyResolver: Execution order for one agent, dangling dependencies
 * - TransitiveClosure: Everything an agent depends on
 * - GraphAnalyzer: Summary statistics
 * - GraphRenderer / serializers: text, JSON and Graphviz views
 * - AgentValidator: All problems below one agent
 */

export * from './GraphBuilder.js';
export * from './CycleDetector.js';
export * from './DependencyResolver.js';
export * from './TransitiveClosure.js';
export * from './GraphAnalyzer.js';
export * from './serializers.js';
export * from './GraphRenderer.js';
export * from './AgentValidator.js';
