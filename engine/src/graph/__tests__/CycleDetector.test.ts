import { describe, expect, it } from 'vitest';
import { CycleDetector } from '../CycleDetector.js';
import { chainOf, graphOf } from './fixtures.js';

describe('CycleDetector', () => {
  it('finds nothing in an acyclic graph', () => {
    const graph = graphOf({ a: ['b'], b: ['c'], c: [] });

    expect(CycleDetector.detectCycles(graph)).toEqual([]);
    expect(CycleDetector.hasCycle(graph)).toBe(false);
  });

  it('detects a self loop as a one-node cycle', () => {
    const graph = graphOf({ a: ['a'] });

    expect(CycleDetector.findCycle(graph, 'a')).toEqual(['a']);
    expect(CycleDetector.detectCycles(graph)).toEqual([['a']]);
  });

  it('reports a two-node loop once, not once per rotation', () => {
    const graph = graphOf({ a: ['b'], b: ['a'] });

    expect(CycleDetector.detectCycles(graph)).toEqual([['a', 'b']]);
  });

  it('detects two disjoint cycles', () => {
    const graph = graphOf({ a: ['b'], b: ['a'], c: ['d'], d: ['c'] });

    expect(CycleDetector.detectCycles(graph)).toEqual([
      ['a', 'b'],
      ['c', 'd'],
    ]);
  });

  it('finds a cycle not reachable from the first seed', () => {
    const graph = graphOf({ a: [], b: ['c'], c: ['b'] });

    expect(CycleDetector.findCycle(graph, 'a')).toBeUndefined();
    expect(CycleDetector.detectCycles(graph)).toEqual([['b', 'c']]);
  });

  it('returns only the loop when the path leads into it', () => {
    const graph = graphOf({ x: ['a'], a: ['b'], b: ['a'] });

    expect(CycleDetector.findCycle(graph, 'x')).toEqual(['a', 'b']);
  });

  it('walks past dangling dependencies', () => {
    const graph = graphOf({ a: ['missing', 'b'], b: [] });

    expect(CycleDetector.hasCycle(graph)).toBe(false);
  });

  it('finds a loop spanning a long chain', () => {
    const cycle = CycleDetector.findCycle(graphOf(chainOf(10_000, true)), 'agent-0');

    expect(cycle).toHaveLength(10_000);
    expect(cycle?.[0]).toBe('agent-0');
    expect(cycle?.[9_999]).toBe('agent-9999');
  });
});
