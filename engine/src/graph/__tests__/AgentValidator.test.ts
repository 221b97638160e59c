import { describe, expect, it } from 'vitest';
import { AgentValidator, formatValidationReport } from '../AgentValidator.js';
import { ResolutionError } from '../../errors/GraphErrors.js';
import { graphOf } from './fixtures.js';

describe('AgentValidator.validate', () => {
  it('passes a resolvable agent and returns its execution order', () => {
    expect(AgentValidator.validate(graphOf({ a: ['b'], b: [] }), 'a')).toEqual({
      agentName: 'a',
      valid: true,
      issues: [],
      resolvedDependencies: ['b', 'a'],
    });
  });

  it('reports dangling dependencies anywhere below the agent', () => {
    const report = AgentValidator.validate(graphOf({ a: ['b'], b: ['x'] }), 'a');

    expect(report.valid).toBe(false);
    expect(report.issues).toEqual(['Agent "b" depends on non-existent agent "x"']);
    expect(report.resolvedDependencies).toEqual([]);
  });

  it('reports a reachable cycle', () => {
    const report = AgentValidator.validate(graphOf({ a: ['b'], b: ['a'] }), 'a');

    expect(report.issues).toEqual(['Circular dependency detected: a → b → a']);
    expect(report.resolvedDependencies).toEqual([]);
  });

  it('ignores problems the agent cannot reach', () => {
    const report = AgentValidator.validate(graphOf({ a: [], b: ['b', 'ghost'] }), 'a');

    expect(report.valid).toBe(true);
  });

  it('rejects an unknown agent', () => {
    expect(() => AgentValidator.validate(graphOf({}), 'a')).toThrow(ResolutionError);
  });
});

describe('formatValidationReport', () => {
  it('prints the execution order of a valid agent', () => {
    const report = AgentValidator.validate(graphOf({ a: ['b'], b: [] }), 'a');

    expect(formatValidationReport(report)).toBe(
      'Agent: a\nValid: true\nDependencies (in execution order):\n  1. b\n  2. a\n'
    );
  });

  it('prints the issues of an invalid agent', () => {
    const report = AgentValidator.validate(graphOf({ b: ['x'] }), 'b');

    expect(formatValidationReport(report)).toBe(
      'Agent: b\nValid: false\nIssues:\n  - Agent "b" depends on non-existent agent "x"\n'
    );
  });
});
