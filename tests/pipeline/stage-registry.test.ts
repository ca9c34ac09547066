/**
 * Stage Registry tests — ordering, grouping, validation and skip planning.
 */

import { describe, it, expect } from 'vitest';
import {
  createStageRegistry,
  defaultStageDefinitions,
  planStages,
  StageRegistry,
  validateStageDefinitions,
} from '../../src/pipeline/stage-registry.js';
import { StageConfigurationError } from '../../src/pipeline/errors.js';
import type { StageDefinition } from '../../src/pipeline/types.js';

function stage(name: string, order: number, requiredInputs: string[] = [], extra: Partial<StageDefinition> = {}): StageDefinition {
  return { name, order, requiredInputs, outputSchemaVersion: '1.0', timeoutMs: 1000, ...extra };
}

describe('defaultStageDefinitions', () => {
  it('should apply timeout overrides', () => {
    const defs = defaultStageDefinitions({ research: 5000 });
    expect(defs.find((d) => d.name === 'research')?.timeoutMs).toBe(5000);
    expect(defs.find((d) => d.name === 'planning')?.timeoutMs).toBe(600000);
  });

  it('should attach a quality gate to every stage', () => {
    expect(defaultStageDefinitions().every((d) => typeof d.qualityGate === 'function')).toBe(true);
  });
});

describe('StageRegistry', () => {
  it('should order the default stages and group the validation stages', () => {
    const registry = createStageRegistry();

    expect(registry.names()).toEqual([
      'research',
      'planning',
      'test-generation',
      'implementation',
      'review',
      'security-audit',
      'doc-sync',
    ]);
    const groups = registry.groups();
    expect(groups).toHaveLength(5);
    expect(groups[4].map((d) => d.name)).toEqual(['review', 'security-audit', 'doc-sync']);
  });

  it('should sort definitions given out of order', () => {
    const registry = new StageRegistry([stage('b', 2, ['a']), stage('a', 1)]);
    expect(registry.names()).toEqual(['a', 'b']);
    expect(registry.get('b')?.requiredInputs).toEqual(['a']);
    expect(registry.has('c')).toBe(false);
  });

  it('should reject invalid definitions with every problem listed', () => {
    expect(() => new StageRegistry([stage('a', 1), stage('a', 2)])).toThrow(StageConfigurationError);
    try {
      new StageRegistry([stage('a', 1), stage('a', 2)]);
    } catch (error) {
      expect(error instanceof StageConfigurationError && error.problems).toEqual(['Duplicate stage name "a"']);
    }
  });
});

describe('validateStageDefinitions', () => {
  it('should accept the defaults', () => {
    expect(validateStageDefinitions(defaultStageDefinitions())).toEqual([]);
  });

  it('should flag order ties outside a parallel group', () => {
    expect(validateStageDefinitions([stage('a', 1), stage('b', 1)])).toEqual([
      'Stages "a", "b" share order 1 but not a parallel group',
    ]);
    expect(validateStageDefinitions([
      stage('a', 1, [], { parallelGroup: 'g' }),
      stage('b', 1, [], { parallelGroup: 'g' }),
    ])).toEqual([]);
  });

  it('should flag unknown inputs and non-positive timeouts', () => {
    expect(validateStageDefinitions([stage('a', 1, ['zzz'], { timeoutMs: 0 })])).toEqual([
      'Stage "a" must have a positive timeout',
      'Stage "a" requires unknown stage "zzz"',
    ]);
  });

  it('should flag inputs that are not earlier and dependency cycles', () => {
    expect(validateStageDefinitions([stage('a', 1, ['b']), stage('b', 2, ['a'])])).toEqual([
      'Stage "a" requires "b" which is not earlier in order',
      'Dependency cycle among stages: a, b',
    ]);
  });
});

describe('planStages', () => {
  const registry = createStageRegistry();

  it('should return the registry unchanged without skips', () => {
    expect(planStages(registry, [])).toBe(registry);
  });

  it('should drop a leaf stage', () => {
    const plan = planStages(registry, ['doc-sync']);
    expect(plan.names()).not.toContain('doc-sync');
    expect(plan.groups()[4].map((d) => d.name)).toEqual(['review', 'security-audit']);
  });

  it('should refuse to skip a stage others depend on', () => {
    try {
      planStages(registry, ['planning']);
      expect.unreachable('planStages should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(StageConfigurationError);
      expect(error instanceof StageConfigurationError && error.problems).toEqual([
        'Stage "test-generation" requires skipped stage "planning"',
        'Stage "implementation" requires skipped stage "planning"',
      ]);
    }
  });

  it('should refuse to skip an unknown stage', () => {
    expect(() => planStages(registry, ['deploy'])).toThrow('Cannot skip unknown stage "deploy"');
  });
});
