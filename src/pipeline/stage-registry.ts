/**
 * Stage Registry — static, ordered stage definitions.
 * Pure and deterministic: validated once at load, immutable afterwards.
 */

import type { DefaultStageName, StageDefinition } from './types.js';
import { STAGE_NAMES } from './types.js';
import { getQualityGate } from './artifact-validators.js';
import { StageConfigurationError } from './errors.js';

// ─── Default Definitions ─────────────────────────────────

const MINUTE = 60 * 1000;

const DEFAULT_DEFINITIONS: Record<DefaultStageName, Omit<StageDefinition, 'name' | 'qualityGate'>> = {
  research: {
    order: 1,
    requiredInputs: [],
    outputSchemaVersion: '1.0',
    timeoutMs: 10 * MINUTE,
  },
  planning: {
    order: 2,
    requiredInputs: ['research'],
    outputSchemaVersion: '1.0',
    timeoutMs: 10 * MINUTE,
  },
  'test-generation': {
    order: 3,
    requiredInputs: ['planning'],
    outputSchemaVersion: '1.0',
    timeoutMs: 15 * MINUTE,
  },
  implementation: {
    order: 4,
    requiredInputs: ['planning', 'test-generation'],
    outputSchemaVersion: '1.0',
    timeoutMs: 30 * MINUTE,
  },
  review: {
    order: 5,
    requiredInputs: ['implementation'],
    outputSchemaVersion: '1.0',
    timeoutMs: 15 * MINUTE,
    parallelGroup: 'validation',
  },
  'security-audit': {
    order: 5,
    requiredInputs: ['implementation'],
    outputSchemaVersion: '1.0',
    timeoutMs: 15 * MINUTE,
    parallelGroup: 'validation',
  },
  'doc-sync': {
    order: 5,
    requiredInputs: ['implementation'],
    outputSchemaVersion: '1.0',
    timeoutMs: 10 * MINUTE,
    parallelGroup: 'validation',
  },
};

/**
 * Build the default stage list, applying per-stage timeout overrides.
 */
export function defaultStageDefinitions(
  timeoutOverrides: Partial<Record<string, number>> = {},
): StageDefinition[] {
  return STAGE_NAMES.map((name) => ({
    name,
    ...DEFAULT_DEFINITIONS[name],
    requiredInputs: [...DEFAULT_DEFINITIONS[name].requiredInputs],
    timeoutMs: timeoutOverrides[name] ?? DEFAULT_DEFINITIONS[name].timeoutMs,
    qualityGate: getQualityGate(name),
  }));
}

// ─── Validation ──────────────────────────────────────────

/**
 * Validate stage definitions. Returns every problem found (empty = valid).
 *
 * Rules: unique names, positive timeouts, order ties only inside a shared
 * parallel group, required inputs known and strictly earlier in order,
 * no cycles.
 */
export function validateStageDefinitions(definitions: StageDefinition[]): string[] {
  const problems: string[] = [];
  const byName = new Map<string, StageDefinition>();

  for (const def of definitions) {
    if (byName.has(def.name)) {
      problems.push(`Duplicate stage name "${def.name}"`);
      continue;
    }
    byName.set(def.name, def);
    if (!(def.timeoutMs > 0)) {
      problems.push(`Stage "${def.name}" must have a positive timeout`);
    }
  }

  // Order ties
  const byOrder = new Map<number, StageDefinition[]>();
  for (const def of byName.values()) {
    const bucket = byOrder.get(def.order) ?? [];
    bucket.push(def);
    byOrder.set(def.order, bucket);
  }
  for (const [order, bucket] of byOrder) {
    if (bucket.length < 2) continue;
    const groups = new Set(bucket.map((d) => d.parallelGroup));
    if (groups.size !== 1 || groups.has(undefined)) {
      problems.push(
        `Stages ${bucket.map((d) => `"${d.name}"`).join(', ')} share order ${order} but not a parallel group`,
      );
    }
  }

  // Input references
  for (const def of byName.values()) {
    for (const input of def.requiredInputs) {
      const dep = byName.get(input);
      if (!dep) {
        problems.push(`Stage "${def.name}" requires unknown stage "${input}"`);
      } else if (dep.order >= def.order) {
        problems.push(`Stage "${def.name}" requires "${input}" which is not earlier in order`);
      }
    }
  }

  problems.push(...detectCycles([...byName.values()]));
  return problems;
}

/** Cycle detection via topological sort (Kahn's algorithm) */
function detectCycles(definitions: StageDefinition[]): string[] {
  const known = new Set(definitions.map((d) => d.name));
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const def of definitions) {
    inDegree.set(def.name, 0);
    dependents.set(def.name, []);
  }
  for (const def of definitions) {
    for (const input of def.requiredInputs) {
      if (!known.has(input)) continue;
      inDegree.set(def.name, (inDegree.get(def.name) ?? 0) + 1);
      dependents.get(input)?.push(def.name);
    }
  }

  const queue = [...inDegree.entries()].filter(([, d]) => d === 0).map(([n]) => n);
  let visited = 0;
  while (queue.length > 0) {
    const name = queue.shift();
    if (name === undefined) break;
    visited++;
    for (const next of dependents.get(name) ?? []) {
      const remaining = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, remaining);
      if (remaining === 0) queue.push(next);
    }
  }

  if (visited === definitions.length) return [];
  const cyclic = [...inDegree.entries()].filter(([, d]) => d > 0).map(([n]) => n).sort();
  return [`Dependency cycle among stages: ${cyclic.join(', ')}`];
}

// ─── Registry ────────────────────────────────────────────

export class StageRegistry {
  private readonly definitions: readonly StageDefinition[];
  private readonly byName: ReadonlyMap<string, StageDefinition>;

  constructor(definitions: StageDefinition[]) {
    const problems = validateStageDefinitions(definitions);
    if (problems.length > 0) {
      throw new StageConfigurationError(problems);
    }
    this.definitions = Object.freeze(
      [...definitions]
        .sort((a, b) => a.order - b.order)
        .map((d) => Object.freeze({ ...d, requiredInputs: [...d.requiredInputs] })),
    );
    this.byName = new Map(this.definitions.map((d) => [d.name, d]));
  }

  get(name: string): StageDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** All stages, ascending by order */
  all(): StageDefinition[] {
    return [...this.definitions];
  }

  names(): string[] {
    return this.definitions.map((d) => d.name);
  }

  /** Stages bucketed by order; each bucket runs as one step */
  groups(): StageDefinition[][] {
    const groups: StageDefinition[][] = [];
    for (const def of this.definitions) {
      const last = groups[groups.length - 1];
      if (last && last[0].order === def.order) {
        last.push(def);
      } else {
        groups.push([def]);
      }
    }
    return groups;
  }

  /**
   * Registry without the skipped stages. Rejects a plan in which a kept
   * stage requires a skipped one.
   */
  withoutStages(skip: readonly string[]): StageRegistry {
    if (skip.length === 0) return this;

    const problems: string[] = [];
    const skipped = new Set(skip);
    for (const name of skipped) {
      if (!this.byName.has(name)) problems.push(`Cannot skip unknown stage "${name}"`);
    }
    const kept = this.definitions.filter((d) => !skipped.has(d.name));
    for (const def of kept) {
      for (const input of def.requiredInputs) {
        if (skipped.has(input)) {
          problems.push(`Stage "${def.name}" requires skipped stage "${input}"`);
        }
      }
    }
    if (problems.length > 0) {
      throw new StageConfigurationError(problems);
    }
    return new StageRegistry(kept.map((d) => ({ ...d })));
  }
}

/** Factory function */
export function createStageRegistry(
  definitions: StageDefinition[] = defaultStageDefinitions(),
): StageRegistry {
  return new StageRegistry(definitions);
}

/**
 * Stages to run for a workflow, after the policy's skip list.
 * Throws StageConfigurationError when a kept stage needs a skipped one.
 */
export function planStages(registry: StageRegistry, skip: readonly string[]): StageRegistry {
  return registry.withoutStages(skip);
}
