/**
 * CLI context tests — wiring configuration into registry, workers and exit codes.
 */

import { describe, it, expect } from 'vitest';
import { ConfigSchema } from '../../src/config/schema.js';
import {
  buildCoordinator,
  buildRegistry,
  buildWorkerRouter,
  EXIT_CODES,
  exitCodeFor,
  wantsJson,
  type CliContext,
} from '../../src/cli/context.js';
import { StageConfigurationError } from '../../src/pipeline/errors.js';
import { STAGE_NAMES, type Workflow } from '../../src/pipeline/types.js';

function context(stages: Record<string, unknown>, output: Record<string, unknown> = {}): CliContext {
  return {
    cwd: '/work',
    config: ConfigSchema.parse({ stages, output }),
    stateDir: '/work/.relaywright',
    policyPath: '/work/PROJECT.md',
  };
}

function workflow(status: Workflow['status']): Workflow {
  return {
    id: 'wf-1',
    request: 'x',
    mode: 'full',
    status,
    current_stage: null,
    created_at: '2026-01-01T00:00:00.000Z',
    updated_at: '2026-01-01T00:00:00.000Z',
  };
}

describe('exitCodeFor', () => {
  it('should map workflow outcomes to exit codes', () => {
    expect(exitCodeFor(workflow('completed'))).toBe(EXIT_CODES.SUCCESS);
    expect(exitCodeFor(workflow('blocked'))).toBe(1);
    expect(exitCodeFor(workflow('failed'))).toBe(2);
    expect(exitCodeFor(workflow('running'))).toBe(3);
  });
});

describe('buildRegistry', () => {
  it('should apply configured stage timeouts', () => {
    const registry = buildRegistry(context({ research: { timeout_ms: 1234 } }).config);
    expect(registry.get('research')?.timeoutMs).toBe(1234);
  });
});

describe('buildWorkerRouter', () => {
  it('should create workers only for stages with a command', () => {
    const router = buildWorkerRouter(context({ research: { command: './research.sh' } }).config, '/work');
    expect(router.missingStages(['research', 'planning'])).toEqual(['planning']);
  });
});

describe('buildCoordinator', () => {
  it('should fail fast when a stage has no command', () => {
    try {
      buildCoordinator(context({ research: { command: './research.sh' } }));
      expect.unreachable('buildCoordinator should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(StageConfigurationError);
      expect(error instanceof StageConfigurationError && error.problems[0]).toBe(
        'No command configured for stage "planning" (stages.planning.command)',
      );
    }
  });

  it('should build when every stage has a command', () => {
    const stages = Object.fromEntries(STAGE_NAMES.map((name) => [name, { command: `./${name}.sh` }]));
    expect(buildCoordinator(context(stages)).artifacts).toBeDefined();
  });
});

describe('wantsJson', () => {
  it('should follow the configured output format when no flag is given', () => {
    expect(wantsJson(undefined, context({}, { format: 'json' }))).toBe(true);
    expect(wantsJson(undefined, context({}))).toBe(false);
  });

  it('should let an explicit flag win over the configured format', () => {
    expect(wantsJson(true, context({}))).toBe(true);
    expect(wantsJson(false, context({}, { format: 'json' }))).toBe(false);
  });
});
