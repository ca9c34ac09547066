/**
 * Shared test fixtures — policy documents, stage payloads and fake workers.
 */

import type { JsonObject, StageInput, StageOutput } from '../../src/pipeline/types.js';
import type { StageWorker } from '../../src/pipeline/stage-worker.js';

export const SAMPLE_POLICY = `# Sample Project

## GOALS
- Fast CLI workflows for developers
- Reliable artifact storage

## SCOPE
### In Scope
- Command line interface
- IN: Stage orchestration — core feature
### Out of Scope
- Payment processing — handled by partner
- OUT: Mobile apps

## CONSTRAINTS
- No telemetry collection
- Keep dependencies small

## PIPELINE
- skip: doc-sync
- parallel: yes
`;

/** Well-formed payloads that pass each default stage's quality gate */
export const PASSING_PAYLOADS: Record<string, JsonObject> = {
  research: { findings: ['existing CLI uses commander'] },
  planning: { steps: ['add command', 'add tests'] },
  'test-generation': { tests: ['tests/cli/run.test.ts'] },
  implementation: { files_changed: ['src/cli/run.ts', { path: 'tests/cli/run.test.ts' }] },
  review: { verdict: 'approve' },
  'security-audit': { vulnerabilities: [] },
  'doc-sync': { docs_updated: ['README.md'] },
};

export function completedOutput(stage: string, extra: JsonObject = {}): StageOutput {
  return {
    status: 'completed',
    payload: {
      producer: `fake-${stage}`,
      timestamp: '2026-01-01T00:00:00.000Z',
      status: 'completed',
      schema_version: '1.0',
      ...PASSING_PAYLOADS[stage],
      ...extra,
    },
  };
}

type Handler = (input: StageInput, signal: AbortSignal) => Promise<StageOutput>;

/**
 * In-process worker: passing output for every stage unless a handler
 * overrides it. Records every invocation.
 */
export class FakeWorker implements StageWorker {
  readonly calls: string[] = [];
  readonly inputs: StageInput[] = [];
  private readonly handlers: Record<string, Handler>;

  constructor(handlers: Record<string, Handler> = {}) {
    this.handlers = handlers;
  }

  invoke(input: StageInput, signal: AbortSignal): Promise<StageOutput> {
    this.calls.push(input.stage_name);
    this.inputs.push(input);
    const handler = this.handlers[input.stage_name];
    return handler ? handler(input, signal) : Promise.resolve(completedOutput(input.stage_name));
  }

  count(stage: string): number {
    return this.calls.filter((c) => c === stage).length;
  }
}

/** Never settles until aborted; rejects with the signal's reason */
export function hang(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    signal.addEventListener('abort', () => {
      const reason: unknown = signal.reason;
      reject(reason instanceof Error ? reason : new Error('aborted'));
    }, { once: true });
  });
}
