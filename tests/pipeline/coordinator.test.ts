/**
 * Workflow Coordinator tests — policy gate, stage sequencing, retries,
 * parallel groups, cancellation, resume/rerun and publishing.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createCoordinator, type CoordinatorOptions } from '../../src/pipeline/coordinator.js';
import { createStageRegistry, defaultStageDefinitions } from '../../src/pipeline/stage-registry.js';
import { RetryPolicy } from '../../src/pipeline/retry-policy.js';
import {
  ArtifactExistsError,
  StageConfigurationError,
  TransientWorkerError,
  WorkflowNotFoundError,
} from '../../src/pipeline/errors.js';
import type { StageWorker } from '../../src/pipeline/stage-worker.js';
import { STAGE_NAMES, type Artifact, type LogEvent } from '../../src/pipeline/types.js';
import { readExecutionLog } from '../../src/workflow/execution-log.js';
import { analyze } from '../../src/workflow/bypass-detector.js';
import { defaultPatterns } from '../../src/workflow/bypass-patterns.js';
import { completedOutput, FakeWorker, hang, SAMPLE_POLICY } from '../helpers/fixtures.js';

describe('WorkflowCoordinator', () => {
  let root: string;
  let stateDir: string;
  let policyPath: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'relaywright-coordinator-'));
    stateDir = join(root, '.relaywright');
    policyPath = join(root, 'PROJECT.md');
    writeFileSync(policyPath, SAMPLE_POLICY);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function makeCoordinator(worker: StageWorker, extra: Partial<CoordinatorOptions> = {}) {
    return createCoordinator({
      stateDir,
      worker,
      policyPath: null,
      retryPolicy: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5 }, () => 0.5),
      ...extra,
    });
  }

  async function events(workflowId: string): Promise<LogEvent[]> {
    return (await readExecutionLog(stateDir, workflowId)).events;
  }

  describe('happy path', () => {
    it('should run every stage in order and complete', async () => {
      const worker = new FakeWorker();
      const coordinator = makeCoordinator(worker);

      const workflow = await coordinator.start('Improve stage orchestration');

      expect(workflow.status).toBe('completed');
      expect(workflow.current_stage).toBeNull();
      expect(worker.calls.slice(0, 4)).toEqual(['research', 'planning', 'test-generation', 'implementation']);
      expect([...worker.calls.slice(4)].sort()).toEqual(['doc-sync', 'review', 'security-audit']);

      const artifacts = await coordinator.artifacts.list(workflow.id);
      expect(artifacts.slice(0, 5).map((a) => a.stage_name)).toEqual([
        'alignment',
        'research',
        'planning',
        'test-generation',
        'implementation',
      ]);
      expect(artifacts).toHaveLength(8);
      expect(artifacts.every((a) => a.status === 'completed')).toBe(true);
    });

    it('should hand each stage exactly its required inputs', async () => {
      const worker = new FakeWorker();
      await makeCoordinator(worker).start('Improve stage orchestration');

      const implementation = worker.inputs.find((i) => i.stage_name === 'implementation');
      expect(Object.keys(implementation?.artifacts ?? {}).sort()).toEqual(['planning', 'test-generation']);
      expect(implementation?.request).toBe('Improve stage orchestration');
    });

    it('should fail open without a policy and record the decision', async () => {
      const coordinator = makeCoordinator(new FakeWorker());
      const workflow = await coordinator.start('Anything');

      const alignment = await coordinator.artifacts.get(workflow.id, 'alignment');
      expect(alignment?.payload.aligned).toBe(true);
      expect(alignment?.payload.confidence).toBe(0);
      expect(alignment?.payload.reasoning).toBe('no policy available (no policy path configured); request allowed by default');
      expect((await coordinator.history.getStats()).approved_count).toBe(1);
    });

    it('should log the run from start to completion with changed files', async () => {
      const coordinator = makeCoordinator(new FakeWorker());
      const workflow = await coordinator.start('Improve stage orchestration');

      const log = await events(workflow.id);
      expect(log.slice(0, 2).map((e) => e.event)).toEqual(['workflow_started', 'alignment_evaluated']);
      expect(log[log.length - 1].event).toBe('workflow_completed');
      expect(log.filter((e) => e.event === 'stage_completed')).toHaveLength(7);
      expect(log.filter((e) => e.event === 'file_changed').map((e) => e.data?.path)).toEqual([
        'src/cli/run.ts',
        'tests/cli/run.test.ts',
      ]);
      expect(log.map((e) => e.seq)).toEqual(log.map((_, i) => i + 1));
    });

    it('should report status with the workflow and its artifacts', async () => {
      const coordinator = makeCoordinator(new FakeWorker());
      const workflow = await coordinator.start('Improve stage orchestration');

      const report = await coordinator.status(workflow.id);
      expect(report.workflow.status).toBe('completed');
      expect(report.artifacts).toHaveLength(8);
      expect(report.progress.percent).toBe(100);
      expect(report.progress.completed).toEqual([...STAGE_NAMES]);
      expect(report.progress.pending).toEqual([]);
      expect(report.progress.running).toEqual([]);
      expect(report.progress.average_duration_ms).not.toBeNull();
    });

    it('should record when each stage started and how long it took', async () => {
      const coordinator = makeCoordinator(new FakeWorker());
      const workflow = await coordinator.start('Improve stage orchestration');

      const research = await coordinator.artifacts.get(workflow.id, 'research');
      expect(Number.isNaN(Date.parse(research?.started_at ?? ''))).toBe(false);
      expect(research?.duration_ms).toBeGreaterThanOrEqual(0);
      expect((await coordinator.artifacts.get(workflow.id, 'alignment'))?.duration_ms).toBeUndefined();
    });

    it('should log envelope warnings without failing the stage', async () => {
      const worker = new FakeWorker({
        research: async () => completedOutput('research', { schema_version: '1.2' }),
      });
      const coordinator = makeCoordinator(worker);

      const workflow = await coordinator.start('Improve stage orchestration');

      expect(workflow.status).toBe('completed');
      const warnings = (await events(workflow.id)).filter((e) => e.event === 'stage_warning');
      expect(warnings.map((e) => [e.stage, e.level, e.message])).toEqual([
        ['research', 'warn', 'schema_version 1.2 differs from expected 1.0'],
      ]);
    });
  });

  describe('policy gate', () => {
    it('should block an excluded request before any stage runs', async () => {
      const worker = new FakeWorker();
      const coordinator = makeCoordinator(worker, { policyPath });

      const workflow = await coordinator.start('Add a payment processor integration for checkout');

      expect(workflow.status).toBe('blocked');
      expect(workflow.reason).toBe('Blocked by policy: scope-out: Payment processing');
      expect(worker.calls).toEqual([]);

      const artifacts = await coordinator.artifacts.list(workflow.id);
      expect(artifacts.map((a) => a.stage_name)).toEqual(['alignment']);
      expect(artifacts[0].status).toBe('failed');
      expect(artifacts[0].failure?.kind).toBe('policy_rejected');

      const logged = await events(workflow.id);
      expect(logged.map((e) => e.event)).toEqual([
        'workflow_started',
        'alignment_evaluated',
        'workflow_blocked',
      ]);
      expect(logged[2].data).toEqual({ code: 'POLICY_REJECTED', violations: ['scope-out: Payment processing'] });
      expect((await coordinator.history.getStats()).rejected_count).toBe(1);
    });

    it('should stay blocked on resume without re-evaluating', async () => {
      const worker = new FakeWorker();
      const coordinator = makeCoordinator(worker, { policyPath });
      const workflow = await coordinator.start('Add a payment processor integration for checkout');

      const resumed = await coordinator.resume(workflow.id);

      expect(resumed.status).toBe('blocked');
      expect(worker.calls).toEqual([]);
      expect(await coordinator.artifacts.history(workflow.id, 'alignment')).toHaveLength(1);
    });

    it('should skip stages the policy switches off', async () => {
      const worker = new FakeWorker();
      const coordinator = makeCoordinator(worker, { policyPath });

      const workflow = await coordinator.start('Improve stage orchestration retries');

      expect(workflow.status).toBe('completed');
      expect(worker.count('doc-sync')).toBe(0);
      const skipped = (await events(workflow.id)).filter((e) => e.event === 'stage_skipped');
      expect(skipped.map((e) => [e.stage, e.message])).toEqual([['doc-sync', 'Skipped by policy: doc-sync']]);
    });
  });

  describe('failures and retries', () => {
    it('should retry a timing-out stage up to max attempts, then fail', async () => {
      const worker = new FakeWorker({ research: (_input, signal) => hang(signal) });
      const registry = createStageRegistry(defaultStageDefinitions({ research: 20 }));
      const coordinator = makeCoordinator(worker, { registry });

      const workflow = await coordinator.start('Improve stage orchestration');

      expect(worker.count('research')).toBe(3);
      expect(worker.calls).toEqual(['research', 'research', 'research']);
      expect(workflow.status).toBe('failed');
      expect(workflow.failed_stage).toBe('research');
      expect(workflow.reason).toBe('Stage research failed: Stage research timed out after 20ms');

      const artifact = await coordinator.artifacts.get(workflow.id, 'research');
      expect(artifact?.status).toBe('failed');
      expect(artifact?.attempts).toBe(3);
      expect(artifact?.failure).toEqual({ kind: 'timeout', reason: 'Stage research timed out after 20ms' });

      const log = await events(workflow.id);
      expect(log.filter((e) => e.event === 'stage_retry')).toHaveLength(2);
      expect(log[log.length - 1].event).toBe('workflow_failed');
    });

    it('should succeed on the third attempt after two timeouts', async () => {
      let calls = 0;
      const worker = new FakeWorker({
        research: (_input, signal) => {
          calls++;
          return calls < 3 ? hang(signal) : Promise.resolve(completedOutput('research'));
        },
      });
      const registry = createStageRegistry(defaultStageDefinitions({ research: 20 }));
      const coordinator = makeCoordinator(worker, { registry });

      const workflow = await coordinator.start('Improve stage orchestration');

      expect(workflow.status).toBe('completed');
      const artifact = await coordinator.artifacts.get(workflow.id, 'research');
      expect(artifact?.status).toBe('completed');
      expect(artifact?.attempts).toBe(3);
      expect((await events(workflow.id)).filter((e) => e.event === 'stage_retry')).toHaveLength(2);
    });

    it('should succeed after a transient failure', async () => {
      let calls = 0;
      const worker = new FakeWorker({
        research: async () => {
          calls++;
          if (calls === 1) throw new TransientWorkerError('rate limited');
          return completedOutput('research');
        },
      });
      const coordinator = makeCoordinator(worker);

      const workflow = await coordinator.start('Improve stage orchestration');

      expect(workflow.status).toBe('completed');
      expect((await coordinator.artifacts.get(workflow.id, 'research'))?.attempts).toBe(2);
    });

    it('should not retry a permanent worker error', async () => {
      const worker = new FakeWorker({
        research: async () => {
          throw new Error('bad input');
        },
      });
      const coordinator = makeCoordinator(worker);

      const workflow = await coordinator.start('Improve stage orchestration');

      expect(worker.count('research')).toBe(1);
      expect((await coordinator.artifacts.get(workflow.id, 'research'))?.failure).toEqual({
        kind: 'worker_error',
        reason: 'bad input',
      });
    });

    it('should store a worker-reported failure with its payload', async () => {
      const worker = new FakeWorker({
        research: async () => ({ status: 'failed', payload: { reason: 'no sources found' } }),
      });
      const coordinator = makeCoordinator(worker);

      const workflow = await coordinator.start('Improve stage orchestration');

      const artifact = await coordinator.artifacts.get(workflow.id, 'research');
      expect(artifact?.failure).toEqual({ kind: 'worker_reported', reason: 'no sources found' });
      expect(artifact?.payload).toEqual({ reason: 'no sources found' });
      expect(worker.count('planning')).toBe(0);
      expect(workflow.reason).toBe('Stage research failed: no sources found');
    });

    it('should fail an envelope whose status contradicts the reported status', async () => {
      const worker = new FakeWorker({
        research: async () => ({ status: 'completed', payload: completedOutput('research', { status: 'failed' }).payload }),
      });
      const coordinator = makeCoordinator(worker);

      const workflow = await coordinator.start('Improve stage orchestration');

      expect((await coordinator.artifacts.get(workflow.id, 'research'))?.failure).toEqual({
        kind: 'validation',
        reason: 'invalid payload: envelope status failed does not match reported completed',
      });
    });

    it('should flag a malformed payload as a contract violation', async () => {
      const worker = new FakeWorker({
        research: async () => ({ status: 'completed', payload: { findings: ['x'] } }),
      });
      const coordinator = makeCoordinator(worker);

      const workflow = await coordinator.start('Improve stage orchestration');

      expect((await coordinator.artifacts.get(workflow.id, 'research'))?.failure?.kind).toBe('validation');
      const findings = await analyze(await readExecutionLog(stateDir, workflow.id), defaultPatterns());
      const violation = findings.find((f) => f.pattern_id === 'BP-034');
      expect(violation?.severity).toBe('critical');
      expect(violation?.evidence[0]).toMatch(/^#\d+ stage_failed \[research\]: Failed: research - invalid payload: /);
    });

    it('should keep sibling results when one parallel stage fails its gate', async () => {
      const worker = new FakeWorker({
        review: async () => completedOutput('review', { verdict: 'request_changes' }),
      });
      const coordinator = makeCoordinator(worker);

      const workflow = await coordinator.start('Improve stage orchestration');

      expect(workflow.status).toBe('failed');
      expect(workflow.failed_stage).toBe('review');
      expect(workflow.reason).toBe('Stage review failed: reviewer requested changes');
      expect((await coordinator.artifacts.get(workflow.id, 'review'))?.failure?.kind).toBe('quality_gate');
      expect((await coordinator.artifacts.get(workflow.id, 'security-audit'))?.status).toBe('completed');
      expect((await coordinator.artifacts.get(workflow.id, 'doc-sync'))?.status).toBe('completed');
    });
  });

  describe('resume and rerun', () => {
    it('should not re-run a completed workflow', async () => {
      const worker = new FakeWorker();
      const coordinator = makeCoordinator(worker);

      const first = await coordinator.run('wf-fixed-id', 'Improve stage orchestration');
      const callsAfterFirst = worker.calls.length;
      const second = await coordinator.run('wf-fixed-id', 'Improve stage orchestration');

      expect(first.id).toBe('wf-fixed-id');
      expect(second.status).toBe('completed');
      expect(worker.calls).toHaveLength(callsAfterFirst);
    });

    it('should halt on a failed stage until it is re-run', async () => {
      let approve = false;
      const worker = new FakeWorker({
        review: async () => completedOutput('review', { verdict: approve ? 'approve' : 'request_changes' }),
      });
      const coordinator = makeCoordinator(worker);
      const failed = await coordinator.start('Improve stage orchestration');

      const resumed = await coordinator.resume(failed.id);
      expect(resumed.status).toBe('failed');
      expect(resumed.reason).toBe('Stage review failed: reviewer requested changes');
      expect(worker.count('review')).toBe(1);

      approve = true;
      const rerun = await coordinator.rerun(failed.id, 'review');

      expect(rerun.status).toBe('completed');
      expect(worker.count('review')).toBe(2);
      expect(worker.count('research')).toBe(1);
      expect(worker.count('security-audit')).toBe(1);
      const history = await coordinator.artifacts.history(failed.id, 'review');
      expect(history.map((a) => a.status)).toEqual(['failed', 'completed']);
    });

    it('should refuse to re-run a completed or unknown stage', async () => {
      const coordinator = makeCoordinator(new FakeWorker());
      const workflow = await coordinator.start('Improve stage orchestration');

      await expect(coordinator.rerun(workflow.id, 'research')).rejects.toBeInstanceOf(ArtifactExistsError);
      await expect(coordinator.rerun(workflow.id, 'deploy')).rejects.toBeInstanceOf(StageConfigurationError);
    });

    it.each([...STAGE_NAMES])(
      'should resume after a crash following the %s write and match an uninterrupted run',
      async (crashStage) => {
        const summary = (artifacts: Artifact[]) =>
          artifacts
            .map((a) => [a.stage_name, a.status, a.stage_name === 'alignment' ? '' : a.sha256])
            .sort((a, b) => a[0].localeCompare(b[0]));

        const baseline = makeCoordinator(new FakeWorker());
        const uninterrupted = await baseline.start('Improve stage orchestration');

        const crashing = makeCoordinator(new FakeWorker(), {
          onStageComplete: (stage) => {
            if (stage === crashStage) throw new Error('process killed');
          },
        });
        await expect(crashing.run('wf-crash', 'Improve stage orchestration')).rejects.toThrow('process killed');
        expect((await crashing.workflows.get('wf-crash')).status).toBe('running');

        const worker = new FakeWorker();
        const restarted = makeCoordinator(worker);
        const recovered = await restarted.resume('wf-crash');

        expect(recovered.status).toBe('completed');
        expect(worker.count(crashStage)).toBe(0);
        const resumedArtifacts = await restarted.artifacts.list('wf-crash');
        expect(summary(resumedArtifacts)).toEqual(summary(await baseline.artifacts.list(uninterrupted.id)));
        expect(resumedArtifacts.every((a) => a.generation === 1)).toBe(true);
      },
    );

    it('should reject an unknown workflow', async () => {
      await expect(makeCoordinator(new FakeWorker()).resume('wf-missing')).rejects.toBeInstanceOf(WorkflowNotFoundError);
    });
  });

  describe('cancellation', () => {
    it('should stop mid-stage without writing its artifact, then resume', async () => {
      const controller = new AbortController();
      const worker = new FakeWorker({
        implementation: (_input, signal) => {
          controller.abort();
          return hang(signal);
        },
      });
      const coordinator = makeCoordinator(worker);

      const cancelled = await coordinator.start('Improve stage orchestration', { signal: controller.signal });

      expect(cancelled.status).toBe('failed');
      expect(cancelled.reason).toBe('cancelled');
      expect(await coordinator.artifacts.get(cancelled.id, 'implementation')).toBeNull();
      const log = await events(cancelled.id);
      expect(log[log.length - 1].event).toBe('workflow_cancelled');

      const fresh = new FakeWorker();
      const resumed = await makeCoordinator(fresh).resume(cancelled.id);

      expect(resumed.status).toBe('completed');
      expect(fresh.count('research')).toBe(0);
      expect(fresh.count('implementation')).toBe(1);
    });

    it('should not start a workflow whose signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const worker = new FakeWorker();

      const workflow = await makeCoordinator(worker).start('Improve stage orchestration', { signal: controller.signal });

      expect(workflow.reason).toBe('cancelled');
      expect(worker.calls).toEqual([]);
    });
  });

  describe('publishing', () => {
    it('should publish after completion and log each terminal action', async () => {
      const publish = vi.fn(async () => ({ commit_id: 'abc123', url: 'https://example.test/pr/1' }));
      const coordinator = makeCoordinator(new FakeWorker(), { publisher: { publish } });

      const workflow = await coordinator.start('Improve stage orchestration');

      expect(workflow.status).toBe('completed');
      expect(publish).toHaveBeenCalledTimes(1);
      const actions = (await events(workflow.id)).filter((e) => e.event === 'action').map((e) => e.data?.action);
      expect(actions).toEqual(['persistence-commit', 'external-publish']);

      const artifact = await coordinator.artifacts.get(workflow.id, 'publish');
      expect(artifact?.status).toBe('completed');
      expect(artifact?.payload.commit_id).toBe('abc123');
    });

    it('should publish a completed workflow on resume when publishing never ran', async () => {
      const workflow = await makeCoordinator(new FakeWorker()).start('Improve stage orchestration');
      const publish = vi.fn(async () => ({ commit_id: 'abc123' }));
      const worker = new FakeWorker();
      const coordinator = makeCoordinator(worker, { publisher: { publish } });

      const resumed = await coordinator.resume(workflow.id);
      await coordinator.resume(workflow.id);

      expect(resumed.status).toBe('completed');
      expect(worker.calls).toEqual([]);
      expect(publish).toHaveBeenCalledTimes(1);
      expect((await coordinator.artifacts.get(workflow.id, 'publish'))?.status).toBe('completed');
    });

    it('should record a publish failure without failing the workflow', async () => {
      const publish = vi.fn(async () => {
        throw new Error('remote rejected');
      });
      const coordinator = makeCoordinator(new FakeWorker(), { publisher: { publish } });

      const workflow = await coordinator.start('Improve stage orchestration');

      expect(workflow.status).toBe('completed');
      expect((await coordinator.workflows.get(workflow.id)).status).toBe('completed');
      const artifact = await coordinator.artifacts.get(workflow.id, 'publish');
      expect(artifact?.status).toBe('failed');
      expect(artifact?.failure).toEqual({ kind: 'worker_error', reason: 'remote rejected' });
    });

    it('should leave a log the bypass detector finds complete', async () => {
      const publish = vi.fn(async () => ({ commit_id: 'abc123', url: 'https://example.test/pr/1', issue_ref: 'T-1' }));
      const coordinator = makeCoordinator(new FakeWorker(), { publisher: { publish } });
      const workflow = await coordinator.start('Improve stage orchestration');

      const log = await readExecutionLog(stateDir, workflow.id);
      const findings = await analyze(log, defaultPatterns(), {
        resolveArtifact: (ref) => coordinator.artifacts.resolve(ref),
      });

      expect(findings.map((f) => f.pattern_id)).toEqual(['BP-021']);
      expect(findings[0].evidence).toEqual(['changed: src/cli/run.ts', 'no change matching ^(docs/|README\\.md$)']);
    });
  });
});
