/**
 * Workflow Coordinator — drives one workflow through the stage registry.
 *
 * Key rules:
 *   - The policy gate runs before any stage; a rejection blocks the
 *     workflow and no stage artifact is ever written.
 *   - A stage runs only when all of its required inputs are completed.
 *   - Completed stages are never re-run on resume; a failed stage halts
 *     the workflow until it is explicitly re-run.
 *   - Stage-local errors become failed artifacts. Only store and
 *     configuration errors escape.
 */

import { z } from 'zod';

import {
  ALIGNMENT_STAGE,
  AlignmentSchema,
  PUBLISH_STAGE,
  type Alignment,
  type Artifact,
  type ArtifactRef,
  type FailureKind,
  type JsonObject,
  type StageDefinition,
  type StageInput,
  type StageOutput,
  type Workflow,
} from './types.js';
import {
  ArtifactExistsError,
  PolicyRejectedError,
  StageConfigurationError,
  StageTimeoutError,
  StageValidationError,
  WorkflowCancelledError,
  errorMessage,
} from './errors.js';
import { ArtifactStore } from './artifact-store.js';
import { runQualityGate, validateEnvelope } from './artifact-validators.js';
import { AlignmentHistory } from './alignment-history.js';
import { tryLoadPolicy, type PolicyLoadResult } from './policy.js';
import { DEFAULT_ALIGNMENT_THRESHOLD, evaluate } from './policy-evaluator.js';
import { computeProgress, type WorkflowProgress } from './progress.js';
import { RetryPolicy, sleep, type RetryPolicyConfig } from './retry-policy.js';
import { createStageRegistry, planStages, type StageRegistry } from './stage-registry.js';
import type { PublishResult, Publisher, StageWorker } from './stage-worker.js';
import { WorkflowStore, type WorkflowUpdate } from '../state/workflow-store.js';
import { ExecutionLogger } from '../workflow/execution-log.js';

// ─── Types ───────────────────────────────────────────────

export interface CoordinatorOptions {
  stateDir: string;
  worker: StageWorker;
  registry?: StageRegistry;
  /** Policy document path; null runs without a policy (fail open) */
  policyPath: string | null;
  alignmentThreshold?: number;
  retry?: Partial<RetryPolicyConfig>;
  /** Overrides `retry`; lets callers fix the jitter source */
  retryPolicy?: RetryPolicy;
  publisher?: Publisher;
  onStageStart?: (stage: string, attempt: number) => void;
  onStageComplete?: (stage: string, artifact: Artifact) => void;
  onProgress?: (message: string) => void;
}

export interface RunOptions {
  /** Workflow-level cancellation */
  signal?: AbortSignal;
  /** Declared workflow mode, used when the workflow is created */
  mode?: string;
}

export interface WorkflowStatusReport {
  workflow: Workflow;
  artifacts: Artifact[];
  progress: WorkflowProgress;
}

type StageResult =
  | { kind: 'completed'; artifact: Artifact }
  | { kind: 'failed'; artifact: Artifact }
  | { kind: 'cancelled' };

interface Judgement {
  failure: { kind: FailureKind; reason: string } | null;
  warnings: string[];
}

/** Wall-clock span of one stage run, retries included */
interface StageTiming {
  started_at: string;
  duration_ms: number;
}

type AttemptResult =
  | { kind: 'output'; output: StageOutput; attempts: number }
  | { kind: 'error'; error: unknown; attempts: number }
  | { kind: 'cancelled' };

/** Alignment artifact payload, with the policy's skip list captured at gate time */
const AlignmentPayloadSchema = AlignmentSchema.extend({
  skip_stages: z.array(z.string()).default([]),
});

const ENGINE_SCHEMA_VERSION = '1.0';
const ENGINE_PRODUCER = 'relaywright';

// ─── Helpers ─────────────────────────────────────────────

function envelope(producer: string, status: 'completed' | 'failed', schemaVersion: string): JsonObject {
  return {
    producer,
    timestamp: new Date().toISOString(),
    status,
    schema_version: schemaVersion,
  };
}

function timingSince(started: Date): StageTiming {
  return {
    started_at: started.toISOString(),
    duration_ms: Math.max(0, Date.now() - started.getTime()),
  };
}

function failureKindOf(error: unknown): FailureKind {
  if (error instanceof StageTimeoutError) return 'timeout';
  if (error instanceof StageValidationError) return 'validation';
  return 'worker_error';
}

/** Paths a stage reports as changed: strings or { path } objects */
function changedPaths(payload: JsonObject): string[] {
  const files = payload.files_changed;
  if (!Array.isArray(files)) return [];
  const paths: string[] = [];
  for (const entry of files) {
    if (typeof entry === 'string') {
      paths.push(entry);
    } else if (typeof entry === 'object' && entry !== null && 'path' in entry && typeof entry.path === 'string') {
      paths.push(entry.path);
    }
  }
  return paths;
}

function reportedReason(payload: JsonObject): string {
  for (const key of ['reason', 'error', 'message']) {
    const value = payload[key];
    if (typeof value === 'string' && value.trim()) return value;
  }
  return 'worker reported failure';
}

// ─── Coordinator ─────────────────────────────────────────

export class WorkflowCoordinator {
  readonly artifacts: ArtifactStore;
  readonly workflows: WorkflowStore;
  readonly history: AlignmentHistory;
  private readonly options: CoordinatorOptions;
  private readonly registry: StageRegistry;
  private readonly retryPolicy: RetryPolicy;

  constructor(options: CoordinatorOptions) {
    this.options = options;
    this.registry = options.registry ?? createStageRegistry();
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy(options.retry);
    this.artifacts = new ArtifactStore({ stateDir: options.stateDir });
    this.workflows = new WorkflowStore(options.stateDir);
    this.history = new AlignmentHistory(options.stateDir);
  }

  /** Create a workflow for a request and run it */
  async start(request: string, options: RunOptions = {}): Promise<Workflow> {
    const workflow = await this.workflows.create(request, options.mode);
    return this.execute(workflow, options, new Set(), false);
  }

  /** Run (or continue) the workflow with the given id, creating it if needed */
  async run(workflowId: string, request: string, options: RunOptions = {}): Promise<Workflow> {
    const existing = await this.workflows.load(workflowId);
    const workflow = existing ?? await this.workflows.create(request, options.mode, workflowId);
    if (workflow.status === 'completed') return this.publishIfPending(workflow);
    return this.execute(workflow, options, new Set(), existing !== null);
  }

  /** Continue an interrupted or cancelled workflow from its stored artifacts */
  async resume(workflowId: string, options: RunOptions = {}): Promise<Workflow> {
    const workflow = await this.workflows.get(workflowId);
    if (workflow.status === 'completed') return this.publishIfPending(workflow);
    return this.execute(workflow, options, new Set(), true);
  }

  /**
   * Supersede the failed artifact of one stage and resume. Re-running a
   * completed stage is refused.
   */
  async rerun(workflowId: string, stageName: string, options: RunOptions = {}): Promise<Workflow> {
    const workflow = await this.workflows.get(workflowId);
    if (!this.registry.has(stageName)) {
      throw new StageConfigurationError([`Unknown stage "${stageName}"`]);
    }
    const current = await this.artifacts.get(workflowId, stageName);
    if (current?.status === 'completed') {
      throw new ArtifactExistsError(workflowId, stageName);
    }
    return this.execute(workflow, options, new Set([stageName]), true);
  }

  async status(workflowId: string): Promise<WorkflowStatusReport> {
    const workflow = await this.workflows.get(workflowId);
    const artifacts = await this.artifacts.list(workflowId);
    return { workflow, artifacts, progress: computeProgress(workflow, artifacts, this.registry.names()) };
  }

  // ─── Main Loop ─────────────────────────────────────────

  private async execute(
    initial: Workflow,
    options: RunOptions,
    rerun: ReadonlySet<string>,
    resumed: boolean,
  ): Promise<Workflow> {
    const { signal } = options;
    const logger = new ExecutionLogger(this.options.stateDir, initial.id);

    let workflow = await this.workflows.save({
      ...initial,
      status: 'running',
      current_stage: null,
      reason: undefined,
      failed_stage: undefined,
    });
    await logger.info('workflow_started', `${resumed ? 'Resuming' : 'Starting'} workflow ${workflow.id}`, {
      data: { mode: workflow.mode, resumed, ...(rerun.size > 0 ? { rerun: [...rerun] } : {}) },
    });

    if (signal?.aborted) return this.cancel(workflow, logger);

    // ─── Policy Gate ─────────────────────────────────────
    const gate = await this.ensureAlignment(workflow, logger);
    if (!gate.alignment.aligned) {
      const rejection = new PolicyRejectedError(gate.alignment.violations, gate.alignment.reasoning);
      await logger.warn('workflow_blocked', rejection.message, {
        data: { code: rejection.code, violations: rejection.violations },
      });
      this.options.onProgress?.(rejection.message);
      return this.workflows.save({ ...workflow, status: 'blocked', current_stage: null, reason: rejection.message });
    }

    let plan: StageRegistry;
    try {
      plan = planStages(this.registry, gate.skipStages);
    } catch (error) {
      await this.finish(workflow, logger, { status: 'failed', reason: errorMessage(error) });
      throw error;
    }
    for (const skipped of gate.skipStages) {
      await logger.info('stage_skipped', `Skipped by policy: ${skipped}`, { stage: skipped });
    }

    // ─── Stage Groups ────────────────────────────────────
    for (const group of plan.groups()) {
      if (signal?.aborted) return this.cancel(workflow, logger);

      // Preconditions
      for (const def of group) {
        for (const input of def.requiredInputs) {
          const artifact = await this.artifacts.get(workflow.id, input);
          if (artifact?.status !== 'completed') {
            const reason = `Stage ${def.name} requires ${input}, which is ${artifact ? 'failed' : 'missing'}`;
            return this.finish(workflow, logger, { status: 'failed', reason, failed_stage: input });
          }
        }
      }

      const toRun: StageDefinition[] = [];
      for (const def of group) {
        const current = await this.artifacts.get(workflow.id, def.name);
        if (current?.status === 'completed') {
          this.options.onProgress?.(`Skipping ${def.name}: already completed`);
          continue;
        }
        if (current?.status === 'failed' && !rerun.has(def.name)) {
          const reason = `Stage ${def.name} failed: ${current.failure?.reason ?? 'unknown reason'}`;
          return this.finish(workflow, logger, { status: 'failed', reason, failed_stage: def.name });
        }
        toRun.push(def);
      }
      if (toRun.length === 0) continue;

      workflow = await this.workflows.save({ ...workflow, current_stage: toRun.map((d) => d.name).join(',') });

      // Barrier: every member settles before the group is judged
      const settled = await Promise.allSettled(
        toRun.map((def) => this.runStage(workflow, def, rerun.has(def.name), logger, signal)),
      );
      const results: StageResult[] = [];
      for (const outcome of settled) {
        if (outcome.status === 'rejected') throw outcome.reason;
        results.push(outcome.value);
      }

      if (signal?.aborted || results.some((r) => r.kind === 'cancelled')) {
        return this.cancel(workflow, logger);
      }

      const failed = results.flatMap((r) => (r.kind === 'failed' ? [r.artifact] : []));
      if (failed.length > 0) {
        const reason = failed
          .map((a) => `Stage ${a.stage_name} failed: ${a.failure?.reason ?? 'unknown reason'}`)
          .join('; ');
        return this.finish(workflow, logger, { status: 'failed', reason, failed_stage: failed[0].stage_name });
      }
    }

    workflow = await this.finish(workflow, logger, { status: 'completed' });
    await this.publish(workflow, logger);
    return workflow;
  }

  // ─── Policy Gate ───────────────────────────────────────

  private async ensureAlignment(
    workflow: Workflow,
    logger: ExecutionLogger,
  ): Promise<{ alignment: Alignment; skipStages: string[] }> {
    const existing = await this.artifacts.get(workflow.id, ALIGNMENT_STAGE);
    if (existing) {
      const parsed = AlignmentPayloadSchema.safeParse(existing.payload);
      if (parsed.success) {
        const { skip_stages: skipStages, ...alignment } = parsed.data;
        return { alignment, skipStages };
      }
      throw new StageValidationError(ALIGNMENT_STAGE, parsed.error.issues.map((i) => i.message));
    }

    const loaded: PolicyLoadResult = this.options.policyPath
      ? await tryLoadPolicy(this.options.policyPath)
      : { policy: null, problem: 'no policy path configured' };
    const alignment = evaluate(workflow.request, loaded.policy, {
      threshold: this.options.alignmentThreshold ?? DEFAULT_ALIGNMENT_THRESHOLD,
      problem: loaded.problem,
    });
    const skipStages = alignment.aligned ? loaded.policy?.skip_stages ?? [] : [];
    const status = alignment.aligned ? 'completed' : 'failed';

    const artifact = await this.artifacts.put({
      workflow_id: workflow.id,
      stage_name: ALIGNMENT_STAGE,
      version: ENGINE_SCHEMA_VERSION,
      status,
      payload: {
        ...envelope('policy-evaluator', status, ENGINE_SCHEMA_VERSION),
        ...alignment,
        skip_stages: skipStages,
        ...(loaded.policy ? { policy_sha256: loaded.policy.sha256 } : {}),
      },
      ...(alignment.aligned ? {} : { failure: { kind: 'policy_rejected' as const, reason: alignment.reasoning } }),
      attempts: 1,
    });

    await this.history.track({
      ...alignment,
      workflow_id: workflow.id,
      request: workflow.request,
      policy_sha256: loaded.policy?.sha256,
      timestamp: artifact.created_at,
    });

    await logger.log('alignment_evaluated', alignment.reasoning, {
      level: alignment.aligned ? 'info' : 'warn',
      stage: ALIGNMENT_STAGE,
      data: {
        artifact: this.artifacts.toRef(artifact),
        aligned: alignment.aligned,
        confidence: alignment.confidence,
        violations: alignment.violations,
      },
    });

    return { alignment, skipStages };
  }

  // ─── Stage Execution ───────────────────────────────────

  private async runStage(
    workflow: Workflow,
    def: StageDefinition,
    supersede: boolean,
    logger: ExecutionLogger,
    signal?: AbortSignal,
  ): Promise<StageResult> {
    const inputs: Record<string, Artifact> = {};
    for (const name of def.requiredInputs) {
      const artifact = await this.artifacts.get(workflow.id, name);
      if (artifact) inputs[name] = artifact;
    }
    const input: StageInput = {
      workflow_id: workflow.id,
      stage_name: def.name,
      request: workflow.request,
      artifacts: inputs,
    };
    const inputRefs = Object.values(inputs).map((a) => this.artifacts.toRef(a));

    const startedAt = new Date();
    const attempt = await this.attempt(def, input, inputRefs, logger, signal);
    const timing = timingSince(startedAt);
    if (attempt.kind === 'cancelled') {
      await logger.warn('stage_failed', `Cancelled: ${def.name}`, { stage: def.name, data: { reason: 'cancelled' } });
      return attempt;
    }
    if (attempt.kind === 'error') {
      return this.storeFailure(workflow, def, supersede, logger, {
        kind: failureKindOf(attempt.error),
        reason: errorMessage(attempt.error),
        attempts: attempt.attempts,
      }, timing);
    }

    const { output, attempts } = attempt;
    const { failure, warnings } = this.judge(def, output);
    for (const warning of warnings) {
      await logger.warn('stage_warning', warning, { stage: def.name });
    }
    if (failure) {
      return this.storeFailure(workflow, def, supersede, logger, { ...failure, attempts, payload: output.payload }, timing);
    }

    const artifact = await this.artifacts.put(
      {
        workflow_id: workflow.id,
        stage_name: def.name,
        version: def.outputSchemaVersion,
        status: 'completed',
        payload: output.payload,
        attempts,
        ...timing,
      },
      { supersede },
    );
    await logger.stageComplete(def.name, this.artifacts.toRef(artifact));
    for (const filePath of changedPaths(artifact.payload)) {
      await logger.fileChanged(def.name, filePath);
    }
    this.options.onStageComplete?.(def.name, artifact);
    return { kind: 'completed', artifact };
  }

  /** Invoke the worker, retrying transient errors */
  private async attempt(
    def: StageDefinition,
    input: StageInput,
    inputRefs: ArtifactRef[],
    logger: ExecutionLogger,
    signal?: AbortSignal,
  ): Promise<AttemptResult> {
    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) return { kind: 'cancelled' };

      await logger.stageStart(def.name, attempt, inputRefs);
      this.options.onStageStart?.(def.name, attempt);

      try {
        const output = await this.invokeWithDeadline(def, input, signal);
        return { kind: 'output', output, attempts: attempt };
      } catch (error) {
        if (signal?.aborted || error instanceof WorkflowCancelledError) return { kind: 'cancelled' };

        const decision = this.retryPolicy.shouldRetry(error, attempt);
        if (!decision.retry) return { kind: 'error', error, attempts: attempt };

        await logger.warn('stage_retry', `Retrying ${def.name} after attempt ${attempt}: ${errorMessage(error)}`, {
          stage: def.name,
          data: { attempt, delay_ms: decision.delayMs, error: errorMessage(error) },
        });
        this.options.onProgress?.(`Retrying ${def.name} in ${decision.delayMs}ms`);
        try {
          await sleep(decision.delayMs, signal);
        } catch (sleepError) {
          if (sleepError instanceof WorkflowCancelledError) return { kind: 'cancelled' };
          throw sleepError;
        }
      }
    }
  }

  /**
   * Race the worker against the stage deadline and workflow cancellation.
   * Either one aborts the signal the worker was given.
   */
  private async invokeWithDeadline(
    def: StageDefinition,
    input: StageInput,
    workflowSignal?: AbortSignal,
  ): Promise<StageOutput> {
    const controller = new AbortController();
    const onWorkflowAbort = (): void => controller.abort(new WorkflowCancelledError());
    if (workflowSignal?.aborted) {
      throw new WorkflowCancelledError();
    }
    workflowSignal?.addEventListener('abort', onWorkflowAbort, { once: true });

    const timer = setTimeout(() => {
      controller.abort(new StageTimeoutError(def.name, def.timeoutMs));
    }, def.timeoutMs);

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => {
        const reason: unknown = controller.signal.reason;
        reject(reason instanceof Error ? reason : new WorkflowCancelledError());
      }, { once: true });
    });

    try {
      return await Promise.race([this.options.worker.invoke(input, controller.signal), aborted]);
    } finally {
      clearTimeout(timer);
      workflowSignal?.removeEventListener('abort', onWorkflowAbort);
    }
  }

  /**
   * Envelope, reported status, then quality gate. `failure` is null when the
   * output passes; envelope warnings never fail a stage.
   */
  private judge(def: StageDefinition, output: StageOutput): Judgement {
    if (output.status === 'failed') {
      return { failure: { kind: 'worker_reported', reason: reportedReason(output.payload) }, warnings: [] };
    }

    const validation = validateEnvelope(output.payload, def.outputSchemaVersion);
    const { warnings } = validation;
    if (!validation.valid) {
      return { failure: { kind: 'validation', reason: `invalid payload: ${validation.errors.join('; ')}` }, warnings };
    }
    if (output.payload.status !== output.status) {
      const reason = `invalid payload: envelope status ${String(output.payload.status)} does not match reported ${output.status}`;
      return { failure: { kind: 'validation', reason }, warnings };
    }

    if (def.qualityGate) {
      const gate = runQualityGate(def.qualityGate, output.payload);
      if (!gate.pass) {
        return { failure: { kind: 'quality_gate', reason: gate.reasons.join('; ') }, warnings };
      }
    }
    return { failure: null, warnings };
  }

  private async storeFailure(
    workflow: Workflow,
    def: StageDefinition,
    supersede: boolean,
    logger: ExecutionLogger,
    failure: { kind: FailureKind; reason: string; attempts: number; payload?: JsonObject },
    timing: StageTiming,
  ): Promise<StageResult> {
    const artifact = await this.artifacts.put(
      {
        workflow_id: workflow.id,
        stage_name: def.name,
        version: def.outputSchemaVersion,
        status: 'failed',
        payload: failure.payload ?? {
          ...envelope(ENGINE_PRODUCER, 'failed', def.outputSchemaVersion),
          error: failure.reason,
        },
        failure: { kind: failure.kind, reason: failure.reason },
        attempts: failure.attempts,
        ...timing,
      },
      { supersede },
    );
    await logger.stageFailed(def.name, failure.reason, {
      artifact: this.artifacts.toRef(artifact),
      kind: failure.kind,
      attempts: failure.attempts,
    });
    return { kind: 'failed', artifact };
  }

  // ─── Terminal States ───────────────────────────────────

  private async finish(
    workflow: Workflow,
    logger: ExecutionLogger,
    update: WorkflowUpdate,
  ): Promise<Workflow> {
    const saved = await this.workflows.save({ ...workflow, ...update, current_stage: null });
    if (saved.status === 'completed') {
      await logger.success('workflow_completed', `Workflow ${saved.id} completed`);
    } else {
      await logger.error('workflow_failed', saved.reason ?? 'failed', {
        ...(saved.failed_stage ? { stage: saved.failed_stage } : {}),
      });
    }
    this.options.onProgress?.(saved.reason ?? `Workflow ${saved.id} ${saved.status}`);
    return saved;
  }

  private async cancel(workflow: Workflow, logger: ExecutionLogger): Promise<Workflow> {
    const saved = await this.workflows.save({
      ...workflow,
      status: 'failed',
      current_stage: null,
      reason: 'cancelled',
      failed_stage: undefined,
    });
    await logger.warn('workflow_cancelled', 'Workflow cancelled');
    this.options.onProgress?.('cancelled');
    return saved;
  }

  /** Publish a completed workflow whose publish step never ran (stopped after completion) */
  private async publishIfPending(workflow: Workflow): Promise<Workflow> {
    if (!this.options.publisher) return workflow;
    if (await this.artifacts.get(workflow.id, PUBLISH_STAGE)) return workflow;
    await this.publish(workflow, new ExecutionLogger(this.options.stateDir, workflow.id));
    return workflow;
  }

  /**
   * Hand the artifact set to the publisher. A publish failure is recorded
   * but never reverts the workflow's completed status.
   */
  private async publish(workflow: Workflow, logger: ExecutionLogger): Promise<void> {
    const { publisher } = this.options;
    if (!publisher) return;

    const artifacts = await this.artifacts.list(workflow.id);
    let result: PublishResult | null = null;
    let reason = '';
    try {
      result = await publisher.publish({ workflow_id: workflow.id, artifacts });
    } catch (error) {
      reason = errorMessage(error);
    }

    const status = result ? 'completed' : 'failed';
    const payload: JsonObject = result
      ? { ...envelope('publisher', status, ENGINE_SCHEMA_VERSION), ...result }
      : { ...envelope('publisher', status, ENGINE_SCHEMA_VERSION), error: reason };

    if (result) {
      if (result.commit_id) await logger.action('persistence-commit', { commit_id: result.commit_id });
      if (result.url) await logger.action('external-publish', { url: result.url });
      if (result.issue_ref) await logger.action('ticket-close', { issue_ref: result.issue_ref });
    } else {
      await logger.error('action', `Publish failed: ${reason}`, { data: { action: 'publish', error: reason } });
      this.options.onProgress?.(`Publish failed: ${reason}`);
    }

    await this.artifacts.put(
      {
        workflow_id: workflow.id,
        stage_name: PUBLISH_STAGE,
        version: ENGINE_SCHEMA_VERSION,
        status,
        payload,
        ...(status === 'failed' ? { failure: { kind: 'worker_error' as const, reason } } : {}),
        attempts: 1,
      },
      { supersede: true },
    );
  }
}

/** Factory function */
export function createCoordinator(options: CoordinatorOptions): WorkflowCoordinator {
  return new WorkflowCoordinator(options);
}
