/**
 * Workflow progress — how far a workflow has got and how long the rest
 * should take, derived from its stored artifacts.
 *
 * Completed and failed stages both count as done. Stages the policy
 * skipped are left out of the total.
 */

import { ALIGNMENT_STAGE, type Artifact, type Workflow } from './types.js';

export interface WorkflowProgress {
  /** Planned stages (registry minus policy skips) */
  total: number;
  completed: string[];
  failed: string[];
  running: string[];
  pending: string[];
  skipped: string[];
  /** Whole percent of planned stages that are done */
  percent: number;
  /** Mean wall time of done stages, across all their attempts */
  average_duration_ms: number | null;
  estimated_remaining_ms: number | null;
}

function skippedStages(artifacts: Artifact[]): string[] {
  const alignment = artifacts.find((a) => a.stage_name === ALIGNMENT_STAGE);
  const skip = alignment?.payload.skip_stages;
  return Array.isArray(skip) ? skip.filter((s): s is string => typeof s === 'string') : [];
}

/**
 * Compute progress for a workflow.
 *
 * @param stageNames - Stage names in registry order
 * @param now - Clock used to measure the running group's elapsed time
 */
export function computeProgress(
  workflow: Workflow,
  artifacts: Artifact[],
  stageNames: readonly string[],
  now: Date = new Date(),
): WorkflowProgress {
  const skipSet = new Set(skippedStages(artifacts));
  const skipped = stageNames.filter((s) => skipSet.has(s));
  const planned = stageNames.filter((s) => !skipSet.has(s));
  const byStage = new Map(artifacts.map((a) => [a.stage_name, a]));

  const completed = planned.filter((s) => byStage.get(s)?.status === 'completed');
  const failed = planned.filter((s) => byStage.get(s)?.status === 'failed');
  const done = new Set([...completed, ...failed]);

  // current_stage holds the comma-joined group in flight
  const inFlight = workflow.status === 'running' && workflow.current_stage
    ? new Set(workflow.current_stage.split(','))
    : new Set<string>();
  const running = planned.filter((s) => inFlight.has(s) && !done.has(s));
  const pending = planned.filter((s) => !done.has(s) && !inFlight.has(s));

  const durations = [...done]
    .map((s) => byStage.get(s)?.duration_ms)
    .filter((d): d is number => d !== undefined);
  const average = durations.length > 0
    ? Math.floor(durations.reduce((sum, d) => sum + d, 0) / durations.length)
    : null;

  let estimate: number | null = null;
  if (average !== null) {
    const remaining = planned.length - done.size;
    if (running.length > 0) {
      // The group started when the workflow record last changed
      const elapsed = Math.max(0, now.getTime() - Date.parse(workflow.updated_at));
      estimate = Math.max(0, average - elapsed) + (remaining - 1) * average;
    } else {
      estimate = remaining * average;
    }
  }

  return {
    total: planned.length,
    completed,
    failed,
    running,
    pending,
    skipped,
    percent: planned.length > 0 ? Math.floor((done.size / planned.length) * 100) : 0,
    average_duration_ms: average,
    estimated_remaining_ms: estimate,
  };
}
