/**
 * Stage worker and publisher contracts.
 *
 * Workers produce stage content; the engine only sequences, validates and
 * stores what they return. A publisher runs once after a workflow completes.
 */

import type { Artifact, StageInput, StageOutput } from './types.js';
import { StageConfigurationError } from './errors.js';

// ─── Stage Worker ────────────────────────────────────────

export interface StageWorker {
  /**
   * Produce the output of one stage. Implementations should stop work when
   * `signal` aborts; the coordinator stops waiting either way.
   */
  invoke(input: StageInput, signal: AbortSignal): Promise<StageOutput>;
}

/**
 * Routes each stage to its own worker, so stages with different
 * capabilities run under different implementations.
 */
export class StageWorkerRouter implements StageWorker {
  private readonly workers: ReadonlyMap<string, StageWorker>;
  private readonly fallback?: StageWorker;

  constructor(workers: Record<string, StageWorker>, fallback?: StageWorker) {
    this.workers = new Map(Object.entries(workers));
    this.fallback = fallback;
  }

  workerFor(stageName: string): StageWorker | undefined {
    return this.workers.get(stageName) ?? this.fallback;
  }

  /** Stages in the list that have no worker */
  missingStages(stageNames: readonly string[]): string[] {
    return stageNames.filter((name) => !this.workerFor(name));
  }

  invoke(input: StageInput, signal: AbortSignal): Promise<StageOutput> {
    const worker = this.workerFor(input.stage_name);
    if (!worker) {
      return Promise.reject(
        new StageConfigurationError([`No worker configured for stage "${input.stage_name}"`]),
      );
    }
    return worker.invoke(input, signal);
  }
}

// ─── Publisher ───────────────────────────────────────────

export interface PublishRequest {
  workflow_id: string;
  artifacts: Artifact[];
}

export interface PublishResult {
  commit_id?: string;
  issue_ref?: string;
  url?: string;
}

/** Commits, publishes and closes tickets for a completed workflow */
export interface Publisher {
  publish(request: PublishRequest): Promise<PublishResult>;
}
