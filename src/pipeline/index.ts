/**
 * Pipeline module — re-exports all public APIs.
 */

// Core types
export * from './types.js';

// Errors
export * from './errors.js';

// Coordinator
export { createCoordinator, WorkflowCoordinator } from './coordinator.js';
export type { CoordinatorOptions, RunOptions, WorkflowStatusReport } from './coordinator.js';

// Progress
export { computeProgress } from './progress.js';
export type { WorkflowProgress } from './progress.js';

// Stage Registry
export {
  createStageRegistry,
  defaultStageDefinitions,
  planStages,
  StageRegistry,
  validateStageDefinitions,
} from './stage-registry.js';

// Artifact Store
export { createArtifactStore, ArtifactStore, canonicalJson, computeSha256 } from './artifact-store.js';
export type { ArtifactStoreOptions, PutOptions } from './artifact-store.js';

// Artifact Validators
export { validateEnvelope, isSchemaCompatible, getQualityGate, runQualityGate } from './artifact-validators.js';
export type { ValidationResult } from './artifact-validators.js';

// Policy
export { DEFAULT_POLICY_FILENAME, parsePolicy, loadPolicy, tryLoadPolicy } from './policy.js';
export type { PolicyLoadResult } from './policy.js';
export { DEFAULT_ALIGNMENT_THRESHOLD, evaluate, matchScore, significantWords, stem } from './policy-evaluator.js';
export type { EvaluateOptions } from './policy-evaluator.js';
export { ALIGNMENT_HISTORY_FILE, AlignmentHistory, createAlignmentHistory } from './alignment-history.js';
export type { AlignmentStats } from './alignment-history.js';

// Retry
export { DEFAULT_RETRY_CONFIG, isTransientError, RetryPolicy, sleep } from './retry-policy.js';
export type { RetryDecision, RetryPolicyConfig } from './retry-policy.js';

// Workers
export { StageWorkerRouter } from './stage-worker.js';
export type { Publisher, PublishRequest, PublishResult, StageWorker } from './stage-worker.js';
export { ShellStageWorker, parseStageOutput, sanitizeCommand, TEMPFAIL_EXIT_CODE } from './shell-worker.js';
export type { ShellStageWorkerOptions } from './shell-worker.js';
