/**
 * Error taxonomy for the orchestration engine.
 *
 * Stage-local errors never escape the coordinator: they become failed
 * artifacts. Only infrastructure errors reach callers of run/resume.
 */

export type ErrorCode =
  | 'POLICY_REJECTED'
  | 'POLICY_PARSE'
  | 'STAGE_TIMEOUT'
  | 'STAGE_VALIDATION'
  | 'QUALITY_GATE'
  | 'STORE_IO'
  | 'ARTIFACT_EXISTS'
  | 'STAGE_CONFIGURATION'
  | 'WORKFLOW_NOT_FOUND'
  | 'TRANSIENT_WORKER'
  | 'WORKFLOW_CANCELLED';

export class RelaywrightError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = 'RelaywrightError';
    this.code = code;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class PolicyRejectedError extends RelaywrightError {
  readonly violations: string[];
  readonly reasoning: string;

  constructor(violations: string[], reasoning: string) {
    super('POLICY_REJECTED', `Blocked by policy: ${violations.join('; ') || reasoning}`);
    this.name = 'PolicyRejectedError';
    this.violations = violations;
    this.reasoning = reasoning;
  }
}

export class PolicyParseError extends RelaywrightError {
  constructor(message: string, cause?: unknown) {
    super('POLICY_PARSE', message, cause);
    this.name = 'PolicyParseError';
  }
}

export class StageTimeoutError extends RelaywrightError {
  readonly stageName: string;
  readonly timeoutMs: number;

  constructor(stageName: string, timeoutMs: number) {
    super('STAGE_TIMEOUT', `Stage ${stageName} timed out after ${timeoutMs}ms`);
    this.name = 'StageTimeoutError';
    this.stageName = stageName;
    this.timeoutMs = timeoutMs;
  }
}

export class StageValidationError extends RelaywrightError {
  readonly stageName: string;
  readonly problems: string[];

  constructor(stageName: string, problems: string[]) {
    super('STAGE_VALIDATION', `Stage ${stageName} produced an invalid payload: ${problems.join('; ')}`);
    this.name = 'StageValidationError';
    this.stageName = stageName;
    this.problems = problems;
  }
}

export class QualityGateFailure extends RelaywrightError {
  readonly stageName: string;
  readonly reasons: string[];

  constructor(stageName: string, reasons: string[]) {
    super('QUALITY_GATE', `Stage ${stageName} failed its quality gate: ${reasons.join('; ')}`);
    this.name = 'QualityGateFailure';
    this.stageName = stageName;
    this.reasons = reasons;
  }
}

export class StoreIOError extends RelaywrightError {
  readonly path: string;

  constructor(operation: string, path: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('STORE_IO', `Failed to ${operation} ${path}: ${detail}`, cause);
    this.name = 'StoreIOError';
    this.path = path;
  }
}

export class ArtifactExistsError extends RelaywrightError {
  constructor(workflowId: string, stageName: string) {
    super(
      'ARTIFACT_EXISTS',
      `Artifact ${workflowId}/${stageName} is already completed; supersede it explicitly to replace it`,
    );
    this.name = 'ArtifactExistsError';
  }
}

export class StageConfigurationError extends RelaywrightError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('STAGE_CONFIGURATION', `Invalid stage configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'StageConfigurationError';
    this.problems = problems;
  }
}

export class WorkflowNotFoundError extends RelaywrightError {
  constructor(workflowId: string) {
    super('WORKFLOW_NOT_FOUND', `Workflow not found: ${workflowId}`);
    this.name = 'WorkflowNotFoundError';
  }
}

/** Raised by workers to request a retry (rate limit, temporary outage) */
export class TransientWorkerError extends RelaywrightError {
  constructor(message: string, cause?: unknown) {
    super('TRANSIENT_WORKER', message, cause);
    this.name = 'TransientWorkerError';
  }
}

export class WorkflowCancelledError extends RelaywrightError {
  constructor(reason = 'cancelled') {
    super('WORKFLOW_CANCELLED', reason);
    this.name = 'WorkflowCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
