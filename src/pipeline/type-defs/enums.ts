/**
 * Pipeline core enums — stage names, statuses, severities.
 */

import { z } from 'zod';

// ─── Stages ──────────────────────────────────────────────

export const STAGE_NAMES = [
  'research',
  'planning',
  'test-generation',
  'implementation',
  'review',
  'security-audit',
  'doc-sync',
] as const;
export type DefaultStageName = (typeof STAGE_NAMES)[number];

/** Synthetic artifact key for the policy decision recorded before any stage */
export const ALIGNMENT_STAGE = 'alignment';

/** Synthetic trailing artifact key for the publish collaborator's result */
export const PUBLISH_STAGE = 'publish';

export const StageNameSchema = z
  .string()
  .min(1)
  .regex(/^[a-z][a-z0-9-]*$/, 'stage names are lowercase kebab-case');

// ─── Statuses ────────────────────────────────────────────

export const WorkflowStatusSchema = z.enum([
  'pending',
  'running',
  'blocked',
  'completed',
  'failed',
]);
export type WorkflowStatus = z.infer<typeof WorkflowStatusSchema>;

export const ArtifactStatusSchema = z.enum(['completed', 'failed']);
export type ArtifactStatus = z.infer<typeof ArtifactStatusSchema>;

export const FailureKindSchema = z.enum([
  'timeout',
  'worker_error',
  'worker_reported',
  'validation',
  'quality_gate',
  'policy_rejected',
]);
export type FailureKind = z.infer<typeof FailureKindSchema>;

// ─── Findings ────────────────────────────────────────────

export const SeveritySchema = z.enum(['critical', 'warning', 'info']);
export type Severity = z.infer<typeof SeveritySchema>;

/** Sort rank, most severe first */
export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 0,
  warning: 1,
  info: 2,
};
