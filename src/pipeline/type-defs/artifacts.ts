/**
 * Artifact types — the envelope every stage payload carries,
 * stored artifacts, and compact references used by the execution log.
 */

import { z } from 'zod';
import { ArtifactStatusSchema, FailureKindSchema, StageNameSchema } from './enums.js';

// ─── Envelope ────────────────────────────────────────────

/** Required fields on every stage payload; everything else is stage-specific */
export const ArtifactEnvelopeSchema = z
  .object({
    producer: z.string().min(1),
    timestamp: z.string().min(1),
    status: ArtifactStatusSchema,
    schema_version: z.string().regex(/^\d+(\.\d+){0,2}$/, 'expected a dotted numeric version'),
  })
  .passthrough();
export type ArtifactEnvelope = z.infer<typeof ArtifactEnvelopeSchema>;

export type JsonObject = Record<string, unknown>;

// ─── Failure ─────────────────────────────────────────────

export const ArtifactFailureSchema = z.object({
  kind: FailureKindSchema,
  reason: z.string(),
});
export type ArtifactFailure = z.infer<typeof ArtifactFailureSchema>;

// ─── Stored Artifact ─────────────────────────────────────

export const ArtifactSchema = z.object({
  workflow_id: z.string().min(1),
  stage_name: StageNameSchema,
  version: z.string(),
  generation: z.number().int().positive(),
  status: ArtifactStatusSchema,
  payload: z.record(z.string(), z.unknown()),
  failure: ArtifactFailureSchema.optional(),
  attempts: z.number().int().min(0),
  sha256: z.string(),
  created_at: z.string(),
  /** When the first attempt of this run started */
  started_at: z.string().optional(),
  /** Wall time from first attempt start to settle, retries included */
  duration_ms: z.number().int().min(0).optional(),
});
export type Artifact = z.infer<typeof ArtifactSchema>;

/** What a caller hands to the store; the store assigns generation, hash and time */
export type NewArtifact = Omit<Artifact, 'generation' | 'sha256' | 'created_at'>;

// ─── Artifact Reference ──────────────────────────────────

/** Compact pointer written to logs instead of artifact content */
export const ArtifactRefSchema = z.object({
  workflow_id: z.string(),
  stage_name: z.string(),
  generation: z.number().int().positive(),
  status: ArtifactStatusSchema,
  sha256: z.string(),
});
export type ArtifactRef = z.infer<typeof ArtifactRefSchema>;

/** One line of the per-workflow write-order index */
export const ArtifactIndexEntrySchema = z.object({
  stage_name: z.string(),
  generation: z.number().int().positive(),
  sha256: z.string(),
  written_at: z.string(),
});
export type ArtifactIndexEntry = z.infer<typeof ArtifactIndexEntrySchema>;
