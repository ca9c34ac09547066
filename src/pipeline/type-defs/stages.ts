/**
 * Stage definitions, worker contract and quality gate types.
 */

import { z } from 'zod';
import { ArtifactStatusSchema } from './enums.js';
import type { Artifact, JsonObject } from './artifacts.js';

// ─── Quality Gate ────────────────────────────────────────

export interface QualityGateResult {
  pass: boolean;
  reasons: string[];
}

export type QualityGate = (payload: JsonObject) => QualityGateResult;

// ─── Stage Definition ────────────────────────────────────

export interface StageDefinition {
  name: string;
  order: number;
  requiredInputs: string[];
  outputSchemaVersion: string;
  timeoutMs: number;
  parallelGroup?: string;
  qualityGate?: QualityGate;
}

// ─── Worker Contract ─────────────────────────────────────

export interface StageInput {
  workflow_id: string;
  stage_name: string;
  request: string;
  /** Required input artifacts, keyed by stage name */
  artifacts: Record<string, Artifact>;
}

export const StageOutputSchema = z.object({
  payload: z.record(z.string(), z.unknown()),
  status: ArtifactStatusSchema,
});
export type StageOutput = z.infer<typeof StageOutputSchema>;
