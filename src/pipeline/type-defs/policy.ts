/**
 * Policy types — parsed strategic policy document and alignment verdicts.
 */

import { z } from 'zod';

export const PolicySchema = z.object({
  goals: z.array(z.string()),
  scope_in: z.array(z.string()),
  scope_out: z.array(z.string()),
  constraints: z.array(z.string()),
  /** Stages the policy owner has explicitly switched off */
  skip_stages: z.array(z.string()),
  source: z.string().optional(),
  sha256: z.string(),
});
export type Policy = z.infer<typeof PolicySchema>;

export const AlignmentSchema = z.object({
  aligned: z.boolean(),
  confidence: z.number().min(0).max(1),
  matching_goals: z.array(z.string()),
  violations: z.array(z.string()),
  reasoning: z.string(),
});
export type Alignment = z.infer<typeof AlignmentSchema>;

export const AlignmentRecordSchema = AlignmentSchema.extend({
  workflow_id: z.string(),
  request: z.string(),
  policy_sha256: z.string().optional(),
  timestamp: z.string(),
});
export type AlignmentRecord = z.infer<typeof AlignmentRecordSchema>;
