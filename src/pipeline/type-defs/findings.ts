/**
 * Bypass detector types — pattern signatures and findings.
 */

import { z } from 'zod';
import { SeveritySchema } from './enums.js';

const PatternBaseSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  severity: SeveritySchema,
  suggested_fix: z.string(),
});

export const AnomalySignatureSchema = z.enum([
  'stage-without-start',
  'precondition-violation',
  'action-before-completion',
  'duplicate-completion',
  'contract-violation',
  'unknown-event',
]);
export type AnomalySignature = z.infer<typeof AnomalySignatureSchema>;

export const PatternSchema = z.discriminatedUnion('kind', [
  PatternBaseSchema.extend({
    kind: z.literal('completeness'),
    /** Workflow mode this expectation applies to */
    mode: z.string(),
    required_actions: z.array(z.string()).min(1),
  }),
  PatternBaseSchema.extend({
    kind: z.literal('congruence'),
    /** Regex sources; a path matching one side requires a path matching the other */
    left: z.string(),
    right: z.string(),
  }),
  PatternBaseSchema.extend({
    kind: z.literal('content'),
    markers: z.array(z.string()).min(1),
    /** Restrict to these stages; empty means every stage */
    stages: z.array(z.string()).default([]),
  }),
  PatternBaseSchema.extend({
    kind: z.literal('anomaly'),
    signature: AnomalySignatureSchema,
  }),
]);
export type Pattern = z.infer<typeof PatternSchema>;
export type PatternKind = Pattern['kind'];

export const FindingSchema = z.object({
  pattern_id: z.string(),
  severity: SeveritySchema,
  workflow_id: z.string(),
  title: z.string(),
  evidence: z.array(z.string()),
  suggested_fix: z.string(),
});
export type Finding = z.infer<typeof FindingSchema>;

/** Pattern id used for anomalies that no known signature claims */
export const NEW_BYPASS_ID = 'NEW-BYPASS';
