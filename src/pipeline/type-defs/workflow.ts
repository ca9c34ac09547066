/**
 * Workflow record — the durable state of a single end-to-end run.
 */

import { z } from 'zod';
import { WorkflowStatusSchema } from './enums.js';

export const WorkflowSchema = z.object({
  id: z.string().min(1),
  request: z.string(),
  mode: z.string().default('full'),
  status: WorkflowStatusSchema,
  current_stage: z.string().nullable(),
  /** Human-readable explanation whenever status is blocked or failed */
  reason: z.string().optional(),
  failed_stage: z.string().optional(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type Workflow = z.infer<typeof WorkflowSchema>;
