/**
 * Execution log types — compact, append-only event records per workflow.
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['info', 'warn', 'error', 'success', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogEventTypeSchema = z.enum([
  'workflow_started',
  'alignment_evaluated',
  'stage_started',
  'stage_retry',
  'stage_warning',
  'stage_completed',
  'stage_failed',
  'stage_skipped',
  'workflow_completed',
  'workflow_failed',
  'workflow_blocked',
  'workflow_cancelled',
  'action',
  'file_changed',
]);
export type LogEventType = z.infer<typeof LogEventTypeSchema>;

export const LogEventSchema = z.object({
  seq: z.number().int().positive(),
  timestamp: z.string(),
  workflow_id: z.string(),
  /** Kept as a plain string so logs from newer writers still parse */
  event: z.string(),
  level: LogLevelSchema,
  stage: z.string().optional(),
  message: z.string(),
  data: z.record(z.string(), z.unknown()).optional(),
});
export type LogEvent = z.infer<typeof LogEventSchema>;

/** Terminal actions taken by external collaborators after a workflow completes */
export const TERMINAL_ACTIONS = ['persistence-commit', 'external-publish', 'ticket-close'] as const;
export type TerminalAction = (typeof TERMINAL_ACTIONS)[number];

export interface ExecutionLog {
  workflow_id: string;
  mode: string;
  events: LogEvent[];
}
