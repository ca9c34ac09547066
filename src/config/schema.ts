/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';

/**
 * Per-stage settings schema
 */
export const StageSettingsSchema = z.object({
  timeout_ms: z.number().int().positive().optional(),
  /** Worker command for the shell stage worker */
  command: z.string().optional(),
  args: z.array(z.string()).default([]),
});

/**
 * Policy settings schema
 */
export const PolicySettingsSchema = z.object({
  path: z.string().default('PROJECT.md'),
});

/**
 * Alignment gate settings schema
 */
export const AlignmentSettingsSchema = z.object({
  threshold: z.number().min(0).max(1).default(0.8),
});

/**
 * Retry settings schema
 */
export const RetrySettingsSchema = z.object({
  max_attempts: z.number().int().min(1).max(10).default(3),
  base_delay_ms: z.number().int().min(0).default(1000),
  max_delay_ms: z.number().int().min(0).default(60000),
});

/**
 * Bypass detector settings schema
 */
export const DetectorSettingsSchema = z.object({
  /** Terminal actions expected of a completed workflow, by mode */
  modes: z.record(z.string(), z.array(z.string())).default({
    full: ['persistence-commit', 'external-publish', 'ticket-close'],
    local: ['persistence-commit'],
  }),
  /** Extra patterns file (YAML or JSON) */
  patterns_file: z.string().optional(),
});

/**
 * Output settings schema
 */
export const OutputSettingsSchema = z.object({
  log_level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  format: z.enum(['text', 'json']).default('text'),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  state_dir: z.string().default('.relaywright'),
  policy: PolicySettingsSchema.default({ path: 'PROJECT.md' }),
  alignment: AlignmentSettingsSchema.default({ threshold: 0.8 }),
  retry: RetrySettingsSchema.default({
    max_attempts: 3,
    base_delay_ms: 1000,
    max_delay_ms: 60000,
  }),
  stages: z.record(z.string(), StageSettingsSchema).default({}),
  detector: DetectorSettingsSchema.default({
    modes: {
      full: ['persistence-commit', 'external-publish', 'ticket-close'],
      local: ['persistence-commit'],
    },
  }),
  output: OutputSettingsSchema.default({
    log_level: 'info',
    format: 'text',
  }),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type StageSettings = z.infer<typeof StageSettingsSchema>;
export type PolicySettings = z.infer<typeof PolicySettingsSchema>;
export type AlignmentSettings = z.infer<typeof AlignmentSettingsSchema>;
export type RetrySettings = z.infer<typeof RetrySettingsSchema>;
export type DetectorSettings = z.infer<typeof DetectorSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
