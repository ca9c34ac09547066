/**
 * CLI context
 * Wires configuration into the coordinator, workers and stores
 */

import { loadConfig, resolvePaths, type Config } from '../config/index.js';
import type { Workflow } from '../pipeline/types.js';
import {
  createCoordinator,
  type CoordinatorOptions,
  type WorkflowCoordinator,
} from '../pipeline/coordinator.js';
import { createStageRegistry, defaultStageDefinitions, type StageRegistry } from '../pipeline/stage-registry.js';
import { ShellStageWorker } from '../pipeline/shell-worker.js';
import { StageWorkerRouter, type StageWorker } from '../pipeline/stage-worker.js';
import { StageConfigurationError } from '../pipeline/errors.js';
import { printDebug, setOutputLevel } from './output.js';

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  BLOCKED: 1,
  STAGE_FAILURE: 2,
  INTERNAL_ERROR: 3,
} as const;

export interface CliContext {
  cwd: string;
  config: Config;
  stateDir: string;
  policyPath: string;
}

/**
 * Load configuration for the current working directory and apply its
 * output level
 */
export async function loadCliContext(cwd: string = process.cwd()): Promise<CliContext> {
  const config = await loadConfig(cwd);
  setOutputLevel(config.output.log_level);
  const paths = resolvePaths(config, cwd);
  printDebug(`State directory: ${paths.stateDir}`);
  printDebug(`Policy document: ${paths.policyPath}`);
  return { cwd, config, ...paths };
}

/**
 * Whether a command should print JSON: an explicit --json wins, otherwise
 * the configured output format decides
 */
export function wantsJson(flag: boolean | undefined, context: CliContext): boolean {
  return flag ?? context.config.output.format === 'json';
}

/**
 * Stage registry with configured timeout overrides
 */
export function buildRegistry(config: Config): StageRegistry {
  const timeouts: Record<string, number> = {};
  for (const [stage, settings] of Object.entries(config.stages)) {
    if (settings.timeout_ms !== undefined) timeouts[stage] = settings.timeout_ms;
  }
  return createStageRegistry(defaultStageDefinitions(timeouts));
}

/**
 * One shell worker per stage that has a configured command
 */
export function buildWorkerRouter(config: Config, cwd: string): StageWorkerRouter {
  const workers: Record<string, StageWorker> = {};
  for (const [stage, settings] of Object.entries(config.stages)) {
    if (!settings.command) continue;
    workers[stage] = new ShellStageWorker({
      command: settings.command,
      args: settings.args,
      cwd,
    });
  }
  return new StageWorkerRouter(workers);
}

/**
 * Create a coordinator for CLI use. Fails fast when a stage has no worker.
 */
export function buildCoordinator(
  context: CliContext,
  callbacks: Pick<CoordinatorOptions, 'onStageStart' | 'onStageComplete' | 'onProgress'> = {},
): WorkflowCoordinator {
  const registry = buildRegistry(context.config);
  const router = buildWorkerRouter(context.config, context.cwd);
  const missing = router.missingStages(registry.names());
  if (missing.length > 0) {
    throw new StageConfigurationError(
      missing.map((stage) => `No command configured for stage "${stage}" (stages.${stage}.command)`),
    );
  }

  return createCoordinator({
    stateDir: context.stateDir,
    worker: router,
    registry,
    policyPath: context.policyPath,
    alignmentThreshold: context.config.alignment.threshold,
    retry: {
      maxAttempts: context.config.retry.max_attempts,
      baseDelayMs: context.config.retry.base_delay_ms,
      maxDelayMs: context.config.retry.max_delay_ms,
    },
    ...callbacks,
  });
}

/**
 * Exit code for a workflow outcome
 */
export function exitCodeFor(workflow: Workflow): number {
  switch (workflow.status) {
    case 'completed':
      return EXIT_CODES.SUCCESS;
    case 'blocked':
      return EXIT_CODES.BLOCKED;
    case 'failed':
      return EXIT_CODES.STAGE_FAILURE;
    default:
      return EXIT_CODES.INTERNAL_ERROR;
  }
}

