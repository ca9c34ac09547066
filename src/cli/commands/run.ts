/**
 * Run commands
 * start, resume and rerun drive a workflow to its next terminal state
 */

import { Command } from 'commander';
import type { Workflow } from '../../pipeline/types.js';
import type { WorkflowCoordinator } from '../../pipeline/coordinator.js';
import { buildCoordinator, exitCodeFor, loadCliContext, wantsJson } from '../context.js';
import {
  failSpinner,
  printInfo,
  printWorkflow,
  printWorkflowProgress,
  startSpinner,
  succeedSpinner,
  updateSpinner,
} from '../output.js';

type Runner = (coordinator: WorkflowCoordinator, signal: AbortSignal) => Promise<Workflow>;

/**
 * Run a workflow operation with a spinner; Ctrl-C cancels the workflow
 */
async function runWithProgress(label: string, runner: Runner, jsonFlag: boolean | undefined): Promise<void> {
  const context = await loadCliContext();
  const json = wantsJson(jsonFlag, context);
  const controller = new AbortController();
  const onSigint = (): void => {
    updateSpinner('Cancelling...');
    controller.abort();
  };

  const coordinator = buildCoordinator(context, {
    onStageStart: (stage, attempt) => {
      updateSpinner(attempt > 1 ? `Running ${stage} (attempt ${attempt})...` : `Running ${stage}...`);
    },
    onProgress: (message) => updateSpinner(message),
  });

  process.once('SIGINT', onSigint);
  if (!json) startSpinner(label);

  let workflow: Workflow;
  try {
    workflow = await runner(coordinator, controller.signal);
  } catch (error) {
    failSpinner('Workflow error');
    throw error;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }

  if (workflow.status === 'completed') {
    succeedSpinner(`Workflow ${workflow.id} completed`);
  } else {
    failSpinner(`Workflow ${workflow.id} ${workflow.status}`);
  }

  const report = await coordinator.status(workflow.id);
  if (json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printWorkflow(report.workflow, report.artifacts);
    printWorkflowProgress(report.progress);
    if (workflow.status === 'failed') {
      printInfo(`Run "relaywright resume ${workflow.id}" or "relaywright rerun ${workflow.id} <stage>" to continue.`);
    }
  }
  process.exitCode = exitCodeFor(workflow);
}

/**
 * Create the start command
 */
export function createStartCommand(): Command {
  return new Command('start')
    .description('Start a workflow for a request')
    .argument('<request>', 'What the workflow should accomplish')
    .option('-m, --mode <mode>', 'Workflow mode (full, local)', 'full')
    .option('--json', 'Output as JSON')
    .action(async (request: string, options: { mode: string; json?: boolean }) => {
      await runWithProgress(
        'Evaluating request...',
        (coordinator, signal) => coordinator.start(request, { mode: options.mode, signal }),
        options.json,
      );
    });
}

/**
 * Create the resume command
 */
export function createResumeCommand(): Command {
  return new Command('resume')
    .description('Resume an interrupted workflow')
    .argument('<id>', 'Workflow id')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: { json?: boolean }) => {
      await runWithProgress(
        `Resuming ${id}...`,
        (coordinator, signal) => coordinator.resume(id, { signal }),
        options.json,
      );
    });
}

/**
 * Create the rerun command
 */
export function createRerunCommand(): Command {
  return new Command('rerun')
    .description('Re-run a failed stage and continue the workflow')
    .argument('<id>', 'Workflow id')
    .argument('<stage>', 'Stage to re-run')
    .option('--json', 'Output as JSON')
    .action(async (id: string, stage: string, options: { json?: boolean }) => {
      await runWithProgress(
        `Re-running ${stage}...`,
        (coordinator, signal) => coordinator.rerun(id, stage, { signal }),
        options.json,
      );
    });
}
