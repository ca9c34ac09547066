/**
 * Status commands
 * Inspect workflows and their execution logs
 */

import { Command } from 'commander';
import { ArtifactStore } from '../../pipeline/artifact-store.js';
import { computeProgress } from '../../pipeline/progress.js';
import { WorkflowStore } from '../../state/workflow-store.js';
import { readExecutionLog, renderMarkdown } from '../../workflow/execution-log.js';
import { buildRegistry, loadCliContext, wantsJson } from '../context.js';
import {
  getStatusIcon,
  printInfo,
  printTable,
  printWorkflow,
  printWorkflowProgress,
} from '../output.js';

/**
 * Create the status command
 */
export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show workflow status and artifacts')
    .argument('<id>', 'Workflow id')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: { json?: boolean }) => {
      const context = await loadCliContext();
      const workflow = await new WorkflowStore(context.stateDir).get(id);
      const artifacts = await new ArtifactStore({ stateDir: context.stateDir }).list(id);
      const progress = computeProgress(workflow, artifacts, buildRegistry(context.config).names());

      if (wantsJson(options.json, context)) {
        console.log(JSON.stringify({ workflow, artifacts, progress }, null, 2));
        return;
      }
      printWorkflow(workflow, artifacts);
      printWorkflowProgress(progress);
    });
}

/**
 * Create the list command
 */
export function createListCommand(): Command {
  return new Command('list')
    .description('List workflows, newest first')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      const context = await loadCliContext();
      const workflows = await new WorkflowStore(context.stateDir).list();

      if (wantsJson(options.json, context)) {
        console.log(JSON.stringify(workflows, null, 2));
        return;
      }
      if (workflows.length === 0) {
        printInfo('No workflows yet. Run "relaywright start <request>" to create one.');
        return;
      }
      printTable(
        ['ID', 'STATUS', 'CREATED', 'REQUEST'],
        workflows.map((w) => [
          w.id,
          w.status,
          w.created_at,
          w.request.length > 50 ? `${w.request.slice(0, 47)}...` : w.request,
        ]),
      );
    });
}

/**
 * Create the log command
 */
export function createLogCommand(): Command {
  return new Command('log')
    .description('Show a workflow execution log')
    .argument('<id>', 'Workflow id')
    .option('--json', 'Output raw events as JSON')
    .action(async (id: string, options: { json?: boolean }) => {
      const context = await loadCliContext();
      const workflow = await new WorkflowStore(context.stateDir).get(id);
      const log = await readExecutionLog(context.stateDir, id, workflow.mode);

      if (wantsJson(options.json, context)) {
        console.log(JSON.stringify(log, null, 2));
        return;
      }
      if (log.events.length === 0) {
        printInfo(`${getStatusIcon(workflow.status)} No events recorded for ${id}`);
        return;
      }
      console.log(renderMarkdown(log));
    });
}
