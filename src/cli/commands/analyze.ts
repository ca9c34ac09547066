/**
 * Analyze commands
 * Bypass detection over execution logs and alignment statistics
 */

import { Command } from 'commander';
import path from 'node:path';
import type { Finding, Pattern } from '../../pipeline/types.js';
import { ArtifactStore } from '../../pipeline/artifact-store.js';
import { AlignmentHistory } from '../../pipeline/alignment-history.js';
import { WorkflowStore } from '../../state/workflow-store.js';
import { listLoggedWorkflows, readExecutionLog } from '../../workflow/execution-log.js';
import { analyze, hasCritical } from '../../workflow/bypass-detector.js';
import { defaultPatterns, loadPatterns } from '../../workflow/bypass-patterns.js';
import { buildRegistry, EXIT_CODES, loadCliContext, wantsJson, type CliContext } from '../context.js';
import {
  printFindings,
  printHeader,
  printKeyValue,
  printProgress,
  printWarning,
  startSpinner,
  succeedSpinner,
} from '../output.js';

interface AnalyzeCommandOptions {
  since?: string;
  until?: string;
  json?: boolean;
}

function parseDate(label: string, value: string | undefined): number | null {
  if (value === undefined) return null;
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new Error(`Invalid --${label} date: ${value}`);
  }
  return time;
}

async function patternsFor(context: CliContext): Promise<Pattern[]> {
  const patterns = defaultPatterns(context.config.detector.modes);
  const extraFile = context.config.detector.patterns_file;
  if (extraFile) {
    patterns.push(...await loadPatterns(path.resolve(context.cwd, extraFile)));
  }
  return patterns;
}

/**
 * Create the analyze command
 */
export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Detect workflow bypasses in execution logs')
    .argument('[ids...]', 'Workflow ids (default: every logged workflow)')
    .option('--since <date>', 'Only workflows created at or after this date')
    .option('--until <date>', 'Only workflows created before this date')
    .option('--json', 'Output as JSON')
    .action(async (ids: string[], options: AnalyzeCommandOptions) => {
      const context = await loadCliContext();
      const json = wantsJson(options.json, context);
      const since = parseDate('since', options.since);
      const until = parseDate('until', options.until);
      const patterns = await patternsFor(context);
      const stages = buildRegistry(context.config).all();
      const workflows = new WorkflowStore(context.stateDir);
      const artifacts = new ArtifactStore({ stateDir: context.stateDir });

      const targets = ids.length > 0 ? ids : await listLoggedWorkflows(context.stateDir);
      if (!json) startSpinner(`Analyzing ${targets.length} workflow(s)...`);

      const findings: Finding[] = [];
      for (const id of targets) {
        const workflow = await workflows.load(id);
        if (workflow) {
          const created = Date.parse(workflow.created_at);
          if (since !== null && created < since) continue;
          if (until !== null && created >= until) continue;
        } else if (since !== null || until !== null) {
          continue;
        }

        const log = await readExecutionLog(context.stateDir, id, workflow?.mode ?? 'full');
        findings.push(...await analyze(log, patterns, {
          stages,
          resolveArtifact: (ref) => artifacts.resolve(ref),
        }));
      }

      if (json) {
        console.log(JSON.stringify(findings, null, 2));
      } else {
        succeedSpinner('Analysis complete');
        printFindings(findings);
        if (hasCritical(findings)) {
          printWarning('Critical findings require human review');
        }
      }
      process.exitCode = hasCritical(findings) ? EXIT_CODES.STAGE_FAILURE : EXIT_CODES.SUCCESS;
    });
}

/**
 * Create the alignment-stats command
 */
export function createAlignmentStatsCommand(): Command {
  return new Command('alignment-stats')
    .description('Show policy gate decision statistics')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      const context = await loadCliContext();
      const stats = await new AlignmentHistory(context.stateDir).getStats();

      if (wantsJson(options.json, context)) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      printHeader('Alignment Statistics');
      printKeyValue('Decisions', stats.total_decisions);
      printKeyValue('Approved', stats.approved_count);
      printKeyValue('Rejected', stats.rejected_count);
      printKeyValue('Average confidence', stats.average_confidence.toFixed(2));
      printKeyValue('With violations', stats.violation_count);
      printProgress(stats.approved_count, stats.total_decisions, 'approval rate');
    });
}
