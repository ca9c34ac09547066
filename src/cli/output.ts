/**
 * CLI output utilities
 * Handles formatted output, spinners, and progress display
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { OutputSettings } from '../config/index.js';
import type { WorkflowProgress } from '../pipeline/progress.js';
import type { Artifact, Finding, Workflow } from '../pipeline/types.js';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

type OutputLevel = OutputSettings['log_level'];

const LEVEL_ORDER: Record<OutputLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Messages below this level are not printed. Errors always print.
 */
let outputLevel: OutputLevel = 'info';

/**
 * Set the minimum level printed by the message helpers
 */
export function setOutputLevel(level: OutputLevel): void {
  outputLevel = level;
}

function shouldPrint(level: OutputLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[outputLevel];
}

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/**
 * Start a spinner with a message
 *
 * @param message - Initial message
 * @returns Spinner instance
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

/**
 * Update spinner message
 *
 * @param message - New message
 */
export function updateSpinner(message: string): void {
  if (spinner) {
    spinner.text = message;
  }
}

/**
 * Stop spinner with success
 *
 * @param message - Success message
 */
export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

/**
 * Stop spinner with failure
 *
 * @param message - Failure message
 */
export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

/**
 * Stop spinner without status
 */
export function stopSpinner(): void {
  if (spinner) {
    spinner.stop();
    spinner = null;
  }
}

/**
 * Print a header
 *
 * @param title - Header title
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

/**
 * Print a section header
 *
 * @param title - Section title
 */
export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

/**
 * Print a warning message
 *
 * @param message - Warning message
 */
export function printWarning(message: string): void {
  if (!shouldPrint('warn')) return;
  console.log(theme.warning(`[WARN] ${message}`));
}

/**
 * Print an error message
 *
 * @param message - Error message
 */
export function printError(message: string): void {
  console.log(theme.error(`[ERROR] ${message}`));
}

/**
 * Print an info message
 *
 * @param message - Info message
 */
export function printInfo(message: string): void {
  if (!shouldPrint('info')) return;
  console.log(theme.info(`[INFO] ${message}`));
}

/**
 * Print a debug message
 *
 * @param message - Debug message
 */
export function printDebug(message: string): void {
  if (!shouldPrint('debug')) return;
  console.log(theme.dim(`[DEBUG] ${message}`));
}

/**
 * Print a key-value pair
 *
 * @param key - Key
 * @param value - Value
 */
export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

function printListItem(item: string, indent: number): void {
  console.log(theme.secondary(`${'  '.repeat(indent)}- `) + item);
}

/**
 * Get status icon
 *
 * @param status - Workflow or artifact status
 * @returns Status icon
 */
export function getStatusIcon(status: string): string {
  switch (status) {
    case 'completed':
      return theme.success('[OK]');
    case 'running':
      return theme.warning('[..]');
    case 'blocked':
      return theme.warning('[!!]');
    case 'failed':
      return theme.error('[X]');
    default:
      return theme.dim('[ ]');
  }
}

/**
 * Print workflow summary with its current artifacts
 */
export function printWorkflow(workflow: Workflow, artifacts: Artifact[] = []): void {
  printHeader(`Workflow: ${workflow.id}`);

  printKeyValue('Request', workflow.request);
  printKeyValue('Mode', workflow.mode);
  printKeyValue('Status', `${getStatusIcon(workflow.status)} ${workflow.status}`);
  if (workflow.current_stage) {
    printKeyValue('Current stage', workflow.current_stage);
  }
  printKeyValue('Created', workflow.created_at);
  printKeyValue('Updated', workflow.updated_at);

  if (workflow.reason) {
    printSection('Reason');
    if (workflow.status === 'failed') {
      printError(workflow.reason);
    } else {
      printWarning(workflow.reason);
    }
  }

  if (artifacts.length > 0) {
    printSection('Artifacts');
    for (const artifact of artifacts) {
      const attempts = artifact.attempts > 1 ? theme.dim(` (${artifact.attempts} attempts)`) : '';
      console.log(`  ${getStatusIcon(artifact.status)} ${artifact.stage_name} ${theme.dim(`gen ${artifact.generation}`)}${attempts}`);
      if (artifact.failure) {
        printListItem(`${artifact.failure.kind}: ${artifact.failure.reason}`, 2);
      }
    }
  }
}

function formatDuration(ms: number): string {
  const seconds = Math.round(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

/**
 * Print how far a workflow has got and how long the rest should take
 */
export function printWorkflowProgress(progress: WorkflowProgress): void {
  printSection('Progress');
  const done = progress.completed.length + progress.failed.length;
  printProgress(done, progress.total, `${done}/${progress.total} stages`);
  if (progress.running.length > 0) {
    printKeyValue('Running', progress.running.join(', '));
  }
  if (progress.pending.length > 0) {
    printKeyValue('Pending', progress.pending.join(', '));
  }
  if (progress.skipped.length > 0) {
    printKeyValue('Skipped', progress.skipped.join(', '));
  }
  if (progress.average_duration_ms !== null) {
    printKeyValue('Average stage time', formatDuration(progress.average_duration_ms));
  }
  if (progress.estimated_remaining_ms !== null && done < progress.total) {
    printKeyValue('Estimated remaining', formatDuration(progress.estimated_remaining_ms));
  }
}

/**
 * Print bypass findings
 */
export function printFindings(findings: Finding[]): void {
  if (findings.length === 0) {
    console.log(theme.success('[OK] No bypass findings'));
    return;
  }

  for (const finding of findings) {
    const color = finding.severity === 'critical' ? theme.error
      : finding.severity === 'warning' ? theme.warning : theme.info;
    console.log();
    console.log(`${color(`[${finding.severity.toUpperCase()}]`)} ${theme.highlight(finding.pattern_id)} ${finding.title}`);
    printKeyValue('Workflow', finding.workflow_id);
    for (const line of finding.evidence) {
      printListItem(line, 1);
    }
    console.log(`  ${theme.secondary('Fix:')} ${finding.suggested_fix}`);
  }
}

/**
 * Print progress bar
 *
 * @param current - Current value
 * @param total - Total value
 * @param label - Label
 */
export function printProgress(current: number, total: number, label?: string): void {
  const percent = total > 0 ? Math.round((current / total) * 100) : 0;
  const barWidth = 30;
  const filled = Math.round((percent / 100) * barWidth);
  const empty = barWidth - filled;

  const bar = theme.success('#'.repeat(filled)) + theme.dim('-'.repeat(empty));
  const percentStr = `${percent}%`.padStart(4);

  console.log(`  [${bar}] ${percentStr}${label ? ` - ${label}` : ''}`);
}

/**
 * Print a table
 *
 * @param headers - Table headers
 * @param rows - Table rows
 */
export function printTable(headers: string[], rows: string[][]): void {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const maxRow = Math.max(...rows.map((r) => (r[i] || '').length));
    return Math.max(h.length, maxRow);
  });

  // Print header
  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  console.log(theme.highlight(headerLine));
  console.log(theme.dim('-'.repeat(headerLine.length)));

  // Print rows
  for (const row of rows) {
    const rowLine = row.map((cell, i) => (cell || '').padEnd(widths[i])).join('  ');
    console.log(rowLine);
  }
}

