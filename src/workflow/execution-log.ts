/**
 * Execution Log
 * Append-only JSONL record of everything a workflow did, one file per
 * workflow. Events carry compact artifact references, never content.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import {
  LogEventSchema,
  type ArtifactRef,
  type ExecutionLog,
  type LogEvent,
  type LogEventType,
  type LogLevel,
} from '../pipeline/types.js';
import { StoreIOError } from '../pipeline/errors.js';
import { appendJsonLine } from '../state/persistence.js';

export const LOGS_DIR = 'logs';

export interface LogOptions {
  level?: LogLevel;
  stage?: string;
  data?: Record<string, unknown>;
}

/**
 * Get the log file path for a workflow
 */
export function getLogPath(stateDir: string, workflowId: string): string {
  return path.join(stateDir, LOGS_DIR, `${workflowId}.jsonl`);
}

/**
 * Parse JSONL log content. Torn or malformed lines are skipped.
 */
export function parseLogLines(content: string): LogEvent[] {
  const events: LogEvent[] = [];
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    try {
      const parsed = LogEventSchema.safeParse(JSON.parse(line));
      if (parsed.success) events.push(parsed.data);
    } catch {
      // Skip malformed entries
    }
  }
  return events;
}

/**
 * Execution logger for one workflow. Appends are serialized so sequence
 * numbers match file order even when parallel stages log concurrently.
 */
export class ExecutionLogger {
  readonly workflowId: string;
  readonly filePath: string;
  private nextSeq: number | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(stateDir: string, workflowId: string) {
    this.workflowId = workflowId;
    this.filePath = getLogPath(stateDir, workflowId);
  }

  /**
   * Append an event. Resolves once the line is on disk.
   */
  log(event: LogEventType, message: string, options: LogOptions = {}): Promise<LogEvent> {
    const next = this.queue.catch(() => undefined).then(() => this.append(event, message, options));
    this.queue = next;
    return next;
  }

  async info(event: LogEventType, message: string, options: Omit<LogOptions, 'level'> = {}): Promise<void> {
    await this.log(event, message, { ...options, level: 'info' });
  }

  async warn(event: LogEventType, message: string, options: Omit<LogOptions, 'level'> = {}): Promise<void> {
    await this.log(event, message, { ...options, level: 'warn' });
  }

  async error(event: LogEventType, message: string, options: Omit<LogOptions, 'level'> = {}): Promise<void> {
    await this.log(event, message, { ...options, level: 'error' });
  }

  async success(event: LogEventType, message: string, options: Omit<LogOptions, 'level'> = {}): Promise<void> {
    await this.log(event, message, { ...options, level: 'success' });
  }

  /**
   * Log stage start
   */
  async stageStart(stage: string, attempt: number, inputs: ArtifactRef[]): Promise<void> {
    await this.info('stage_started', `Starting: ${stage}`, { stage, data: { attempt, inputs } });
  }

  /**
   * Log stage completion
   */
  async stageComplete(stage: string, artifact: ArtifactRef): Promise<void> {
    await this.success('stage_completed', `Completed: ${stage}`, { stage, data: { artifact } });
  }

  /**
   * Log stage failure
   */
  async stageFailed(stage: string, reason: string, data: Record<string, unknown> = {}): Promise<void> {
    await this.error('stage_failed', `Failed: ${stage} - ${reason}`, { stage, data: { ...data, reason } });
  }

  /** Record a terminal action taken after completion */
  async action(name: string, data: Record<string, unknown> = {}): Promise<void> {
    await this.info('action', `Action: ${name}`, { data: { ...data, action: name } });
  }

  /** Record a file a stage reported as changed */
  async fileChanged(stage: string, filePath: string): Promise<void> {
    await this.debug('file_changed', filePath, { stage, data: { path: filePath } });
  }

  async read(): Promise<LogEvent[]> {
    await this.queue.catch(() => undefined);
    return readLogEvents(this.filePath);
  }

  private async debug(event: LogEventType, message: string, options: Omit<LogOptions, 'level'>): Promise<void> {
    await this.log(event, message, { ...options, level: 'debug' });
  }

  private async append(event: LogEventType, message: string, options: LogOptions): Promise<LogEvent> {
    if (this.nextSeq === null) {
      const existing = await readLogEvents(this.filePath);
      this.nextSeq = existing.reduce((max, e) => Math.max(max, e.seq), 0) + 1;
    }

    const entry: LogEvent = {
      seq: this.nextSeq,
      timestamp: new Date().toISOString(),
      workflow_id: this.workflowId,
      event,
      level: options.level ?? 'info',
      ...(options.stage !== undefined ? { stage: options.stage } : {}),
      message,
      ...(options.data !== undefined ? { data: options.data } : {}),
    };

    await appendJsonLine(this.filePath, entry, 'append execution log');
    this.nextSeq++;
    return entry;
  }
}

// ─── Reading ─────────────────────────────────────────────

async function readLogEvents(filePath: string): Promise<LogEvent[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return [];
    throw new StoreIOError('read execution log', filePath, error);
  }
  return parseLogLines(content).sort((a, b) => a.seq - b.seq);
}

/**
 * Load a workflow's execution log for analysis
 */
export async function readExecutionLog(
  stateDir: string,
  workflowId: string,
  mode = 'full',
): Promise<ExecutionLog> {
  return {
    workflow_id: workflowId,
    mode,
    events: await readLogEvents(getLogPath(stateDir, workflowId)),
  };
}

/**
 * Workflow ids that have a log on disk, sorted
 */
export async function listLoggedWorkflows(stateDir: string): Promise<string[]> {
  const dir = path.join(stateDir, LOGS_DIR);
  try {
    const files = await fs.readdir(dir);
    return files
      .filter((f) => f.endsWith('.jsonl'))
      .map((f) => f.slice(0, -'.jsonl'.length))
      .sort();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return [];
    throw new StoreIOError('list execution logs', dir, error);
  }
}

// ─── Markdown Rendering ──────────────────────────────────

function getLevelIcon(level: LogLevel): string {
  switch (level) {
    case 'error':
      return '[ERROR]';
    case 'warn':
      return '[WARN]';
    case 'success':
      return '[OK]';
    case 'debug':
      return '[DEBUG]';
    default:
      return '[INFO]';
  }
}

/**
 * Format a log as markdown for humans
 */
export function renderMarkdown(log: ExecutionLog): string {
  const lines: string[] = [
    `# Execution Log: ${log.workflow_id}`,
    '',
    `Mode: ${log.mode}`,
    '',
    '---',
    '',
  ];

  const byDate = new Map<string, LogEvent[]>();
  for (const event of log.events) {
    const date = event.timestamp.split('T')[0];
    const bucket = byDate.get(date) ?? [];
    bucket.push(event);
    byDate.set(date, bucket);
  }

  for (const [date, events] of byDate) {
    lines.push(`## Session: ${date}`);
    lines.push('');

    for (const event of events) {
      const time = (event.timestamp.split('T')[1] ?? '').split('.')[0];
      const scope = event.stage ? ` **${event.stage}**` : '';
      lines.push(`### [${time}] ${getLevelIcon(event.level)}${scope} - ${event.message}`);

      if (event.data && Object.keys(event.data).length > 0) {
        lines.push('');
        lines.push('```json');
        lines.push(JSON.stringify(event.data, null, 2));
        lines.push('```');
      }
      lines.push('');
    }
  }

  lines.push('---');
  lines.push('');
  lines.push('## Summary Statistics');
  lines.push('');
  lines.push(`- **Total Entries:** ${log.events.length}`);
  lines.push(`- **Errors:** ${log.events.filter((e) => e.level === 'error').length}`);
  lines.push(`- **Warnings:** ${log.events.filter((e) => e.level === 'warn').length}`);
  lines.push(`- **Successful Steps:** ${log.events.filter((e) => e.level === 'success').length}`);
  lines.push('');

  return lines.join('\n');
}
