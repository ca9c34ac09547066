/**
 * Shell Stage Worker — runs an external program per stage.
 *
 * Protocol: StageInput JSON on stdin, StageOutput JSON on stdout.
 * Exit code 75 (EX_TEMPFAIL) asks for a retry; any other non-zero exit
 * is a permanent worker error.
 *
 * Safety: command sanitization, stream caps, kill on abort.
 */

import { spawn } from 'node:child_process';

import { StageOutputSchema, type StageInput, type StageOutput } from './types.js';
import { StageConfigurationError, StageValidationError, TransientWorkerError } from './errors.js';
import type { StageWorker } from './stage-worker.js';

// ─── Constants ───────────────────────────────────────────

export const TEMPFAIL_EXIT_CODE = 75;

/** Max stdout/stderr capture in bytes */
const MAX_OUTPUT_SIZE = 1024 * 1024; // 1 MB

const STDERR_SUMMARY_LENGTH = 2000;

/** Dangerous command patterns to reject */
const DANGEROUS_PATTERNS = [
  /rm\s+-rf\s+\//,
  /sudo\s+/,
  />\s*\/dev\//,
  />\s*\/etc\//,
  />\s*\/usr\//,
  /;\s*rm\s/,
  /&&\s*rm\s/,
  /\|\s*sh$/,
  /\|\s*bash$/,
];

// ─── Command Sanitization ────────────────────────────────

export function sanitizeCommand(command: string): { safe: boolean; reason?: string } {
  for (const pattern of DANGEROUS_PATTERNS) {
    if (pattern.test(command)) {
      return { safe: false, reason: `Matches dangerous pattern: ${pattern.source}` };
    }
  }
  return { safe: true };
}

function summarize(stderr: string): string {
  const trimmed = stderr.trim();
  return trimmed.length > STDERR_SUMMARY_LENGTH
    ? `${trimmed.slice(-STDERR_SUMMARY_LENGTH)} (truncated)`
    : trimmed;
}

/** Parse worker stdout: the whole output, or failing that its last line */
export function parseStageOutput(stageName: string, stdout: string): StageOutput {
  const trimmed = stdout.trim();
  const candidates = [trimmed, trimmed.split('\n').pop() ?? ''];

  let lastProblem = 'no output';
  for (const candidate of candidates) {
    if (!candidate) continue;
    let data: unknown;
    try {
      data = JSON.parse(candidate);
    } catch (error) {
      lastProblem = `stdout is not JSON: ${error instanceof Error ? error.message : String(error)}`;
      continue;
    }
    const parsed = StageOutputSchema.safeParse(data);
    if (parsed.success) return parsed.data;
    throw new StageValidationError(
      stageName,
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  throw new StageValidationError(stageName, [lastProblem]);
}

// ─── Worker ──────────────────────────────────────────────

export interface ShellStageWorkerOptions {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export class ShellStageWorker implements StageWorker {
  private readonly options: ShellStageWorkerOptions;

  constructor(options: ShellStageWorkerOptions) {
    const { safe, reason } = sanitizeCommand([options.command, ...(options.args ?? [])].join(' '));
    if (!safe) {
      throw new StageConfigurationError([`Command rejected: ${reason}`]);
    }
    this.options = options;
  }

  invoke(input: StageInput, signal: AbortSignal): Promise<StageOutput> {
    return new Promise<StageOutput>((resolve, reject) => {
      const child = spawn(this.options.command, this.options.args ?? [], {
        cwd: this.options.cwd,
        env: {
          ...process.env,
          ...this.options.env,
          RELAYWRIGHT_WORKFLOW_ID: input.workflow_id,
          RELAYWRIGHT_STAGE: input.stage_name,
        },
        signal,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let overflow = false;

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => {
        if (stdout.length + chunk.length > MAX_OUTPUT_SIZE) {
          overflow = true;
          child.kill('SIGTERM');
          return;
        }
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        if (stderr.length < MAX_OUTPUT_SIZE) stderr += chunk;
      });

      // A worker may exit without reading its input; the exit code decides
      child.stdin.on('error', (error) => {
        stderr += `\n[stdin] ${error.message}`;
      });

      child.on('error', reject);
      child.on('close', (code) => {
        if (signal.aborted) {
          reject(signal.reason instanceof Error ? signal.reason : new Error('aborted'));
          return;
        }
        if (overflow) {
          reject(new Error(`Stage worker for ${input.stage_name} exceeded ${MAX_OUTPUT_SIZE} bytes of output`));
          return;
        }
        if (code === TEMPFAIL_EXIT_CODE) {
          reject(new TransientWorkerError(
            `Stage worker for ${input.stage_name} reported a temporary failure: ${summarize(stderr)}`,
          ));
          return;
        }
        if (code !== 0) {
          reject(new Error(`Stage worker for ${input.stage_name} exited with code ${code ?? 'null'}: ${summarize(stderr)}`));
          return;
        }
        try {
          resolve(parseStageOutput(input.stage_name, stdout));
        } catch (error) {
          reject(error);
        }
      });

      child.stdin.end(JSON.stringify(input));
    });
  }
}
