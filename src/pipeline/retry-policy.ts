/**
 * Retry Policy — transient-error classification and bounded backoff.
 *
 * maxAttempts counts every attempt including the first.
 * Delay before retry n (1-based) is baseDelayMs * 2^(n-1), capped at
 * maxDelayMs, then jittered by ±50%.
 */

import {
  RelaywrightError,
  StageTimeoutError,
  TransientWorkerError,
  WorkflowCancelledError,
} from './errors.js';

// ─── Types ───────────────────────────────────────────────

export interface RetryPolicyConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryDecision {
  retry: boolean;
  delayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryPolicyConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
};

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN']);
const TRANSIENT_MESSAGE = /\b(?:500|502|503|504)\b|timed? ?out|rate limit|temporarily unavailable/i;

// ─── Classification ──────────────────────────────────────

/**
 * Whether an error from a worker is worth retrying.
 * Schema and quality-gate failures are never transient.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof StageTimeoutError || error instanceof TransientWorkerError) return true;
  if (error instanceof RelaywrightError) return false;
  if (!(error instanceof Error)) return false;
  if (error.name === 'TimeoutError') return true;

  if ('code' in error && typeof error.code === 'string' && TRANSIENT_CODES.has(error.code)) return true;

  return TRANSIENT_MESSAGE.test(error.message);
}

// ─── Policy ──────────────────────────────────────────────

export class RetryPolicy {
  readonly config: RetryPolicyConfig;
  private readonly random: () => number;

  constructor(config: Partial<RetryPolicyConfig> = {}, random: () => number = Math.random) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.random = random;
  }

  /** Delay before the given retry (1 = first retry), jitter applied */
  delayFor(retry: number): number {
    const exponential = this.config.baseDelayMs * Math.pow(2, retry - 1);
    const capped = Math.min(this.config.maxDelayMs, exponential);
    // ±50%
    return Math.round(capped * (0.5 + this.random()));
  }

  /** Decide after a failed attempt (1-based) */
  shouldRetry(error: unknown, attempt: number): RetryDecision {
    if (!isTransientError(error) || attempt >= this.config.maxAttempts) {
      return { retry: false, delayMs: 0 };
    }
    return { retry: true, delayMs: this.delayFor(attempt) };
  }
}

/**
 * Wait for a delay, rejecting with WorkflowCancelledError if the signal
 * aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new WorkflowCancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new WorkflowCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
