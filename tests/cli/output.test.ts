/**
 * CLI output tests — level filtering and progress display.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import {
  printDebug,
  printError,
  printFindings,
  printInfo,
  printWarning,
  printWorkflowProgress,
  setOutputLevel,
} from '../../src/cli/output.js';
import type { WorkflowProgress } from '../../src/pipeline/progress.js';

describe('output level', () => {
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    setOutputLevel('info');
    log.mockRestore();
  });

  it('should hide debug messages at the default level', () => {
    printDebug('hidden');
    printInfo('shown');
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(expect.stringContaining('[INFO] shown'));
  });

  it('should print debug messages at debug level', () => {
    setOutputLevel('debug');
    printDebug('state dir');
    expect(log).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] state dir'));
  });

  it('should keep only warnings and errors at warn level', () => {
    setOutputLevel('warn');
    printInfo('hidden');
    printWarning('careful');
    printError('broken');
    expect(log).toHaveBeenCalledTimes(2);
  });

  it('should always print errors', () => {
    setOutputLevel('error');
    printWarning('hidden');
    printError('broken');
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(expect.stringContaining('[ERROR] broken'));
  });
});

describe('printWorkflowProgress', () => {
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
  });

  it('should list running and pending stages with timing', () => {
    const progress: WorkflowProgress = {
      total: 3,
      completed: ['research'],
      failed: [],
      running: ['planning'],
      pending: ['implementation'],
      skipped: [],
      percent: 33,
      average_duration_ms: 65_000,
      estimated_remaining_ms: 90_000,
    };
    printWorkflowProgress(progress);

    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.includes('1/3 stages'))).toBe(true);
    expect(lines.some((line) => line.includes('planning'))).toBe(true);
    expect(lines.some((line) => line.includes('implementation'))).toBe(true);
    expect(lines.some((line) => line.includes('1m 5s'))).toBe(true);
    expect(lines.some((line) => line.includes('1m 30s'))).toBe(true);
  });
});

describe('printFindings', () => {
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
  });

  it('should report a clean result', () => {
    printFindings([]);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(expect.stringContaining('[OK] No bypass findings'));
  });

  it('should list evidence lines under each finding', () => {
    printFindings([{
      pattern_id: 'BP-034',
      severity: 'critical',
      workflow_id: 'wf-1',
      title: 'Stage output violated the artifact contract',
      evidence: ['#2 stage_failed [research]: Failed: research - invalid payload'],
      suggested_fix: 'Fix the worker',
    }]);
    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.includes('#2 stage_failed [research]: Failed: research - invalid payload'))).toBe(true);
  });
});
