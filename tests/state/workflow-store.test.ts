/**
 * Workflow Store tests — ids, persistence and listing.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  createWorkflowStore,
  generateWorkflowId,
  isWorkflowId,
  WorkflowStore,
} from '../../src/state/workflow-store.js';
import { StoreIOError, WorkflowNotFoundError } from '../../src/pipeline/errors.js';

describe('generateWorkflowId', () => {
  it('should embed the UTC timestamp and a random suffix', () => {
    const id = generateWorkflowId(new Date('2026-03-04T05:06:07.000Z'));

    expect(id).toMatch(/^wf-20260304050607-[0-9a-f]{8}$/);
    expect(isWorkflowId(id)).toBe(true);
    expect(isWorkflowId('wf-1')).toBe(false);
  });
});

describe('WorkflowStore', () => {
  let stateDir: string;
  let store: WorkflowStore;

  beforeEach(() => {
    stateDir = mkdtempSync(join(tmpdir(), 'relaywright-workflows-'));
    store = createWorkflowStore(stateDir);
  });

  afterEach(() => {
    rmSync(stateDir, { recursive: true, force: true });
  });

  it('should create a pending workflow and load it back', async () => {
    const workflow = await store.create('Add retries', 'local');

    expect(workflow.status).toBe('pending');
    expect(workflow.mode).toBe('local');
    expect(workflow.current_stage).toBeNull();
    expect(isWorkflowId(workflow.id)).toBe(true);
    expect((await store.load(workflow.id))?.request).toBe('Add retries');
  });

  it('should accept a caller-supplied id', async () => {
    const workflow = await store.create('Add retries', 'full', 'ticket-42');
    expect((await store.get('ticket-42')).id).toBe(workflow.id);
  });

  it('should reject unsafe ids', async () => {
    await expect(store.create('x', 'full', '../escape')).rejects.toBeInstanceOf(StoreIOError);
    expect(await store.load('../escape')).toBeNull();
  });

  it('should apply updates and clear fields set to undefined', async () => {
    const workflow = await store.create('Add retries');
    await store.update(workflow.id, { status: 'failed', reason: 'boom', failed_stage: 'research' });
    const cleared = await store.update(workflow.id, { status: 'running', reason: undefined, failed_stage: undefined });

    expect(cleared.status).toBe('running');
    expect(cleared.reason).toBeUndefined();
    expect((await store.get(workflow.id)).failed_stage).toBeUndefined();
  });

  it('should throw WorkflowNotFoundError for a missing workflow', async () => {
    await expect(store.get('wf-missing')).rejects.toBeInstanceOf(WorkflowNotFoundError);
  });

  it('should list workflows newest first', async () => {
    await store.create('first', 'full', 'wf-a');
    await new Promise((resolve) => setTimeout(resolve, 5));
    await store.create('second', 'full', 'wf-b');

    expect((await store.list()).map((w) => w.id)).toEqual(['wf-b', 'wf-a']);
  });

  it('should list nothing before any workflow exists', async () => {
    expect(await store.list()).toEqual([]);
  });

  it('should surface a corrupt record as a store error', async () => {
    mkdirSync(join(stateDir, 'workflows'), { recursive: true });
    writeFileSync(join(stateDir, 'workflows', 'wf-bad.json'), '{ not json');

    await expect(store.load('wf-bad')).rejects.toBeInstanceOf(StoreIOError);
  });
});
