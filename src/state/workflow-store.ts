/**
 * Workflow Store
 * Durable workflow records, one JSON file per workflow
 */

import { randomBytes } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { WorkflowSchema, type Workflow } from '../pipeline/types.js';
import { StoreIOError, WorkflowNotFoundError } from '../pipeline/errors.js';
import { readJsonFile, writeJsonFileAtomic } from './persistence.js';

export const WORKFLOWS_DIR = 'workflows';

const WORKFLOW_ID = /^wf-\d{14}-[0-9a-f]{8}$/;
const SAFE_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Generate a workflow id: wf-<yyyymmddHHMMss>-<8 hex>, UTC
 */
export function generateWorkflowId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:T]/g, '').slice(0, 14);
  return `wf-${stamp}-${randomBytes(4).toString('hex')}`;
}

export function isWorkflowId(value: string): boolean {
  return WORKFLOW_ID.test(value);
}

export type WorkflowUpdate = Partial<Omit<Workflow, 'id' | 'request' | 'created_at' | 'updated_at'>>;

export class WorkflowStore {
  private readonly dir: string;

  constructor(stateDir: string) {
    this.dir = path.join(stateDir, WORKFLOWS_DIR);
  }

  /**
   * Create and persist a pending workflow
   */
  async create(request: string, mode = 'full', id?: string): Promise<Workflow> {
    const now = new Date();
    const workflowId = id ?? generateWorkflowId(now);
    if (!SAFE_ID.test(workflowId) || workflowId.includes('..')) {
      throw new StoreIOError('create workflow', workflowId, new Error('unsafe workflow id'));
    }
    const workflow: Workflow = {
      id: workflowId,
      request,
      mode,
      status: 'pending',
      current_stage: null,
      created_at: now.toISOString(),
      updated_at: now.toISOString(),
    };
    await this.save(workflow);
    return workflow;
  }

  /**
   * Persist a workflow record, stamping updated_at
   */
  async save(workflow: Workflow): Promise<Workflow> {
    const toSave = WorkflowSchema.parse({ ...workflow, updated_at: new Date().toISOString() });
    await writeJsonFileAtomic(this.filePath(toSave.id), toSave);
    return toSave;
  }

  /**
   * Apply a partial update. Clearing `reason`/`failed_stage` takes an
   * explicit undefined.
   */
  async update(id: string, update: WorkflowUpdate): Promise<Workflow> {
    const current = await this.get(id);
    return this.save({ ...current, ...update });
  }

  /** Load a workflow or null */
  async load(id: string): Promise<Workflow | null> {
    if (!SAFE_ID.test(id) || id.includes('..')) return null;
    return readJsonFile(this.filePath(id), WorkflowSchema);
  }

  /** Load a workflow or throw WorkflowNotFoundError */
  async get(id: string): Promise<Workflow> {
    const workflow = await this.load(id);
    if (!workflow) {
      throw new WorkflowNotFoundError(id);
    }
    return workflow;
  }

  /** All workflows, newest first */
  async list(): Promise<Workflow[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw new StoreIOError('list', this.dir, error);
    }

    const workflows: Workflow[] = [];
    for (const file of files) {
      if (!file.endsWith('.json')) continue;
      const workflow = await this.load(file.slice(0, -'.json'.length));
      if (workflow) workflows.push(workflow);
    }
    return workflows.sort((a, b) => b.created_at.localeCompare(a.created_at) || b.id.localeCompare(a.id));
  }

  private filePath(id: string): string {
    return path.join(this.dir, `${id}.json`);
  }
}

/** Factory function */
export function createWorkflowStore(stateDir: string): WorkflowStore {
  return new WorkflowStore(stateDir);
}
