/**
 * Artifact Store — immutable, versioned stage outputs keyed by
 * (workflow_id, stage_name).
 *
 * Every write creates a new generation file; nothing already on disk is
 * rewritten. The current artifact for a key is its highest generation.
 * A per-workflow index.jsonl records durable write order.
 */

import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import {
  ArtifactSchema,
  ArtifactIndexEntrySchema,
  type Artifact,
  type ArtifactIndexEntry,
  type ArtifactRef,
  type NewArtifact,
} from './types.js';
import { ArtifactExistsError, StageValidationError, StoreIOError } from './errors.js';
import { appendJsonLine, readJsonFile, writeJsonFileAtomic } from '../state/persistence.js';

// ─── Constants ───────────────────────────────────────────

const ARTIFACTS_DIR = 'artifacts';
const INDEX_FILE = 'index.jsonl';
const SAFE_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

// ─── Helper Functions ────────────────────────────────────

/** JSON with object keys sorted, so equal payloads hash equally */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => canonicalJson(v)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function computeSha256(content: string): string {
  return createHash('sha256').update(content, 'utf-8').digest('hex');
}

function assertSafeSegment(kind: string, value: string): void {
  if (!SAFE_SEGMENT.test(value) || value.includes('..')) {
    throw new StoreIOError('address', `${kind} "${value}"`, new Error('unsafe path segment'));
  }
}

function isNotFound(error: unknown): boolean {
  return (error as NodeJS.ErrnoException | undefined)?.code === 'ENOENT';
}

// ─── Artifact Store ──────────────────────────────────────

export interface PutOptions {
  /** Replace a completed artifact. Only the explicit re-run path sets this. */
  supersede?: boolean;
}

export interface ArtifactStoreOptions {
  stateDir: string;
}

export class ArtifactStore {
  private readonly rootDir: string;
  private readonly keyLocks = new Map<string, Promise<unknown>>();

  constructor(options: ArtifactStoreOptions) {
    this.rootDir = path.join(options.stateDir, ARTIFACTS_DIR);
  }

  /**
   * Durably write a new artifact generation.
   * Rejects with ArtifactExistsError when the current artifact for the key
   * is completed and `supersede` is not set.
   */
  async put(artifact: NewArtifact, options: PutOptions = {}): Promise<Artifact> {
    assertSafeSegment('workflow id', artifact.workflow_id);
    assertSafeSegment('stage name', artifact.stage_name);

    const key = `${artifact.workflow_id}/${artifact.stage_name}`;
    return this.withKeyLock(key, async () => {
      const current = await this.get(artifact.workflow_id, artifact.stage_name);
      if (current?.status === 'completed' && !options.supersede) {
        throw new ArtifactExistsError(artifact.workflow_id, artifact.stage_name);
      }

      const record: Artifact = {
        ...artifact,
        generation: (current?.generation ?? 0) + 1,
        sha256: computeSha256(canonicalJson(artifact.payload)),
        created_at: new Date().toISOString(),
      };

      const parsed = ArtifactSchema.safeParse(record);
      if (!parsed.success) {
        throw new StageValidationError(
          artifact.stage_name,
          parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
        );
      }

      const filePath = path.join(this.stageDir(record.workflow_id, record.stage_name), `${record.generation}.json`);
      await writeJsonFileAtomic(filePath, record, 'write artifact');

      const indexEntry: ArtifactIndexEntry = {
        stage_name: record.stage_name,
        generation: record.generation,
        sha256: record.sha256,
        written_at: record.created_at,
      };
      await appendJsonLine(path.join(this.workflowDir(record.workflow_id), INDEX_FILE), indexEntry, 'append index');

      return record;
    });
  }

  /** Current (highest generation) artifact for a key, or null */
  async get(workflowId: string, stageName: string): Promise<Artifact | null> {
    const generations = await this.listGenerations(workflowId, stageName);
    if (generations.length === 0) return null;
    return this.requireGeneration(workflowId, stageName, generations[generations.length - 1]);
  }

  /** Every generation of a key, oldest first */
  async history(workflowId: string, stageName: string): Promise<Artifact[]> {
    const generations = await this.listGenerations(workflowId, stageName);
    const artifacts: Artifact[] = [];
    for (const generation of generations) {
      artifacts.push(await this.requireGeneration(workflowId, stageName, generation));
    }
    return artifacts;
  }

  /**
   * Current artifact of each stage, in the order they were durably written.
   * Keys missing from the index (crash between write and index append)
   * are appended last, by creation time.
   */
  async list(workflowId: string): Promise<Artifact[]> {
    assertSafeSegment('workflow id', workflowId);
    const stageNames = await this.listStageNames(workflowId);
    const current = new Map<string, Artifact>();
    for (const stageName of stageNames) {
      const artifact = await this.get(workflowId, stageName);
      if (artifact) current.set(stageName, artifact);
    }

    const order = await this.readIndex(workflowId);
    const position = new Map<string, number>();
    order.forEach((entry, i) => {
      const artifact = current.get(entry.stage_name);
      if (artifact && artifact.generation === entry.generation) {
        position.set(entry.stage_name, i);
      }
    });

    return [...current.values()].sort((a, b) => {
      const pa = position.get(a.stage_name);
      const pb = position.get(b.stage_name);
      if (pa !== undefined && pb !== undefined) return pa - pb;
      if (pa !== undefined) return -1;
      if (pb !== undefined) return 1;
      return a.created_at.localeCompare(b.created_at);
    });
  }

  /** Check that an artifact's payload still matches its recorded hash */
  verify(artifact: Artifact): boolean {
    return computeSha256(canonicalJson(artifact.payload)) === artifact.sha256;
  }

  toRef(artifact: Artifact): ArtifactRef {
    return {
      workflow_id: artifact.workflow_id,
      stage_name: artifact.stage_name,
      generation: artifact.generation,
      status: artifact.status,
      sha256: artifact.sha256,
    };
  }

  /** Resolve a compact reference back to the exact generation it names */
  async resolve(ref: ArtifactRef): Promise<Artifact | null> {
    assertSafeSegment('workflow id', ref.workflow_id);
    assertSafeSegment('stage name', ref.stage_name);
    return this.readGeneration(ref.workflow_id, ref.stage_name, ref.generation);
  }

  // ─── Internals ─────────────────────────────────────────

  private workflowDir(workflowId: string): string {
    return path.join(this.rootDir, workflowId);
  }

  private stageDir(workflowId: string, stageName: string): string {
    return path.join(this.workflowDir(workflowId), stageName);
  }

  private async listStageNames(workflowId: string): Promise<string[]> {
    const dir = this.workflowDir(workflowId);
    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new StoreIOError('list', dir, error);
    }
  }

  private async listGenerations(workflowId: string, stageName: string): Promise<number[]> {
    assertSafeSegment('workflow id', workflowId);
    assertSafeSegment('stage name', stageName);
    const dir = this.stageDir(workflowId, stageName);
    try {
      const files = await fs.readdir(dir);
      return files
        .map((f) => /^(\d+)\.json$/.exec(f))
        .filter((m): m is RegExpExecArray => m !== null)
        .map((m) => Number.parseInt(m[1], 10))
        .sort((a, b) => a - b);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new StoreIOError('list', dir, error);
    }
  }

  private async readGeneration(
    workflowId: string,
    stageName: string,
    generation: number,
  ): Promise<Artifact | null> {
    const filePath = path.join(this.stageDir(workflowId, stageName), `${generation}.json`);
    return readJsonFile(filePath, ArtifactSchema);
  }

  private async requireGeneration(workflowId: string, stageName: string, generation: number): Promise<Artifact> {
    const artifact = await this.readGeneration(workflowId, stageName, generation);
    if (!artifact) {
      const filePath = path.join(this.stageDir(workflowId, stageName), `${generation}.json`);
      throw new StoreIOError('read artifact', filePath, new Error('artifact file disappeared'));
    }
    return artifact;
  }

  private async readIndex(workflowId: string): Promise<ArtifactIndexEntry[]> {
    const indexPath = path.join(this.workflowDir(workflowId), INDEX_FILE);
    let raw: string;
    try {
      raw = await fs.readFile(indexPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new StoreIOError('read index', indexPath, error);
    }

    const entries: ArtifactIndexEntry[] = [];
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      try {
        const parsed = ArtifactIndexEntrySchema.safeParse(JSON.parse(line));
        if (parsed.success) entries.push(parsed.data);
      } catch {
        // A torn trailing line from a crash mid-append; the artifact files are authoritative
      }
    }
    return entries;
  }

  /** Serialize writes per key within this process */
  private async withKeyLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.keyLocks.get(key) ?? Promise.resolve();
    const next = previous.catch(() => undefined).then(fn);
    this.keyLocks.set(key, next);
    try {
      return await next;
    } finally {
      if (this.keyLocks.get(key) === next) {
        this.keyLocks.delete(key);
      }
    }
  }
}

/** Factory function */
export function createArtifactStore(stateDir: string): ArtifactStore {
  return new ArtifactStore({ stateDir });
}
