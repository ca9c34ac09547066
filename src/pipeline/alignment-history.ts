/**
 * Alignment History — append-only record of every gate decision,
 * with aggregate statistics for reviewing how the policy is applied.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import { AlignmentRecordSchema, type AlignmentRecord } from './types.js';
import { StoreIOError } from './errors.js';
import { appendJsonLine } from '../state/persistence.js';

export const ALIGNMENT_HISTORY_FILE = 'alignment-history.jsonl';

export interface AlignmentStats {
  total_decisions: number;
  approved_count: number;
  rejected_count: number;
  /** 0.0 - 1.0 */
  approval_rate: number;
  average_confidence: number;
  /** Decisions that carried at least one violation */
  violation_count: number;
}

const EMPTY_STATS: AlignmentStats = {
  total_decisions: 0,
  approved_count: 0,
  rejected_count: 0,
  approval_rate: 0,
  average_confidence: 0,
  violation_count: 0,
};

export class AlignmentHistory {
  readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = path.join(stateDir, ALIGNMENT_HISTORY_FILE);
  }

  /** Append one decision */
  async track(record: AlignmentRecord): Promise<void> {
    const parsed = AlignmentRecordSchema.parse(record);
    await appendJsonLine(this.filePath, parsed, 'append alignment history');
  }

  /** All decisions, oldest first; malformed lines are skipped */
  async read(): Promise<AlignmentRecord[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw new StoreIOError('read alignment history', this.filePath, error);
    }

    const records: AlignmentRecord[] = [];
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      try {
        const parsed = AlignmentRecordSchema.safeParse(JSON.parse(line));
        if (parsed.success) records.push(parsed.data);
      } catch {
        // Skip malformed lines
      }
    }
    return records;
  }

  async getStats(): Promise<AlignmentStats> {
    const records = await this.read();
    if (records.length === 0) return { ...EMPTY_STATS };

    const total = records.length;
    const approved = records.filter((r) => r.aligned).length;
    return {
      total_decisions: total,
      approved_count: approved,
      rejected_count: total - approved,
      approval_rate: approved / total,
      average_confidence: records.reduce((sum, r) => sum + r.confidence, 0) / total,
      violation_count: records.filter((r) => r.violations.length > 0).length,
    };
  }
}

/** Factory function */
export function createAlignmentHistory(stateDir: string): AlignmentHistory {
  return new AlignmentHistory(stateDir);
}
