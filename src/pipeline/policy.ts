/**
 * Policy document — parsing and loading.
 *
 * The policy (PROJECT.md by default) is the strategic source of truth for
 * the pipeline: goals, scope in/out, constraints and pipeline settings.
 * It is read-only to the engine and parsed afresh on every evaluation.
 */

import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';

import type { Policy } from './types.js';
import { PolicyParseError } from './errors.js';

// ─── Constants ───────────────────────────────────────────

export const DEFAULT_POLICY_FILENAME = 'PROJECT.md';

type SectionName = 'GOALS' | 'SCOPE' | 'CONSTRAINTS' | 'PIPELINE';
type ScopeSide = 'in' | 'out';

const SECTION_NAMES: readonly SectionName[] = ['GOALS', 'SCOPE', 'CONSTRAINTS', 'PIPELINE'];

/** Explanatory tail after an item, e.g. "Payments — handled by partner" */
const ITEM_TAIL = /\s+(?:—|--|–)\s+.*$/;

// ─── Parsing ─────────────────────────────────────────────

function toSectionName(heading: string): SectionName | null {
  const upper = heading.trim().toUpperCase().replace(/\s+/g, '_');
  return SECTION_NAMES.find((s) => upper === s || upper.startsWith(`${s}_`)) ?? null;
}

function toScopeSide(label: string): ScopeSide | null {
  const lower = label.toLowerCase();
  if (/\bout\b|excluded|exclusions?|non-goals?/.test(lower)) return 'out';
  if (/\bin\b|included|inclusions?/.test(lower)) return 'in';
  return null;
}

function cleanItem(raw: string): string {
  return raw
    .replace(/\*\*|__|`/g, '')
    .replace(ITEM_TAIL, '')
    .trim();
}

/**
 * Parse a policy markdown document.
 *
 * Recognised layout:
 *   ## GOALS / ## SCOPE / ## CONSTRAINTS / ## PIPELINE
 *   SCOPE items split by "### In Scope" / "### Out of Scope" (or bold
 *   labels, or "IN:" / "OUT:" item prefixes); unlabelled scope items are
 *   in scope. Only top-level "- " bullets are items.
 *
 * Throws PolicyParseError when GOALS or SCOPE is missing.
 */
export function parsePolicy(content: string, source?: string): Policy {
  const found = new Set<SectionName>();
  const policy: Policy = {
    goals: [],
    scope_in: [],
    scope_out: [],
    constraints: [],
    skip_stages: [],
    source,
    sha256: createHash('sha256').update(content, 'utf-8').digest('hex'),
  };

  let section: SectionName | null = null;
  let side: ScopeSide = 'in';

  for (const line of content.split(/\r?\n/)) {
    const h2 = /^##\s+(.+?)\s*#*\s*$/.exec(line);
    if (h2) {
      section = toSectionName(h2[1]);
      side = 'in';
      if (section) found.add(section);
      continue;
    }
    if (/^#\s/.test(line)) {
      section = null;
      continue;
    }
    if (section === null) continue;

    const label = /^(?:###+\s+(.+?)|\*\*(.+?)\*\*:?)\s*$/.exec(line);
    if (label) {
      if (section === 'SCOPE') side = toScopeSide(label[1] ?? label[2] ?? '') ?? side;
      continue;
    }

    const bullet = /^[-*]\s+(.+)$/.exec(line);
    if (!bullet) continue;

    let text = bullet[1];
    switch (section) {
      case 'GOALS': {
        const item = cleanItem(text);
        if (item) policy.goals.push(item);
        break;
      }
      case 'CONSTRAINTS': {
        const item = cleanItem(text);
        if (item) policy.constraints.push(item);
        break;
      }
      case 'SCOPE': {
        let itemSide = side;
        const prefixed = /^(IN|OUT)\s*:\s*(.+)$/i.exec(text);
        if (prefixed) {
          itemSide = prefixed[1].toUpperCase() === 'OUT' ? 'out' : 'in';
          text = prefixed[2];
        }
        const item = cleanItem(text);
        if (!item) break;
        (itemSide === 'out' ? policy.scope_out : policy.scope_in).push(item);
        break;
      }
      case 'PIPELINE': {
        const skip = /^skip\s*:\s*([a-z][a-z0-9-]*)\s*$/i.exec(cleanItem(text));
        if (skip) policy.skip_stages.push(skip[1].toLowerCase());
        break;
      }
    }
  }

  const missing = (['GOALS', 'SCOPE'] as const).filter((s) => !found.has(s));
  if (missing.length > 0) {
    throw new PolicyParseError(
      `Malformed policy${source ? ` ${source}` : ''}: missing required section(s) ${missing.map((s) => `## ${s}`).join(', ')}`,
    );
  }

  return policy;
}

// ─── Loading ─────────────────────────────────────────────

/** Read and parse a policy file. Throws PolicyParseError on any problem. */
export async function loadPolicy(policyPath: string): Promise<Policy> {
  let content: string;
  try {
    content = await fs.readFile(policyPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new PolicyParseError(`Policy not found: ${policyPath}`, error);
    }
    throw new PolicyParseError(`Policy unreadable: ${policyPath}`, error);
  }
  return parsePolicy(content, policyPath);
}

export interface PolicyLoadResult {
  policy: Policy | null;
  /** Why no policy is available, when policy is null */
  problem?: string;
}

/** Load a policy without throwing; the evaluator fails open on null */
export async function tryLoadPolicy(policyPath: string): Promise<PolicyLoadResult> {
  try {
    return { policy: await loadPolicy(policyPath) };
  } catch (error) {
    if (error instanceof PolicyParseError) {
      return { policy: null, problem: error.message };
    }
    throw error;
  }
}
