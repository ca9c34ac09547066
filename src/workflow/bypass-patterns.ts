/**
 * Known bypass patterns
 * Signatures of incomplete runs, skipped steps and placeholder output
 */

import { promises as fs } from 'node:fs';
import YAML from 'yaml';
import { z } from 'zod';

import { PatternSchema, TERMINAL_ACTIONS, type Pattern } from '../pipeline/types.js';
import { StageConfigurationError } from '../pipeline/errors.js';

/**
 * Terminal actions expected of a completed workflow, by mode
 */
export const DEFAULT_MODE_ACTIONS: Record<string, string[]> = {
  full: [...TERMINAL_ACTIONS],
  local: ['persistence-commit'],
};

const STATIC_PATTERNS: Pattern[] = [
  {
    id: 'BP-010',
    kind: 'content',
    title: 'Stub implementation in stage output',
    severity: 'critical',
    markers: [
      'not implemented',
      'NotImplementedError',
      'TODO:\\s*implement',
      'raise NotImplemented',
      'throw new Error\\([\'"]Not implemented[\'"]\\)',
    ],
    stages: [],
    suggested_fix: 'Re-run the stage and reject output that stubs out the requested behavior',
  },
  {
    id: 'BP-011',
    kind: 'content',
    title: 'Placeholder content in generated work',
    severity: 'warning',
    markers: ['lorem ipsum', '\\bFIXME\\b', '<placeholder>'],
    stages: ['test-generation', 'implementation'],
    suggested_fix: 'Replace placeholder content before publishing',
  },
  {
    id: 'BP-020',
    kind: 'congruence',
    title: 'Source changed without tests',
    severity: 'warning',
    left: '^src/',
    right: '^tests?/',
    suggested_fix: 'Add or update tests covering the changed source files',
  },
  {
    id: 'BP-021',
    kind: 'congruence',
    title: 'CLI changed without documentation',
    severity: 'info',
    left: '^src/cli/',
    right: '^(docs/|README\\.md$)',
    suggested_fix: 'Document the changed commands',
  },
  {
    id: 'BP-030',
    kind: 'anomaly',
    title: 'Stage completed without a recorded start',
    severity: 'critical',
    signature: 'stage-without-start',
    suggested_fix: 'Investigate how the stage output was produced outside the coordinator',
  },
  {
    id: 'BP-031',
    kind: 'anomaly',
    title: 'Stage started before its inputs completed',
    severity: 'critical',
    signature: 'precondition-violation',
    suggested_fix: 'Re-run the workflow; the stage consumed missing or failed inputs',
  },
  {
    id: 'BP-032',
    kind: 'anomaly',
    title: 'Terminal action before workflow completion',
    severity: 'critical',
    signature: 'action-before-completion',
    suggested_fix: 'Revert the premature commit or publish and re-run the remaining stages',
  },
  {
    id: 'BP-033',
    kind: 'anomaly',
    title: 'Stage completed more than once',
    severity: 'warning',
    signature: 'duplicate-completion',
    suggested_fix: 'Check for concurrent coordinators on the same workflow',
  },
  {
    id: 'BP-034',
    kind: 'anomaly',
    title: 'Stage output violated the artifact contract',
    severity: 'critical',
    signature: 'contract-violation',
    suggested_fix: 'Fix the stage worker so its payload carries a valid envelope and schema version',
  },
];

/**
 * Default pattern set. Completeness expectations are generated per mode,
 * so configured modes replace the built-in ones.
 */
export function defaultPatterns(modeActions: Record<string, string[]> = DEFAULT_MODE_ACTIONS): Pattern[] {
  const completeness: Pattern[] = Object.entries(modeActions)
    .filter(([, actions]) => actions.length > 0)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([mode, actions]): Pattern => ({
      id: `BP-001-${mode}`,
      kind: 'completeness',
      title: `Completed ${mode} workflow is missing terminal actions`,
      severity: 'warning',
      mode,
      required_actions: [...actions],
      suggested_fix: 'Run the missing actions or record why they were not needed',
    }));
  return [...completeness, ...STATIC_PATTERNS];
}

// ─── Loading ─────────────────────────────────────────────

function regexProblems(pattern: Pattern): string[] {
  const sources = pattern.kind === 'content'
    ? pattern.markers
    : pattern.kind === 'congruence'
      ? [pattern.left, pattern.right]
      : [];
  const problems: string[] = [];
  for (const source of sources) {
    try {
      new RegExp(source, 'i');
    } catch (error) {
      problems.push(`${pattern.id}: invalid regex "${source}": ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return problems;
}

/**
 * Validate a pattern list, including every regex it declares
 */
export function parsePatterns(data: unknown): Pattern[] {
  const parsed = z.array(PatternSchema).safeParse(data);
  if (!parsed.success) {
    throw new StageConfigurationError(
      parsed.error.issues.map((i) => `patterns.${i.path.join('.')}: ${i.message}`),
    );
  }
  const problems = parsed.data.flatMap(regexProblems);
  const ids = parsed.data.map((p) => p.id);
  for (const id of new Set(ids)) {
    if (ids.indexOf(id) !== ids.lastIndexOf(id)) problems.push(`Duplicate pattern id "${id}"`);
  }
  if (problems.length > 0) {
    throw new StageConfigurationError(problems);
  }
  return parsed.data;
}

/**
 * Load additional patterns from a YAML or JSON file
 */
export async function loadPatterns(filePath: string): Promise<Pattern[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parsePatterns(YAML.parse(content));
}
