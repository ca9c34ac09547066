/**
 * Policy Evaluator — deterministic alignment gate.
 *
 * Default-allow on ambiguity, default-deny only on an explicit exclusion
 * match: a request is rejected when a scope-out entry or a prohibitive
 * constraint matches it with a score at or above the threshold.
 * Pure: persisting the decision is the coordinator's job.
 */

import type { Alignment, Policy } from './types.js';

// ─── Constants ───────────────────────────────────────────

export const DEFAULT_ALIGNMENT_THRESHOLD = 0.8;

/** Score at which a goal or in-scope entry counts as matching */
const GOAL_MATCH_SCORE = 0.5;

const STOPWORDS = new Set([
  'the', 'and', 'but', 'for', 'with', 'into', 'from', 'via', 'onto',
  'any', 'all', 'our', 'its', 'are', 'was', 'not', 'this', 'that',
  'based', 'must', 'should', 'never', 'avoid', 'without',
]);

const PROHIBITION = /^(?:no|never|must\s+not|mustn't|do\s+not|don't|does\s+not|avoid|without|forbid(?:den)?|disallow(?:ed)?)\s+(.+)$/i;

// ─── Text Normalization ──────────────────────────────────

/**
 * Light suffix stemmer: plural first, then derivational suffixes until
 * stable, so "processing", "processor" and "processes" share "process".
 */
export function stem(word: string): string {
  let w = word.toLowerCase();

  if (w.length > 4 && /(?:ss|x|ch|sh)es$/.test(w)) {
    w = w.slice(0, -2);
  } else if (w.length > 3 && w.endsWith('s') && !w.endsWith('ss')) {
    w = w.slice(0, -1);
  }

  for (;;) {
    if (w.length > 5 && (w.endsWith('ing') || w.endsWith('ion'))) {
      w = w.slice(0, -3);
    } else if (w.length > 4 && (w.endsWith('or') || w.endsWith('er') || w.endsWith('ed'))) {
      w = w.slice(0, -2);
    } else {
      return w;
    }
  }
}

/** Significant, stemmed words of a phrase, deduplicated in order */
export function significantWords(text: string): string[] {
  const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  const result: string[] = [];
  for (const word of words) {
    if (word.length <= 2 || STOPWORDS.has(word)) continue;
    const s = stem(word);
    if (!result.includes(s)) result.push(s);
  }
  return result;
}

/**
 * Fraction of an entry's significant words present in the request.
 * Multi-word entries need at least two matching words, so "CLI-like"
 * does not match "CLI commands".
 */
export function matchScore(entry: string, requestWords: ReadonlySet<string>): number {
  const words = significantWords(entry);
  if (words.length === 0) return 0;
  const matched = words.filter((w) => requestWords.has(w)).length;
  if (words.length > 1 && matched < 2) return 0;
  return matched / words.length;
}

// ─── Evaluation ──────────────────────────────────────────

export interface EvaluateOptions {
  threshold?: number;
  /** Why no policy is available, included in the reasoning */
  problem?: string;
}

interface ScoredEntry {
  entry: string;
  score: number;
}

function scoreAll(entries: string[], requestWords: ReadonlySet<string>): ScoredEntry[] {
  return entries.map((entry) => ({ entry, score: matchScore(entry, requestWords) }));
}

/**
 * Decide whether a request may proceed under a policy.
 * A null policy fails open with confidence 0.
 */
export function evaluate(
  request: string,
  policy: Policy | null,
  options: EvaluateOptions = {},
): Alignment {
  const threshold = options.threshold ?? DEFAULT_ALIGNMENT_THRESHOLD;

  if (!request.trim()) {
    return {
      aligned: false,
      confidence: 1,
      matching_goals: [],
      violations: ['request: empty request'],
      reasoning: 'Request is empty; there is nothing to evaluate',
    };
  }

  if (!policy) {
    return {
      aligned: true,
      confidence: 0,
      matching_goals: [],
      violations: [],
      reasoning: `no policy available${options.problem ? ` (${options.problem})` : ''}; request allowed by default`,
    };
  }

  const requestWords = new Set(significantWords(request));

  const scopeOutHits = scoreAll(policy.scope_out, requestWords).filter((s) => s.score >= threshold);
  const constraintHits = policy.constraints
    .map((constraint) => {
      const subject = PROHIBITION.exec(constraint.trim());
      return { entry: constraint, score: subject ? matchScore(subject[1], requestWords) : 0 };
    })
    .filter((s) => s.score >= threshold);

  if (scopeOutHits.length > 0 || constraintHits.length > 0) {
    const violations = [
      ...scopeOutHits.map((s) => `scope-out: ${s.entry}`),
      ...constraintHits.map((s) => `constraint: ${s.entry}`),
    ];
    const confidence = Math.max(...scopeOutHits.map((s) => s.score), ...constraintHits.map((s) => s.score));
    return {
      aligned: false,
      confidence,
      matching_goals: [],
      violations,
      reasoning: `Request matches explicit exclusions: ${violations.join('; ')}`,
    };
  }

  const goals = scoreAll(policy.goals, requestWords);
  const scopeIn = scoreAll(policy.scope_in, requestWords);
  const matchingGoals = goals.filter((g) => g.score >= GOAL_MATCH_SCORE).map((g) => g.entry);
  const matchingScope = scopeIn.filter((s) => s.score >= GOAL_MATCH_SCORE).map((s) => s.entry);
  const confidence = Math.max(0, ...goals.map((g) => g.score), ...scopeIn.map((s) => s.score));

  const reasons: string[] = [];
  if (matchingGoals.length > 0) reasons.push(`serves goals: ${matchingGoals.join('; ')}`);
  if (matchingScope.length > 0) reasons.push(`in scope: ${matchingScope.join('; ')}`);

  return {
    aligned: true,
    confidence,
    matching_goals: matchingGoals,
    violations: [],
    reasoning: reasons.length > 0
      ? `Request ${reasons.join('; ')}`
      : 'No explicit goal or scope match and no exclusion matched; allowed by default',
  };
}
