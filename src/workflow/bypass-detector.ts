/**
 * Bypass Detector
 * Offline forensic analysis of execution logs: incomplete runs, stages
 * that skipped their preconditions, drift between paths that must change
 * together, and stub output that passed the quality gates.
 *
 * Analysis reads only the log and the artifacts it references, so running
 * it twice on the same log yields the same findings.
 */

import {
  ArtifactRefSchema,
  LogEventTypeSchema,
  NEW_BYPASS_ID,
  SEVERITY_RANK,
  TERMINAL_ACTIONS,
  type AnomalySignature,
  type Artifact,
  type ArtifactRef,
  type ExecutionLog,
  type Finding,
  type LogEvent,
  type Pattern,
  type StageDefinition,
} from '../pipeline/types.js';
import { defaultStageDefinitions } from '../pipeline/stage-registry.js';

// ─── Types ───────────────────────────────────────────────

export type ArtifactResolver = (ref: ArtifactRef) => Promise<Artifact | null>;

export interface AnalyzeOptions {
  /** Dereferences artifact refs found in the log; content checks are skipped without it */
  resolveArtifact?: ArtifactResolver;
  /** Stage definitions used to check preconditions */
  stages?: StageDefinition[];
}

interface Anomaly {
  signature: AnomalySignature;
  evidence: string;
}

/** What a replay of the log establishes */
interface Replay {
  completedWorkflow: boolean;
  actions: Set<string>;
  changedPaths: string[];
  completedRefs: ArtifactRef[];
  anomalies: Anomaly[];
}

const KNOWN_EVENTS = new Set<string>(LogEventTypeSchema.options);
const TERMINAL = new Set<string>(TERMINAL_ACTIONS);
const EXCERPT_RADIUS = 40;

// ─── Replay ──────────────────────────────────────────────

function describe(event: LogEvent): string {
  return `#${event.seq} ${event.event}${event.stage ? ` [${event.stage}]` : ''}: ${event.message}`;
}

function stringField(data: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = data?.[key];
  return typeof value === 'string' ? value : undefined;
}

function replay(log: ExecutionLog, stages: StageDefinition[]): Replay {
  const requires = new Map(stages.map((s) => [s.name, s.requiredInputs]));
  const started = new Set<string>();
  const completed = new Set<string>();
  const result: Replay = {
    completedWorkflow: false,
    actions: new Set(),
    changedPaths: [],
    completedRefs: [],
    anomalies: [],
  };
  const flag = (signature: AnomalySignature, evidence: string): void => {
    result.anomalies.push({ signature, evidence });
  };

  const events = [...log.events].sort((a, b) => a.seq - b.seq);
  for (const event of events) {
    if (!KNOWN_EVENTS.has(event.event)) {
      flag('unknown-event', describe(event));
      continue;
    }
    const stage = event.stage ?? '';

    switch (event.event) {
      case 'stage_started': {
        started.add(stage);
        for (const input of requires.get(stage) ?? []) {
          if (!completed.has(input)) {
            flag('precondition-violation', `${describe(event)} (requires ${input}, not completed)`);
          }
        }
        break;
      }
      case 'stage_completed': {
        if (!started.has(stage)) flag('stage-without-start', describe(event));
        if (completed.has(stage)) flag('duplicate-completion', describe(event));
        started.delete(stage);
        completed.add(stage);
        const ref = ArtifactRefSchema.safeParse(event.data?.artifact);
        if (ref.success) result.completedRefs.push(ref.data);
        break;
      }
      case 'stage_failed': {
        started.delete(stage);
        if (stringField(event.data, 'kind') === 'validation') {
          flag('contract-violation', describe(event));
        }
        break;
      }
      case 'workflow_completed': {
        result.completedWorkflow = true;
        break;
      }
      case 'action': {
        const action = stringField(event.data, 'action');
        if (action && TERMINAL.has(action)) {
          if (!result.completedWorkflow) flag('action-before-completion', describe(event));
          result.actions.add(action);
        }
        break;
      }
      case 'file_changed': {
        const filePath = stringField(event.data, 'path');
        if (filePath) result.changedPaths.push(filePath);
        break;
      }
      default:
        break;
    }
  }
  return result;
}

// ─── Pattern Checks ──────────────────────────────────────

function finding(pattern: Pattern, workflowId: string, evidence: string[]): Finding {
  return {
    pattern_id: pattern.id,
    severity: pattern.severity,
    workflow_id: workflowId,
    title: pattern.title,
    evidence,
    suggested_fix: pattern.suggested_fix,
  };
}

function excerpt(text: string, index: number, length: number): string {
  const start = Math.max(0, index - EXCERPT_RADIUS);
  const end = Math.min(text.length, index + length + EXCERPT_RADIUS);
  return `${start > 0 ? '...' : ''}${text.slice(start, end)}${end < text.length ? '...' : ''}`;
}

/**
 * Analyze one execution log against a pattern set.
 * Findings are sorted by severity, then pattern id, then evidence.
 */
export async function analyze(
  log: ExecutionLog,
  patterns: Pattern[],
  options: AnalyzeOptions = {},
): Promise<Finding[]> {
  const state = replay(log, options.stages ?? defaultStageDefinitions());
  const findings: Finding[] = [];
  const artifactCache = new Map<string, Artifact | null>();

  const resolve = async (ref: ArtifactRef): Promise<Artifact | null> => {
    const key = `${ref.stage_name}#${ref.generation}`;
    if (!artifactCache.has(key)) {
      artifactCache.set(key, options.resolveArtifact ? await options.resolveArtifact(ref) : null);
    }
    return artifactCache.get(key) ?? null;
  };

  for (const pattern of patterns) {
    switch (pattern.kind) {
      case 'completeness': {
        if (!state.completedWorkflow || pattern.mode !== log.mode) break;
        const missing = pattern.required_actions.filter((a) => !state.actions.has(a));
        if (missing.length > 0) {
          findings.push(finding(pattern, log.workflow_id, missing.map((a) => `missing action: ${a}`)));
        }
        break;
      }
      case 'congruence': {
        const left = new RegExp(pattern.left);
        const right = new RegExp(pattern.right);
        const leftHits = state.changedPaths.filter((p) => left.test(p));
        const rightHits = state.changedPaths.filter((p) => right.test(p));
        if (leftHits.length > 0 && rightHits.length === 0) {
          findings.push(finding(pattern, log.workflow_id, [
            ...leftHits.map((p) => `changed: ${p}`),
            `no change matching ${pattern.right}`,
          ]));
        } else if (rightHits.length > 0 && leftHits.length === 0) {
          findings.push(finding(pattern, log.workflow_id, [
            ...rightHits.map((p) => `changed: ${p}`),
            `no change matching ${pattern.left}`,
          ]));
        }
        break;
      }
      case 'content': {
        const markers = pattern.markers.map((m) => new RegExp(m, 'i'));
        const evidence: string[] = [];
        for (const ref of state.completedRefs) {
          if (pattern.stages.length > 0 && !pattern.stages.includes(ref.stage_name)) continue;
          const artifact = await resolve(ref);
          if (!artifact) continue;
          const text = JSON.stringify(artifact.payload);
          for (const marker of markers) {
            const match = marker.exec(text);
            if (match) {
              evidence.push(`${ref.stage_name}#${ref.generation}: ${excerpt(text, match.index, match[0].length)}`);
            }
          }
        }
        if (evidence.length > 0) findings.push(finding(pattern, log.workflow_id, evidence));
        break;
      }
      case 'anomaly': {
        const evidence = state.anomalies
          .filter((a) => a.signature === pattern.signature)
          .map((a) => a.evidence);
        if (evidence.length > 0) findings.push(finding(pattern, log.workflow_id, evidence));
        break;
      }
    }
  }

  // Anomalies no pattern claims go to human triage
  const claimed = new Set(patterns.flatMap((p) => (p.kind === 'anomaly' ? [p.signature] : [])));
  const unclaimed = new Map<AnomalySignature, string[]>();
  for (const anomaly of state.anomalies) {
    if (claimed.has(anomaly.signature)) continue;
    const bucket = unclaimed.get(anomaly.signature) ?? [];
    bucket.push(anomaly.evidence);
    unclaimed.set(anomaly.signature, bucket);
  }
  for (const [signature, evidence] of unclaimed) {
    findings.push({
      pattern_id: NEW_BYPASS_ID,
      severity: 'warning',
      workflow_id: log.workflow_id,
      title: `Unrecognized anomaly: ${signature}`,
      evidence,
      suggested_fix: 'Triage manually; add a pattern if this recurs',
    });
  }

  return sortFindings(findings);
}

export function sortFindings(findings: Finding[]): Finding[] {
  return [...findings].sort((a, b) =>
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity]
    || a.pattern_id.localeCompare(b.pattern_id)
    || a.workflow_id.localeCompare(b.workflow_id)
    || a.evidence.join('\n').localeCompare(b.evidence.join('\n')));
}

/** A critical finding requires mandatory human review */
export function hasCritical(findings: Finding[]): boolean {
  return findings.some((f) => f.severity === 'critical');
}
