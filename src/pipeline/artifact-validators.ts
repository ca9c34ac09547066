/**
 * Artifact Validators — deterministic structural checks on stage payloads.
 *
 * Two layers:
 *   1. Envelope validation: required fields and schema-version compatibility.
 *      A failure here is a worker contract violation and is never retried.
 *   2. Quality gates: stage-specific predicates over a well-formed payload.
 *      A failure marks the artifact failed without a transport error.
 */

import {
  ArtifactEnvelopeSchema,
  type DefaultStageName,
  type JsonObject,
  type QualityGate,
  type QualityGateResult,
} from './types.js';

// ─── Types ───────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// ─── Envelope ────────────────────────────────────────────

function majorOf(version: string): string {
  return version.split('.')[0];
}

/** Versions are compatible when their major components match */
export function isSchemaCompatible(actual: string, expected: string): boolean {
  return majorOf(actual) === majorOf(expected);
}

/**
 * Validate the required envelope of a stage payload against the stage's
 * declared output schema version.
 */
export function validateEnvelope(payload: JsonObject, expectedVersion: string): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const parsed = ArtifactEnvelopeSchema.safeParse(payload);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const field = issue.path.join('.') || '(root)';
      errors.push(`${field}: ${issue.message}`);
    }
    return { valid: false, errors, warnings };
  }

  const { schema_version: actual, timestamp } = parsed.data;
  if (!isSchemaCompatible(actual, expectedVersion)) {
    errors.push(`schema_version ${actual} is incompatible with expected ${expectedVersion}`);
  } else if (actual !== expectedVersion) {
    warnings.push(`schema_version ${actual} differs from expected ${expectedVersion}`);
  }

  if (Number.isNaN(Date.parse(timestamp))) {
    warnings.push(`timestamp "${timestamp}" is not an ISO-8601 date`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

// ─── Quality Gate Helpers ────────────────────────────────

function pass(): QualityGateResult {
  return { pass: true, reasons: [] };
}

function fail(...reasons: string[]): QualityGateResult {
  return { pass: false, reasons };
}

function nonEmptyArray(payload: JsonObject, field: string): QualityGateResult {
  const value = payload[field];
  if (!Array.isArray(value)) return fail(`"${field}" must be an array`);
  if (value.length === 0) return fail(`"${field}" must not be empty`);
  return pass();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── Per-Stage Gates ─────────────────────────────────────

const BLOCKING_VULNERABILITY_SEVERITIES = new Set(['critical', 'high']);

function gateReview(payload: JsonObject): QualityGateResult {
  const verdict = payload.verdict;
  if (verdict === 'approve') return pass();
  if (verdict === 'request_changes') return fail('reviewer requested changes');
  return fail('"verdict" must be "approve" or "request_changes"');
}

function gateSecurityAudit(payload: JsonObject): QualityGateResult {
  const vulnerabilities = payload.vulnerabilities;
  if (!Array.isArray(vulnerabilities)) return fail('"vulnerabilities" must be an array');

  const blocking = vulnerabilities.filter(
    (v) => isRecord(v) && typeof v.severity === 'string'
      && BLOCKING_VULNERABILITY_SEVERITIES.has(v.severity.toLowerCase()),
  );
  if (blocking.length > 0) {
    return fail(`${blocking.length} blocking vulnerabilit${blocking.length === 1 ? 'y' : 'ies'} (critical/high)`);
  }
  return pass();
}

function gateDocSync(payload: JsonObject): QualityGateResult {
  return Array.isArray(payload.docs_updated) ? pass() : fail('"docs_updated" must be an array');
}

const QUALITY_GATES: Record<DefaultStageName, QualityGate> = {
  research: (p) => nonEmptyArray(p, 'findings'),
  planning: (p) => nonEmptyArray(p, 'steps'),
  'test-generation': (p) => nonEmptyArray(p, 'tests'),
  implementation: (p) => nonEmptyArray(p, 'files_changed'),
  review: gateReview,
  'security-audit': gateSecurityAudit,
  'doc-sync': gateDocSync,
};

// ─── Public API ──────────────────────────────────────────

/** Quality gate for a default stage */
export function getQualityGate(stage: DefaultStageName): QualityGate {
  return QUALITY_GATES[stage];
}

/** Run a gate, turning a throwing predicate into a failed result */
export function runQualityGate(gate: QualityGate, payload: JsonObject): QualityGateResult {
  try {
    return gate(payload);
  } catch (error) {
    return fail(`quality gate threw: ${error instanceof Error ? error.message : String(error)}`);
  }
}
