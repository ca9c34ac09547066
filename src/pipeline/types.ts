/**
 * Pipeline type definitions — barrel re-export from type-defs/ sub-modules.
 *
 *   enums.ts     — stage names, workflow/artifact statuses, severities
 *   artifacts.ts — envelope, Artifact, ArtifactRef, write-order index
 *   workflow.ts  — Workflow record
 *   stages.ts    — StageDefinition, StageInput/StageOutput, quality gates
 *   policy.ts    — Policy, Alignment, AlignmentRecord
 *   log.ts       — execution log events
 *   findings.ts  — bypass patterns and findings
 */

export * from './type-defs/index.js';
