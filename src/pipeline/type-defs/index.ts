/**
 * Pipeline types — barrel re-export.
 * All existing `from '../pipeline/types.js'` imports continue to work.
 */

export * from './enums.js';
export * from './artifacts.js';
export * from './workflow.js';
export * from './stages.js';
export * from './policy.js';
export * from './log.js';
export * from './findings.js';
