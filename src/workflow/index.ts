/**
 * Workflow module
 * Execution logging and offline bypass detection
 */

export * from './execution-log.js';
export * from './bypass-patterns.js';
export * from './bypass-detector.js';
