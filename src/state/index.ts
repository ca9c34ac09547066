/**
 * State management module
 * Workflow records and the on-disk state directory
 */

export * from './persistence.js';
export * from './workflow-store.js';
