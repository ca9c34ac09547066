/**
 * CLI commands index
 * Exports all command creators
 */

export { createStartCommand, createResumeCommand, createRerunCommand } from './run.js';
export { createStatusCommand, createListCommand, createLogCommand } from './status.js';
export { createAnalyzeCommand, createAlignmentStatsCommand } from './analyze.js';
export { createConfigCommand } from './config.js';
