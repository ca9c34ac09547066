/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  createStartCommand,
  createResumeCommand,
  createRerunCommand,
  createStatusCommand,
  createListCommand,
  createLogCommand,
  createAnalyzeCommand,
  createAlignmentStatsCommand,
  createConfigCommand,
} from './commands/index.js';
import { EXIT_CODES } from './context.js';
import { printError, stopSpinner } from './output.js';

// Re-export
export * from './output.js';
export * from './context.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../../package.json');
export const VERSION: string = packageJson.version;

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('relaywright')
    .description('Policy-gated, multi-stage workflow orchestration with bypass detection')
    .version(VERSION)
    .option('--no-color', 'Disable colored output');

  // Add commands
  program.addCommand(createStartCommand());
  program.addCommand(createResumeCommand());
  program.addCommand(createRerunCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createListCommand());
  program.addCommand(createLogCommand());
  program.addCommand(createAnalyzeCommand());
  program.addCommand(createAlignmentStatsCommand());
  program.addCommand(createConfigCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    stopSpinner();
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = EXIT_CODES.INTERNAL_ERROR;
  }
}
