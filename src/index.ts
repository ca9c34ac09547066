#!/usr/bin/env node
/**
 * Relaywright CLI
 * Policy-gated, multi-stage workflow orchestration
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(3);
});
