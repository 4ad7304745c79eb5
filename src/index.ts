#!/usr/bin/env node
/**
 * testfleet CLI
 * Parallel, fail-fast test orchestration across a monorepo
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
