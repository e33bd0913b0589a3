#!/usr/bin/env node
/**
 * DocSurvey CLI
 * Document portfolio scanner, analyzer and report generator
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
