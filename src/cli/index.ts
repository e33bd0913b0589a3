/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { createAnalyzeCommand, createConfigCommand, createFormatsCommand } from './commands/index.js';
import { printError, printWarning, stopSpinner } from './output.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../../package.json');
export const VERSION: string = packageJson.version;

/**
 * Exit code used when the run is interrupted
 */
export const INTERRUPTED_EXIT_CODE = 130;

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('docsurvey')
    .description('Scan a portfolio of project folders and report on their documents')
    .version(VERSION);

  program.addCommand(createAnalyzeCommand(), { isDefault: true });
  program.addCommand(createConfigCommand());
  program.addCommand(createFormatsCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  process.once('SIGINT', () => {
    stopSpinner();
    console.log();
    printWarning('Analysis interrupted by user');
    process.exit(INTERRUPTED_EXIT_CODE);
  });

  try {
    await program.parseAsync(args);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
