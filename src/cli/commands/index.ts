/**
 * CLI commands index
 * Exports all command creators
 */

export { createAnalyzeCommand, runAnalyze, type AnalyzeCommandOptions } from './analyze.js';
export { createConfigCommand, describeProviders, type ProviderStatus } from './config.js';
export { createFormatsCommand } from './formats.js';
