/**
 * CLI output utilities
 * Handles formatted output, spinners, and progress display
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { FileRecord } from '../types/document.js';
import type { DocumentAnalysisRun } from '../workflow/document-analysis.js';
import { formatSize } from '../workflow/report-generator.js';
import type { LogEntry, LogSink } from '../workflow/run-logger.js';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/**
 * Start a spinner with a message
 *
 * @param message - Initial message
 * @returns Spinner instance
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

/**
 * Update spinner message
 */
export function updateSpinner(message: string): void {
  if (spinner) {
    spinner.text = message;
  }
}

export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

export function stopSpinner(): void {
  if (spinner) {
    spinner.stop();
    spinner = null;
  }
}

/**
 * Print a header
 *
 * @param title - Header title
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

/**
 * Print a section header
 *
 * @param title - Section title
 */
export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

export function printWarning(message: string): void {
  console.log(theme.warning(`[WARN] ${message}`));
}

export function printError(message: string): void {
  console.log(theme.error(`[ERROR] ${message}`));
}

export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

/**
 * Print a key-value pair
 *
 * @param key - Key
 * @param value - Value
 */
export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

/**
 * Print a list item
 *
 * @param item - List item
 * @param indent - Indentation level
 */
export function printListItem(item: string, indent: number = 0): void {
  const prefix = '  '.repeat(indent) + '- ';
  console.log(theme.secondary(prefix) + item);
}

/**
 * Print a table
 *
 * @param headers - Table headers
 * @param rows - Table rows
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => {
    const maxRow = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
    return Math.max(h.length, maxRow);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
  console.log(theme.highlight(headerLine));
  console.log(theme.dim('-'.repeat(headerLine.length)));

  for (const row of rows) {
    console.log(row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  '));
  }
}

// ---------------------------------------------------------------------------
// Run output
// ---------------------------------------------------------------------------

/**
 * Console sink for the run logger. Spinner text is replaced by warnings and
 * errors so they stay visible.
 */
export function createConsoleSink(verbose: boolean): LogSink {
  return (entry: LogEntry) => {
    switch (entry.level) {
      case 'error':
        stopSpinner();
        printError(entry.message);
        break;
      case 'warn':
        if (verbose) printWarning(entry.message);
        break;
      case 'debug':
        if (verbose) console.log(theme.dim(`  [${entry.stage}] ${entry.message}`));
        break;
      default:
        if (verbose) console.log(theme.secondary(`  [${entry.stage}] ${entry.message}`));
    }
  };
}

/**
 * `EXT: name (size)` per record, sorted case-insensitively by name
 */
export function formatFileListing(records: readonly FileRecord[]): string[] {
  return [...records]
    .sort((a, b) => {
      const left = a.name.toLowerCase();
      const right = b.name.toLowerCase();
      return left < right ? -1 : left > right ? 1 : 0;
    })
    .map((record) => `${record.extension.toUpperCase()}: ${record.name} (${formatSize(record.size)})`);
}

/**
 * Lines of the end-of-run summary, grouped by heading
 */
export function formatRunSummary(run: DocumentAnalysisRun): Array<{ title: string; lines: string[] }> {
  const { directoryStats, scan, results } = run;

  const overview = [
    `Time taken: ${(run.elapsedMs / 1000).toFixed(1)} seconds`,
    `Total files: ${directoryStats.totalFiles}`,
    `Total size: ${formatSize(directoryStats.totalSize)}`,
    `Projects: ${scan.projects.size}`,
  ];

  const fileTypes = Object.entries(directoryStats.extensions).map(
    ([ext, count]) => `${ext.toUpperCase()}: ${count} files`
  );

  const projects = [...scan.projects].map(([name, records]) => `${name}: ${records.length} files`);

  const largest = results
    .filter((result) => !result.error)
    .sort((a, b) => b.fileInfo.size - a.fileInfo.size)
    .slice(0, 3)
    .map((result, i) => `${i + 1}. ${result.fileInfo.name} (${formatSize(result.fileInfo.size)})`);

  const sections = [
    { title: 'Analysis Summary', lines: overview },
    { title: 'File Types', lines: fileTypes },
    { title: 'Projects', lines: projects },
  ];
  if (largest.length > 0) {
    sections.push({ title: 'Largest Files', lines: largest });
  }
  return sections;
}

export function printRunSummary(run: DocumentAnalysisRun): void {
  for (const section of formatRunSummary(run)) {
    printSection(section.title);
    for (const line of section.lines) {
      console.log(`  ${line}`);
    }
  }
}
