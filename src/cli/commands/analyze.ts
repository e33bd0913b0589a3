/**
 * CLI command: docsurvey analyze
 *
 * Scans a directory of project folders, analyzes every supported document
 * and writes the markdown reports into a session directory.
 */

import { Command, Option } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createAnalyzerRegistry } from '../../analyzers/registry.js';
import { loadConfig } from '../../config/index.js';
import { scanDirectory } from '../../scanner/directory-scanner.js';
import { AnalysisModeSchema, type AnalysisMode } from '../../types/document.js';
import { errorMessage } from '../../types/errors.js';
import { createAIAnalyzer, type AIAnalyzer } from '../../workflow/ai-analyzer.js';
import { runDocumentAnalysis } from '../../workflow/document-analysis.js';
import { ReportGenerator, titleCase } from '../../workflow/report-generator.js';
import { RunLogger } from '../../workflow/run-logger.js';
import {
  createConsoleSink,
  failSpinner,
  formatFileListing,
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printListItem,
  printRunSummary,
  printSection,
  printSuccess,
  printWarning,
  startSpinner,
  succeedSpinner,
  updateSpinner,
} from '../output.js';

export interface AnalyzeCommandOptions {
  ai?: boolean;
  verbose?: boolean;
  analysisMode?: string;
  /** Commander sets this to false for --no-summary */
  summary?: boolean;
  listOnly?: boolean;
  output?: string;
  config?: string;
  json?: boolean;
  /** Environment used for credentials; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Resolve the directory argument, or explain why it cannot be analyzed
 */
async function validateDirectory(directory: string): Promise<{ root: string } | { error: string }> {
  const root = path.resolve(directory);
  try {
    const stat = await fs.stat(root);
    return stat.isDirectory() ? { root } : { error: `Path is not a directory: ${directory}` };
  } catch {
    return { error: `Directory does not exist: ${directory}` };
  }
}

function resolveMode(requested: string | undefined, fallback: AnalysisMode): AnalysisMode | null {
  if (requested === undefined) return fallback;
  const parsed = AnalysisModeSchema.safeParse(requested);
  return parsed.success ? parsed.data : null;
}

// ---------------------------------------------------------------------------
// Run analysis (exported for testability)
// ---------------------------------------------------------------------------

/**
 * Execute an analysis run and print results to the console.
 *
 * @param directory - Directory to analyze, relative to the working directory
 * @param options - CLI options
 * @returns Process exit code
 */
export async function runAnalyze(directory: string, options: AnalyzeCommandOptions = {}): Promise<number> {
  printHeader('DocSurvey - Document Analysis');

  const validated = await validateDirectory(directory);
  if ('error' in validated) {
    printError(validated.error);
    return 1;
  }
  const { root } = validated;

  let config;
  try {
    config = await loadConfig({ configPath: options.config, env: options.env });
  } catch (error) {
    printError(errorMessage(error));
    return 1;
  }

  const mode = resolveMode(options.analysisMode, config.analysis.mode);
  if (mode === null) {
    printError(`Unknown analysis mode: ${options.analysisMode}`);
    return 1;
  }
  config = { ...config, analysis: { ...config.analysis, mode } };

  const verbose = options.verbose ?? false;
  const logger = new RunLogger({
    threshold: verbose ? 'debug' : config.logging.level,
    sink: createConsoleSink(verbose),
  });

  printKeyValue('Directory', root);
  printKeyValue('AI Analysis', options.ai ? 'Enabled' : 'Disabled');
  printKeyValue('Analysis Mode', titleCase(mode));

  if (options.listOnly) {
    const scan = await scanDirectory(root, { logger });
    if (scan.error) {
      printError(scan.error);
      return 1;
    }
    printSection(`Found ${scan.records.length} supported files`);
    for (const line of formatFileListing(scan.records)) {
      console.log(`  ${line}`);
    }
    return 0;
  }

  let analyzer: AIAnalyzer | undefined;
  if (options.ai) {
    analyzer = createAIAnalyzer(config, { logger, env: options.env });
    if (analyzer.isAvailable()) {
      printInfo(`AI providers: ${analyzer.availableProviders().join(', ')}`);
    } else {
      printWarning('AI analysis enabled but no API keys detected');
      printInfo('Set REPLICATE_API_TOKEN, OPENAI_API_KEY, ANTHROPIC_API_KEY or GEMINI_API_KEY');
    }
  }

  try {
    const registry = await createAnalyzerRegistry({ logger });

    startSpinner('Scanning directory for projects and supported files...');
    const run = await runDocumentAnalysis(root, {
      registry,
      ai: analyzer,
      logger,
      onProgress: (progress) => {
        if (progress.phase === 'analyze') {
          updateSpinner(`Analyzing ${progress.index}/${progress.total}: ${progress.result.fileInfo.name}`);
        }
      },
    });

    if (run.scan.error) {
      failSpinner(run.scan.error);
      return 1;
    }
    if (run.results.length === 0) {
      failSpinner('No supported files found in directory');
      return 1;
    }

    const failed = run.results.filter((result) => result.error);
    succeedSpinner(`Analysis complete in ${(run.elapsedMs / 1000).toFixed(1)}s`);
    printInfo(`Results: ${run.results.length - failed.length} successful, ${failed.length} failed`);
    printInfo(`Projects detected: ${run.scan.projects.size}`);

    if (failed.length > 0 && verbose) {
      printSection('Failed files');
      for (const result of failed) {
        printListItem(`${result.fileInfo.name}: ${result.error}`, 1);
      }
    }

    startSpinner('Generating reports...');
    const generator = new ReportGenerator({
      reportsDir: options.output ?? config.reports.dir,
      ai: analyzer?.isAvailable() ? analyzer : undefined,
      json: options.json ?? config.reports.json,
      logger,
    });
    const reports = await generator.generate({
      root,
      results: run.results,
      projects: run.scan.projects,
      projectStats: run.projectStats,
      directoryStats: run.directoryStats,
      mode,
    });

    const files = [reports.comprehensive, reports.overview, ...reports.projects, reports.crossProject];
    if (reports.json) files.push(reports.json);
    succeedSpinner(`Reports saved to session directory: ${reports.sessionDir}`);
    for (const file of files) {
      printListItem(path.basename(file), 1);
    }

    if (options.summary !== false) {
      printRunSummary(run);
    }

    if (config.logging.to_file) {
      const logPath = await logger.flush(path.resolve(reports.sessionDir, config.logging.file));
      printInfo(`Log written to ${logPath}`);
    }

    console.log();
    printSuccess(`Analysis complete! Generated ${files.length} report(s).`);
    return 0;
  } catch (error) {
    failSpinner('Analysis failed');
    printError(errorMessage(error));
    return 1;
  }
}

// ---------------------------------------------------------------------------
// Commander command factory
// ---------------------------------------------------------------------------

/**
 * Create the `docsurvey analyze` CLI command.
 *
 * @returns Commander command instance.
 */
export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Analyze every supported document under a directory and write reports')
    .argument('<directory>', 'Directory containing project folders')
    .option('--ai', 'Summarize and analyze documents with the configured AI providers', false)
    .option('-v, --verbose', 'Show progress and warnings for every file', false)
    .addOption(
      new Option('--analysis-mode <mode>', 'How the AI reads documents').choices(AnalysisModeSchema.options)
    )
    .option('--no-summary', 'Skip the summary printed after the run')
    .option('--list-only', 'List supported files without analyzing them', false)
    .option('-o, --output <dir>', 'Base directory for report session folders')
    .option('-c, --config <path>', 'Configuration file to use instead of searching')
    .option('--json', 'Also write a JSON bundle of the results')
    .action(async (directory: string, opts: AnalyzeCommandOptions) => {
      const code = await runAnalyze(directory, opts);
      if (code !== 0) {
        process.exit(code);
      }
    });
}
