/**
 * Document analysis run
 * Scan, analyze and aggregate one directory tree
 */

import type { AnalyzerRegistry } from '../analyzers/registry.js';
import { scanDirectory } from '../scanner/directory-scanner.js';
import { computeDirectoryStats, computeProjectStats } from '../scanner/stats.js';
import type { DocumentAI } from '../types/ai.js';
import type {
  AnalysisResult,
  DirectoryStats,
  FileRecord,
  ProjectStats,
  ScanResult,
} from '../types/document.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { analyzeRecords } from './orchestrator.js';

/**
 * Progress events emitted during a run
 */
export type RunProgress =
  | { phase: 'scan'; record: FileRecord }
  | { phase: 'analyze'; result: AnalysisResult; index: number; total: number };

export interface DocumentAnalysisOptions {
  registry: AnalyzerRegistry;
  ai?: DocumentAI;
  logger?: Logger;
  onProgress?: (progress: RunProgress) => void;
  /** Clock, replaceable in tests */
  now?: () => number;
}

export interface DocumentAnalysisRun {
  scan: ScanResult;
  results: AnalysisResult[];
  directoryStats: DirectoryStats;
  projectStats: Map<string, ProjectStats>;
  elapsedMs: number;
}

/**
 * Run the full pipeline over a directory. A root that cannot be scanned
 * yields an empty run with `scan.error` set.
 */
export async function runDocumentAnalysis(
  root: string,
  options: DocumentAnalysisOptions
): Promise<DocumentAnalysisRun> {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? Date.now;
  const startedAt = now();

  logger.info('run', `Starting analysis of ${root}`);

  const scan = await scanDirectory(root, {
    logger,
    onFile: (record) => options.onProgress?.({ phase: 'scan', record }),
  });

  const results = await analyzeRecords(scan.records, {
    registry: options.registry,
    ai: options.ai,
    logger,
    onResult: (result, index, total) => options.onProgress?.({ phase: 'analyze', result, index, total }),
  });

  const directoryStats = computeDirectoryStats(scan.records);
  const projectStats = computeProjectStats(scan.projects);
  logger.debug('stats', 'Computed statistics', {
    totalFiles: directoryStats.totalFiles,
    totalProjects: directoryStats.totalProjects,
  });

  const elapsedMs = now() - startedAt;
  const failures = results.filter((result) => result.error).length;
  logger.success('run', `Analyzed ${results.length} files (${failures} failed) in ${(elapsedMs / 1000).toFixed(2)}s`);

  return { scan, results, directoryStats, projectStats, elapsedMs };
}
