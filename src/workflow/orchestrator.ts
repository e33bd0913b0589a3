/**
 * Analysis orchestrator
 * Runs each file record through its analyzer and the optional AI collaborator
 */

import type { AnalyzerRegistry } from '../analyzers/registry.js';
import type { DocumentAI } from '../types/ai.js';
import type { AnalysisResult, FileRecord } from '../types/document.js';
import { errorMessage } from '../types/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';

export const PREVIEW_LENGTH = 500;
export const AI_UNAVAILABLE = 'AI analysis unavailable';

export interface AnalyzeOptions {
  registry: AnalyzerRegistry;
  /** When set, non-empty documents are summarized and analyzed */
  ai?: DocumentAI;
  logger?: Logger;
  /** Called after each record with its 1-based position */
  onResult?: (result: AnalysisResult, index: number, total: number) => void;
}

/**
 * Number of non-empty whitespace-separated tokens
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

/**
 * First PREVIEW_LENGTH characters, with '...' appended when text was cut
 */
export function buildPreview(text: string): string {
  const chars = Array.from(text);
  return chars.length > PREVIEW_LENGTH ? chars.slice(0, PREVIEW_LENGTH).join('') + '...' : text;
}

function failed(record: FileRecord, error: string): AnalysisResult {
  return {
    fileInfo: record,
    contentPreview: '',
    wordCount: 0,
    metadata: {},
    error,
  };
}

async function withAI(
  operation: () => Promise<string>,
  record: FileRecord,
  logger: Logger
): Promise<string> {
  try {
    return await operation();
  } catch (error) {
    logger.warn('ai', `AI analysis failed for ${record.name}: ${errorMessage(error)}`);
    return AI_UNAVAILABLE;
  }
}

/**
 * Analyze a single record. Never rejects; every failure becomes the
 * result's error field.
 */
export async function analyzeRecord(
  record: FileRecord,
  options: Omit<AnalyzeOptions, 'onResult'>
): Promise<AnalysisResult> {
  const logger = options.logger ?? silentLogger;

  if (!record.isReadable) {
    return failed(record, `File not readable: ${record.errorMessage}`);
  }

  const analyzer = options.registry.get(record.extension);
  if (!analyzer) {
    return failed(record, `No analyzer available for ${record.extension} files`);
  }

  let result: AnalysisResult;
  let text: string;
  try {
    text = await analyzer.extractText(record.path);
    const metadata = await analyzer.extractMetadata(record.path);
    result = {
      fileInfo: record,
      contentPreview: buildPreview(text),
      wordCount: countWords(text),
      metadata,
      error: '',
    };
  } catch (error) {
    return failed(record, `Analysis failed: ${errorMessage(error)}`);
  }

  const ai = options.ai;
  if (ai && text) {
    const context = { projectName: record.projectName, subfolderPath: record.subfolderPath };
    result.summary = await withAI(() => ai.summarize(text, context), record, logger);
    result.insights = await withAI(() => ai.analyze(text, record.name, context), record, logger);
  }

  return result;
}

/**
 * Analyze records sequentially. The output has the same length and order as
 * the input, and one failing record never affects the others.
 */
export async function analyzeRecords(
  records: readonly FileRecord[],
  options: AnalyzeOptions
): Promise<AnalysisResult[]> {
  const logger = options.logger ?? silentLogger;
  const results: AnalysisResult[] = [];

  for (const record of records) {
    const result = await analyzeRecord(record, options);
    if (result.error) {
      logger.warn('analyze', `${record.name}: ${result.error}`);
    } else {
      logger.debug('analyze', `Analyzed: ${record.name}`);
    }
    results.push(result);
    options.onResult?.(result, results.length, records.length);
  }

  logger.info('analyze', `Analysis completed. Processed ${results.length} files`);
  return results;
}
