/**
 * Analyzer registry
 * Fixed mapping from format tag to analyzer, resolved once per process
 */

import { FORMAT_TAGS, type FormatTag } from '../types/document.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { isFormatTag } from '../scanner/classifier.js';
import { UnavailableAnalyzer } from './base.js';
import { ExcelAnalyzer } from './excel.js';
import { HtmlAnalyzer } from './html.js';
import { PdfAnalyzer } from './pdf.js';
import { TextAnalyzer } from './text.js';
import type { Analyzer } from './types.js';
import { WordAnalyzer } from './word.js';
import { XmlAnalyzer } from './xml.js';

export type AnalyzerMap = Partial<Record<FormatTag, Analyzer>>;

/**
 * Registry entry as shown by the `formats` command
 */
export interface FormatSupport {
  tag: FormatTag;
  format: string;
  library?: string;
  available: boolean;
}

export class AnalyzerRegistry {
  private readonly analyzers: AnalyzerMap;

  constructor(analyzers: AnalyzerMap) {
    this.analyzers = { ...analyzers };
  }

  /**
   * Look up the analyzer for a format tag or raw extension
   */
  get(tag: string): Analyzer | undefined {
    return isFormatTag(tag) ? this.analyzers[tag] : undefined;
  }

  /**
   * Every supported tag with the analyzer registered for it
   */
  async describe(): Promise<FormatSupport[]> {
    const entries: FormatSupport[] = [];
    for (const tag of FORMAT_TAGS) {
      const analyzer = this.analyzers[tag];
      entries.push({
        tag,
        format: analyzer?.format ?? 'none',
        library: analyzer?.library,
        available: analyzer ? await analyzer.checkAvailability() : false,
      });
    }
    return entries;
  }
}

/**
 * Default analyzer for every supported tag. One instance serves all tags of
 * the same format.
 */
export function defaultAnalyzers(logger: Logger = silentLogger): Record<FormatTag, Analyzer> {
  const text = new TextAnalyzer(logger);
  const pdf = new PdfAnalyzer(logger);
  const word = new WordAnalyzer(logger);
  const excel = new ExcelAnalyzer(logger);
  const html = new HtmlAnalyzer(logger);
  const xml = new XmlAnalyzer(logger);

  return {
    '.txt': text,
    '.md': text,
    '.markdown': text,
    '.pdf': pdf,
    '.doc': word,
    '.docx': word,
    '.xlsx': excel,
    '.xls': excel,
    '.html': html,
    '.htm': html,
    '.xml': xml,
  };
}

/**
 * Build the registry, replacing analyzers whose parsing library cannot be
 * loaded with stand-ins that report the missing package
 */
export async function createAnalyzerRegistry(
  options: { logger?: Logger; analyzers?: AnalyzerMap } = {}
): Promise<AnalyzerRegistry> {
  const logger = options.logger ?? silentLogger;
  const candidates: AnalyzerMap = options.analyzers ?? defaultAnalyzers(logger);
  const resolved: AnalyzerMap = {};
  const checked = new Map<Analyzer, Analyzer>();

  for (const tag of FORMAT_TAGS) {
    const analyzer = candidates[tag];
    if (!analyzer) continue;

    let usable = checked.get(analyzer);
    if (!usable) {
      if (await analyzer.checkAvailability()) {
        usable = analyzer;
      } else {
        logger.warn('analyze', `${analyzer.library ?? analyzer.format} not available. ${analyzer.format} analysis will be limited.`);
        usable = new UnavailableAnalyzer(analyzer.format, analyzer.library ?? analyzer.format);
      }
      checked.set(analyzer, usable);
    }
    resolved[tag] = usable;
  }

  return new AnalyzerRegistry(resolved);
}
