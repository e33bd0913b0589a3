/**
 * AI analyzer
 * Summaries and insights over an ordered provider chain, with heuristic
 * fallbacks when no provider is configured or every provider fails
 */

import { createProviderChain } from '../adapters/index.js';
import type { Config } from '../config/schema.js';
import type {
  CompletionProvider,
  DocumentAI,
  PortfolioAI,
  ProjectDigest,
  ProjectDocumentDigest,
  ProviderName,
} from '../types/ai.js';
import type { AnalysisMode, DocumentContext, ProjectStats } from '../types/document.js';
import { NoProviderError, ProviderChainError, ProviderError, errorMessage } from '../types/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { countWords } from './orchestrator.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const MAX_PROMPT_CONTENT = 4000;
export const MIN_SUMMARY_CONTENT = 50;
export const MIN_ANALYSIS_CONTENT = 20;

export const TOKEN_LIMITS = {
  summary: 60,
  analysis: 150,
  project: 200,
  crossProject: 250,
} as const;

export const TOO_SHORT_FOR_SUMMARY = 'Content too short for meaningful summary';
export const TOO_SHORT_FOR_ANALYSIS = 'Content too short for analysis';
export const NO_AI_SUMMARY = 'No AI available for summarization';

export interface AIAnalyzerOptions {
  /** Providers to try, in order */
  providers: CompletionProvider[];
  logger?: Logger;
  /** Character budget requested for summaries */
  summaryMaxLength?: number;
  mode?: AnalysisMode;
}

// ---------------------------------------------------------------------------
// Prompt helpers
// ---------------------------------------------------------------------------

function truncateContent(content: string): string {
  return content.length > MAX_PROMPT_CONTENT ? content.slice(0, MAX_PROMPT_CONTENT) + '...' : content;
}

function documentContextLine(context: DocumentContext, withSection: boolean): string {
  if (!context.projectName) return '';
  let line = `\nProject Context: This document belongs to the '${context.projectName}' project`;
  if (withSection && context.subfolderPath) {
    line += ` in the '${context.subfolderPath}' section`;
  }
  return line + '. ';
}

function analysisFocus(mode: AnalysisMode): string {
  if (mode === 'quantitative') {
    return `1. Document type and purpose
2. Size and structure metrics (sections, tables, lists)
3. Figures, measurements or data points mentioned
4. Completeness and data quality`;
  }
  return `1. Document type and purpose
2. Key topics or themes
3. Structure and organization
4. Notable characteristics`;
}

export function buildSummaryPrompt(content: string, maxLength: number, context: DocumentContext = {}): string {
  return `Please provide a concise summary of the following content in ${maxLength} characters or less:${documentContextLine(context, false)}

${content}

Summary:`;
}

export function buildAnalysisPrompt(
  content: string,
  filename: string,
  context: DocumentContext = {},
  mode: AnalysisMode = 'qualitative'
): string {
  return `Analyze the following document content from file "${filename}" and provide insights about:
${analysisFocus(mode)}${documentContextLine(context, true)}

Content:
${content}

Analysis:`;
}

function sectionList(subfolders: string[]): string {
  return subfolders.length > 0 ? subfolders.join(', ') : 'root level only';
}

export function buildProjectPrompt(
  projectName: string,
  stats: ProjectStats,
  documents: ProjectDocumentDigest[],
  mode: AnalysisMode = 'qualitative'
): string {
  const overview = [
    `Project: ${projectName}`,
    `Files: ${stats.fileCount} files (${Object.keys(stats.extensions).join(', ')})`,
    `Structure: ${stats.subfolders.length} subfolders: ${sectionList(stats.subfolders)}`,
  ];

  const summaries = documents
    .filter((doc) => doc.summary)
    .slice(0, 20)
    .map((doc) => `- ${doc.name} (${doc.subfolderPath || 'root'}, ${doc.wordCount} words): ${doc.summary}`);
  if (summaries.length > 0) {
    overview.push('', 'Document summaries:', ...summaries);
  }

  const focus =
    mode === 'quantitative'
      ? `1. Volume and distribution of documents
2. Format mix and what it implies
3. Coverage gaps by section
4. Overall project metrics`
      : `1. Project purpose and scope assessment
2. Documentation quality and organization
3. Potential gaps or recommendations
4. Overall project characteristics`;

  return `Analyze the following project and provide insights:

${overview.join('\n')}

Based on the project structure and file types, provide:
${focus}

Analysis:`;
}

export function buildCrossProjectPrompt(projects: ProjectDigest[], mode: AnalysisMode = 'qualitative'): string {
  const lines = projects.map(
    ({ name, stats }) =>
      `- ${name}: ${stats.fileCount} files, ${stats.subfolders.length} sections, types: ${Object.keys(stats.extensions).join(', ')}`
  );
  const totalFiles = projects.reduce((sum, project) => sum + project.stats.fileCount, 0);

  const focus =
    mode === 'quantitative'
      ? `1. File counts and sizes compared across projects
2. Format distribution per project
3. Section depth and structure metrics
4. Outliers in volume or coverage
5. Overall portfolio metrics`
      : `1. Project similarities and differences
2. Documentation patterns across projects
3. Potential standardization opportunities
4. Cross-project relationships or dependencies
5. Overall portfolio assessment`;

  return `Perform cross-project analysis of the following projects:

Projects Overview:
${lines.join('\n')}

Total: ${projects.length} projects, ${totalFiles} files

Provide insights on:
${focus}

Cross-Project Analysis:`;
}

// ---------------------------------------------------------------------------
// Heuristic fallbacks
// ---------------------------------------------------------------------------

/**
 * First sentence of the content, cut to maxLength
 */
export function fallbackSummary(content: string, maxLength: number): string {
  const [first = ''] = content.replace(/\n/g, ' ').split('. ');
  if (!first.trim()) {
    return NO_AI_SUMMARY;
  }
  return first.length > maxLength ? first.slice(0, maxLength - 3) + '...' : first;
}

/**
 * Basic structural description of the content
 */
export function fallbackAnalysis(content: string, filename: string): string {
  const ext = filename.includes('.') ? (filename.split('.').pop() ?? '').toLowerCase() : 'unknown';

  let analysis = 'Document Analysis (Basic):\n';
  analysis += `- File type: ${ext.toUpperCase()}\n`;
  analysis += `- Content length: ${content.length} characters, ${countWords(content)} words\n`;

  if (content.toLowerCase().includes('table') || content.includes('|')) {
    analysis += '- Contains structured data (tables)\n';
  }
  if (['#', 'Chapter', 'Section'].some((marker) => content.includes(marker))) {
    analysis += '- Contains headings/sections\n';
  }

  return analysis + '\nNote: Full AI analysis requires API configuration';
}

// ---------------------------------------------------------------------------
// Analyzer
// ---------------------------------------------------------------------------

export class AIAnalyzer implements DocumentAI, PortfolioAI {
  private readonly providers: CompletionProvider[];
  private readonly logger: Logger;
  private readonly summaryMaxLength: number;
  private readonly mode: AnalysisMode;

  constructor(options: AIAnalyzerOptions) {
    this.providers = [...options.providers];
    this.logger = options.logger ?? silentLogger;
    this.summaryMaxLength = options.summaryMaxLength ?? 200;
    this.mode = options.mode ?? 'qualitative';
  }

  /**
   * Whether at least one provider is configured
   */
  isAvailable(): boolean {
    return this.providers.length > 0;
  }

  availableProviders(): ProviderName[] {
    return this.providers.map((provider) => provider.name);
  }

  /**
   * Run a prompt through the chain. Each attempt is contained; the first
   * success wins.
   *
   * @throws NoProviderError when the chain is empty
   * @throws ProviderChainError when every provider failed
   */
  async complete(prompt: string, maxTokens: number): Promise<string> {
    if (this.providers.length === 0) {
      throw new NoProviderError();
    }

    const failures: ProviderError[] = [];
    for (const provider of this.providers) {
      try {
        const text = await provider.complete(prompt, maxTokens);
        this.logger.debug('ai', `${provider.name} answered (${text.length} chars)`);
        return text;
      } catch (error) {
        const failure =
          error instanceof ProviderError ? error : new ProviderError(provider.name, errorMessage(error));
        this.logger.warn('ai', `AI provider failed: ${failure.message}`);
        failures.push(failure);
      }
    }
    throw new ProviderChainError(failures);
  }

  async summarize(text: string, context: DocumentContext = {}): Promise<string> {
    if (!text || text.trim().length < MIN_SUMMARY_CONTENT) {
      return TOO_SHORT_FOR_SUMMARY;
    }

    const content = truncateContent(text);
    if (!this.isAvailable()) {
      return fallbackSummary(content, this.summaryMaxLength);
    }

    try {
      return await this.complete(buildSummaryPrompt(content, this.summaryMaxLength, context), TOKEN_LIMITS.summary);
    } catch (error) {
      this.logger.error('ai', `AI summarization failed: ${errorMessage(error)}`);
      return fallbackSummary(content, this.summaryMaxLength);
    }
  }

  async analyze(text: string, filename: string, context: DocumentContext = {}): Promise<string> {
    if (!text || text.trim().length < MIN_ANALYSIS_CONTENT) {
      return TOO_SHORT_FOR_ANALYSIS;
    }

    const content = truncateContent(text);
    if (!this.isAvailable()) {
      return fallbackAnalysis(content, filename);
    }

    try {
      return await this.complete(buildAnalysisPrompt(content, filename, context, this.mode), TOKEN_LIMITS.analysis);
    } catch (error) {
      this.logger.error('ai', `AI analysis failed: ${errorMessage(error)}`);
      return fallbackAnalysis(content, filename);
    }
  }

  async analyzeProject(
    projectName: string,
    stats: ProjectStats,
    documents: ProjectDocumentDigest[] = [],
    mode: AnalysisMode = this.mode
  ): Promise<string> {
    if (stats.fileCount === 0) {
      return `No files found for project '${projectName}'`;
    }

    if (!this.isAvailable()) {
      return `Project '${projectName}' contains ${stats.fileCount} files across ${stats.subfolders.length} sections. Requires AI for detailed analysis.`;
    }

    try {
      return await this.complete(buildProjectPrompt(projectName, stats, documents, mode), TOKEN_LIMITS.project);
    } catch (error) {
      this.logger.error('ai', `Project analysis failed: ${errorMessage(error)}`);
      return `Project '${projectName}' analysis unavailable due to error: ${errorMessage(error)}`;
    }
  }

  async analyzeCrossProject(projects: ProjectDigest[], mode: AnalysisMode = this.mode): Promise<string> {
    if (projects.length === 0) {
      return 'No projects found for cross-analysis';
    }

    const totalFiles = projects.reduce((sum, project) => sum + project.stats.fileCount, 0);
    if (!this.isAvailable()) {
      return `Cross-project analysis of ${projects.length} projects with ${totalFiles} total files. Requires AI for detailed insights.`;
    }

    try {
      return await this.complete(buildCrossProjectPrompt(projects, mode), TOKEN_LIMITS.crossProject);
    } catch (error) {
      this.logger.error('ai', `Cross-project analysis failed: ${errorMessage(error)}`);
      return `Cross-project analysis unavailable due to error: ${errorMessage(error)}`;
    }
  }
}

/**
 * Build an analyzer over the providers the config enables and has
 * credentials for
 */
export function createAIAnalyzer(
  config: Config,
  options: { logger?: Logger; env?: NodeJS.ProcessEnv } = {}
): AIAnalyzer {
  return new AIAnalyzer({
    providers: createProviderChain(config, options.env),
    logger: options.logger,
    summaryMaxLength: config.analysis.summary_max_length,
    mode: config.analysis.mode,
  });
}
