/**
 * Report generator
 * Renders the markdown reports for an analysis run and writes them into a
 * per-run session directory
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { PortfolioAI, ProjectDigest, ProjectDocumentDigest } from '../types/ai.js';
import type {
  AnalysisMode,
  AnalysisResult,
  DirectoryStats,
  ProjectIndex,
  ProjectStats,
} from '../types/document.js';
import { errorMessage } from '../types/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Everything one run produced, as the reports need it
 */
export interface ReportInput {
  /** Surveyed directory */
  root: string;
  results: AnalysisResult[];
  projects: ProjectIndex;
  projectStats: Map<string, ProjectStats>;
  directoryStats: DirectoryStats;
  mode: AnalysisMode;
}

/**
 * Outcome of asking the AI collaborator about a project or the portfolio
 */
export type InsightOutcome =
  | { kind: 'analysis'; text: string }
  | { kind: 'unavailable' }
  | { kind: 'error'; message: string };

export interface PortfolioInsights {
  projects: Map<string, InsightOutcome>;
  crossProject: InsightOutcome;
}

export interface GeneratedReports {
  sessionDir: string;
  comprehensive: string;
  overview: string;
  projects: string[];
  crossProject: string;
  json?: string;
}

export interface ReportGeneratorOptions {
  /** Base directory; session directories are created beneath it */
  reportsDir: string;
  /** Without it, AI sections say the analysis is unavailable */
  ai?: PortfolioAI;
  /** Also write the machine-readable bundle */
  json?: boolean;
  logger?: Logger;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'] as const;

/**
 * Human readable byte count with one decimal
 */
export function formatSize(sizeBytes: number): string {
  if (sizeBytes === 0) {
    return '0 B';
  }

  let size = sizeBytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) {
      return `${size.toFixed(1)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function dateParts(now: Date): { dd: string; mm: string; yy: string; HH: string; MM: string } {
  return {
    dd: pad(now.getDate()),
    mm: pad(now.getMonth() + 1),
    yy: pad(now.getFullYear() % 100),
    HH: pad(now.getHours()),
    MM: pad(now.getMinutes()),
  };
}

/**
 * `<root>_<dd_mm_yy_HH_MM>`
 */
export function sessionDirName(root: string, now: Date): string {
  const { dd, mm, yy, HH, MM } = dateParts(now);
  return `${path.basename(root)}_${dd}_${mm}_${yy}_${HH}_${MM}`;
}

/**
 * `HH_MM_dd_mm_yy`, used in report file names
 */
export function reportTimestamp(now: Date): string {
  const { dd, mm, yy, HH, MM } = dateParts(now);
  return `${HH}_${MM}_${dd}_${mm}_${yy}`;
}

/**
 * `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatGenerated(now: Date): string {
  return (
    `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())} ` +
    `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`
  );
}

/**
 * Capitalize the first letter of every word, lowercase the rest
 */
export function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

function sectionNames(stats: ProjectStats | undefined): string {
  return stats && stats.subfolders.length > 0 ? stats.subfolders.join(', ') : 'root';
}

function extensionList(stats: ProjectStats | undefined): string {
  return stats ? Object.keys(stats.extensions).join(', ') : '';
}

function totalWords(results: readonly AnalysisResult[]): number {
  return results.reduce((sum, result) => sum + result.wordCount, 0);
}

function resultsFor(results: readonly AnalysisResult[], projectName: string): AnalysisResult[] {
  return results.filter((result) => result.fileInfo.projectName === projectName);
}

function projectAnalysisSection(outcome: InsightOutcome | undefined): string {
  switch (outcome?.kind) {
    case 'analysis':
      return `### AI Project Analysis\n\n${outcome.text}\n\n`;
    case 'error':
      return `### Project Analysis\n\nAnalysis error: ${outcome.message}\n\n`;
    default:
      return '### Project Analysis\n\nAI analysis unavailable - requires API configuration.\n\n';
  }
}

function crossProjectText(outcome: InsightOutcome): string {
  switch (outcome.kind) {
    case 'analysis':
      return outcome.text;
    case 'error':
      return `Cross-project analysis error: ${outcome.message}`;
    default:
      return 'AI cross-project analysis unavailable - requires API configuration.';
  }
}

// ---------------------------------------------------------------------------
// Renderers
// ---------------------------------------------------------------------------

function renderDocumentDetails(result: AnalysisResult, analysisLabel: string): string {
  const record = result.fileInfo;
  let content = `#### ${record.name}\n`;
  content += `**Location:** \`${record.relativePath ?? record.name}\`  \n`;
  content += `**Type:** ${record.extension.toUpperCase()}  \n`;
  content += `**Size:** ${formatSize(record.size)}  \n`;
  content += `**Words:** ${formatCount(result.wordCount)}\n\n`;
  if (result.summary) {
    content += `**Summary:** ${result.summary}\n\n`;
  }
  if (result.insights) {
    content += `**${analysisLabel}:** ${result.insights}\n\n`;
  }
  return content + '---\n\n';
}

function renderUnorganized(results: readonly AnalysisResult[]): string {
  const successful = results.filter((result) => !result.error).length;
  const fileTypes = new Map<string, number>();
  for (const result of results) {
    const ext = result.fileInfo.extension.toUpperCase();
    fileTypes.set(ext, (fileTypes.get(ext) ?? 0) + 1);
  }

  let content = '## Documents Analysis\n\n';
  content += `**Total Files:** ${results.length}  \n`;
  content += `**Successful Analyses:** ${successful}  \n`;
  content += `**Total Words:** ${formatCount(totalWords(results))}\n\n`;
  content += `**File Types:** ${[...fileTypes].map(([ext, count]) => `${ext}(${count})`).join(', ')}\n\n`;
  content += '### Document Details\n\n';

  for (const result of results) {
    if (result.error) {
      content += `#### ${result.fileInfo.name} (Error)\n**Error:** ${result.error}\n\n---\n\n`;
      continue;
    }
    content += renderDocumentDetails(result, 'AI Analysis');
  }
  return content;
}

function renderTechnicalAppendix(input: ReportInput): string {
  let content = '## Technical Appendix\n\n';

  const errors = input.results.filter((result) => result.error);
  if (errors.length > 0) {
    content += '### Processing Errors\n\n';
    for (const result of errors) {
      content += `- **${result.fileInfo.name}:** ${result.error}\n`;
    }
    content += '\n';
  }

  content += '### Detailed Statistics\n\n';
  for (const [projectName, stats] of input.projectStats) {
    content += `#### ${projectName}\n`;
    content += `- Files: ${stats.fileCount}\n`;
    content += `- Total Size: ${formatSize(stats.totalSize)}\n`;
    content += `- Sections: ${sectionNames(stats)}\n`;

    const extensions = Object.entries(stats.extensions);
    if (extensions.length > 0) {
      content += '- File Types:\n';
      for (const [ext, count] of extensions) {
        content += `  - ${ext.toUpperCase()}: ${count}\n`;
      }
    }
    content += '\n';
  }

  return content;
}

/**
 * Full report: executive summary, one section per project and a technical
 * appendix
 */
export function renderComprehensive(input: ReportInput, insights: PortfolioInsights, now: Date): string {
  const rootName = path.basename(input.root);

  let content = `# Comprehensive Document Analysis Report
## ${rootName}

**Generated:** ${formatGenerated(now)}
**Analysis Mode:** ${titleCase(input.mode)}
**Directory:** \`${input.root}\`

---

## Executive Summary

This comprehensive analysis covers **${input.projects.size} projects** containing **${input.results.length} documents** with a total of **${formatCount(totalWords(input.results))} words**.

### Projects Overview
`;

  for (const projectName of input.projects.keys()) {
    const stats = input.projectStats.get(projectName);
    content += `\n- **${projectName}:** ${stats?.fileCount ?? 0} files, ${stats?.subfolders.length ?? 0} sections\n`;
  }

  content += '\n---\n\n';

  if (input.projects.size > 0) {
    for (const projectName of input.projects.keys()) {
      const stats = input.projectStats.get(projectName);

      content += `## Project: ${projectName}\n\n`;
      content += `**Files:** ${stats?.fileCount ?? 0}  \n`;
      content += `**Sections:** ${sectionNames(stats)}\n`;
      content += `**File Types:** ${extensionList(stats)}\n\n`;
      content += projectAnalysisSection(insights.projects.get(projectName));
      content += `### Documents in ${projectName}\n\n`;

      for (const result of resultsFor(input.results, projectName)) {
        if (result.error) continue;
        content += renderDocumentDetails(result, 'Analysis');
      }
    }
  } else {
    content += renderUnorganized(input.results);
  }

  return content + renderTechnicalAppendix(input);
}

/**
 * Portfolio overview: quick stats, per-project breakdown and the
 * cross-project analysis
 */
export function renderOverview(input: ReportInput, insights: PortfolioInsights, now: Date): string {
  const extensions = new Set(input.results.map((result) => result.fileInfo.extension));

  let content = `# Portfolio Overview Report
## ${path.basename(input.root)}

**Generated:** ${formatGenerated(now)}
**Directory:** \`${input.root}\`

---

## Portfolio Summary

### Quick Stats
- **Projects:** ${input.projects.size}
- **Total Documents:** ${input.results.length}
- **Total Words:** ${formatCount(totalWords(input.results))}
- **File Types:** ${extensions.size}

### Project Breakdown
`;

  for (const projectName of input.projects.keys()) {
    const stats = input.projectStats.get(projectName);
    const words = totalWords(resultsFor(input.results, projectName));

    content += `\n#### ${projectName}\n`;
    content += `- **Documents:** ${stats?.fileCount ?? 0}\n`;
    content += `- **Sections:** ${stats?.subfolders.length ?? 0}\n`;
    content += `- **Word Count:** ${formatCount(words)}\n`;
    content += `- **File Types:** ${extensionList(stats)}\n`;
  }

  content += '\n---\n\n## Cross-Project Analysis\n\n';
  return content + crossProjectText(insights.crossProject);
}

/**
 * Report for one project, documents grouped by section
 */
export function renderProject(
  input: ReportInput,
  projectName: string,
  insight: InsightOutcome | undefined,
  now: Date
): string {
  const stats = input.projectStats.get(projectName);
  const projectResults = resultsFor(input.results, projectName);

  let content = `# Project Report: ${projectName}

**Generated:** ${formatGenerated(now)}
**Parent Directory:** \`${input.root}\`

---

## Project Overview

**Files:** ${stats?.fileCount ?? 0}
**Sections:** ${sectionNames(stats)}
**File Types:** ${extensionList(stats)}
**Total Words:** ${formatCount(totalWords(projectResults))}

## Project Analysis

`;

  content += projectAnalysisSection(insight);
  content += '\n## Document Details\n\n';

  const bySection = new Map<string, AnalysisResult[]>();
  for (const result of projectResults) {
    const section = result.fileInfo.subfolderPath || 'root';
    const group = bySection.get(section) ?? [];
    group.push(result);
    bySection.set(section, group);
  }

  for (const [section, sectionResults] of bySection) {
    content += `### ${titleCase(section)} Section\n\n`;

    for (const result of sectionResults) {
      if (result.error) continue;
      content += `#### ${result.fileInfo.name}\n`;
      content += `**Type:** ${result.fileInfo.extension.toUpperCase()}  \n`;
      content += `**Words:** ${formatCount(result.wordCount)}  \n`;
      if (result.summary) {
        content += `**Summary:** ${result.summary}\n\n`;
      }
      if (result.insights) {
        content += `**Insights:** ${result.insights}\n\n`;
      }
      content += '---\n\n';
    }
  }

  return content;
}

/**
 * Cross-project report: AI analysis, size comparison and file-type
 * distribution
 */
export function renderCrossProject(input: ReportInput, insights: PortfolioInsights, now: Date): string {
  let content = `# Cross-Project Analysis Report
## ${path.basename(input.root)}

**Generated:** ${formatGenerated(now)}
**Directory:** \`${input.root}\`

---

## Portfolio Analysis

This report analyzes patterns, relationships, and insights across all ${input.projects.size} projects in the portfolio.

`;

  content += crossProjectText(insights.crossProject);
  content += '\n## Comparative Analysis\n\n';

  content += '### Project Size Comparison\n\n';
  const sizes = [...input.projectStats].map(([name, stats]) => ({ name, fileCount: stats.fileCount }));
  sizes.sort((a, b) => b.fileCount - a.fileCount);
  for (const { name, fileCount } of sizes) {
    content += `- **${name}:** ${fileCount} files\n`;
  }

  content += '\n### File Type Distribution\n\n';
  const distribution = new Map<string, number>();
  for (const stats of input.projectStats.values()) {
    for (const [ext, count] of Object.entries(stats.extensions)) {
      distribution.set(ext, (distribution.get(ext) ?? 0) + count);
    }
  }
  const ranked = [...distribution].sort((a, b) => b[1] - a[1]);
  for (const [ext, count] of ranked) {
    content += `- **${ext.toUpperCase()}:** ${count} files\n`;
  }

  return content;
}

/**
 * Machine-readable bundle of the whole run
 */
export function renderJsonBundle(input: ReportInput, now: Date): string {
  return JSON.stringify(
    {
      root: input.root,
      generatedAt: now.toISOString(),
      mode: input.mode,
      directoryStats: input.directoryStats,
      projectStats: Object.fromEntries(input.projectStats),
      results: input.results,
    },
    null,
    2
  );
}

// ---------------------------------------------------------------------------
// AI insights
// ---------------------------------------------------------------------------

function documentDigests(results: readonly AnalysisResult[]): ProjectDocumentDigest[] {
  return results
    .filter((result) => !result.error)
    .map((result) => ({
      name: result.fileInfo.name,
      subfolderPath: result.fileInfo.subfolderPath ?? '',
      wordCount: result.wordCount,
      summary: result.summary,
    }));
}

async function askAI(operation: () => Promise<string>): Promise<InsightOutcome> {
  try {
    return { kind: 'analysis', text: await operation() };
  } catch (error) {
    return { kind: 'error', message: errorMessage(error) };
  }
}

/**
 * Ask the AI collaborator about every project and the portfolio as a whole
 */
export async function collectInsights(input: ReportInput, ai?: PortfolioAI): Promise<PortfolioInsights> {
  const projects = new Map<string, InsightOutcome>();
  if (!ai) {
    return { projects, crossProject: { kind: 'unavailable' } };
  }

  const digests: ProjectDigest[] = [];
  for (const [projectName, stats] of input.projectStats) {
    const documents = documentDigests(resultsFor(input.results, projectName));
    projects.set(projectName, await askAI(() => ai.analyzeProject(projectName, stats, documents, input.mode)));
    digests.push({ name: projectName, stats });
  }

  const crossProject = await askAI(() => ai.analyzeCrossProject(digests, input.mode));
  return { projects, crossProject };
}

// ---------------------------------------------------------------------------
// Generator
// ---------------------------------------------------------------------------

/**
 * Writes every report of a run into one session directory
 */
export class ReportGenerator {
  private readonly options: ReportGeneratorOptions;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private sessionDir: string | null = null;

  constructor(options: ReportGeneratorOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Session directory for this generator, created on first use
   */
  async getSessionDirectory(root: string): Promise<string> {
    if (this.sessionDir === null) {
      const dir = path.resolve(this.options.reportsDir, sessionDirName(root, this.now()));
      await fs.mkdir(dir, { recursive: true });
      this.logger.info('report', `Created session directory: ${dir}`);
      this.sessionDir = dir;
    }
    return this.sessionDir;
  }

  private async write(dir: string, filename: string, content: string, label: string): Promise<string> {
    const filePath = path.join(dir, filename);
    await fs.writeFile(filePath, content, 'utf-8');
    this.logger.info('report', `${label} saved to: ${filePath}`);
    return filePath;
  }

  /**
   * Render and write all reports
   */
  async generate(input: ReportInput): Promise<GeneratedReports> {
    const dir = await this.getSessionDirectory(input.root);
    const now = this.now();
    const rootName = path.basename(input.root);
    const stamp = reportTimestamp(now);

    const insights = await collectInsights(input, this.options.ai);

    const comprehensive = await this.write(
      dir,
      `${rootName}_COMPREHENSIVE_AI_${stamp}.md`,
      renderComprehensive(input, insights, now),
      'Comprehensive report'
    );
    const overview = await this.write(
      dir,
      `${rootName}_OVERVIEW_AI_${stamp}.md`,
      renderOverview(input, insights, now),
      'Overview report'
    );

    const projects: string[] = [];
    for (const projectName of input.projects.keys()) {
      projects.push(
        await this.write(
          dir,
          `${rootName}_${projectName}_PROJECT_${stamp}.md`,
          renderProject(input, projectName, insights.projects.get(projectName), now),
          'Project report'
        )
      );
    }

    const crossProject = await this.write(
      dir,
      `${rootName}_CROSS_PROJECT_ANALYSIS_${stamp}.md`,
      renderCrossProject(input, insights, now),
      'Cross-project analysis report'
    );

    const reports: GeneratedReports = { sessionDir: dir, comprehensive, overview, projects, crossProject };
    if (this.options.json) {
      reports.json = await this.write(dir, `${rootName}_ANALYSIS_${stamp}.json`, renderJsonBundle(input, now), 'JSON bundle');
    }

    this.logger.success('report', `Generated ${projects.length + 3} reports in ${dir}`);
    return reports;
  }
}
