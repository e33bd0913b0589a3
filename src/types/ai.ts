/**
 * AI collaborator types
 */

import { z } from 'zod';
import type { AnalysisMode, DocumentContext, ProjectStats } from './document.js';

export const ProviderNameSchema = z.enum(['replicate', 'openai', 'anthropic', 'gemini']);
export type ProviderName = z.infer<typeof ProviderNameSchema>;

export const PROVIDER_NAMES = ProviderNameSchema.options;

/**
 * Text completion against one hosted model
 */
export interface CompletionProvider {
  readonly name: ProviderName;
  complete(prompt: string, maxTokens: number): Promise<string>;
}

/**
 * Per-document capability used by the orchestrator
 */
export interface DocumentAI {
  summarize(text: string, context?: DocumentContext): Promise<string>;
  analyze(text: string, filename: string, context?: DocumentContext): Promise<string>;
}

/**
 * One document's contribution to a project-level prompt
 */
export interface ProjectDocumentDigest {
  name: string;
  subfolderPath: string;
  wordCount: number;
  summary?: string;
}

/**
 * Project-level input for cross-project analysis
 */
export interface ProjectDigest {
  name: string;
  stats: ProjectStats;
}

/**
 * Report-level capability used by the report generator
 */
export interface PortfolioAI {
  analyzeProject(
    projectName: string,
    stats: ProjectStats,
    documents: ProjectDocumentDigest[],
    mode?: AnalysisMode
  ): Promise<string>;
  analyzeCrossProject(projects: ProjectDigest[], mode?: AnalysisMode): Promise<string>;
}
