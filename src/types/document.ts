/**
 * Document survey types
 * Records, analysis results and aggregate statistics shared by the scanner,
 * the analyzers and the report generator
 */

import { z } from 'zod';

/**
 * Closed set of file suffixes the survey understands
 */
export const FORMAT_TAGS = [
  '.doc',
  '.docx',
  '.pdf',
  '.txt',
  '.html',
  '.htm',
  '.md',
  '.markdown',
  '.xlsx',
  '.xls',
  '.xml',
] as const;

export const FormatTagSchema = z.enum(FORMAT_TAGS);
export type FormatTag = z.infer<typeof FormatTagSchema>;

/**
 * How the AI collaborator should read documents
 */
export const AnalysisModeSchema = z.enum(['qualitative', 'quantitative']);
export type AnalysisMode = z.infer<typeof AnalysisModeSchema>;

/**
 * One discovered file with a supported extension
 */
export interface FileRecord {
  readonly path: string;
  readonly name: string;
  /** Lowercase suffix including the dot */
  readonly extension: string;
  readonly size: number;
  readonly created: Date;
  readonly modified: Date;
  readonly isReadable: boolean;
  /** Empty when the file is readable */
  readonly errorMessage: string;
  readonly projectName?: string;
  readonly relativePath?: string;
  /** Directories between the project folder and the file, '/'-joined; '' at the project root */
  readonly subfolderPath?: string;
}

/**
 * Resolved position of a file inside the surveyed tree
 */
export interface ProjectLocation {
  projectName?: string;
  relativePath?: string;
  subfolderPath?: string;
}

/**
 * Project name to its records, in discovery order
 */
export type ProjectIndex = Map<string, FileRecord[]>;

/**
 * Format-specific metadata. Keys vary by analyzer; failures carry an `error` key.
 */
export type DocumentMetadata = Record<string, unknown>;

/**
 * Outcome of analyzing one FileRecord
 */
export interface AnalysisResult {
  fileInfo: FileRecord;
  contentPreview: string;
  wordCount: number;
  metadata: DocumentMetadata;
  summary?: string;
  insights?: string;
  /** Empty on success */
  error: string;
}

/**
 * Aggregate counts over all records of a scan
 */
export interface DirectoryStats {
  extensions: Record<string, number>;
  totalFiles: number;
  totalSize: number;
  totalProjects: number;
}

/**
 * Aggregate counts for one project
 */
export interface ProjectStats {
  fileCount: number;
  totalSize: number;
  extensions: Record<string, number>;
  /** Distinct non-empty subfolder paths in first-seen order */
  subfolders: string[];
}

/**
 * Fresh bundle produced by one scan
 */
export interface ScanResult {
  root: string;
  records: FileRecord[];
  projects: ProjectIndex;
  /** Set when the root could not be scanned at all */
  error?: string;
}

/**
 * Project context passed to the AI collaborator
 */
export interface DocumentContext {
  projectName?: string;
  subfolderPath?: string;
}
