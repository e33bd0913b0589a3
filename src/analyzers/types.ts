/**
 * Analyzer capability shared by every document format
 */

import type { DocumentMetadata } from '../types/document.js';

/**
 * Extracts text and metadata from one document format.
 *
 * Neither method rejects: read and parse failures are reported inside the
 * returned text or under an `error` metadata key.
 */
export interface Analyzer {
  /** Human-readable format name, e.g. "PDF" */
  readonly format: string;
  /** npm package the analyzer parses with, if any */
  readonly library?: string;
  extractText(filePath: string): Promise<string>;
  extractMetadata(filePath: string): Promise<DocumentMetadata>;
  /** Resolves false when the parsing library cannot be loaded */
  checkAvailability(): Promise<boolean>;
}
