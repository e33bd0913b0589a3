/**
 * File classification by extension
 */

import path from 'node:path';
import { FORMAT_TAGS, type FormatTag } from '../types/document.js';

const SUPPORTED = new Set<string>(FORMAT_TAGS);

/**
 * Narrow a raw extension to a supported format tag
 */
export function isFormatTag(value: string): value is FormatTag {
  return SUPPORTED.has(value);
}

/**
 * Lowercase extension of a path including the dot, or '' when there is none
 */
export function fileExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/**
 * Map a path to its format tag
 *
 * @param filePath - Any path; only the final suffix is inspected
 * @returns The format tag, or null for unsupported or missing extensions
 */
export function classifyFile(filePath: string): FormatTag | null {
  const ext = fileExtension(filePath);
  return isFormatTag(ext) ? ext : null;
}

/**
 * Whether the path has a supported extension
 */
export function isSupportedFile(filePath: string): boolean {
  return classifyFile(filePath) !== null;
}
