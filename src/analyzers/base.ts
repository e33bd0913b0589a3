/**
 * Shared helpers for format analyzers
 */

import type { DocumentMetadata } from '../types/document.js';
import type { Analyzer } from './types.js';

/**
 * Memoize a dynamic import so the parsing library loads at most once
 */
export function lazyModule<T>(load: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | undefined;
  return () => {
    pending ??= load();
    return pending;
  };
}

/**
 * Resolve true when the loader succeeds
 */
export async function canLoad(load: () => Promise<unknown>): Promise<boolean> {
  try {
    await load();
    return true;
  } catch {
    return false;
  }
}

/**
 * Keep string-valued fields only, dropping empty strings
 */
export function pickStrings(
  source: Record<string, unknown>,
  mapping: Record<string, string>
): DocumentMetadata {
  const picked: DocumentMetadata = {};
  for (const [sourceKey, targetKey] of Object.entries(mapping)) {
    const value = source[sourceKey];
    if (typeof value === 'string' && value.trim() !== '') {
      picked[targetKey] = value;
    } else if (value instanceof Date && !Number.isNaN(value.getTime())) {
      picked[targetKey] = value.toISOString();
    }
  }
  return picked;
}

/**
 * Stand-in for an analyzer whose parsing library cannot be loaded
 */
export class UnavailableAnalyzer implements Analyzer {
  readonly format: string;
  readonly library?: string;

  constructor(format: string, library: string) {
    this.format = format;
    this.library = library;
  }

  async extractText(): Promise<string> {
    return `${this.format} analysis requires the ${this.library} package`;
  }

  async extractMetadata(): Promise<DocumentMetadata> {
    return { error: `${this.library} not available` };
  }

  async checkAvailability(): Promise<boolean> {
    return false;
  }
}
