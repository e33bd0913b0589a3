/**
 * Tests for the analyzer registry
 */

import { describe, it, expect } from 'vitest';
import { UnavailableAnalyzer } from '../../src/analyzers/base.js';
import { AnalyzerRegistry, createAnalyzerRegistry, defaultAnalyzers } from '../../src/analyzers/registry.js';
import type { Analyzer } from '../../src/analyzers/types.js';
import { FORMAT_TAGS } from '../../src/types/document.js';
import { RunLogger } from '../../src/workflow/run-logger.js';

function stubAnalyzer(available: boolean): Analyzer {
  return {
    format: 'Stub',
    library: 'stub-lib',
    extractText: async () => 'stub text',
    extractMetadata: async () => ({ fileType: 'stub' }),
    checkAvailability: async () => available,
  };
}

describe('defaultAnalyzers', () => {
  it('should cover every format tag', () => {
    const analyzers = defaultAnalyzers();
    for (const tag of FORMAT_TAGS) {
      expect(analyzers[tag]).toBeDefined();
    }
  });

  it('should share one instance per format', () => {
    const analyzers = defaultAnalyzers();
    expect(analyzers['.md']).toBe(analyzers['.txt']);
    expect(analyzers['.htm']).toBe(analyzers['.html']);
    expect(analyzers['.xls']).toBe(analyzers['.xlsx']);
  });
});

describe('AnalyzerRegistry', () => {
  it('should return undefined for unknown extensions', () => {
    const registry = new AnalyzerRegistry({ '.txt': stubAnalyzer(true) });
    expect(registry.get('.png')).toBeUndefined();
    expect(registry.get('.pdf')).toBeUndefined();
    expect(registry.get('.txt')?.format).toBe('Stub');
  });

  it('should describe every tag', async () => {
    const registry = new AnalyzerRegistry({ '.txt': stubAnalyzer(true) });
    const formats = await registry.describe();

    expect(formats).toHaveLength(FORMAT_TAGS.length);
    expect(formats.find((entry) => entry.tag === '.txt')).toEqual({
      tag: '.txt',
      format: 'Stub',
      library: 'stub-lib',
      available: true,
    });
    expect(formats.find((entry) => entry.tag === '.pdf')).toEqual({
      tag: '.pdf',
      format: 'none',
      library: undefined,
      available: false,
    });
  });
});

describe('createAnalyzerRegistry', () => {
  it('should replace unavailable analyzers with stand-ins and warn once per analyzer', async () => {
    const missing = stubAnalyzer(false);
    const logger = new RunLogger();
    const registry = await createAnalyzerRegistry({
      logger,
      analyzers: { '.xlsx': missing, '.xls': missing, '.txt': stubAnalyzer(true) },
    });

    const standIn = registry.get('.xlsx');
    expect(standIn).toBeInstanceOf(UnavailableAnalyzer);
    expect(registry.get('.xls')).toBe(standIn);
    expect(await standIn?.extractText('/any.xlsx')).toBe('Stub analysis requires the stub-lib package');
    expect(await standIn?.extractMetadata('/any.xlsx')).toEqual({ error: 'stub-lib not available' });
    expect(registry.get('.txt')?.format).toBe('Stub');
    expect(logger.getEntries().filter((entry) => entry.level === 'warn')).toHaveLength(1);
  });

  it('should load every default analyzer when dependencies are installed', async () => {
    const registry = await createAnalyzerRegistry();
    const formats = await registry.describe();
    expect(formats.every((entry) => entry.available)).toBe(true);
  });
});
