/**
 * Tests for the AI analyzer and its fallbacks
 */

import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { setProviderEnabled } from '../../src/config/providers.js';
import type { CompletionProvider, ProjectDocumentDigest, ProviderName } from '../../src/types/ai.js';
import type { ProjectStats } from '../../src/types/document.js';
import { NoProviderError, ProviderChainError, ProviderError } from '../../src/types/errors.js';
import {
  AIAnalyzer,
  NO_AI_SUMMARY,
  TOKEN_LIMITS,
  TOO_SHORT_FOR_ANALYSIS,
  TOO_SHORT_FOR_SUMMARY,
  buildAnalysisPrompt,
  buildCrossProjectPrompt,
  buildProjectPrompt,
  buildSummaryPrompt,
  createAIAnalyzer,
  fallbackAnalysis,
  fallbackSummary,
} from '../../src/workflow/ai-analyzer.js';
import { RunLogger } from '../../src/workflow/run-logger.js';

const NOTES = 'Quarterly planning notes for the harbor project. Budget approved by the board.';

function fakeProvider(name: ProviderName, reply: (prompt: string) => Promise<string>) {
  const complete = vi.fn(async (prompt: string, _maxTokens: number) => reply(prompt));
  const provider: CompletionProvider = { name, complete };
  return { provider, complete };
}

function stats(overrides: Partial<ProjectStats> = {}): ProjectStats {
  return { fileCount: 3, totalSize: 300, extensions: { '.md': 2, '.pdf': 1 }, subfolders: ['specs', 'notes'], ...overrides };
}

describe('fallbackSummary', () => {
  it('should return the first sentence', () => {
    expect(fallbackSummary(NOTES, 200)).toBe('Quarterly planning notes for the harbor project');
  });

  it('should cut long sentences to the limit', () => {
    expect(fallbackSummary('The first sentence is here. Second.', 10)).toBe('The fir...');
  });

  it('should report blank content', () => {
    expect(fallbackSummary('   ', 200)).toBe(NO_AI_SUMMARY);
  });
});

describe('fallbackAnalysis', () => {
  it('should describe size and structure', () => {
    expect(fallbackAnalysis('# Title\n| a | b |', 'notes.md')).toBe(
      'Document Analysis (Basic):\n' +
        '- File type: MD\n' +
        '- Content length: 17 characters, 7 words\n' +
        '- Contains structured data (tables)\n' +
        '- Contains headings/sections\n' +
        '\nNote: Full AI analysis requires API configuration'
    );
  });

  it('should use unknown for names without an extension', () => {
    expect(fallbackAnalysis('plain words only', 'README')).toContain('- File type: UNKNOWN\n');
  });
});

describe('prompt builders', () => {
  it('should include project context in summary prompts', () => {
    const prompt = buildSummaryPrompt('Body text', 120, { projectName: 'harbor', subfolderPath: 'specs' });
    expect(prompt).toBe(
      "Please provide a concise summary of the following content in 120 characters or less:\nProject Context: This document belongs to the 'harbor' project. \n\nBody text\n\nSummary:"
    );
  });

  it('should name the section in analysis prompts', () => {
    const prompt = buildAnalysisPrompt('Body', 'plan.md', { projectName: 'harbor', subfolderPath: 'specs' });
    expect(prompt).toContain("belongs to the 'harbor' project in the 'specs' section. ");
    expect(prompt).toContain('2. Key topics or themes');
  });

  it('should switch focus in quantitative mode', () => {
    const prompt = buildAnalysisPrompt('Body', 'plan.md', {}, 'quantitative');
    expect(prompt).toContain('3. Figures, measurements or data points mentioned');
    expect(prompt).not.toContain('Project Context');
  });

  it('should list at most twenty document summaries', () => {
    const documents: ProjectDocumentDigest[] = Array.from({ length: 25 }, (_, i) => ({
      name: `doc${i}.md`,
      subfolderPath: i === 0 ? '' : 'specs',
      wordCount: i,
      summary: `summary ${i}`,
    }));
    documents.unshift({ name: 'blank.md', subfolderPath: '', wordCount: 0 });

    const prompt = buildProjectPrompt('harbor', stats(), documents);
    const summaryLines = prompt.split('\n').filter((line) => line.startsWith('- doc'));

    expect(summaryLines).toHaveLength(20);
    expect(summaryLines[0]).toBe('- doc0.md (root, 0 words): summary 0');
    expect(prompt).not.toContain('blank.md');
    expect(prompt).toContain('Structure: 2 subfolders: specs, notes');
    expect(prompt).toContain('Files: 3 files (.md, .pdf)');
  });
});

describe('AIAnalyzer', () => {
  describe('complete', () => {
    it('should reject when no provider is configured', async () => {
      await expect(new AIAnalyzer({ providers: [] }).complete('prompt', 10)).rejects.toBeInstanceOf(NoProviderError);
    });

    it('should fall through to the next provider on failure', async () => {
      const logger = new RunLogger();
      const first = fakeProvider('openai', async () => {
        throw new Error('rate limited');
      });
      const second = fakeProvider('gemini', async () => 'answer');
      const analyzer = new AIAnalyzer({ providers: [first.provider, second.provider], logger });

      expect(await analyzer.complete('prompt', 42)).toBe('answer');
      expect(first.complete).toHaveBeenCalledWith('prompt', 42);
      expect(second.complete).toHaveBeenCalledWith('prompt', 42);
      expect(logger.getEntries().map((e) => e.message)).toContain('AI provider failed: openai: rate limited');
    });

    it('should not try later providers after a success', async () => {
      const first = fakeProvider('replicate', async () => 'first');
      const second = fakeProvider('openai', async () => 'second');
      const analyzer = new AIAnalyzer({ providers: [first.provider, second.provider] });

      expect(await analyzer.complete('prompt', 10)).toBe('first');
      expect(second.complete).not.toHaveBeenCalled();
    });

    it('should collect every failure when the chain is exhausted', async () => {
      const first = fakeProvider('openai', async () => {
        throw new Error('down');
      });
      const second = fakeProvider('gemini', async () => {
        throw new ProviderError('gemini', 'quota', 429);
      });
      const analyzer = new AIAnalyzer({ providers: [first.provider, second.provider] });

      const error = await analyzer.complete('prompt', 10).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ProviderChainError);
      expect(error instanceof ProviderChainError ? error.message : '').toBe(
        'All AI providers failed: openai: down; gemini: quota'
      );
    });
  });

  describe('summarize', () => {
    it('should refuse short content', async () => {
      const fake = fakeProvider('openai', async () => 'unused');
      const analyzer = new AIAnalyzer({ providers: [fake.provider] });

      expect(await analyzer.summarize('too short')).toBe(TOO_SHORT_FOR_SUMMARY);
      expect(fake.complete).not.toHaveBeenCalled();
    });

    it('should use the first sentence without providers', async () => {
      expect(await new AIAnalyzer({ providers: [] }).summarize(NOTES)).toBe(
        'Quarterly planning notes for the harbor project'
      );
    });

    it('should send the summary prompt with the summary token limit', async () => {
      const fake = fakeProvider('openai', async () => 'A harbor budget.');
      const analyzer = new AIAnalyzer({ providers: [fake.provider], summaryMaxLength: 150 });

      expect(await analyzer.summarize(NOTES, { projectName: 'harbor' })).toBe('A harbor budget.');
      expect(fake.complete).toHaveBeenCalledWith(
        buildSummaryPrompt(NOTES, 150, { projectName: 'harbor' }),
        TOKEN_LIMITS.summary
      );
    });

    it('should truncate long content before prompting', async () => {
      const fake = fakeProvider('openai', async () => 'long');
      const analyzer = new AIAnalyzer({ providers: [fake.provider] });

      await analyzer.summarize('x'.repeat(5000));
      expect(fake.complete).toHaveBeenCalledWith(buildSummaryPrompt('x'.repeat(4000) + '...', 200), 60);
    });

    it('should fall back when every provider fails', async () => {
      const fake = fakeProvider('openai', async () => {
        throw new Error('down');
      });
      const logger = new RunLogger();
      const analyzer = new AIAnalyzer({ providers: [fake.provider], logger });

      expect(await analyzer.summarize(NOTES)).toBe('Quarterly planning notes for the harbor project');
      expect(logger.getErrors().map((e) => e.message)).toEqual([
        'AI summarization failed: All AI providers failed: openai: down',
      ]);
    });
  });

  describe('analyze', () => {
    it('should refuse short content', async () => {
      expect(await new AIAnalyzer({ providers: [] }).analyze('tiny', 'a.txt')).toBe(TOO_SHORT_FOR_ANALYSIS);
    });

    it('should return the basic analysis without providers', async () => {
      expect(await new AIAnalyzer({ providers: [] }).analyze(NOTES, 'notes.txt')).toBe(fallbackAnalysis(NOTES, 'notes.txt'));
    });

    it('should use the configured mode', async () => {
      const fake = fakeProvider('anthropic', async () => 'insight');
      const analyzer = new AIAnalyzer({ providers: [fake.provider], mode: 'quantitative' });

      expect(await analyzer.analyze(NOTES, 'notes.txt')).toBe('insight');
      expect(fake.complete).toHaveBeenCalledWith(
        buildAnalysisPrompt(NOTES, 'notes.txt', {}, 'quantitative'),
        TOKEN_LIMITS.analysis
      );
    });
  });

  describe('analyzeProject', () => {
    it('should report empty projects', async () => {
      const analyzer = new AIAnalyzer({ providers: [] });
      expect(await analyzer.analyzeProject('harbor', stats({ fileCount: 0 }))).toBe("No files found for project 'harbor'");
    });

    it('should describe the project without providers', async () => {
      const analyzer = new AIAnalyzer({ providers: [] });
      expect(await analyzer.analyzeProject('harbor', stats())).toBe(
        "Project 'harbor' contains 3 files across 2 sections. Requires AI for detailed analysis."
      );
    });

    it('should report provider errors inline', async () => {
      const fake = fakeProvider('openai', async () => {
        throw new Error('down');
      });
      const analyzer = new AIAnalyzer({ providers: [fake.provider] });
      expect(await analyzer.analyzeProject('harbor', stats())).toBe(
        "Project 'harbor' analysis unavailable due to error: All AI providers failed: openai: down"
      );
    });

    it('should send the project prompt', async () => {
      const fake = fakeProvider('openai', async () => 'project insight');
      const analyzer = new AIAnalyzer({ providers: [fake.provider] });

      expect(await analyzer.analyzeProject('harbor', stats(), [])).toBe('project insight');
      expect(fake.complete).toHaveBeenCalledWith(buildProjectPrompt('harbor', stats(), []), TOKEN_LIMITS.project);
    });
  });

  describe('analyzeCrossProject', () => {
    const projects = [
      { name: 'harbor', stats: stats() },
      { name: 'bridge', stats: stats({ fileCount: 4 }) },
    ];

    it('should report an empty portfolio', async () => {
      expect(await new AIAnalyzer({ providers: [] }).analyzeCrossProject([])).toBe(
        'No projects found for cross-analysis'
      );
    });

    it('should describe the portfolio without providers', async () => {
      expect(await new AIAnalyzer({ providers: [] }).analyzeCrossProject(projects)).toBe(
        'Cross-project analysis of 2 projects with 7 total files. Requires AI for detailed insights.'
      );
    });

    it('should use the qualitative focus by default', () => {
      const prompt = buildCrossProjectPrompt(projects);
      expect(prompt).toContain('- harbor: 3 files, 2 sections, types: .md, .pdf');
      expect(prompt).toContain('Total: 2 projects, 7 files');
      expect(prompt).toContain('3. Potential standardization opportunities');
    });

    it('should send the quantitative focus when asked for that mode', async () => {
      const fake = fakeProvider('openai', async () => 'portfolio metrics');
      const analyzer = new AIAnalyzer({ providers: [fake.provider] });

      expect(await analyzer.analyzeCrossProject(projects, 'quantitative')).toBe('portfolio metrics');

      const prompt = buildCrossProjectPrompt(projects, 'quantitative');
      expect(prompt).toContain('2. Format distribution per project');
      expect(prompt).not.toContain('standardization');
      expect(fake.complete).toHaveBeenCalledWith(prompt, TOKEN_LIMITS.crossProject);
    });

    it('should default to the analyzer mode', async () => {
      const fake = fakeProvider('openai', async () => 'portfolio metrics');
      await new AIAnalyzer({ providers: [fake.provider], mode: 'quantitative' }).analyzeCrossProject(projects);

      expect(fake.complete).toHaveBeenCalledWith(buildCrossProjectPrompt(projects, 'quantitative'), TOKEN_LIMITS.crossProject);
    });

    it('should report provider errors inline', async () => {
      const fake = fakeProvider('gemini', async () => {
        throw new ProviderError('gemini', 'blocked');
      });
      expect(await new AIAnalyzer({ providers: [fake.provider] }).analyzeCrossProject(projects)).toBe(
        'Cross-project analysis unavailable due to error: All AI providers failed: gemini: blocked'
      );
    });
  });
});

describe('createAIAnalyzer', () => {
  it('should have no providers without credentials', () => {
    expect(createAIAnalyzer(DEFAULT_CONFIG, { env: {} }).isAvailable()).toBe(false);
  });

  it('should chain enabled providers with credentials in fallback order', () => {
    const config = setProviderEnabled(setProviderEnabled(DEFAULT_CONFIG, 'openai', true), 'anthropic', true);
    const analyzer = createAIAnalyzer(config, {
      env: { REPLICATE_API_TOKEN: 'test-secret', ANTHROPIC_API_KEY: 'test-secret', OPENAI_API_KEY: 'test-secret' },
    });

    expect(analyzer.availableProviders()).toEqual(['replicate', 'openai', 'anthropic']);
  });
});
