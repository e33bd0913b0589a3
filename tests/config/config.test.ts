/**
 * Tests for configuration management
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { ConfigSchema } from '../../src/config/schema.js';
import {
  deepMerge,
  findConfigPath,
  getConfigValue,
  loadConfig,
  loadEnvConfig,
  saveConfig,
} from '../../src/config/index.js';
import { ConfigError } from '../../src/types/errors.js';

let tmpDir: string;

async function createFile(name: string, content: string): Promise<string> {
  const filePath = path.join(tmpDir, name);
  await fs.writeFile(filePath, content, 'utf-8');
  return filePath;
}

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsurvey-config-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('DEFAULT_CONFIG', () => {
  it('should have all required sections', () => {
    expect(DEFAULT_CONFIG.ai_providers).toBeDefined();
    expect(DEFAULT_CONFIG.fallback).toBeDefined();
    expect(DEFAULT_CONFIG.analysis).toBeDefined();
    expect(DEFAULT_CONFIG.reports).toBeDefined();
    expect(DEFAULT_CONFIG.logging).toBeDefined();
  });

  it('should default to replicate with the full fallback chain', () => {
    expect(DEFAULT_CONFIG.ai_providers.default).toBe('replicate');
    expect(DEFAULT_CONFIG.fallback.order).toEqual(['replicate', 'openai', 'gemini', 'anthropic']);
    expect(DEFAULT_CONFIG.ai_providers.replicate.api_token).toBe('${REPLICATE_API_TOKEN}');
  });

  it('should pass schema validation unchanged', () => {
    const result = ConfigSchema.safeParse(DEFAULT_CONFIG);
    expect(result.success).toBe(true);
    expect(result.success ? result.data : null).toEqual(DEFAULT_CONFIG);
  });
});

describe('ConfigSchema', () => {
  it('should fill defaults for an empty config', () => {
    expect(ConfigSchema.parse({})).toEqual(DEFAULT_CONFIG);
  });

  it('should accept partial config', () => {
    const result = ConfigSchema.safeParse({ analysis: { mode: 'quantitative' } });
    expect(result.success).toBe(true);
    expect(result.success ? result.data.analysis : null).toEqual({ mode: 'quantitative', summary_max_length: 200 });
  });

  it('should reject out of range temperature', () => {
    expect(ConfigSchema.safeParse({ ai_providers: { openai: { temperature: 5 } } }).success).toBe(false);
  });

  it('should reject unknown providers in the fallback order', () => {
    expect(ConfigSchema.safeParse({ fallback: { order: ['openai', 'cohere'] } }).success).toBe(false);
  });

  it('should reject unknown analysis modes', () => {
    expect(ConfigSchema.safeParse({ analysis: { mode: 'poetic' } }).success).toBe(false);
  });
});

describe('deepMerge', () => {
  it('should merge simple objects', () => {
    expect(deepMerge({ a: 1, b: 2 }, { b: 3, c: 4 })).toEqual({ a: 1, b: 3, c: 4 });
  });

  it('should deep merge nested objects', () => {
    const target = { level1: { level2: { a: 1, b: 2 } } };
    const source = { level1: { level2: { b: 3, c: 4 } } };

    expect(deepMerge(target, source)).toEqual({ level1: { level2: { a: 1, b: 3, c: 4 } } });
  });

  it('should not modify original objects', () => {
    const target = { a: 1 };
    const source = { b: 2 };

    deepMerge(target, source);

    expect(target).toEqual({ a: 1 });
    expect(source).toEqual({ b: 2 });
  });

  it('should handle arrays by replacement', () => {
    expect(deepMerge({ arr: [1, 2, 3] }, { arr: [4, 5] }).arr).toEqual([4, 5]);
  });

  it('should skip undefined and null values in source', () => {
    expect(deepMerge({ a: 1, b: 2 }, { a: undefined, b: null, c: 3 })).toEqual({ a: 1, b: 2, c: 3 });
  });
});

describe('loadEnvConfig', () => {
  it('should read recognized variables', () => {
    expect(
      loadEnvConfig({
        DOCSURVEY_AI_PROVIDER: 'gemini',
        DOCSURVEY_REPORTS_DIR: 'out',
        DOCSURVEY_LOG_LEVEL: 'debug',
        DOCSURVEY_ANALYSIS_MODE: 'quantitative',
      })
    ).toEqual({
      ai_providers: { default: 'gemini' },
      reports: { dir: 'out' },
      logging: { level: 'debug' },
      analysis: { mode: 'quantitative' },
    });
  });

  it('should ignore invalid values', () => {
    expect(loadEnvConfig({ DOCSURVEY_AI_PROVIDER: 'cohere', DOCSURVEY_LOG_LEVEL: 'loud' })).toEqual({});
  });
});

describe('loadConfig', () => {
  it('should return defaults when nothing is configured', async () => {
    expect(await loadConfig({ cwd: tmpDir, includeGlobal: false, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('should merge an explicit file over the defaults', async () => {
    const configPath = await createFile(
      'custom.yaml',
      'ai_providers:\n  default: openai\n  openai:\n    enabled: true\nanalysis:\n  mode: quantitative\n'
    );

    const config = await loadConfig({ configPath, includeGlobal: false, env: {} });

    expect(config.ai_providers.default).toBe('openai');
    expect(config.ai_providers.openai.enabled).toBe(true);
    expect(config.ai_providers.openai.model).toBe('gpt-3.5-turbo');
    expect(config.analysis).toEqual({ mode: 'quantitative', summary_max_length: 200 });
  });

  it('should let environment variables win over the file', async () => {
    const configPath = await createFile('custom.yaml', 'analysis:\n  mode: quantitative\n');

    const config = await loadConfig({
      configPath,
      includeGlobal: false,
      env: { DOCSURVEY_ANALYSIS_MODE: 'qualitative' },
    });

    expect(config.analysis.mode).toBe('qualitative');
  });

  it('should discover a project config file from cwd', async () => {
    await createFile('docsurvey.config.yaml', 'reports:\n  dir: Out\n');

    const config = await loadConfig({ cwd: tmpDir, includeGlobal: false, env: {} });
    expect(config.reports).toEqual({ dir: 'Out', json: false });
  });

  it('should fall back to defaults when a discovered file is invalid', async () => {
    await createFile('docsurvey.config.yaml', 'analysis:\n  mode: poetic\n');

    expect(await loadConfig({ cwd: tmpDir, includeGlobal: false, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('should reject an invalid explicit file', async () => {
    const configPath = await createFile('bad.yaml', 'analysis:\n  mode: poetic\n');

    const error = await loadConfig({ configPath, includeGlobal: false, env: {} }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError ? error.message : '').toContain('analysis.mode');
  });

  it('should reject a missing explicit file', async () => {
    await expect(
      loadConfig({ configPath: path.join(tmpDir, 'missing.yaml'), includeGlobal: false, env: {} })
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it('should reject a file that is not a mapping', async () => {
    const configPath = await createFile('list.yaml', '- a\n- b\n');

    await expect(loadConfig({ configPath, includeGlobal: false, env: {} })).rejects.toThrow(
      `Config file ${configPath} must contain a mapping`
    );
  });

  it('should treat an empty explicit file as defaults', async () => {
    const configPath = await createFile('empty.yaml', '');
    expect(await loadConfig({ configPath, includeGlobal: false, env: {} })).toEqual(DEFAULT_CONFIG);
  });
});

describe('findConfigPath', () => {
  it('should return null without a config file', async () => {
    expect(await findConfigPath(tmpDir)).toBeNull();
  });

  it('should find the first supported file name', async () => {
    const filePath = await createFile('.docsurveyrc', 'reports:\n  json: true\n');
    expect(await findConfigPath(tmpDir)).toBe(filePath);
  });
});

describe('saveConfig', () => {
  it('should write YAML that loads back to the same config', async () => {
    const written = await saveConfig(DEFAULT_CONFIG, path.join(tmpDir, 'nested', 'saved.yaml'));

    expect(written).toBe(path.join(tmpDir, 'nested', 'saved.yaml'));
    expect(await loadConfig({ configPath: written, includeGlobal: false, env: {} })).toEqual(DEFAULT_CONFIG);
  });
});

describe('getConfigValue', () => {
  it('should read dotted paths', () => {
    expect(getConfigValue(DEFAULT_CONFIG, 'analysis.mode')).toBe('qualitative');
    expect(getConfigValue(DEFAULT_CONFIG, 'fallback.order')).toEqual(['replicate', 'openai', 'gemini', 'anthropic']);
    expect(getConfigValue(DEFAULT_CONFIG, 'reports')).toEqual({ dir: 'Reports', json: false });
  });

  it('should return undefined for missing keys', () => {
    expect(getConfigValue(DEFAULT_CONFIG, 'nope.deeper')).toBeUndefined();
    expect(getConfigValue(DEFAULT_CONFIG, 'analysis.mode.deeper')).toBeUndefined();
  });
});
