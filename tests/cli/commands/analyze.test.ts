/**
 * Tests for the analyze command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { runAnalyze } from '../../../src/cli/commands/analyze.js';

let tmpDir: string;
let root: string;
let reportsDir: string;
let configPath: string;
let output: string[];

async function createFile(relativePath: string, content: string): Promise<void> {
  const filePath = path.join(root, relativePath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf-8');
}

function printed(): string {
  return output.join('\n');
}

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsurvey-cli-'));
  root = path.join(tmpDir, 'portfolio');
  reportsDir = path.join(tmpDir, 'reports');
  configPath = path.join(tmpDir, 'docsurvey.config.yaml');
  await fs.mkdir(root);
  await fs.writeFile(configPath, 'logging:\n  file: run.log\n', 'utf-8');
  output = [];
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    output.push(args.map(String).join(' '));
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('runAnalyze', () => {
  it('should fail for a missing directory', async () => {
    const code = await runAnalyze(path.join(tmpDir, 'missing'), { config: configPath, env: {} });

    expect(code).toBe(1);
    expect(printed()).toContain(`Directory does not exist: ${path.join(tmpDir, 'missing')}`);
  });

  it('should fail for a file path', async () => {
    await fs.writeFile(path.join(tmpDir, 'file.txt'), 'text', 'utf-8');
    expect(await runAnalyze(path.join(tmpDir, 'file.txt'), { config: configPath, env: {} })).toBe(1);
    expect(printed()).toContain('Path is not a directory:');
  });

  it('should fail for an unreadable config file', async () => {
    expect(await runAnalyze(root, { config: path.join(tmpDir, 'nope.yaml'), env: {} })).toBe(1);
  });

  it('should fail for an unknown analysis mode', async () => {
    expect(await runAnalyze(root, { config: configPath, analysisMode: 'poetic', env: {} })).toBe(1);
    expect(printed()).toContain('Unknown analysis mode: poetic');
  });

  it('should list files without analyzing them', async () => {
    await createFile('alpha/b.txt', 'hello');
    await createFile('alpha/A.md', '# Title');

    const code = await runAnalyze(root, { config: configPath, listOnly: true, output: reportsDir, env: {} });

    expect(code).toBe(0);
    expect(output).toContain('  .MD: A.md (7.0 B)');
    expect(output).toContain('  .TXT: b.txt (5.0 B)');
    await expect(fs.access(reportsDir)).rejects.toThrow();
  });

  it('should fail when no supported files exist', async () => {
    await createFile('alpha/photo.png', 'binary');
    expect(await runAnalyze(root, { config: configPath, output: reportsDir, env: {} })).toBe(1);
  });

  it('should write reports and the run log into a session directory', async () => {
    await createFile('alpha/readme.md', 'Alpha readme');
    await createFile('beta/notes.txt', 'Beta notes');

    const code = await runAnalyze(root, { config: configPath, output: reportsDir, summary: false, env: {} });

    expect(code).toBe(0);
    const [session] = await fs.readdir(reportsDir);
    expect(session?.startsWith('portfolio_')).toBe(true);

    const files = await fs.readdir(path.join(reportsDir, session ?? ''));
    expect(files).toContain('run.log');
    expect(files.filter((file) => file.endsWith('.md'))).toHaveLength(5);
    expect(files.some((file) => file.startsWith('portfolio_alpha_PROJECT_'))).toBe(true);
  });

  it('should warn and continue when AI has no credentials', async () => {
    await createFile('alpha/readme.md', 'Alpha readme');

    const code = await runAnalyze(root, { config: configPath, output: reportsDir, ai: true, env: {} });

    expect(code).toBe(0);
    expect(printed()).toContain('AI analysis enabled but no API keys detected');
  });

  it('should write the JSON bundle when asked', async () => {
    await createFile('alpha/readme.md', 'Alpha readme');

    expect(await runAnalyze(root, { config: configPath, output: reportsDir, json: true, env: {} })).toBe(0);

    const [session] = await fs.readdir(reportsDir);
    const files = await fs.readdir(path.join(reportsDir, session ?? ''));
    expect(files.filter((file) => file.endsWith('.json'))).toHaveLength(1);
  });
});
