/**
 * Run Logger
 * Buffers log entries for a run, echoes them to the console and persists
 * them as a markdown log
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { LogThreshold } from '../config/schema.js';
import type { Logger, LogLevel, RunStage } from '../types/logger.js';

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  stage: RunStage;
  message: string;
  data?: Record<string, unknown>;
  level: LogLevel;
}

/**
 * Receives every entry at or above the threshold as it is logged
 */
export type LogSink = (entry: LogEntry) => void;

export interface RunLoggerOptions {
  threshold?: LogThreshold;
  sink?: LogSink;
  /** Clock, replaceable in tests */
  now?: () => Date;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  warn: 2,
  error: 3,
};

/**
 * Collects entries in memory; `flush` writes them out
 */
export class RunLogger implements Logger {
  private entries: LogEntry[] = [];
  private readonly threshold: LogThreshold;
  private readonly sink?: LogSink;
  private readonly now: () => Date;

  constructor(options: RunLoggerOptions = {}) {
    this.threshold = options.threshold ?? 'info';
    this.sink = options.sink;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Record an entry when its level meets the threshold
   */
  log(level: LogLevel, stage: RunStage, message: string, data?: Record<string, unknown>): void {
    if (SEVERITY[level] < SEVERITY[this.threshold]) return;

    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      stage,
      message,
      data,
      level,
    };

    this.entries.push(entry);
    this.sink?.(entry);
  }

  debug(stage: RunStage, message: string, data?: Record<string, unknown>): void {
    this.log('debug', stage, message, data);
  }

  info(stage: RunStage, message: string, data?: Record<string, unknown>): void {
    this.log('info', stage, message, data);
  }

  warn(stage: RunStage, message: string, data?: Record<string, unknown>): void {
    this.log('warn', stage, message, data);
  }

  error(stage: RunStage, message: string, data?: Record<string, unknown>): void {
    this.log('error', stage, message, data);
  }

  success(stage: RunStage, message: string, data?: Record<string, unknown>): void {
    this.log('success', stage, message, data);
  }

  /**
   * Write the buffered entries as markdown, replacing any previous log
   *
   * @returns Absolute path of the written file
   */
  async flush(filePath: string): Promise<string> {
    const resolved = path.resolve(filePath);
    await fs.mkdir(path.dirname(resolved), { recursive: true });
    await fs.writeFile(resolved, this.formatMarkdown(), 'utf-8');
    return resolved;
  }

  /**
   * Format log entries as markdown, grouped by date
   */
  formatMarkdown(): string {
    const lines: string[] = ['# Document Analysis Log', '', '---', ''];

    const entriesByDate = new Map<string, LogEntry[]>();
    for (const entry of this.entries) {
      const [date = ''] = entry.timestamp.split('T');
      const group = entriesByDate.get(date) ?? [];
      group.push(entry);
      entriesByDate.set(date, group);
    }

    for (const [date, dateEntries] of entriesByDate) {
      lines.push(`## Session: ${date}`);
      lines.push('');

      for (const entry of dateEntries) {
        const time = (entry.timestamp.split('T')[1] ?? '').split('.')[0];
        lines.push(`### [${time}] ${levelTag(entry.level)} **${entry.stage}** - ${entry.message}`);

        if (entry.data && Object.keys(entry.data).length > 0) {
          lines.push('');
          lines.push('```json');
          lines.push(JSON.stringify(entry.data, null, 2));
          lines.push('```');
        }

        lines.push('');
      }
    }

    lines.push('---');
    lines.push('');
    lines.push('## Summary Statistics');
    lines.push('');
    lines.push(`- **Total Entries:** ${this.entries.length}`);
    lines.push(`- **Errors:** ${this.entries.filter((e) => e.level === 'error').length}`);
    lines.push(`- **Warnings:** ${this.entries.filter((e) => e.level === 'warn').length}`);
    lines.push(`- **Successful Steps:** ${this.entries.filter((e) => e.level === 'success').length}`);
    lines.push('');

    return lines.join('\n');
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getErrors(): LogEntry[] {
    return this.entries.filter((e) => e.level === 'error');
  }
}

function levelTag(level: LogLevel): string {
  switch (level) {
    case 'error':
      return '[ERROR]';
    case 'warn':
      return '[WARN]';
    case 'success':
      return '[OK]';
    case 'debug':
      return '[DEBUG]';
    default:
      return '[INFO]';
  }
}
