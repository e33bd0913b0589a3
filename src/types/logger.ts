/**
 * Logging contract used by the core modules
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

/**
 * Areas of a run, used to group log entries
 */
export type RunStage = 'config' | 'scan' | 'analyze' | 'ai' | 'stats' | 'report' | 'run';

export interface Logger {
  debug(stage: RunStage, message: string, data?: Record<string, unknown>): void;
  info(stage: RunStage, message: string, data?: Record<string, unknown>): void;
  warn(stage: RunStage, message: string, data?: Record<string, unknown>): void;
  error(stage: RunStage, message: string, data?: Record<string, unknown>): void;
  success(stage: RunStage, message: string, data?: Record<string, unknown>): void;
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  success: () => undefined,
};
