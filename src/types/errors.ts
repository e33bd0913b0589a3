/**
 * Error types raised inside the configuration and AI provider layers
 */

/**
 * Configuration file could not be read or failed validation
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * An AI provider call failed
 */
export class ProviderError extends Error {
  constructor(
    public readonly provider: string,
    message: string,
    public readonly status?: number
  ) {
    super(`${provider}: ${message}`);
    this.name = 'ProviderError';
  }
}

/**
 * No AI provider is enabled with credentials
 */
export class NoProviderError extends Error {
  constructor(message = 'No AI provider is configured') {
    super(message);
    this.name = 'NoProviderError';
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Every provider in the chain failed
 */
export class ProviderChainError extends Error {
  constructor(public readonly failures: ProviderError[]) {
    super(`All AI providers failed: ${failures.map((failure) => failure.message).join('; ')}`);
    this.name = 'ProviderChainError';
  }
}
