/**
 * AI provider selection helpers
 */

import { PROVIDER_NAMES, type ProviderName } from '../types/ai.js';
import type { Config } from './schema.js';

const ENV_REFERENCE = /^\$\{([^}]+)\}$/;

/**
 * Raw credential value for a provider as written in the config
 */
function rawCredential(config: Config, provider: ProviderName): string {
  const providers = config.ai_providers;
  switch (provider) {
    case 'replicate':
      return providers.replicate.api_token;
    case 'openai':
      return providers.openai.api_key;
    case 'anthropic':
      return providers.anthropic.api_key;
    case 'gemini':
      return providers.gemini.api_key;
  }
}

/**
 * Resolve a provider's credential. A `${VAR}` value is read from the
 * environment.
 *
 * @returns The credential, or undefined when it is empty or unset
 */
export function resolveCredential(
  config: Config,
  provider: ProviderName,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const raw = rawCredential(config, provider);
  const reference = ENV_REFERENCE.exec(raw);
  const value = reference ? env[reference[1]] : raw;
  return value ? value : undefined;
}

/**
 * Whether a provider is switched on in the config
 */
export function isProviderEnabled(config: Config, provider: ProviderName): boolean {
  return config.ai_providers[provider].enabled;
}

/**
 * Providers in the order they should be tried: the default first, then the
 * fallback order when fallback is enabled. Duplicates are dropped.
 */
export function getProviderOrder(config: Config): ProviderName[] {
  const order: ProviderName[] = [config.ai_providers.default];
  if (config.fallback.enabled) {
    order.push(...config.fallback.order);
  }
  return [...new Set(order)];
}

/**
 * Enabled providers that have a credential, in declaration order
 */
export function getAvailableProviders(
  config: Config,
  env: NodeJS.ProcessEnv = process.env
): ProviderName[] {
  return PROVIDER_NAMES.filter(
    (provider) => isProviderEnabled(config, provider) && resolveCredential(config, provider, env) !== undefined
  );
}

/**
 * Check the provider setup
 *
 * @returns Problems found; empty when the config is usable
 */
export function validateConfig(config: Config, env: NodeJS.ProcessEnv = process.env): string[] {
  const problems: string[] = [];
  const enabled = PROVIDER_NAMES.filter((provider) => isProviderEnabled(config, provider));

  if (enabled.length === 0) {
    problems.push('No AI providers are enabled');
    return problems;
  }

  const defaultProvider = config.ai_providers.default;
  if (!enabled.includes(defaultProvider)) {
    problems.push(`Default provider '${defaultProvider}' is not enabled`);
  }

  for (const provider of enabled) {
    if (resolveCredential(config, provider, env) === undefined) {
      problems.push(`Provider '${provider}' is enabled but has no API credential`);
    }
  }

  return problems;
}

/**
 * Copy of the config with a provider switched on or off
 */
export function setProviderEnabled(config: Config, provider: ProviderName, enabled: boolean): Config {
  return updateProviderConfig(config, provider, { enabled });
}

/**
 * Copy of the config with a new default provider
 */
export function setDefaultProvider(config: Config, provider: ProviderName): Config {
  return {
    ...config,
    ai_providers: { ...config.ai_providers, default: provider },
  };
}

/**
 * Copy of the config with one provider's settings updated
 */
export function updateProviderConfig<P extends ProviderName>(
  config: Config,
  provider: P,
  updates: Partial<Config['ai_providers'][P]>
): Config {
  return {
    ...config,
    ai_providers: {
      ...config.ai_providers,
      [provider]: { ...config.ai_providers[provider], ...updates },
    },
  };
}
