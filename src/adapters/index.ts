/**
 * Provider adapters index
 * Builds the ordered provider chain from configuration
 */

import { getProviderOrder, isProviderEnabled, resolveCredential } from '../config/providers.js';
import type { Config } from '../config/schema.js';
import type { CompletionProvider, ProviderName } from '../types/ai.js';
import { createAnthropicProvider } from './anthropic.js';
import { createGeminiProvider } from './gemini.js';
import { createOpenAIProvider } from './openai.js';
import { createReplicateProvider } from './replicate.js';

export { createAnthropicProvider } from './anthropic.js';
export { createGeminiProvider } from './gemini.js';
export { createOpenAIProvider } from './openai.js';
export { createReplicateProvider } from './replicate.js';

/**
 * Instantiate one provider
 */
export function createProvider(config: Config, name: ProviderName, credential: string): CompletionProvider {
  const timeoutMs = config.ai_providers.timeout_ms;
  switch (name) {
    case 'replicate':
      return createReplicateProvider(config.ai_providers.replicate, credential, timeoutMs);
    case 'openai':
      return createOpenAIProvider(config.ai_providers.openai, credential, timeoutMs);
    case 'anthropic':
      return createAnthropicProvider(config.ai_providers.anthropic, credential, timeoutMs);
    case 'gemini':
      return createGeminiProvider(config.ai_providers.gemini, credential, timeoutMs);
  }
}

/**
 * Providers to try, in order, skipping any that are disabled or lack a
 * credential
 */
export function createProviderChain(
  config: Config,
  env: NodeJS.ProcessEnv = process.env
): CompletionProvider[] {
  const chain: CompletionProvider[] = [];
  for (const name of getProviderOrder(config)) {
    if (!isProviderEnabled(config, name)) continue;
    const credential = resolveCredential(config, name, env);
    if (credential) {
      chain.push(createProvider(config, name, credential));
    }
  }
  return chain;
}
