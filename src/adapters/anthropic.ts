/**
 * Anthropic Messages API adapter
 */

import Anthropic from '@anthropic-ai/sdk';
import type { AnthropicSettings } from '../config/schema.js';
import type { CompletionProvider } from '../types/ai.js';
import { ProviderError, errorMessage } from '../types/errors.js';

/**
 * First text block of a message, trimmed
 */
function messageText(message: Anthropic.Message): string {
  for (const block of message.content) {
    if (block.type === 'text') {
      return block.text.trim();
    }
  }
  return '';
}

/**
 * Create an Anthropic completion provider
 *
 * @param settings - Provider settings from the config
 * @param apiKey - Resolved API key
 * @param timeoutMs - Per-request timeout
 */
export function createAnthropicProvider(
  settings: AnthropicSettings,
  apiKey: string,
  timeoutMs: number
): CompletionProvider {
  const client = new Anthropic({
    apiKey,
    baseURL: settings.api_url,
    timeout: timeoutMs,
    maxRetries: 1,
  });

  return {
    name: 'anthropic',
    async complete(prompt: string, maxTokens: number): Promise<string> {
      let text: string;
      try {
        const message = await client.messages.create({
          model: settings.model,
          max_tokens: maxTokens,
          temperature: settings.temperature,
          messages: [{ role: 'user', content: prompt }],
        });
        text = messageText(message);
      } catch (error) {
        const status = error instanceof Anthropic.APIError ? error.status : undefined;
        throw new ProviderError('anthropic', errorMessage(error), status);
      }

      if (!text) {
        throw new ProviderError('anthropic', 'response missing content text');
      }
      return text;
    },
  };
}
