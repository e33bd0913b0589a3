/**
 * OpenAI API adapter
 * Chat completions for document summaries and insights
 */

import OpenAI from 'openai';
import type { OpenAISettings } from '../config/schema.js';
import type { CompletionProvider } from '../types/ai.js';
import { ProviderError, errorMessage } from '../types/errors.js';

/**
 * Create an OpenAI client
 */
export function createClient(settings: OpenAISettings, apiKey: string, timeoutMs: number): OpenAI {
  return new OpenAI({
    apiKey,
    baseURL: settings.base_url,
    timeout: timeoutMs,
    maxRetries: 1,
  });
}

/**
 * Create an OpenAI completion provider
 *
 * @param settings - Provider settings from the config
 * @param apiKey - Resolved API key
 * @param timeoutMs - Per-request timeout
 */
export function createOpenAIProvider(
  settings: OpenAISettings,
  apiKey: string,
  timeoutMs: number
): CompletionProvider {
  const client = createClient(settings, apiKey, timeoutMs);

  return {
    name: 'openai',
    async complete(prompt: string, maxTokens: number): Promise<string> {
      let content: string;
      try {
        const completion = await client.chat.completions.create({
          model: settings.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: settings.temperature,
          max_tokens: maxTokens,
        });
        content = completion.choices[0]?.message?.content?.trim() ?? '';
      } catch (error) {
        const status = error instanceof OpenAI.APIError ? error.status : undefined;
        throw new ProviderError('openai', errorMessage(error), status);
      }

      if (!content) {
        throw new ProviderError('openai', 'empty response');
      }
      return content;
    },
  };
}
