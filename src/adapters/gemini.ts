/**
 * Google Gemini API adapter
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import type { GeminiSettings } from '../config/schema.js';
import type { CompletionProvider } from '../types/ai.js';
import { ProviderError, errorMessage } from '../types/errors.js';

/**
 * Create a Gemini completion provider
 *
 * @param settings - Provider settings from the config
 * @param apiKey - Resolved API key
 * @param timeoutMs - Per-request timeout
 */
export function createGeminiProvider(
  settings: GeminiSettings,
  apiKey: string,
  timeoutMs: number
): CompletionProvider {
  const client = new GoogleGenerativeAI(apiKey);
  const generativeModel = client.getGenerativeModel({ model: settings.model }, { timeout: timeoutMs });

  return {
    name: 'gemini',
    async complete(prompt: string, maxTokens: number): Promise<string> {
      let text: string;
      try {
        const result = await generativeModel.generateContent({
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig: {
            temperature: settings.temperature,
            maxOutputTokens: maxTokens,
          },
        });
        text = result.response.text().trim();
      } catch (error) {
        throw new ProviderError('gemini', errorMessage(error));
      }

      if (!text) {
        throw new ProviderError('gemini', 'empty response');
      }
      return text;
    },
  };
}
