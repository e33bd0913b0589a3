/**
 * Replicate predictions adapter
 *
 * A prediction is created for the configured model and polled until it
 * settles or the timeout passes.
 */

import Replicate, { type Prediction } from 'replicate';
import type { ReplicateSettings } from '../config/schema.js';
import type { CompletionProvider } from '../types/ai.js';
import { ProviderError, errorMessage } from '../types/errors.js';

const POLL_INTERVAL_MS = 1000;
const PENDING_STATUSES = new Set(['starting', 'processing']);

/**
 * Join streamed output chunks into one string
 */
export function outputText(output: unknown): string {
  if (Array.isArray(output)) {
    return output.map((chunk) => String(chunk)).join('');
  }
  return typeof output === 'string' ? output : '';
}

/**
 * Strip a prompt the model echoed back before its answer
 */
export function cleanOutput(output: string, prompt: string): string {
  const trimmed = output.trim();
  return trimmed.startsWith(prompt) ? trimmed.slice(prompt.length).trim() : trimmed;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create a Replicate completion provider
 *
 * @param settings - Provider settings from the config
 * @param apiToken - Resolved API token
 * @param timeoutMs - Budget for creating and polling one prediction
 */
export function createReplicateProvider(
  settings: ReplicateSettings,
  apiToken: string,
  timeoutMs: number
): CompletionProvider {
  const client = new Replicate({ auth: apiToken, baseUrl: settings.api_url });

  return {
    name: 'replicate',
    async complete(prompt: string, maxTokens: number): Promise<string> {
      const deadline = Date.now() + timeoutMs;

      let prediction: Prediction;
      try {
        prediction = await client.predictions.create({
          model: settings.model,
          input: {
            prompt,
            max_new_tokens: maxTokens,
            temperature: settings.temperature,
            top_p: settings.top_p,
            repetition_penalty: settings.repetition_penalty,
          },
        });

        while (PENDING_STATUSES.has(prediction.status)) {
          const remaining = deadline - Date.now();
          if (remaining <= 0) {
            throw new ProviderError(
              'replicate',
              `prediction still ${prediction.status} after ${Math.round(timeoutMs / 1000)}s`
            );
          }
          await sleep(Math.min(POLL_INTERVAL_MS, remaining));
          prediction = await client.predictions.get(prediction.id);
        }
      } catch (error) {
        if (error instanceof ProviderError) throw error;
        throw new ProviderError('replicate', errorMessage(error));
      }

      if (prediction.status !== 'succeeded') {
        const reason = typeof prediction.error === 'string' ? prediction.error : `prediction ${prediction.status}`;
        throw new ProviderError('replicate', reason);
      }

      const result = cleanOutput(outputText(prediction.output), prompt);
      return result || 'No response generated';
    },
  };
}
