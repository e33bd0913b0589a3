/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';
import { ProviderNameSchema } from '../types/ai.js';
import { AnalysisModeSchema } from '../types/document.js';

const temperature = z.number().min(0).max(2).default(0.3);
const maxTokens = z.number().int().min(1).max(32000).default(1000);

/**
 * Replicate settings schema
 */
export const ReplicateSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  api_token: z.string().default('${REPLICATE_API_TOKEN}'),
  model: z.string().default('meta/llama-2-7b-chat'),
  max_tokens: maxTokens,
  temperature,
  top_p: z.number().min(0).max(1).default(0.9),
  repetition_penalty: z.number().min(0).default(1.1),
  api_url: z.string().url().default('https://api.replicate.com/v1'),
});

/**
 * OpenAI settings schema
 */
export const OpenAISettingsSchema = z.object({
  enabled: z.boolean().default(false),
  api_key: z.string().default('${OPENAI_API_KEY}'),
  model: z.string().default('gpt-3.5-turbo'),
  max_tokens: maxTokens,
  temperature,
  base_url: z.string().url().optional(),
});

/**
 * Anthropic settings schema
 */
export const AnthropicSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  api_key: z.string().default('${ANTHROPIC_API_KEY}'),
  model: z.string().default('claude-3-haiku-20240307'),
  max_tokens: maxTokens,
  temperature,
  api_url: z.string().url().default('https://api.anthropic.com'),
});

/**
 * Gemini settings schema
 */
export const GeminiSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  api_key: z.string().default('${GEMINI_API_KEY}'),
  model: z.string().default('gemini-pro'),
  max_tokens: maxTokens,
  temperature,
});

/**
 * AI provider settings schema
 */
export const AIProvidersSchema = z.object({
  default: ProviderNameSchema.default('replicate'),
  timeout_ms: z.number().int().min(1000).default(60000),
  replicate: ReplicateSettingsSchema.default({}),
  openai: OpenAISettingsSchema.default({}),
  anthropic: AnthropicSettingsSchema.default({}),
  gemini: GeminiSettingsSchema.default({}),
});

/**
 * Provider fallback schema
 */
export const FallbackSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  order: z.array(ProviderNameSchema).default(['replicate', 'openai', 'gemini', 'anthropic']),
});

/**
 * Analysis settings schema
 */
export const AnalysisSettingsSchema = z.object({
  mode: AnalysisModeSchema.default('qualitative'),
  summary_max_length: z.number().int().min(20).max(2000).default(200),
});

/**
 * Report output settings schema
 */
export const ReportSettingsSchema = z.object({
  dir: z.string().default('Reports'),
  json: z.boolean().default(false),
});

export const LogThresholdSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Run log settings schema
 */
export const LoggingSettingsSchema = z.object({
  file: z.string().default('docsurvey.log'),
  level: LogThresholdSchema.default('info'),
  to_file: z.boolean().default(true),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  ai_providers: AIProvidersSchema.default({}),
  fallback: FallbackSettingsSchema.default({}),
  analysis: AnalysisSettingsSchema.default({}),
  reports: ReportSettingsSchema.default({}),
  logging: LoggingSettingsSchema.default({}),
});

// Type exports
export type ReplicateSettings = z.infer<typeof ReplicateSettingsSchema>;
export type OpenAISettings = z.infer<typeof OpenAISettingsSchema>;
export type AnthropicSettings = z.infer<typeof AnthropicSettingsSchema>;
export type GeminiSettings = z.infer<typeof GeminiSettingsSchema>;
export type AIProviders = z.infer<typeof AIProvidersSchema>;
export type FallbackSettings = z.infer<typeof FallbackSettingsSchema>;
export type AnalysisSettings = z.infer<typeof AnalysisSettingsSchema>;
export type ReportSettings = z.infer<typeof ReportSettingsSchema>;
export type LogThreshold = z.infer<typeof LogThresholdSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
