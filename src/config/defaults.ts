/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  ai_providers: {
    default: 'replicate',
    timeout_ms: 60000,
    replicate: {
      enabled: true,
      api_token: '${REPLICATE_API_TOKEN}',
      model: 'meta/llama-2-7b-chat',
      max_tokens: 1000,
      temperature: 0.3,
      top_p: 0.9,
      repetition_penalty: 1.1,
      api_url: 'https://api.replicate.com/v1',
    },
    openai: {
      enabled: false,
      api_key: '${OPENAI_API_KEY}',
      model: 'gpt-3.5-turbo',
      max_tokens: 1000,
      temperature: 0.3,
    },
    anthropic: {
      enabled: false,
      api_key: '${ANTHROPIC_API_KEY}',
      model: 'claude-3-haiku-20240307',
      max_tokens: 1000,
      temperature: 0.3,
      api_url: 'https://api.anthropic.com',
    },
    gemini: {
      enabled: false,
      api_key: '${GEMINI_API_KEY}',
      model: 'gemini-pro',
      max_tokens: 1000,
      temperature: 0.3,
    },
  },
  fallback: {
    enabled: true,
    order: ['replicate', 'openai', 'gemini', 'anthropic'],
  },
  analysis: {
    mode: 'qualitative',
    summary_max_length: 200,
  },
  reports: {
    dir: 'Reports',
    json: false,
  },
  logging: {
    file: 'docsurvey.log',
    level: 'info',
    to_file: true,
  },
};

/**
 * Configuration file names searched in the working directory
 */
export const CONFIG_FILE_NAMES = [
  'docsurvey.config.yaml',
  'docsurvey.config.yml',
  '.docsurveyrc',
  '.docsurveyrc.yaml',
  '.docsurveyrc.yml',
  'ai_config.yaml',
];

/**
 * Global config directory, relative to the home directory
 */
export const GLOBAL_CONFIG_DIR = '.docsurvey';

/**
 * Config file name in the global directory
 */
export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  DEFAULT_PROVIDER: 'DOCSURVEY_AI_PROVIDER',
  REPORTS_DIR: 'DOCSURVEY_REPORTS_DIR',
  LOG_LEVEL: 'DOCSURVEY_LOG_LEVEL',
  ANALYSIS_MODE: 'DOCSURVEY_ANALYSIS_MODE',
} as const;
