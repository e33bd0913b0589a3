/**
 * Config command
 * Inspect and edit the analysis configuration
 */

import { Command, Argument } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  loadConfig,
  findConfigPath,
  saveConfig,
  getConfigValue,
  getProviderOrder,
  isProviderEnabled,
  resolveCredential,
  setDefaultProvider,
  setProviderEnabled,
  validateConfig,
  type Config,
} from '../../config/index.js';
import { DEFAULT_CONFIG, CONFIG_FILE_NAMES } from '../../config/defaults.js';
import { PROVIDER_NAMES, ProviderNameSchema, type ProviderName } from '../../types/ai.js';
import { errorMessage } from '../../types/errors.js';
import {
  printHeader,
  printSection,
  printSuccess,
  printError,
  printInfo,
  printKeyValue,
  printTable,
  printWarning,
} from '../output.js';

/**
 * Row of the `config providers` table
 */
export interface ProviderStatus {
  provider: ProviderName;
  enabled: boolean;
  hasCredential: boolean;
  isDefault: boolean;
  /** 1-based position in the fallback chain, or null when not tried */
  position: number | null;
}

/**
 * Status of every provider under the given config
 */
export function describeProviders(config: Config, env: NodeJS.ProcessEnv = process.env): ProviderStatus[] {
  const order = getProviderOrder(config);
  return PROVIDER_NAMES.map((provider) => {
    const index = order.indexOf(provider);
    return {
      provider,
      enabled: isProviderEnabled(config, provider),
      hasCredential: resolveCredential(config, provider, env) !== undefined,
      isDefault: config.ai_providers.default === provider,
      position: index === -1 ? null : index + 1,
    };
  });
}

/**
 * Print a configuration section, descending into nested objects
 */
function printConfigSection(name: string, section: unknown, depth: number = 0): void {
  if (depth === 0) {
    printSection(name);
  } else {
    console.log(`${'  '.repeat(depth)}${name}:`);
  }

  if (typeof section !== 'object' || section === null) {
    return;
  }

  for (const [key, value] of Object.entries(section)) {
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      printConfigSection(key, value, depth + 1);
    } else {
      printKeyValue(`${'  '.repeat(depth)}${key}`, Array.isArray(value) ? value.join(', ') : String(value));
    }
  }
}

function printConfig(config: Config): void {
  printConfigSection('AI Providers', config.ai_providers);
  printConfigSection('Fallback', config.fallback);
  printConfigSection('Analysis', config.analysis);
  printConfigSection('Reports', config.reports);
  printConfigSection('Logging', config.logging);
  console.log();
}

/**
 * Config file that edits are written to: the one found from cwd, else a
 * new docsurvey.config.yaml in cwd
 */
async function editableConfigPath(explicit?: string): Promise<string> {
  if (explicit) return path.resolve(explicit);
  return (await findConfigPath()) ?? path.join(process.cwd(), CONFIG_FILE_NAMES[0]);
}

async function editConfig(explicit: string | undefined, update: (config: Config) => Config): Promise<string> {
  const filePath = await editableConfigPath(explicit);
  let exists = true;
  try {
    await fs.access(filePath);
  } catch {
    exists = false;
  }
  const current = exists ? await loadConfig({ configPath: filePath, includeGlobal: false, env: {} }) : DEFAULT_CONFIG;
  return saveConfig(update(current), filePath);
}

function parseProvider(value: string): ProviderName {
  const parsed = ProviderNameSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Unknown provider: ${value}. Expected one of ${PROVIDER_NAMES.join(', ')}`);
  }
  return parsed.data;
}

/**
 * Create the config command
 */
export function createConfigCommand(): Command {
  const config = new Command('config').description('Inspect and edit the analysis configuration');

  config
    .command('show')
    .description('Show the effective configuration')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Configuration file to use instead of searching')
    .action(async (options: { json?: boolean; config?: string }) => {
      try {
        const loaded = await loadConfig({ configPath: options.config });

        if (options.json) {
          console.log(JSON.stringify(loaded, null, 2));
          return;
        }

        printHeader('Current Configuration');
        const configPath = options.config ? path.resolve(options.config) : await findConfigPath();
        if (configPath) {
          printInfo(`Config file: ${configPath}`);
        } else {
          printInfo('Using default configuration');
        }
        printConfig(loaded);
      } catch (error) {
        printError(errorMessage(error));
        process.exit(1);
      }
    });

  config
    .command('defaults')
    .description('Show default configuration values')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      if (options.json) {
        console.log(JSON.stringify(DEFAULT_CONFIG, null, 2));
        return;
      }

      printHeader('Default Configuration');
      printConfig(DEFAULT_CONFIG);
    });

  config
    .command('get')
    .description('Get a specific configuration value')
    .argument('<key>', 'Configuration key (e.g., analysis.mode)')
    .action(async (key: string) => {
      try {
        const value = getConfigValue(await loadConfig(), key);

        if (value === undefined) {
          printError(`Configuration key not found: ${key}`);
          process.exit(1);
        }

        console.log(typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
      } catch (error) {
        printError(errorMessage(error));
        process.exit(1);
      }
    });

  config
    .command('path')
    .description('Show configuration file path')
    .action(async () => {
      const configPath = await findConfigPath();

      if (configPath) {
        console.log(configPath);
      } else {
        printInfo('No configuration file found');
        printInfo(`Create one at: ${CONFIG_FILE_NAMES.join(', ')}`);
      }
    });

  config
    .command('init')
    .description('Create a configuration file with the default values')
    .option('-f, --force', 'Overwrite an existing file', false)
    .action(async (options: { force: boolean }) => {
      const filepath = path.join(process.cwd(), CONFIG_FILE_NAMES[0]);

      try {
        if (!options.force) {
          const exists = await fs
            .access(filepath)
            .then(() => true)
            .catch(() => false);
          if (exists) {
            printError(`Configuration file already exists: ${filepath}`);
            process.exit(1);
          }
        }

        await saveConfig(DEFAULT_CONFIG, filepath);
        printSuccess(`Created configuration file: ${filepath}`);
      } catch (error) {
        printError(errorMessage(error));
        process.exit(1);
      }
    });

  config
    .command('validate')
    .description('Check the provider setup')
    .option('-c, --config <path>', 'Configuration file to use instead of searching')
    .action(async (options: { config?: string }) => {
      try {
        const problems = validateConfig(await loadConfig({ configPath: options.config }));

        if (problems.length === 0) {
          printSuccess('Configuration is valid');
          return;
        }

        for (const problem of problems) {
          printWarning(problem);
        }
        process.exit(1);
      } catch (error) {
        printError(errorMessage(error));
        process.exit(1);
      }
    });

  config
    .command('providers')
    .description('Show AI provider status and fallback order')
    .option('-c, --config <path>', 'Configuration file to use instead of searching')
    .action(async (options: { config?: string }) => {
      try {
        const statuses = describeProviders(await loadConfig({ configPath: options.config }));

        printHeader('AI Providers');
        printTable(
          ['Provider', 'Enabled', 'Credential', 'Order'],
          statuses.map((status) => [
            status.isDefault ? `${status.provider} (default)` : status.provider,
            status.enabled ? 'yes' : 'no',
            status.hasCredential ? 'found' : 'missing',
            status.position === null ? '-' : String(status.position),
          ])
        );
      } catch (error) {
        printError(errorMessage(error));
        process.exit(1);
      }
    });

  const providerArgument = () => new Argument('<provider>', 'AI provider').choices(PROVIDER_NAMES);

  config
    .command('enable')
    .description('Enable an AI provider in the project config file')
    .addArgument(providerArgument())
    .option('-c, --config <path>', 'Configuration file to edit')
    .action(async (provider: string, options: { config?: string }) => {
      try {
        const name = parseProvider(provider);
        const written = await editConfig(options.config, (current) => setProviderEnabled(current, name, true));
        printSuccess(`Enabled ${name} in ${written}`);
      } catch (error) {
        printError(errorMessage(error));
        process.exit(1);
      }
    });

  config
    .command('disable')
    .description('Disable an AI provider in the project config file')
    .addArgument(providerArgument())
    .option('-c, --config <path>', 'Configuration file to edit')
    .action(async (provider: string, options: { config?: string }) => {
      try {
        const name = parseProvider(provider);
        const written = await editConfig(options.config, (current) => setProviderEnabled(current, name, false));
        printSuccess(`Disabled ${name} in ${written}`);
      } catch (error) {
        printError(errorMessage(error));
        process.exit(1);
      }
    });

  config
    .command('set-default')
    .description('Make an AI provider the first one tried')
    .addArgument(providerArgument())
    .option('-c, --config <path>', 'Configuration file to edit')
    .action(async (provider: string, options: { config?: string }) => {
      try {
        const name = parseProvider(provider);
        const written = await editConfig(options.config, (current) =>
          setProviderEnabled(setDefaultProvider(current, name), name, true)
        );
        printSuccess(`Default provider set to ${name} in ${written}`);
      } catch (error) {
        printError(errorMessage(error));
        process.exit(1);
      }
    });

  return config;
}
