/**
 * Config command - Manage CLI configuration
 */

import { Command } from 'commander';
import {
  loadConfig,
  saveConfig,
  getDefaultConfigPath,
  parseConfigValue,
  isConfigKey,
  CONFIG_KEYS,
} from '../utils/config-file.js';
import { output, success, error, formatKeyValue } from '../utils/output.js';
import { getGlobalOptions } from '../cli.js';

export function configCommand(): Command {
  const cmd = new Command('config');

  cmd
    .description('Manage CLI configuration')
    .addCommand(configSetCommand())
    .addCommand(configGetCommand())
    .addCommand(configListCommand())
    .addCommand(configPathCommand());

  return cmd;
}

function configSetCommand(): Command {
  const cmd = new Command('set');

  cmd
    .description('Set a configuration value')
    .argument('<key>', 'Configuration key')
    .argument('<value>', 'Configuration value')
    .action(async (key: string, value: string, _options, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      try {
        if (!isConfigKey(key)) {
          error(`Invalid config key: ${key}`, globalOpts);
          error(`Valid keys: ${CONFIG_KEYS.join(', ')}`, globalOpts);
          process.exit(1);
        }

        const parsed = parseConfigValue(key, value);
        if (!parsed.ok) {
          error('Configuration validation failed:', globalOpts);
          parsed.errors.forEach((err) => error(`  - ${err}`, globalOpts));
          process.exit(1);
        }

        saveConfig(parsed.config, globalOpts.config);
        success(`Set ${key} = ${value}`, globalOpts);
      } catch (err) {
        error(`Failed to set config: ${err instanceof Error ? err.message : String(err)}`, {});
        process.exit(1);
      }
    });

  return cmd;
}

function configGetCommand(): Command {
  const cmd = new Command('get');

  cmd
    .description('Get a configuration value')
    .argument('<key>', 'Configuration key')
    .action(async (key: string, _options, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      try {
        if (!isConfigKey(key)) {
          error(`Unknown config key: ${key}`, globalOpts);
          process.exit(1);
        }

        const value = loadConfig(globalOpts.config)[key];

        if (globalOpts.json) {
          output({ [key]: value }, globalOpts);
        } else {
          output(String(value), globalOpts);
        }
      } catch (err) {
        error(`Failed to get config: ${err instanceof Error ? err.message : String(err)}`, {});
        process.exit(1);
      }
    });

  return cmd;
}

function configListCommand(): Command {
  const cmd = new Command('list');

  cmd
    .description('List all configuration values')
    .alias('ls')
    .action(async (_options, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      try {
        const config = loadConfig(globalOpts.config);

        if (globalOpts.json) {
          output(config, globalOpts);
        } else if (!globalOpts.quiet) {
          console.log('Current configuration:');
          console.log(formatKeyValue({ ...config }));
        }
      } catch (err) {
        error(`Failed to list config: ${err instanceof Error ? err.message : String(err)}`, {});
        process.exit(1);
      }
    });

  return cmd;
}

function configPathCommand(): Command {
  const cmd = new Command('path');

  cmd
    .description('Show the configuration file path')
    .action((_options, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const path = globalOpts.config || getDefaultConfigPath();

      if (globalOpts.json) {
        output({ configPath: path }, globalOpts);
      } else {
        output(path, globalOpts);
      }
    });

  return cmd;
}
