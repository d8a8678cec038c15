/**
 * Configuration file management
 * Stores user preferences in ~/.scatter/config.json
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import type { CLIConfiguration } from '@scatter/shared';
import { DEFAULT_CLI_CONFIG } from '@scatter/shared';

const CONFIG_DIR = join(homedir(), '.scatter');
const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

export const CONFIG_KEYS: readonly (keyof CLIConfiguration)[] = [
  'apiUrl',
  'timeoutMs',
  'outputFormat',
];

export function isConfigKey(key: string): key is keyof CLIConfiguration {
  return CONFIG_KEYS.some((k) => k === key);
}

/**
 * Keep only well-typed known keys from parsed file content
 */
function pickConfig(raw: unknown): Partial<CLIConfiguration> {
  if (typeof raw !== 'object' || raw === null) {
    return {};
  }

  const picked: Partial<CLIConfiguration> = {};
  const apiUrl: unknown = Reflect.get(raw, 'apiUrl');
  const timeoutMs: unknown = Reflect.get(raw, 'timeoutMs');
  const outputFormat: unknown = Reflect.get(raw, 'outputFormat');

  if (typeof apiUrl === 'string') picked.apiUrl = apiUrl;
  if (typeof timeoutMs === 'number') picked.timeoutMs = timeoutMs;
  if (outputFormat === 'table' || outputFormat === 'json') picked.outputFormat = outputFormat;

  return picked;
}

function readConfigFile(filePath: string): Partial<CLIConfiguration> {
  if (!existsSync(filePath)) {
    return {};
  }

  try {
    return pickConfig(JSON.parse(readFileSync(filePath, 'utf-8')));
  } catch (error) {
    console.warn(`Warning: Failed to parse config file: ${error}`);
    return {};
  }
}

/**
 * Load configuration from file and environment variables
 * Environment variables take precedence over file config
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): CLIConfiguration {
  const fileConfig = readConfigFile(configPath || CONFIG_FILE);

  return {
    apiUrl: env.SCATTER_API_URL || fileConfig.apiUrl || DEFAULT_CLI_CONFIG.apiUrl,
    timeoutMs: fileConfig.timeoutMs ?? DEFAULT_CLI_CONFIG.timeoutMs,
    outputFormat: fileConfig.outputFormat ?? DEFAULT_CLI_CONFIG.outputFormat,
  };
}

/**
 * Save configuration to file, merged over what is already there
 */
export function saveConfig(config: Partial<CLIConfiguration>, configPath?: string): void {
  const filePath = configPath || CONFIG_FILE;
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const mergedConfig = {
    ...readConfigFile(filePath),
    ...config,
  };

  writeFileSync(filePath, JSON.stringify(mergedConfig, null, 2), 'utf-8');
}

/**
 * Parse and validate a value given on the command line for a key
 *
 * Returns the typed partial config, or a list of problems.
 */
export function parseConfigValue(
  key: keyof CLIConfiguration,
  value: string
): { ok: true; config: Partial<CLIConfiguration> } | { ok: false; errors: string[] } {
  switch (key) {
    case 'apiUrl':
      if (!/^https?:\/\//.test(value)) {
        return { ok: false, errors: ['apiUrl must start with http:// or https://'] };
      }
      return { ok: true, config: { apiUrl: value } };

    case 'timeoutMs': {
      const timeoutMs = Number(value);
      if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
        return { ok: false, errors: ['timeoutMs must be a positive integer'] };
      }
      return { ok: true, config: { timeoutMs } };
    }

    case 'outputFormat':
      if (value !== 'table' && value !== 'json') {
        return { ok: false, errors: ['outputFormat must be either "table" or "json"'] };
      }
      return { ok: true, config: { outputFormat: value } };
  }
}

/**
 * Get the default config file path
 */
export function getDefaultConfigPath(): string {
  return CONFIG_FILE;
}
