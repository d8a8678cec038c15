/**
 * Tests for CLI configuration file handling
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_CLI_CONFIG } from '@scatter/shared';
import {
  loadConfig,
  saveConfig,
  parseConfigValue,
  isConfigKey,
} from '../utils/config-file.js';

describe('config file', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'scatter-cli-'));
    configPath = join(dir, 'nested', 'config.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns defaults when the file does not exist', () => {
    expect(loadConfig(configPath, {})).toEqual(DEFAULT_CLI_CONFIG);
  });

  it('saves and merges values', async () => {
    saveConfig({ apiUrl: 'http://coordinator:5000' }, configPath);
    saveConfig({ timeoutMs: 5000 }, configPath);

    const stored: unknown = JSON.parse(await readFile(configPath, 'utf-8'));
    expect(stored).toEqual({ apiUrl: 'http://coordinator:5000', timeoutMs: 5000 });
    expect(loadConfig(configPath, {})).toEqual({
      apiUrl: 'http://coordinator:5000',
      timeoutMs: 5000,
      outputFormat: 'table',
    });
  });

  it('lets SCATTER_API_URL override the file', () => {
    saveConfig({ apiUrl: 'http://coordinator:5000' }, configPath);
    const config = loadConfig(configPath, { SCATTER_API_URL: 'http://override:6000' });
    expect(config.apiUrl).toBe('http://override:6000');
  });

  it('ignores wrongly typed values in the file', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, JSON.stringify({ timeoutMs: 'soon', outputFormat: 'xml' }));
    expect(loadConfig(path, {})).toEqual(DEFAULT_CLI_CONFIG);
  });

  describe('parseConfigValue', () => {
    it('accepts http and https urls', () => {
      expect(parseConfigValue('apiUrl', 'https://c.example:443')).toEqual({
        ok: true,
        config: { apiUrl: 'https://c.example:443' },
      });
    });

    it('rejects a url without scheme', () => {
      expect(parseConfigValue('apiUrl', 'localhost:5000')).toEqual({
        ok: false,
        errors: ['apiUrl must start with http:// or https://'],
      });
    });

    it('parses timeoutMs as a positive integer', () => {
      expect(parseConfigValue('timeoutMs', '2500')).toEqual({ ok: true, config: { timeoutMs: 2500 } });
      expect(parseConfigValue('timeoutMs', '0').ok).toBe(false);
      expect(parseConfigValue('timeoutMs', '1.5').ok).toBe(false);
    });

    it('restricts outputFormat', () => {
      expect(parseConfigValue('outputFormat', 'json')).toEqual({
        ok: true,
        config: { outputFormat: 'json' },
      });
      expect(parseConfigValue('outputFormat', 'yaml').ok).toBe(false);
    });
  });

  it('recognises config keys', () => {
    expect(isConfigKey('apiUrl')).toBe(true);
    expect(isConfigKey('natsUrl')).toBe(false);
  });
});
