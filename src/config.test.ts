import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CONFIG_PATH_ENV, loadConfig, parseConfig, resolveConfigPath } from './config.js';
import { ConfigurationError } from './errors.js';
import { makeTempDir } from './test-helpers.js';

const validConfig = {
  default_model: 'deepseek',
  models: {
    openai: {
      api_key: 'test-secret',
      model_name: 'gpt-4',
      api_url: 'https://api.openai.com/v1/chat/completions',
    },
    deepseek: {
      model_name: 'deepseek-chat',
      api_url: 'https://api.deepseek.com/v1/chat/completions',
    },
  },
};

describe('parseConfig', () => {
  it('should map profiles and fill default settings', () => {
    const config = parseConfig(validConfig, '/tmp/config.json');

    expect(config.source).toBe('/tmp/config.json');
    expect(config.defaultModel).toBe('deepseek');
    expect(config.models.openai).toEqual({
      apiKey: 'test-secret',
      modelName: 'gpt-4',
      apiUrl: 'https://api.openai.com/v1/chat/completions',
    });
    expect(config.models.deepseek?.apiKey).toBe('');
    expect(config.settings).toEqual({
      requestTimeoutSeconds: 30,
      executionTimeoutSeconds: 30,
      maxContextFiles: 20,
      maxOutputTokens: 2000,
    });
  });

  it('should default the model name to openai', () => {
    const config = parseConfig({ models: validConfig.models }, 'config.json');
    expect(config.defaultModel).toBe('openai');
  });

  it('should read explicit settings', () => {
    const config = parseConfig(
      { ...validConfig, settings: { request_timeout_seconds: 5, max_context_files: 3 } },
      'config.json',
    );
    expect(config.settings.requestTimeoutSeconds).toBe(5);
    expect(config.settings.maxContextFiles).toBe(3);
    expect(config.settings.executionTimeoutSeconds).toBe(30);
  });

  it('should reject a config without models', () => {
    expect(() => parseConfig({ default_model: 'openai' }, 'config.json')).toThrow(ConfigurationError);
    expect(() => parseConfig({ default_model: 'openai' }, 'config.json')).toThrow(
      /^Invalid config file 'config\.json': models: /,
    );
  });

  it('should name the offending field of a profile', () => {
    const broken = {
      models: { openai: { model_name: 'gpt-4', api_url: 'not a url' } },
    };
    expect(() => parseConfig(broken, 'config.json')).toThrow(/models\.openai\.api_url: /);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should load a JSON file', async () => {
    const file = path.join(dir, 'config.json');
    await fs.writeFile(file, JSON.stringify(validConfig));

    const config = await loadConfig(file);

    expect(config.source).toBe(file);
    expect(Object.keys(config.models)).toEqual(['openai', 'deepseek']);
  });

  it('should report a missing file', async () => {
    const file = path.join(dir, 'missing.json');
    await expect(loadConfig(file)).rejects.toThrow(`Config file '${file}' not found`);
  });

  it('should report malformed JSON', async () => {
    const file = path.join(dir, 'config.json');
    await fs.writeFile(file, '{ "models": ');

    await expect(loadConfig(file)).rejects.toBeInstanceOf(ConfigurationError);
    await expect(loadConfig(file)).rejects.toThrow(`Config file '${file}' is not valid JSON: `);
  });
});

describe('resolveConfigPath', () => {
  it('should prefer the explicit path', () => {
    expect(resolveConfigPath('custom.json', { [CONFIG_PATH_ENV]: 'env.json' })).toBe(
      path.resolve('custom.json'),
    );
  });

  it('should fall back to the environment variable', () => {
    expect(resolveConfigPath(undefined, { [CONFIG_PATH_ENV]: 'env.json' })).toBe(path.resolve('env.json'));
  });

  it('should default to config.json', () => {
    expect(resolveConfigPath(undefined, {})).toBe(path.resolve('config.json'));
  });
});
