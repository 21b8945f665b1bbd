import { describe, expect, it } from 'vitest';
import { parseConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { apiKeyEnvName, listProfiles, resolveModelProfile } from './model-profile.js';

const config = parseConfig(
  {
    default_model: 'openai',
    models: {
      openai: {
        api_key: 'test-secret',
        model_name: 'gpt-4',
        api_url: 'https://api.openai.com/v1/chat/completions',
      },
      'deep-seek': {
        api_key: '',
        model_name: 'deepseek-chat',
        api_url: 'https://api.deepseek.com/v1/chat/completions',
      },
    },
  },
  '/etc/repo-forge/config.json',
);

describe('apiKeyEnvName', () => {
  it('should upper-case the name and replace other characters', () => {
    expect(apiKeyEnvName('openai')).toBe('OPENAI_API_KEY');
    expect(apiKeyEnvName('deep-seek')).toBe('DEEP_SEEK_API_KEY');
  });
});

describe('resolveModelProfile', () => {
  it('should resolve the default profile', () => {
    expect(resolveModelProfile(config, undefined, { env: {} })).toEqual({
      name: 'openai',
      apiKey: 'test-secret',
      modelName: 'gpt-4',
      apiUrl: 'https://api.openai.com/v1/chat/completions',
    });
  });

  it('should let an explicit key replace only the credential', () => {
    const profile = resolveModelProfile(config, 'openai', { apiKey: 'other-secret', env: {} });
    expect(profile.apiKey).toBe('other-secret');
    expect(profile.modelName).toBe('gpt-4');
  });

  it('should read an empty key from the environment', () => {
    const profile = resolveModelProfile(config, 'deep-seek', {
      env: { DEEP_SEEK_API_KEY: 'env-secret' },
    });
    expect(profile.apiKey).toBe('env-secret');
  });

  it('should fail when no credential is available', () => {
    expect(() => resolveModelProfile(config, 'deep-seek', { env: {} })).toThrow(
      "API key for 'deep-seek' is empty. Set it in /etc/repo-forge/config.json, " +
        'export DEEP_SEEK_API_KEY, or pass --api-key.',
    );
  });

  it('should fail for an unknown profile instead of falling back', () => {
    expect(() => resolveModelProfile(config, 'claude', { env: {} })).toThrow(ConfigurationError);
    expect(() => resolveModelProfile(config, 'claude', { env: {} })).toThrow(
      "Model 'claude' not found in config (available: openai, deep-seek)",
    );
  });
});

describe('listProfiles', () => {
  it('should list profile names', () => {
    expect(listProfiles(config)).toEqual(['openai', 'deep-seek']);
  });
});
