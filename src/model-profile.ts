import type { AppConfig } from './config.js';
import { ConfigurationError } from './errors.js';

/**
 * A resolved model profile: everything needed to talk to one endpoint.
 */
export interface ModelProfile {
  /**
   * Profile name as written in the config file (e.g. `openai`).
   */
  readonly name: string;
  readonly apiKey: string;
  readonly modelName: string;
  /**
   * Chat-completion endpoint, either the full `.../chat/completions` URL or its base URL.
   */
  readonly apiUrl: string;
}

export interface ResolveProfileOptions {
  /**
   * Credential given on the command line. It replaces the profile's own key
   * but never changes which model or endpoint is used.
   */
  apiKey?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Environment variable consulted when a profile has no key, e.g. `OPENAI_API_KEY`.
 */
export function apiKeyEnvName(profileName: string): string {
  return `${profileName.toUpperCase().replace(/[^A-Z0-9]+/g, '_')}_API_KEY`;
}

/**
 * Names of every configured profile.
 */
export function listProfiles(config: AppConfig): string[] {
  return Object.keys(config.models);
}

/**
 * Resolve a profile by name (or the configured default).
 *
 * Credential order: explicit key, then the profile's `api_key`, then the
 * `<NAME>_API_KEY` environment variable.
 */
export function resolveModelProfile(
  config: AppConfig,
  name: string = config.defaultModel,
  { apiKey, env = process.env }: ResolveProfileOptions = {},
): ModelProfile {
  const entry = config.models[name];
  if (!entry) {
    const available = listProfiles(config).join(', ') || 'none';
    throw new ConfigurationError(
      `Model '${name}' not found in config (available: ${available})`,
    );
  }

  const key =
    apiKey?.trim() || entry.apiKey.trim() || env[apiKeyEnvName(name)]?.trim() || '';
  if (!key) {
    throw new ConfigurationError(
      `API key for '${name}' is empty. Set it in ${config.source}, ` +
        `export ${apiKeyEnvName(name)}, or pass --api-key.`,
    );
  }

  return {
    name,
    apiKey: key,
    modelName: entry.modelName,
    apiUrl: entry.apiUrl,
  };
}
