import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';

/**
 * Default config file, resolved against the current directory.
 */
export const DEFAULT_CONFIG_FILE = 'config.json';

/**
 * Environment variable that overrides the config file location.
 */
export const CONFIG_PATH_ENV = 'REPO_FORGE_CONFIG';

const modelProfileSchema = z.object({
  api_key: z.string().default(''),
  model_name: z.string().min(1),
  api_url: z.string().url(),
});

const settingsSchema = z.object({
  request_timeout_seconds: z.number().positive().default(30),
  execution_timeout_seconds: z.number().positive().default(30),
  max_context_files: z.number().int().min(0).default(20),
  max_output_tokens: z.number().int().positive().default(2000),
});

const configFileSchema = z.object({
  default_model: z.string().min(1).default('openai'),
  models: z.record(z.string(), modelProfileSchema),
  settings: settingsSchema.default({}),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * A named profile as written in the config file.
 */
export interface ProfileEntry {
  readonly apiKey: string;
  readonly modelName: string;
  readonly apiUrl: string;
}

export interface Settings {
  readonly requestTimeoutSeconds: number;
  readonly executionTimeoutSeconds: number;
  readonly maxContextFiles: number;
  readonly maxOutputTokens: number;
}

export interface AppConfig {
  /**
   * Absolute path the configuration was read from.
   */
  readonly source: string;
  readonly defaultModel: string;
  readonly models: Readonly<Record<string, ProfileEntry>>;
  readonly settings: Settings;
}

/**
 * Where to read the configuration from: explicit path, then the
 * REPO_FORGE_CONFIG environment variable, then ./config.json.
 */
export function resolveConfigPath(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const override = explicitPath?.trim() || env[CONFIG_PATH_ENV]?.trim();
  return path.resolve(override || DEFAULT_CONFIG_FILE);
}

/**
 * Validate an already-parsed config object.
 */
export function parseConfig(data: unknown, source: string): AppConfig {
  const parsed = configFileSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid config file '${source}': ${details}`);
  }

  const { default_model, models, settings } = parsed.data;
  const profiles: Record<string, ProfileEntry> = {};
  for (const [name, entry] of Object.entries(models)) {
    profiles[name] = {
      apiKey: entry.api_key,
      modelName: entry.model_name,
      apiUrl: entry.api_url,
    };
  }

  return {
    source,
    defaultModel: default_model,
    models: profiles,
    settings: {
      requestTimeoutSeconds: settings.request_timeout_seconds,
      executionTimeoutSeconds: settings.execution_timeout_seconds,
      maxContextFiles: settings.max_context_files,
      maxOutputTokens: settings.max_output_tokens,
    },
  };
}

/**
 * Read and validate the JSON config file.
 */
export async function loadConfig(configPath: string): Promise<AppConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Config file '${configPath}' not found`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `Config file '${configPath}' is not valid JSON: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  return parseConfig(data, configPath);
}
