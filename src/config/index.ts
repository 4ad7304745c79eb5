/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';
import { ConfigSchema, MAX_TIMER_MS, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_FILE_NAMES, ENV_VARS } from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('testfleet', {
  searchPlaces: CONFIG_FILE_NAMES,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load project-specific configuration
 *
 * @param cwd - Directory to start searching from
 * @returns Raw configuration object and the file it came from
 */
async function loadProjectConfig(
  cwd?: string
): Promise<{ config: Record<string, unknown>; filepath: string | null }> {
  try {
    const result = await explorer.search(cwd);
    if (result && !result.isEmpty) {
      const raw: unknown = result.config;
      if (isPlainObject(raw)) {
        return { config: raw, filepath: result.filepath };
      }
      console.warn(`Ignoring ${result.filepath}: expected a mapping at the top level`);
    }
  } catch (error) {
    console.warn(
      'Failed to read configuration file:',
      error instanceof Error ? error.message : String(error)
    );
  }
  return { config: {}, filepath: null };
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  // Global deadline
  const timeout = env[ENV_VARS.TIMEOUT_MS];
  if (timeout) {
    const parsed = parseInt(timeout, 10);
    if (!isNaN(parsed) && parsed > 0 && parsed <= MAX_TIMER_MS) {
      config.execution = { timeout_ms: parsed };
    }
  }

  const output: Record<string, unknown> = {};

  // Verbose/log level
  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    output.verbose = true;
  }

  const noProgress = env[ENV_VARS.NO_PROGRESS];
  if (noProgress === '1' || noProgress === 'true') {
    output.progress = false;
  }

  if (Object.keys(output).length > 0) {
    config.output = output;
  }

  return config;
}

/**
 * Deep merge configuration objects.
 * Nested objects merge key by key; arrays and scalars from `source` replace.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Options for loadConfig
 */
export interface LoadConfigOptions {
  /** Directory to search for a project config file */
  cwd?: string;
  /** Values from CLI flags; highest priority */
  overrides?: Record<string, unknown>;
  env?: NodeJS.ProcessEnv;
}

/**
 * Cached config path from last load
 */
let cachedConfigPath: string | null = null;

/**
 * Load and merge configuration from all sources
 * Priority: CLI flags > env vars > project config > defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const { config: projectConfig, filepath } = await loadProjectConfig(options.cwd);
  cachedConfigPath = filepath;
  const envConfig = loadEnvConfig(options.env);

  const overrides = options.overrides ?? {};

  // Merge in priority order
  let merged = deepMerge(DEFAULT_CONFIG, projectConfig);
  merged = deepMerge(merged, envConfig);
  merged = deepMerge(merged, overrides);

  const result = ConfigSchema.safeParse(merged);
  if (result.success) {
    return result.data;
  }
  warnInvalid(result.error);

  // Drop the file layer; env vars and CLI flags still apply
  return validateConfig(deepMerge(deepMerge(DEFAULT_CONFIG, envConfig), overrides));
}

function warnInvalid(error: ZodError): void {
  const issues = error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  console.warn(`Configuration validation warnings: ${issues}`);
}

/**
 * Validate a merged configuration, falling back to defaults when invalid
 */
export function validateConfig(merged: Record<string, unknown>): Config {
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    warnInvalid(result.error);
    return DEFAULT_CONFIG;
  }

  return result.data;
}

/**
 * Get the path to the currently loaded config file (or null if using defaults)
 */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}
