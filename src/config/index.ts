/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, type Config } from './schema.js';
import { CONFIG_FILE_NAMES, DEFAULT_CONFIG, ENV_VARS } from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('compdb', {
  searchPlaces: CONFIG_FILE_NAMES,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

/**
 * Result of loading configuration
 */
export interface LoadedConfig {
  config: Config;
  /** Config file that was used, or null when none was found */
  filepath: string | null;
  /** Problems that made a source get ignored */
  warnings: string[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load project-specific configuration from the working directory
 */
async function loadProjectConfig(
  cwd: string | undefined,
  warnings: string[],
): Promise<{ config: Record<string, unknown>; filepath: string | null }> {
  try {
    const result = await explorer.search(cwd);
    if (result && !result.isEmpty) {
      const loaded: unknown = result.config;
      if (isPlainObject(loaded)) {
        return { config: loaded, filepath: result.filepath };
      }
      warnings.push(`Ignoring ${result.filepath}: expected a mapping at the top level`);
    }
  } catch (error) {
    warnings.push(
      `Couldn't read configuration file: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return { config: {}, filepath: null };
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<Config> {
  const config: Partial<Config> = {};

  const buildConfig = env[ENV_VARS.CONFIG];
  if (buildConfig) {
    config.config = buildConfig;
  }

  const buildDir = env[ENV_VARS.BUILD_DIR];
  if (buildDir) {
    config.build_dir = buildDir;
  }

  const skipHeaders = env[ENV_VARS.SKIP_HEADERS]?.toLowerCase();
  if (skipHeaders === '1' || skipHeaders === 'true') {
    config.skip_headers = true;
  } else if (skipHeaders === '0' || skipHeaders === 'false') {
    config.skip_headers = false;
  }

  // Verbose/log level
  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    config.verbose = true;
  }

  return config;
}

/**
 * Deep merge configuration objects
 */
export function deepMerge<T extends Record<string, unknown>>(target: T, source: Partial<T>): T {
  const result = { ...target };

  for (const key in source) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (
      sourceValue !== undefined &&
      sourceValue !== null &&
      typeof sourceValue === 'object' &&
      !Array.isArray(sourceValue) &&
      typeof targetValue === 'object' &&
      !Array.isArray(targetValue)
    ) {
      result[key] = deepMerge(
        targetValue as Record<string, unknown>,
        sourceValue as Record<string, unknown>
      ) as T[Extract<keyof T, string>];
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue as T[Extract<keyof T, string>];
    }
  }

  return result;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > project config > defaults
 */
export async function loadConfig(
  cwd?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<LoadedConfig> {
  const warnings: string[] = [];
  const project = await loadProjectConfig(cwd, warnings);
  const envConfig = loadEnvConfig(env);

  // Merge in priority order
  let merged: Record<string, unknown> = deepMerge<Record<string, unknown>>(DEFAULT_CONFIG, project.config);
  merged = deepMerge(merged, envConfig);

  // Validate final config
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    warnings.push(`Invalid configuration, using defaults (${issues})`);
    // Return defaults if validation fails
    return { config: DEFAULT_CONFIG, filepath: project.filepath, warnings };
  }

  return { config: result.data, filepath: project.filepath, warnings };
}
