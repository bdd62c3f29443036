/**
 * Default configuration values
 */

import type { Config, OutputSettings } from './schema.js';

/**
 * Default output file settings
 */
export const DEFAULT_OUTPUT_SETTINGS: OutputSettings = {
  file_name: 'compile_commands.json',
  indent: 4,
};

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  config: 'Debug',
  build_dir: 'build',
  skip_headers: false,
  verbose: false,
  output: DEFAULT_OUTPUT_SETTINGS,
};

/**
 * Configuration file names to search for, in order
 */
export const CONFIG_FILE_NAMES = [
  'compdb.config.yaml',
  'compdb.config.yml',
  '.compdbrc.yaml',
  '.compdbrc.yml',
  '.compdbrc',
];

/**
 * Environment variable names
 */
export const ENV_VARS = {
  CONFIG: 'COMPDB_CONFIG',
  BUILD_DIR: 'COMPDB_BUILD_DIR',
  SKIP_HEADERS: 'COMPDB_SKIP_HEADERS',
  LOG_LEVEL: 'COMPDB_LOG_LEVEL',
} as const;
