/**
 * Compilation database generation
 * tlog discovery -> source commands -> header fan-out -> compile_commands.json
 */

import {
  CompilationDatabaseSchema,
  type CompilationDatabase,
  type CompileCommand,
} from '../types/compdb.js';
import { CompdbError, describeError } from './errors.js';
import type { FileSystem } from './file-system.js';
import { expandHeaderCommands } from './header-commands.js';
import { silentLogger, type Logger } from './logger.js';
import { err, ok, type Result } from './result.js';
import { createSourceCommands } from './source-commands.js';
import { findTlogFiles } from './tlog-finder.js';

export const DEFAULT_OUTPUT_FILE_NAME = 'compile_commands.json';
export const DEFAULT_INDENT = 4;

export interface CreateCompileCommandsOptions {
  skipHeaders?: boolean;
  logger?: Logger;
}

export interface GenerateOptions extends CreateCompileCommandsOptions {
  /** Absolute build directory */
  buildDir: string;
  /** Build configuration folder name, e.g. Debug */
  config: string;
  outputFileName?: string;
  indent?: number;
}

export interface GenerateResult {
  outputPath: string;
  commands: CompilationDatabase;
}

/**
 * Source commands for every tlog, followed by header commands unless skipped
 */
export function createCompileCommands(
  fs: FileSystem,
  buildDir: string,
  tlogFiles: readonly string[],
  options: CreateCompileCommandsOptions = {},
): Result<CompileCommand[]> {
  const logger = options.logger ?? silentLogger;

  const sources = createSourceCommands(fs, buildDir, tlogFiles, logger);
  if (!sources.ok || options.skipHeaders) {
    return sources;
  }

  const headers = expandHeaderCommands(fs, buildDir, sources.value, logger);
  if (!headers.ok) {
    return headers;
  }
  return ok([...sources.value, ...headers.value]);
}

/**
 * Render commands as a compile_commands.json document
 */
export function serializeCompilationDatabase(
  commands: Readonly<CompilationDatabase>,
  indent: number = DEFAULT_INDENT,
): string {
  // parsing rebuilds each entry with exactly directory, command, file in that order
  return JSON.stringify(CompilationDatabaseSchema.parse(commands), null, indent);
}

/**
 * Find the tlogs of a build, derive its commands and write compile_commands.json
 * into the build directory
 */
export function generateCompilationDatabase(
  fs: FileSystem,
  options: GenerateOptions,
): Result<GenerateResult> {
  const logger = options.logger ?? silentLogger;
  const { buildDir, config } = options;

  const tlogFiles = findTlogFiles(fs, buildDir, config, logger);
  if (!tlogFiles.ok) {
    return tlogFiles;
  }
  logger.debug(`Found ${tlogFiles.value.length} tlog file(s) for ${config}`);

  const commands = createCompileCommands(fs, buildDir, tlogFiles.value, {
    skipHeaders: options.skipHeaders,
    logger,
  });
  if (!commands.ok) {
    return commands;
  }

  const outputPath = fs.path.join(buildDir, options.outputFileName ?? DEFAULT_OUTPUT_FILE_NAME);
  logger.debug(`Writing ${outputPath}...`);

  try {
    fs.writeFile(outputPath, serializeCompilationDatabase(commands.value, options.indent));
  } catch (error) {
    return err(
      new CompdbError('WriteFailed', `Failed to write ${outputPath}: ${describeError(error)}`, {
        path: outputPath,
        cause: error,
      }),
    );
  }

  return ok({ outputPath, commands: commands.value });
}
