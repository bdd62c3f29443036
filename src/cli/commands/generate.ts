/**
 * Generate command
 * Writes compile_commands.json for one build configuration
 */

import { generateCompilationDatabase } from '../../compdb/compile-commands.js';
import { nodeFileSystem, type FileSystem } from '../../compdb/file-system.js';
import { loadConfig, type Config } from '../../config/index.js';
import {
  createConsoleLogger,
  failSpinner,
  printError,
  printKeyValue,
  printSuccess,
  printWarning,
  startSpinner,
  succeedSpinner,
} from '../output.js';

/**
 * Flags as parsed by commander; unset flags fall back to configuration
 */
export interface GenerateFlags {
  config?: string;
  buildDir?: string;
  skipHeaders?: boolean;
  verbose?: boolean;
}

/**
 * Where and against what a run happens
 */
export interface CliContext {
  cwd?: string;
  fileSystem?: FileSystem;
  env?: NodeJS.ProcessEnv;
}

export interface GenerateSettings {
  config: string;
  buildDir: string;
  skipHeaders: boolean;
  verbose: boolean;
  outputFileName: string;
  indent: number;
}

/**
 * Merge command line flags over loaded configuration
 */
export function resolveSettings(config: Config, flags: GenerateFlags): GenerateSettings {
  return {
    config: flags.config ?? config.config,
    buildDir: flags.buildDir ?? config.build_dir,
    skipHeaders: flags.skipHeaders ?? config.skip_headers,
    verbose: flags.verbose ?? config.verbose,
    outputFileName: config.output.file_name,
    indent: config.output.indent,
  };
}

/**
 * Run the generator and report the outcome
 *
 * @returns Process exit code
 */
export async function runGenerate(flags: GenerateFlags, context: CliContext = {}): Promise<number> {
  const cwd = context.cwd ?? process.cwd();
  const fileSystem = context.fileSystem ?? nodeFileSystem;

  const loaded = await loadConfig(cwd, context.env);
  for (const warning of loaded.warnings) {
    printWarning(warning);
  }

  const settings = resolveSettings(loaded.config, flags);
  const logger = createConsoleLogger({ verbose: settings.verbose });
  const buildDir = fileSystem.path.resolve(cwd, settings.buildDir);

  if (settings.verbose) {
    printKeyValue('Configuration', settings.config);
    printKeyValue('Build directory', buildDir);
    printKeyValue('Headers', settings.skipHeaders ? 'skipped' : 'included');
    if (loaded.filepath) {
      printKeyValue('Config file', loaded.filepath);
    }
  } else {
    startSpinner(`Generating ${settings.outputFileName} for ${settings.config}...`);
  }

  const result = generateCompilationDatabase(fileSystem, {
    buildDir,
    config: settings.config,
    skipHeaders: settings.skipHeaders,
    outputFileName: settings.outputFileName,
    indent: settings.indent,
    logger,
  });

  if (!result.ok) {
    failSpinner();
    printError(result.error.message);
    return 1;
  }

  const summary = `Wrote ${result.value.commands.length} entries to ${result.value.outputPath}`;
  if (settings.verbose) {
    printSuccess(summary);
  } else {
    succeedSpinner(summary);
  }
  return 0;
}
