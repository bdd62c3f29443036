/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command, CommanderError } from 'commander';
import { createRequire } from 'node:module';
import { runGenerate, type CliContext, type GenerateFlags } from './commands/index.js';
import { disableColor, printError } from './output.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../../package.json');
export const VERSION: string = packageJson.version;

/**
 * Multi-letter short flags from earlier releases, which commander cannot declare
 */
const LEGACY_FLAGS = new Map([
  ['-sh', '--skip-headers'],
  ['-bd', '--build-dir'],
]);

/**
 * Rewrite legacy short flags to their long form. Arguments after `--` are left alone.
 */
export function normalizeArgs(args: readonly string[]): string[] {
  const terminator = args.indexOf('--');
  return args.map((arg, index) =>
    terminator !== -1 && index > terminator ? arg : (LEGACY_FLAGS.get(arg) ?? arg),
  );
}

/**
 * Create the main CLI program
 *
 * @param onRun - Called with the parsed flags when the program is not just printing help
 */
export function createProgram(onRun: (flags: GenerateFlags) => Promise<void>): Command {
  const program = new Command();

  program
    .name('msbuild-compdb')
    .description('Generate compile_commands.json from the tlog files of an MSBuild build')
    .version(VERSION)
    .option('-c, --config <name>', 'Build configuration to read (Debug, Release, ...) [default: Debug]')
    .option(
      '-b, --build-dir <path>',
      'Build directory, relative to the current working directory (alias: -bd) [default: build]',
    )
    .option('--skip-headers', 'Do not add entries for included headers (alias: -sh)')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--no-color', 'Disable colored output')
    .exitOverride()
    .action(async () => {
      const { color, ...flags } = program.opts<GenerateFlags & { color: boolean }>();
      if (!color) {
        disableColor();
      }
      await onRun(flags);
    });

  return program;
}

/**
 * Run the CLI
 *
 * @returns Process exit code
 */
export async function runCLI(args: string[] = process.argv, context: CliContext = {}): Promise<number> {
  let exitCode = 0;
  const program = createProgram(async (flags) => {
    exitCode = await runGenerate(flags, context);
  });

  try {
    await program.parseAsync(normalizeArgs(args));
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    printError(error instanceof Error ? error.message : 'Unknown error');
    return 1;
  }

  return exitCode;
}
