/**
 * Source command extraction from CL.command.1.tlog files
 */

import type { CompileCommand } from '../types/compdb.js';
import { getCorrectCasingForPath } from './case-resolver.js';
import { CompdbError } from './errors.js';
import type { FileSystem } from './file-system.js';
import { readFileLines } from './line-reader.js';
import { silentLogger, type Logger } from './logger.js';
import { err, ok, type Result } from './result.js';

/** Tlogs store paths upper-cased, so these are matched case-sensitively */
export const SOURCE_EXTENSIONS = ['.C', '.CC', '.CPP', '.CXX', '.M', '.MM'] as const;

export const COMPILER_PREFIX = 'cl.exe ';

function isAsciiLetter(c: string): boolean {
  return (c >= 'A' && c <= 'Z') || (c >= 'a' && c <= 'z');
}

/**
 * Index where the recorded source path starts: the last drive letter followed
 * by ':' in the line, or -1 when there is none
 */
export function findSourcePathStart(line: string): number {
  for (let i = line.length - 2; i >= 0; i--) {
    if (isAsciiLetter(line[i]) && line[i + 1] === ':') {
      return i;
    }
  }
  return -1;
}

/**
 * Build one compile command per unique source file named in the tlogs
 */
export function createSourceCommands(
  fs: FileSystem,
  buildDir: string,
  tlogFiles: readonly string[],
  logger: Logger = silentLogger,
): Result<CompileCommand[]> {
  const commands: CompileCommand[] = [];
  const seen = new Set<string>();

  for (const tlogFile of tlogFiles) {
    logger.debug(`File: ${tlogFile}`);

    const lines = readFileLines(fs, tlogFile);
    if (!lines.ok) {
      return lines;
    }
    logger.debug(`Num Lines: ${lines.value.length}`);

    for (const line of lines.value) {
      if (!line.startsWith('/c')) {
        continue;
      }
      logger.debug(`Command: ${line}`);

      if (!SOURCE_EXTENSIONS.some((extension) => line.endsWith(extension))) {
        return err(
          new CompdbError('NotASourceCommand', `Command did not end with source file: ${line}`, {
            path: tlogFile,
          }),
        );
      }

      const start = findSourcePathStart(line);
      if (start === -1) {
        return err(
          new CompdbError('NotASourceCommand', `Couldn't find source file in command: ${line}`, {
            path: tlogFile,
          }),
        );
      }

      const recordedPath = line.slice(start);
      const corrected = getCorrectCasingForPath(fs, recordedPath);
      if (!corrected.ok) {
        logger.warn(`Skipping ${recordedPath}: ${corrected.error.message}`);
        continue;
      }

      const file = corrected.value;
      logger.debug(`Source File: ${file}`);
      if (seen.has(file)) {
        continue;
      }
      seen.add(file);

      commands.push({
        directory: buildDir,
        command: `${COMPILER_PREFIX}${line.slice(0, start)}${file}`,
        file,
      });
    }
  }

  return ok(commands);
}
