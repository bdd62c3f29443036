/**
 * Header fan-out
 * Headers get the flags of the file that includes them. New headers are scanned
 * in turn until a pass finds nothing new, so transitive includes are covered.
 */

import type { CompileCommand } from '../types/compdb.js';
import { getCorrectCasingForPath } from './case-resolver.js';
import type { FileSystem } from './file-system.js';
import { findIncludePaths } from './include-paths.js';
import { readFileLines } from './line-reader.js';
import { silentLogger, type Logger } from './logger.js';
import { ok, type Result } from './result.js';

export interface IncludedFile {
  filePath: string;
  /** `#include "x"` rather than `#include <x>`: search the includer's directory first */
  usesQuotes: boolean;
}

const INCLUDE_DIRECTIVE = '#include';
const IMPORT_DIRECTIVE = '#import';

/**
 * Objective-C sources honour #import. Any name ending in `m` counts, which
 * catches .m and .mm along with the odd false positive.
 */
export function isObjectiveCSource(filePath: string): boolean {
  return filePath.endsWith('m');
}

function parseDirectiveTarget(rest: string): IncludedFile | null {
  const target = rest.trimStart();
  const opening = target[0];
  if (opening !== '"' && opening !== '<') {
    return null;
  }

  const closing = target.indexOf(opening === '"' ? '"' : '>', 1);
  if (closing === -1) {
    return null;
  }
  return { filePath: target.slice(1, closing), usesQuotes: opening === '"' };
}

/**
 * Pull `#include` targets (and `#import` targets for Objective-C) out of source lines.
 * Directives with no closing delimiter on the same line are ignored.
 */
export function parseIncludedFiles(lines: readonly string[], isObjC: boolean): IncludedFile[] {
  const included: IncludedFile[] = [];

  for (const rawLine of lines) {
    const line = rawLine.trimStart();

    let rest: string;
    if (line.startsWith(INCLUDE_DIRECTIVE)) {
      rest = line.slice(INCLUDE_DIRECTIVE.length);
    } else if (isObjC && line.startsWith(IMPORT_DIRECTIVE)) {
      rest = line.slice(IMPORT_DIRECTIVE.length);
    } else {
      continue;
    }

    const target = parseDirectiveTarget(rest);
    if (target) {
      included.push(target);
    }
  }

  return included;
}

function replaceFirst(haystack: string, needle: string, replacement: string): string {
  const index = haystack.indexOf(needle);
  if (index === -1) {
    return haystack;
  }
  return haystack.slice(0, index) + replacement + haystack.slice(index + needle.length);
}

/**
 * One fan-out pass: scan the files of `toCheck` and return commands for the
 * headers they include that are not already in `all`
 */
export function createCompileCommandsForHeaders(
  fs: FileSystem,
  buildDir: string,
  toCheck: readonly CompileCommand[],
  all: readonly CompileCommand[],
  logger: Logger = silentLogger,
): Result<CompileCommand[]> {
  const known = new Set(all.map((command) => command.file));
  const headers: CompileCommand[] = [];

  for (const parent of toCheck) {
    const lines = readFileLines(fs, parent.file);
    if (!lines.ok) {
      return lines;
    }

    const includedFiles = parseIncludedFiles(lines.value, isObjectiveCSource(parent.file));
    const includePaths = findIncludePaths(parent.command);
    if (!includePaths.ok) {
      return includePaths;
    }

    const parentDir = fs.path.dirname(parent.file);

    for (const included of includedFiles) {
      const searchDirs = included.usesQuotes
        ? [parentDir, ...includePaths.value]
        : includePaths.value;

      for (const searchDir of searchDirs) {
        const candidate = fs.path.normalize(fs.path.join(searchDir, included.filePath));
        if (!fs.isFile(candidate)) {
          continue;
        }

        const corrected = getCorrectCasingForPath(fs, candidate);
        if (!corrected.ok) {
          return corrected;
        }

        const header = corrected.value;
        if (known.has(header)) {
          continue;
        }
        known.add(header);

        logger.debug(`Header File: ${header} (from ${parent.file})`);
        headers.push({
          directory: buildDir,
          command: replaceFirst(parent.command, parent.file, header),
          file: header,
        });
      }
    }
  }

  return ok(headers);
}

/**
 * Repeat fan-out passes over the newest batch until one adds nothing.
 * Returns the header commands only.
 */
export function expandHeaderCommands(
  fs: FileSystem,
  buildDir: string,
  sourceCommands: readonly CompileCommand[],
  logger: Logger = silentLogger,
): Result<CompileCommand[]> {
  const all: CompileCommand[] = [...sourceCommands];
  const headers: CompileCommand[] = [];
  let batch: readonly CompileCommand[] = sourceCommands;

  while (batch.length > 0) {
    const found = createCompileCommandsForHeaders(fs, buildDir, batch, all, logger);
    if (!found.ok) {
      return found;
    }
    all.push(...found.value);
    headers.push(...found.value);
    batch = found.value;
  }

  return ok(headers);
}
