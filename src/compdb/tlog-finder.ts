/**
 * Tlog discovery
 * MSBuild writes CL.command.1.tlog to <Project>.dir/<Config>/<Project>.tlog/,
 * so the configuration folder is the grandparent of the file.
 */

import { CompdbError, describeError } from './errors.js';
import type { DirectoryEntry, FileSystem } from './file-system.js';
import { silentLogger, type Logger } from './logger.js';
import { err, ok, type Result } from './result.js';

export const TLOG_FILE_NAME = 'CL.command.1.tlog';

function walk(
  fs: FileSystem,
  dir: string,
  config: string,
  logger: Logger,
  found: string[],
): Result<void> {
  let entries: DirectoryEntry[];
  try {
    entries = fs.readDirectory(dir);
  } catch (error) {
    return err(
      new CompdbError(
        'WalkFailed',
        `Failed to iterate through directory ${dir}: ${describeError(error)}`,
        { path: dir, cause: error },
      ),
    );
  }

  for (const entry of entries) {
    const entryPath = fs.path.join(dir, entry.name);

    if (entry.isDirectory) {
      logger.debug(`Looking in ${entryPath}...`);
      const inner = walk(fs, entryPath, config, logger, found);
      if (!inner.ok) {
        return inner;
      }
      continue;
    }

    const grandparent = fs.path.dirname(fs.path.dirname(entryPath));
    if (entry.name === TLOG_FILE_NAME && fs.path.basename(grandparent) === config) {
      logger.debug(`Found file ${entryPath}`);
      found.push(entryPath);
    }
  }

  return ok(undefined);
}

/**
 * Find every CL.command.1.tlog for a build configuration under the build tree
 */
export function findTlogFiles(
  fs: FileSystem,
  buildDir: string,
  config: string,
  logger: Logger = silentLogger,
): Result<string[]> {
  if (!fs.isDirectory(buildDir)) {
    return err(
      new CompdbError('BuildDirMissing', `Couldn't open build directory ${buildDir}`, {
        path: buildDir,
      }),
    );
  }

  const found: string[] = [];
  const walked = walk(fs, buildDir, config, logger, found);
  if (!walked.ok) {
    return walked;
  }
  return ok(found);
}
