/**
 * Case-correcting path resolver
 * Tlogs record paths in upper case, but editors compare paths case-sensitively,
 * so each component is looked up in its parent's listing to recover the real name.
 */

import { CompdbError, describeError } from './errors.js';
import type { DirectoryEntry, FileSystem } from './file-system.js';
import { err, ok, type Result } from './result.js';

/**
 * ASCII-only lowercasing; other characters compare as they are
 */
export function toLowerAscii(value: string): string {
  return value.replace(/[A-Z]/g, (c) => c.toLowerCase());
}

function isRoot(fs: FileSystem, filePath: string): boolean {
  const { root } = fs.path.parse(filePath);
  return root === filePath || fs.path.dirname(filePath) === filePath;
}

/**
 * Rebuild an existing path segment by segment with the casing found on disk
 */
export function getCorrectCasingForPath(fs: FileSystem, filePath: string): Result<string> {
  if (!fs.exists(filePath)) {
    return err(new CompdbError('PathNotFound', `Path ${filePath} does not exist`, { path: filePath }));
  }

  if (isRoot(fs, filePath)) {
    return ok(filePath);
  }

  const parent = fs.path.dirname(filePath);
  if (!fs.isDirectory(parent)) {
    return err(
      new CompdbError('ParentMissing', `Parent of ${filePath} is not a directory`, { path: parent }),
    );
  }

  let entries: DirectoryEntry[];
  try {
    entries = fs.readDirectory(parent);
  } catch (error) {
    return err(
      new CompdbError('ParentMissing', `Couldn't list ${parent}: ${describeError(error)}`, {
        path: parent,
        cause: error,
      }),
    );
  }

  // compare text, not identity: junctions make C:/Users and
  // C:/Documents and Settings look like the same directory
  const wanted = toLowerAscii(fs.path.basename(filePath));
  const match = entries.find((entry) => toLowerAscii(entry.name) === wanted);
  if (!match) {
    return err(
      new CompdbError(
        'NoCaseMatch',
        `Didn't find entry in parent for ${parent} that matched ${fs.path.basename(filePath)}`,
        { path: filePath },
      ),
    );
  }

  const correctedParent = getCorrectCasingForPath(fs, parent);
  if (!correctedParent.ok) {
    return correctedParent;
  }
  return ok(fs.path.join(correctedParent.value, match.name));
}
