/**
 * Filesystem primitives the generator reads the build tree through
 */

import { readdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import path from 'node:path';

export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

export interface FileSystem {
  /** Path syntax used for every path handed to this filesystem */
  readonly path: path.PlatformPath;
  exists(filePath: string): boolean;
  isDirectory(filePath: string): boolean;
  isFile(filePath: string): boolean;
  /** Throws when the directory cannot be listed */
  readDirectory(dirPath: string): DirectoryEntry[];
  /** Throws when the file cannot be read */
  readFile(filePath: string): Buffer;
  writeFile(filePath: string, content: string): void;
}

function stat(filePath: string) {
  try {
    return statSync(filePath, { throwIfNoEntry: false });
  } catch {
    // EACCES and friends count as absent
    return undefined;
  }
}

export const nodeFileSystem: FileSystem = {
  path,

  exists(filePath) {
    return stat(filePath) !== undefined;
  },

  isDirectory(filePath) {
    return stat(filePath)?.isDirectory() ?? false;
  },

  isFile(filePath) {
    return stat(filePath)?.isFile() ?? false;
  },

  readDirectory(dirPath) {
    return readdirSync(dirPath, { withFileTypes: true }).map((entry) => ({
      name: entry.name,
      isDirectory:
        entry.isDirectory() ||
        (entry.isSymbolicLink() && nodeFileSystem.isDirectory(path.join(dirPath, entry.name))),
    }));
  },

  readFile(filePath) {
    return readFileSync(filePath);
  },

  writeFile(filePath, content) {
    writeFileSync(filePath, content, 'utf-8');
  },
};
