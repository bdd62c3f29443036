/**
 * Compilation database generator
 */

export * from './result.js';
export * from './errors.js';
export * from './logger.js';
export * from './file-system.js';
export * from './line-reader.js';
export * from './case-resolver.js';
export * from './tlog-finder.js';
export * from './include-paths.js';
export * from './source-commands.js';
export * from './header-commands.js';
export * from './compile-commands.js';
export * from '../types/compdb.js';
