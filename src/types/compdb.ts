/**
 * Compilation database type definitions
 * Mirrors the Clang JSON compilation database format
 */

import { z } from 'zod';

/**
 * One entry of compile_commands.json
 */
export const CompileCommandSchema = z.object({
  /** Working directory of the command: the fully-qualified build directory */
  directory: z.string(),
  command: z.string(),
  /** Case-corrected absolute path of the source or header */
  file: z.string(),
});
export type CompileCommand = z.infer<typeof CompileCommandSchema>;

export const CompilationDatabaseSchema = z.array(CompileCommandSchema);
export type CompilationDatabase = z.infer<typeof CompilationDatabaseSchema>;
