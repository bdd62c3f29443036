/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';

/**
 * Output file settings schema
 */
export const OutputSettingsSchema = z.object({
  file_name: z.string().min(1).default('compile_commands.json'),
  indent: z.number().int().min(0).max(10).default(4),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  // Build configuration folder to read tlogs from (Debug, Release, ...)
  config: z.string().min(1).default('Debug'),
  // Relative to the working directory
  build_dir: z.string().min(1).default('build'),
  skip_headers: z.boolean().default(false),
  verbose: z.boolean().default(false),
  output: OutputSettingsSchema.default({
    file_name: 'compile_commands.json',
    indent: 4,
  }),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
