/**
 * CLI commands index
 */

export { runGenerate, resolveSettings } from './generate.js';
export type { CliContext, GenerateFlags, GenerateSettings } from './generate.js';
