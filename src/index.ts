#!/usr/bin/env node
/**
 * msbuild-compdb CLI
 * Compilation databases for Visual Studio / MSBuild builds
 */

import { runCLI } from './cli/index.js';

runCLI()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
