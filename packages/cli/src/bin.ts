#!/usr/bin/env node
/**
 * codeprobe executable
 */

import { createProgram } from './index.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 2;
  });
