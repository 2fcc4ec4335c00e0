#!/usr/bin/env node

import { createProgram } from './cli/program.js';
import { ToolError } from './errors/ToolError.js';
import { logger } from './utils/logger.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof ToolError) {
      logger.error(error.message, error.details ?? {});
    } else {
      logger.error('Decipher run failed:', error instanceof Error ? error.stack ?? error.message : String(error));
    }
    process.exitCode = 1;
  });
