#!/usr/bin/env node
/**
 * crossbuild command line entry point
 */

import { errorMessage } from '@crossbuild/core';
import { createProgram } from './cli/program';
import { ENV_VARS } from './config';
import { configureLogger, logger, parseLogLevel } from './utils/logger';

const level = parseLogLevel(process.env[ENV_VARS.LOG_LEVEL]);
if (level) {
  configureLogger({ level });
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.failure(errorMessage(error));
    process.exitCode = 1;
  });
