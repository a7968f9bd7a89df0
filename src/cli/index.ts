#!/usr/bin/env node

import { createCLI } from './cli.js';
import { logger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';

// Resolution errors are fatal: report and exit non-zero
createCLI()
  .parseAsync(process.argv)
  .then(() => logger.close())
  .catch((error: unknown) => {
    logger.error(getErrorMessage(error), error);
    logger.close();
    process.exit(1);
  });
