#!/usr/bin/env node
/**
 * @arch propweave.cli.entry
 */
import { createCli } from './index.js';
import { logger } from '../utils/logger.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  });
