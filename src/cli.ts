#!/usr/bin/env node

import { run } from './index.js';
import { logger } from './utils/logger.js';

run().catch((error: unknown) => {
  logger.error('Fatal error in main execution', { error });
  console.error('Command execution failed. Use --help for usage information.');
  process.exit(1);
});
