/**
 * Builds the ExecutionContext each command runs in.
 */

import { resolve } from 'path';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { ConfigurationError } from '../utils/errors.js';
import { isDirectory } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { LogLevel } from '../types/index.js';

/**
 * Create an ExecutionContext from command options.
 *
 * cwd resolves --cwd against process.cwd(); without it, process.cwd() is used.
 *
 * @throws ConfigurationError if the directory does not exist
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const cwd = options.cwd ? resolve(process.cwd(), options.cwd) : process.cwd();

  if (!(await isDirectory(cwd))) {
    throw new ConfigurationError(`Working directory does not exist: ${cwd}`, { cwd });
  }

  logger.debug('Created execution context', { cwd });
  return { cwd };
}
