/**
 * Execution Context Types
 *
 * Type definitions for the execution context threaded from the CLI into
 * the resolve pipeline.
 */

import type { OutputPort } from '../core/ports/output.js';

/**
 * ExecutionContext - Single source of truth for directory resolution
 * and user-facing output.
 */
export interface ExecutionContext {
  /**
   * Absolute path of the directory relative configuration paths resolve
   * against (the process cwd, or --cwd).
   */
  cwd: string;

  /**
   * Output port for all user-facing messages (info, success, error, warn, etc.).
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /**
   * --cwd flag: explicit working directory
   */
  cwd?: string;

  /**
   * --verbose flag: enable debug logging
   */
  verbose?: boolean;
}
