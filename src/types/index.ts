/**
 * Common types and interfaces for the modsel CLI application
 */

export * from './modules.js';
export * from './config.js';
export type { ExecutionContext } from './execution-context.js';

// Command and operation results

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

/**
 * Result of a parse or resolution step. Steps never throw for bad input;
 * they hand the diagnostic back to the caller instead.
 */
export type Outcome<T, E extends Error = ModselError> =
  | { success: true; data: T }
  | { success: false; error: E };

// Error types
export class ModselError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ModselError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  PARSE_ERROR = 'PARSE_ERROR',
  INTEGRITY_ERROR = 'INTEGRITY_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  CONFLICT_ERROR = 'CONFLICT_ERROR',
  STALE_DEPENDENCY = 'STALE_DEPENDENCY',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
