import { ModselError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the diagnostics modsel reports
 */

/**
 * Malformed manifest, workspace or checksum file. The message carries
 * `file:line` when the offending line is known.
 */
export class ParseError extends ModselError {
  public readonly file: string;
  public readonly line?: number;

  constructor(file: string, line: number | undefined, message: string) {
    super(line === undefined ? `${file}: ${message}` : `${file}:${line}: ${message}`, ErrorCodes.PARSE_ERROR, { file, line });
    this.name = 'ParseError';
    this.file = file;
    this.line = line;
  }
}

export class IntegrityError extends ModselError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INTEGRITY_ERROR, details);
    this.name = 'IntegrityError';
  }
}

export class ConfigurationError extends ModselError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, details);
    this.name = 'ConfigurationError';
  }
}

export class ConflictError extends ModselError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFLICT_ERROR, details);
    this.name = 'ConflictError';
  }
}

/**
 * A resolved version is higher than what the root unit asked for, or a
 * providing unit is older than the requested version.
 */
export class StalenessWarning extends ModselError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.STALE_DEPENDENCY, details);
    this.name = 'StalenessWarning';
  }
}

export class FileSystemError extends ModselError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError<T = unknown>(error: unknown): CommandResult<T> {
  if (error instanceof ModselError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
