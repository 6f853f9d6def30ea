import { Logger, LogLevel } from '../types/index.js';

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Developer-facing trace of the loader and the engine. Every level writes
 * to stderr so it never mixes into `--json` output on stdout.
 */
class ConsoleLogger implements Logger {
  constructor(private level: LogLevel) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }
    let formatted = `${new Date().toISOString()} modsel ${level.toUpperCase().padEnd(5)} ${message}`;

    if (meta instanceof Error) {
      formatted += `\n${meta.stack ?? `${meta.name}: ${meta.message}`}`;
    } else if (meta && typeof meta === 'object') {
      formatted += ` ${JSON.stringify(meta, replaceCollections)}`;
    } else if (meta !== undefined) {
      formatted += ` ${String(meta)}`;
    }

    console.error(formatted);
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

// Maps, Sets and Errors in diagnostic details would serialize as {} otherwise
function replaceCollections(_key: string, value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  if (value instanceof Set) {
    return Array.from(value);
  }
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  return value;
}

export const logger = new ConsoleLogger(process.env.MODSEL_VERBOSE === '1' ? LogLevel.DEBUG : LogLevel.ERROR);
