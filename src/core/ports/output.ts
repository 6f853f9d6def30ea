/**
 * User-facing output of the modsel commands.
 *
 * Commands and the resolve pipeline never write to the console directly;
 * they go through an OutputPort so tests can record what would be shown.
 * Diagnostics for developers go through the logger instead.
 */
export interface OutputPort {
  /** Plain text written as-is, such as JSON documents */
  message(message: string): void;

  /** Rows of a rendered table, one per line */
  lines(rows: readonly string[]): void;

  success(message: string): void;

  error(message: string): void;

  /** Non-fatal resolution findings (stale requirements, demoted conflicts) */
  warn(message: string): void;

  /** A titled block, such as the list of direct dependencies */
  note(content: string, title?: string): void;
}
