/**
 * OutputPort backed by the process console. Results go to stdout and
 * findings go to stderr, so `modsel resolve --json` stays parseable
 * while warnings are still shown.
 */

import pc from 'picocolors';
import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  message(message: string): void {
    console.log(message);
  },

  lines(rows: readonly string[]): void {
    for (const row of rows) {
      console.log(row);
    }
  },

  success(message: string): void {
    console.log(`${pc.green('✓')} ${message}`);
  },

  error(message: string): void {
    console.error(`${pc.red('error:')} ${message}`);
  },

  warn(message: string): void {
    console.error(`${pc.yellow('warning:')} ${message}`);
  },

  note(content: string, title?: string): void {
    console.log(title ? `\n${pc.bold(title)}\n${content}` : `\n${content}`);
  }
};
