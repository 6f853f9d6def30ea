/**
 * Line tokenizer shared by the manifest and workspace grammars.
 *
 * Tokens are bare words separated by spaces, `raw` strings in backticks
 * (taken verbatim) or "interpreted" strings in double quotes, where a
 * backslash takes the following character literally. A `//` at a token
 * boundary starts a comment that runs to the end of the line.
 */

import { GRAMMAR } from '../../constants/index.js';
import type { Outcome } from '../../types/index.js';
import { ParseError } from '../../utils/errors.js';

export interface TokenizedLine {
  tokens: string[];
  /** Trimmed comment text after `//`, or null when the line has none */
  comment: string | null;
}

/**
 * Valid directive values never contain tabs or carriage returns, so they
 * are folded into spaces before any line is tokenized.
 */
export function normalizeWhitespace(content: string): string {
  return content.replace(/[\t\r]/g, ' ');
}

export function tokenizeLine(line: string, file: string, lineNo: number): Outcome<TokenizedLine, ParseError> {
  const tokens: string[] = [];
  let rest = line;

  for (;;) {
    rest = rest.trim();
    if (!rest) {
      break;
    }

    if (rest.startsWith('`')) {
      const end = rest.indexOf('`', 1);
      if (end === -1) {
        return { success: false, error: new ParseError(file, lineNo, 'unterminated raw string') };
      }
      tokens.push(rest.slice(1, end));
      rest = rest.slice(end + 1);
      continue;
    }

    if (rest.startsWith('"')) {
      const scanned = scanInterpretedString(rest);
      if (!scanned) {
        return { success: false, error: new ParseError(file, lineNo, 'unterminated interpreted string') };
      }
      tokens.push(scanned.value);
      rest = rest.slice(scanned.end + 1);
      continue;
    }

    if (rest.startsWith(GRAMMAR.COMMENT)) {
      return { success: true, data: { tokens, comment: rest.slice(GRAMMAR.COMMENT.length).trim() } };
    }

    const space = rest.indexOf(' ');
    if (space === -1) {
      tokens.push(rest);
      break;
    }
    tokens.push(rest.slice(0, space));
    rest = rest.slice(space + 1);
  }

  return { success: true, data: { tokens, comment: null } };
}

/**
 * Scan a double-quoted string starting at index 0. Returns the unescaped
 * value and the index of the closing quote.
 */
function scanInterpretedString(input: string): { value: string; end: number } | null {
  let value = '';
  let escaped = false;

  for (let pos = 1; pos < input.length; pos++) {
    const c = input[pos];
    if (escaped) {
      value += c;
      escaped = false;
      continue;
    }
    if (c === '\\') {
      escaped = true;
      continue;
    }
    if (c === '"') {
      return { value, end: pos };
    }
    value += c;
  }

  return null;
}
