/**
 * Directive rules shared by the manifest and workspace grammars.
 */

import { GRAMMAR } from '../../constants/index.js';
import type { GoVersion, Outcome, ReplaceEntry, ReplaceMap } from '../../types/index.js';
import { ParseError } from '../../utils/errors.js';
import { canonicalizeRawVersion, parseVersion } from '../../utils/version.js';

/**
 * Validate a `go` directive line (tokens include the keyword) and return
 * its major/minor. Patch and pre-release parts are dropped.
 */
export function parseGoDirective(
  tokens: string[],
  previous: GoVersion | undefined,
  file: string,
  lineNo: number
): Outcome<GoVersion, ParseError> {
  if (tokens.length === 1) {
    return { success: false, error: new ParseError(file, lineNo, "expected another token after 'go'") };
  }
  if (previous) {
    return { success: false, error: new ParseError(file, lineNo, "unexpected second 'go' directive") };
  }
  if (tokens.length > 2) {
    return { success: false, error: new ParseError(file, lineNo, `unexpected token '${tokens[2]}' after '${tokens[1]}'`) };
  }

  const match = /^(\d+)\.(\d+)/.exec(tokens[1]);
  if (!match) {
    return { success: false, error: new ParseError(file, lineNo, `invalid go version '${tokens[1]}'`) };
  }
  return { success: true, data: { major: Number(match[1]), minor: Number(match[2]) } };
}

export function compareGoVersions(a: GoVersion, b: GoVersion): number {
  return a.major !== b.major ? a.major - b.major : a.minor - b.minor;
}

function isLocalDirectory(target: string): boolean {
  return target.startsWith('./') || target.startsWith('../') || target.startsWith('/') || target === '.' || target === '..';
}

/**
 * Parse the arguments of one replace entry (without the `replace` keyword).
 *
 * Accepted shapes:
 *   from => to version
 *   from fromVersion => to version
 *   from => ./local/dir
 *   from fromVersion => ./local/dir
 */
export function parseReplaceDirective(tokens: string[], file: string, lineNo: number): Outcome<ReplaceEntry, ParseError> {
  const arrow = tokens.indexOf(GRAMMAR.REPLACE_ARROW);
  if (arrow !== 1 && arrow !== 2) {
    return {
      success: false,
      error: new ParseError(file, lineNo, "expected 'from [version] => to [version]' in 'replace' directive")
    };
  }

  const fromPath = tokens[0];
  const target = tokens.slice(arrow + 1);
  let fromVersion: ReplaceEntry['fromVersion'];

  if (arrow === 2) {
    const rawFrom = canonicalizeRawVersion(tokens[1]);
    const version = parseVersion(rawFrom);
    if (!version) {
      return { success: false, error: new ParseError(file, lineNo, `invalid version '${tokens[1]}' in 'replace' directive`) };
    }
    fromVersion = { version, rawVersion: rawFrom };
  }

  if (target.length === 1) {
    if (!isLocalDirectory(target[0])) {
      return {
        success: false,
        error: new ParseError(file, lineNo, `replacement '${target[0]}' without a version must be a directory path`)
      };
    }
    return {
      success: true,
      data: { fromPath, fromVersion, target: { kind: 'local', directory: target[0] }, file, line: lineNo }
    };
  }

  if (target.length === 2) {
    const rawVersion = canonicalizeRawVersion(target[1]);
    const version = parseVersion(rawVersion);
    if (!version) {
      return { success: false, error: new ParseError(file, lineNo, `invalid version '${target[1]}' in 'replace' directive`) };
    }
    return {
      success: true,
      data: {
        fromPath,
        fromVersion,
        target: { kind: 'module', path: target[0], version, rawVersion },
        file,
        line: lineNo
      }
    };
  }

  return {
    success: false,
    error: new ParseError(file, lineNo, "expected 'from [version] => to [version]' in 'replace' directive")
  };
}

/**
 * Record a replace entry in a file's map. A later entry for the same
 * `fromPath` replaces the earlier one and moves to the end of the map.
 */
export function recordReplace(map: ReplaceMap, entry: ReplaceEntry): void {
  map.delete(entry.fromPath);
  map.set(entry.fromPath, entry);
}
