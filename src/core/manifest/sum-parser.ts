/**
 * Checksum file (go.sum / go.work.sum) parser.
 *
 * Each line is `path version hash`. Lines whose version ends in `/go.mod`
 * hash only the module's manifest and are dropped.
 */

import { GRAMMAR } from '../../constants/index.js';
import type { Outcome, SumFileEntry } from '../../types/index.js';
import { ParseError } from '../../utils/errors.js';
import { canonicalizeRawVersion } from '../../utils/version.js';

export function parseSumFile(content: string, file: string): Outcome<SumFileEntry[], ParseError> {
  const entries: SumFileEntry[] = [];
  const lines = content.split('\n');

  for (let index = 0; index < lines.length; index++) {
    const fields = lines[index].trim().split(/\s+/).filter(Boolean);
    if (fields.length === 0) {
      continue;
    }
    if (fields.length !== 3) {
      return {
        success: false,
        error: new ParseError(file, index + 1, `expected 'path version hash', found ${fields.length} field(s)`)
      };
    }

    const [path, rawVersion, sum] = fields;
    const version = canonicalizeRawVersion(rawVersion);
    if (version.endsWith(GRAMMAR.MANIFEST_SUM_SUFFIX)) {
      continue;
    }
    entries.push({ path, version, sum });
  }

  return { success: true, data: entries };
}
