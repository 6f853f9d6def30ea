/**
 * Checksum store keyed by (module path, canonical version).
 */

import type { Outcome, SumFileEntry } from '../../types/index.js';
import { IntegrityError } from '../../utils/errors.js';

interface StoredSum {
  sum: string;
  /** File or declaration the checksum was first read from */
  source: string;
}

function sumKey(path: string, version: string): string {
  return `${path}@${version}`;
}

export class SumStore {
  private readonly sums = new Map<string, StoredSum>();

  /**
   * Insert a checksum. Inserting the same value again is a no-op; a
   * different value for a known key is an integrity violation and leaves
   * the stored value untouched.
   */
  insert(entry: SumFileEntry, source: string): Outcome<void, IntegrityError> {
    const key = sumKey(entry.path, entry.version);
    const existing = this.sums.get(key);

    if (existing && existing.sum !== entry.sum) {
      return {
        success: false,
        error: new IntegrityError(
          `Multiple mismatching sums for ${entry.path}@v${entry.version} found: ${entry.sum} (${source}) vs ${existing.sum} (${existing.source}). ` +
            'The checksum files are inconsistent or were modified; regenerate them with \'go mod tidy\'.',
          { path: entry.path, version: entry.version, sums: [entry.sum, existing.sum], sources: [source, existing.source] }
        )
      };
    }

    if (!existing) {
      this.sums.set(key, { sum: entry.sum, source });
    }
    return { success: true, data: undefined };
  }

  lookup(path: string, version: string): string | undefined {
    return this.sums.get(sumKey(path, version))?.sum;
  }

  get size(): number {
    return this.sums.size;
  }
}
