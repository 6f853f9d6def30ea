/**
 * Requirements of a single configuration unit, keyed by module path.
 */

import type { Requirement } from '../../types/index.js';
import type { ConflictError } from '../../utils/errors.js';
import { isVersionGreater, versionsEqual } from '../../utils/version.js';
import { buildConflictError } from './conflict-policy.js';

export class UnitAccumulator {
  private readonly requirements = new Map<string, Requirement>();

  constructor(readonly unitName: string) {}

  /**
   * First write wins; a later requirement at a different version is a
   * conflict. The higher of the two is kept so resolution can proceed when
   * the conflict is only reported as a warning.
   */
  insertRequirement(requirement: Requirement): ConflictError | null {
    const previous = this.requirements.get(requirement.path);
    if (!previous) {
      this.requirements.set(requirement.path, requirement);
      return null;
    }
    if (versionsEqual(previous.version, requirement.version)) {
      return null;
    }

    if (isVersionGreater(requirement.version, previous.version)) {
      this.requirements.set(requirement.path, requirement);
    }
    return buildConflictError(previous, requirement);
  }

  get size(): number {
    return this.requirements.size;
  }
}
