/**
 * Classification of two differing requirements for the same module path
 * within one configuration unit.
 *
 *   manual            either side comes from a workspace file, or the
 *                     major versions differ
 *   resync-manifest   at least one side is indirect
 *   resync-workspace  both sides are direct and outside any workspace
 *
 * Combinations outside these cases are treated as `manual`.
 */

import type { Requirement, RequirementOrigin } from '../../types/index.js';
import { ConflictError } from '../../utils/errors.js';
import { formatVersion, majorOf } from '../../utils/version.js';

export type ConflictCase = 'manual' | 'resync-manifest' | 'resync-workspace';

export function classifyConflict(previous: Requirement, current: Requirement): ConflictCase {
  const fromWorkspace = previous.origin.kind === 'workspace' || current.origin.kind === 'workspace';
  if (fromWorkspace || majorOf(previous.version) !== majorOf(current.version)) {
    return 'manual';
  }
  if (previous.indirect || current.indirect) {
    return 'resync-manifest';
  }
  if (!previous.indirect && !current.indirect) {
    return 'resync-workspace';
  }
  return 'manual';
}

export function remediationFor(conflict: ConflictCase, path: string): string {
  switch (conflict) {
    case 'manual':
      return [
        'To correct this:',
        ` 1. manually update all go.mod files so that the versions of '${path}' are the same.`,
        ' 2. run \'go mod tidy\' in every folder you changed.',
        ' 3. run \'go work sync\'.'
      ].join('\n');
    case 'resync-manifest':
      return [
        'To correct this:',
        ` 1. update the go.mod file that requires '${path}' indirectly and run 'go mod tidy' in its folder.`,
        ' 2. run \'go work sync\'.'
      ].join('\n');
    case 'resync-workspace':
      return ['To correct this, run:', ' 1. go work sync.'].join('\n');
  }
}

export function describeOrigin(origin: RequirementOrigin): string {
  return origin.kind === 'declaration' ? `${origin.file} (unit "${origin.unit}")` : origin.file;
}

/**
 * Build the diagnostic for two differing requirements. Whether it is
 * fatal is decided by the caller.
 */
export function buildConflictError(previous: Requirement, current: Requirement): ConflictError {
  const conflict = classifyConflict(previous, current);
  const message = [
    `Multiple versions of ${current.path} found:`,
    ` - ${describeOrigin(current.origin)} contains: ${formatVersion(current.version)}`,
    ` - ${describeOrigin(previous.origin)} contains: ${formatVersion(previous.version)}`,
    remediationFor(conflict, current.path)
  ].join('\n');

  return new ConflictError(message, {
    path: current.path,
    unit: current.origin.unit,
    conflict,
    versions: [current.rawVersion, previous.rawVersion],
    sources: [describeOrigin(current.origin), describeOrigin(previous.origin)]
  });
}
