/**
 * Comparable module versions.
 *
 * Module versions are semantic versions with an optional leading `v`.
 * Pseudo-versions (`v0.0.0-20220905092116-b49f7bc46da2`) and
 * `+incompatible` build metadata are ordinary semver and compare as such.
 */

import semver from 'semver';
import type { Version } from '../types/index.js';

/** Sorts above every release. */
export const HIGHEST_VERSION: Version = { kind: 'highest' };

/**
 * Strip the leading `v` used in manifests. The canonical form is what
 * checksum entries and resolution output are keyed on.
 */
export function canonicalizeRawVersion(rawVersion: string): string {
  return rawVersion.startsWith('v') ? rawVersion.slice(1) : rawVersion;
}

/**
 * Parse a strict version. Returns null when the string is not a full
 * semantic version.
 */
export function parseVersion(rawVersion: string): Version | null {
  const raw = canonicalizeRawVersion(rawVersion);
  const parsed = semver.parse(raw);
  return parsed ? { kind: 'release', raw, parsed } : null;
}

/**
 * Parse a version leniently: loose semver first, then coercion of the
 * leading numeric part (`1.2` → `1.2.0`, `1.2.3.bcr.1` → `1.2.3`).
 * An empty string is the highest version.
 */
export function parseRelaxedVersion(rawVersion: string): Version | null {
  const raw = canonicalizeRawVersion(rawVersion.trim());
  if (!raw) {
    return HIGHEST_VERSION;
  }
  const parsed = semver.parse(raw, { loose: true }) ?? semver.coerce(raw);
  return parsed ? { kind: 'release', raw, parsed } : null;
}

export function compareVersions(a: Version, b: Version): number {
  if (a.kind === 'highest' || b.kind === 'highest') {
    if (a.kind === b.kind) return 0;
    return a.kind === 'highest' ? 1 : -1;
  }
  return semver.compare(a.parsed, b.parsed);
}

export function isVersionGreater(a: Version, b: Version): boolean {
  return compareVersions(a, b) > 0;
}

export function versionsEqual(a: Version, b: Version): boolean {
  return compareVersions(a, b) === 0;
}

/**
 * Major version epoch; the highest sentinel has no finite major.
 */
export function majorOf(version: Version): number {
  return version.kind === 'highest' ? Number.POSITIVE_INFINITY : version.parsed.major;
}

/**
 * Human-readable form with the `v` prefix manifests use.
 */
export function formatVersion(version: Version): string {
  return version.kind === 'highest' ? '(unversioned)' : `v${version.raw}`;
}
