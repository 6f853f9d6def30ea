/**
 * Module, requirement and resolution types shared by the parsers and the
 * resolution engine.
 */

import type { SemVer } from 'semver';

// ============================================================================
// Versions
// ============================================================================

/**
 * A comparable version. `highest` sorts above every release and stands in
 * for unversioned providers and local replacements.
 */
export type Version =
  | { kind: 'release'; raw: string; parsed: SemVer }
  | { kind: 'highest' };

// ============================================================================
// Requirements
// ============================================================================

export type RequirementOriginKind = 'manifest' | 'workspace' | 'declaration';

export interface RequirementOrigin {
  kind: RequirementOriginKind;
  /** File that declared the requirement, or the configuration file for declarations */
  file: string;
  /** Name of the configuration unit the requirement belongs to */
  unit: string;
}

export interface Requirement {
  path: string;
  version: Version;
  /** Canonical version string (no leading `v`) */
  rawVersion: string;
  indirect: boolean;
  dev: boolean;
  origin: RequirementOrigin;
}

// ============================================================================
// Replace directives
// ============================================================================

export type ReplaceTarget =
  | { kind: 'module'; path: string; version: Version; rawVersion: string }
  | { kind: 'local'; directory: string };

export interface ReplaceEntry {
  fromPath: string;
  fromVersion?: { version: Version; rawVersion: string };
  target: ReplaceTarget;
  /** File the directive was read from */
  file: string;
  line: number;
}

/** Replace entries keyed by `fromPath`; insertion order is declaration order. */
export type ReplaceMap = Map<string, ReplaceEntry>;

// ============================================================================
// Parsed files
// ============================================================================

export interface GoVersion {
  major: number;
  minor: number;
}

export interface RequireDirective {
  path: string;
  version: Version;
  rawVersion: string;
  indirect: boolean;
  line: number;
}

export interface ExcludeDirective {
  path: string;
  rawVersion: string;
  line: number;
}

export interface ParsedManifest {
  file: string;
  module: string;
  go: GoVersion;
  toolchain?: string;
  require: RequireDirective[];
  exclude: ExcludeDirective[];
  /** Raw `retract` arguments, one entry per retracted version or range */
  retract: string[];
  replace: ReplaceMap;
}

export interface ParsedWorkspace {
  file: string;
  go: GoVersion;
  /** `use` directives as written */
  use: string[];
  /** Manifest locations the `use` directives resolve to */
  manifests: string[];
  replace: ReplaceMap;
}

export interface SumFileEntry {
  path: string;
  version: string;
  sum: string;
}

// ============================================================================
// Overrides
// ============================================================================

export type BuildFileGeneration = 'auto' | 'on' | 'off';

export interface ArchiveOverride {
  kind: 'archive';
  path: string;
  urls: string[];
  sha256?: string;
  stripPrefix?: string;
  patches: string[];
  patchStrip: number;
}

export interface BuildOverride {
  kind: 'build';
  path: string;
  directives: string[];
  buildFileGeneration: BuildFileGeneration;
  buildExtraArgs: string[];
}

export interface PatchOverride {
  kind: 'patch';
  path: string;
  patches: string[];
  patchStrip: number;
}

export type Override = ArchiveOverride | BuildOverride | PatchOverride;
export type OverrideKind = Override['kind'];

// ============================================================================
// Resolution output
// ============================================================================

export type ModuleSource = 'fetched' | 'replaced' | 'local' | 'provided';

export interface ModuleProvider {
  unitName: string;
  repoName: string;
  version: Version;
  rawVersion: string;
}

export interface ResolvedModule {
  path: string;
  version: Version;
  rawVersion: string;
  source: ModuleSource;
  repoName: string;
  /** Module path fetched in place of `path` when a replace applied */
  replace?: string;
  /** Directory substituted for the module by a local replace */
  localPath?: string;
  sum?: string;
  archive?: ArchiveOverride;
  build: BuildOverride;
  patches: string[];
  patchArgs: string[];
  provider?: ModuleProvider;
}

export interface ResolvedTable {
  modules: Map<string, ResolvedModule>;
  rootDirectDeps: string[];
  rootDirectDevDeps: string[];
}
