/**
 * Configuration surface and the loaded, parsed inputs of one evaluation.
 */

import type {
  ArchiveOverride,
  BuildOverride,
  ParsedManifest,
  ParsedWorkspace,
  PatchOverride,
  SumFileEntry
} from './modules.js';

/** How outdated direct dependencies are reported */
export type Strictness = 'off' | 'warning' | 'error';

export type FromFileKind = 'manifest' | 'workspace';

export interface FromFileDeclaration {
  kind: FromFileKind;
  /** Path as written in the configuration file */
  file: string;
  failOnVersionConflict: boolean;
  dev: boolean;
}

export interface ModuleDeclaration {
  path: string;
  /** Version as written, leading `v` allowed */
  version: string;
  sum?: string;
  indirect: boolean;
  dev: boolean;
}

export interface UnitConfig {
  name: string;
  root: boolean;
  /** Version the unit is published at; empty when unversioned */
  version: string;
  checkDirectDependencies?: Strictness;
  /** Whether differing versions of one module within this unit are fatal */
  failOnVersionConflict: boolean;
  fromFile: FromFileDeclaration[];
  modules: ModuleDeclaration[];
  archiveOverrides: ArchiveOverride[];
  buildOverrides: BuildOverride[];
  patchOverrides: PatchOverride[];
}

export interface EvaluationConfig {
  /** Absolute path of the configuration file */
  file: string;
  /** Directory relative file references resolve against */
  baseDir: string;
  /** When set, every unit is evaluated as if it were the only one */
  isolated: boolean;
  units: UnitConfig[];
}

// ============================================================================
// Loaded inputs
// ============================================================================

export interface SumFile {
  file: string;
  entries: SumFileEntry[];
}

export interface LoadedSource {
  declaration: FromFileDeclaration;
  workspace?: ParsedWorkspace;
  /** The declared manifest, or every manifest the workspace uses */
  manifests: ParsedManifest[];
  sumFiles: SumFile[];
}

export interface UnitInput {
  unit: UnitConfig;
  sources: LoadedSource[];
}

export interface EvaluationInput {
  configFile: string;
  isolated: boolean;
  units: UnitInput[];
}
