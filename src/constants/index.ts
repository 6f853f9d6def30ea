/**
 * Shared constants for the modsel CLI application
 * This file provides a single source of truth for file names, grammar
 * keywords and other constants used throughout the application.
 */

/** Keep in sync with package.json */
export const CLI_VERSION = '0.1.0';

export const FILE_PATTERNS = {
  MANIFEST: 'go.mod',
  WORKSPACE: 'go.work',
  MANIFEST_SUM: 'go.sum',
  WORKSPACE_SUM: 'go.work.sum',
  CONFIG_YML: 'modsel.yml',
} as const;

export const MANIFEST_DIRECTIVES = [
  'module',
  'go',
  'require',
  'replace',
  'exclude',
  'retract',
  'toolchain',
] as const;

export const WORKSPACE_DIRECTIVES = ['go', 'use', 'replace'] as const;

export const GRAMMAR = {
  BLOCK_OPEN: '(',
  BLOCK_CLOSE: ')',
  REPLACE_ARROW: '=>',
  COMMENT: '//',
  INDIRECT_COMMENT: 'indirect',
  /** Suffix marking a checksum of the manifest only, not of the module source */
  MANIFEST_SUM_SUFFIX: '/go.mod',
} as const;

export const GO_VERSIONS = {
  /** Assumed when a file has no `go` directive */
  DEFAULT: { major: 1, minor: 16 },
  /** First version whose manifests list every transitive requirement */
  COMPLETE_REQUIREMENTS: { major: 1, minor: 17 },
} as const;

/**
 * Modules shared with the non-isolated evaluation; an isolated evaluation
 * never emits fetch entries for them.
 */
export const SHARED_MODULE_PATHS: readonly string[] = [
  'github.com/golang/protobuf',
  'google.golang.org/protobuf',
];

export const STRICTNESS_LEVELS = ['off', 'warning', 'error'] as const;

export const BUILD_FILE_GENERATION_MODES = ['auto', 'on', 'off'] as const;
