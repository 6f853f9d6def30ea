/**
 * Per-evaluation resolution state.
 *
 * One ResolutionContext is built for each evaluation and discarded
 * afterwards; the tables it owns are filled strictly in declaration order.
 */

import type {
  ModselError,
  ModuleProvider,
  ModuleSource,
  ReplaceMap,
  ReplaceTarget,
  Requirement,
  RequirementOrigin,
  Strictness,
  Version
} from '../../types/index.js';
import { isVersionGreater } from '../../utils/version.js';
import { OverrideRegistry } from './override-registry.js';
import { SumStore } from './sum-store.js';

export type DiagnosticSeverity = 'warning' | 'error';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  error: ModselError;
}

/** The version currently selected for a module path. */
export interface Selection {
  path: string;
  version: Version;
  rawVersion: string;
  source: ModuleSource;
  /** Requirement that contributed the selected version */
  origin?: RequirementOrigin;
  replace?: ReplaceTarget;
  /** File the applied replace directive came from */
  replaceFile?: string;
  provider?: ModuleProvider;
}

export interface RootRequest {
  version: Version;
  rawVersion: string;
}

export class ResolutionContext {
  readonly sums = new SumStore();
  readonly overrides = new OverrideRegistry();
  readonly replaceMap: ReplaceMap = new Map();
  readonly selections = new Map<string, Selection>();
  readonly providers = new Map<string, ModuleProvider>();
  /** Versions the root unit requires directly, for the staleness check */
  readonly rootRequests = new Map<string, RootRequest>();
  readonly rootDirectDeps = new Set<string>();
  readonly rootDirectDevDeps = new Set<string>();
  readonly diagnostics: Diagnostic[] = [];

  /**
   * `conflictStrictness` is the root unit's explicit setting; when it is
   * unset, each unit's failOnVersionConflict alone decides.
   */
  constructor(
    readonly configFile: string,
    readonly isolated: boolean,
    readonly strictness: Strictness,
    readonly conflictStrictness?: Strictness
  ) {}

  report(error: ModselError, severity: DiagnosticSeverity): void {
    this.diagnostics.push({ severity, error });
  }

  /**
   * Report an outdated-dependency finding according to the configured
   * strictness: dropped when off, a warning, or fatal.
   */
  reportOutdated(error: ModselError): void {
    if (this.strictness === 'off') {
      return;
    }
    this.report(error, this.strictness === 'error' ? 'error' : 'warning');
  }

  /**
   * Report a within-unit version conflict. Only `error` strictness (or no
   * strictness at all) on a unit that fails on conflicts makes it fatal;
   * otherwise it is printed and the higher version is kept. Conflicts are
   * never dropped, not even under `off`.
   */
  reportConflict(error: ModselError, failOnVersionConflict: boolean): void {
    const fatal = failOnVersionConflict && (this.conflictStrictness ?? 'error') === 'error';
    this.report(error, fatal ? 'error' : 'warning');
  }

  /**
   * Cross-unit selection: keep the highest version requested for a path.
   */
  selectVersion(requirement: Requirement): void {
    const current = this.selections.get(requirement.path);
    if (current && !isVersionGreater(requirement.version, current.version)) {
      return;
    }
    this.selections.set(requirement.path, {
      path: requirement.path,
      version: requirement.version,
      rawVersion: requirement.rawVersion,
      source: 'fetched',
      origin: requirement.origin
    });
  }

  /**
   * Merge a file's replace directives. Later entries for a path win over
   * earlier ones, across files as within a file.
   */
  mergeReplaceMap(source: ReplaceMap): void {
    for (const [fromPath, entry] of source) {
      this.replaceMap.delete(fromPath);
      this.replaceMap.set(fromPath, entry);
    }
  }

  /**
   * Register a unit as provider of a module; the highest provider wins and
   * the first one is kept on ties.
   */
  registerProvider(path: string, provider: ModuleProvider): void {
    const current = this.providers.get(path);
    if (!current || isVersionGreater(provider.version, current.version)) {
      this.providers.set(path, provider);
    }
  }

  get firstFatal(): ModselError | undefined {
    return this.diagnostics.find(diagnostic => diagnostic.severity === 'error')?.error;
  }
}
