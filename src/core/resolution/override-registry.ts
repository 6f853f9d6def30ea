/**
 * Registry of path-keyed overrides: archive sources, build directives
 * and patches. Archive and patch overrides both describe how the module
 * source is obtained, so a path may carry only one of them.
 */

import type {
  ArchiveOverride,
  BuildOverride,
  Override,
  OverrideKind,
  PatchOverride,
  UnitConfig
} from '../../types/index.js';
import { ConfigurationError } from '../../utils/errors.js';

const OVERRIDE_LABELS: Record<OverrideKind, string> = {
  archive: 'archive overrides',
  build: 'build overrides',
  patch: 'patch overrides'
};

const DIRECTIVE_PATTERN = /^[\w.-]+:\S+ +\S/;

export function defaultBuildOverride(path: string): BuildOverride {
  return { kind: 'build', path, directives: [], buildFileGeneration: 'auto', buildExtraArgs: [] };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled override kind: ${JSON.stringify(value)}`);
}

export class OverrideRegistry {
  private readonly archive = new Map<string, ArchiveOverride>();
  private readonly build = new Map<string, BuildOverride>();
  private readonly patch = new Map<string, PatchOverride>();

  /**
   * Register every override a unit declares. Units other than the root may
   * declare overrides only when the evaluation is isolated to them.
   */
  registerUnit(unit: UnitConfig, isolated: boolean): ConfigurationError[] {
    const declared: Array<[OverrideKind, Override[]]> = [
      ['build', unit.buildOverrides],
      ['patch', unit.patchOverrides],
      ['archive', unit.archiveOverrides]
    ];

    if (!unit.root && !isolated) {
      return declared
        .filter(([, overrides]) => overrides.length > 0)
        .map(([kind]) => new ConfigurationError(
          `Declaring ${OVERRIDE_LABELS[kind]} in non-root unit "${unit.name}" is forbidden. ` +
            'Move the override to the root unit, or evaluate this unit in isolation.',
          { unit: unit.name, kind }
        ));
    }

    const errors: ConfigurationError[] = [];
    for (const [, overrides] of declared) {
      for (const override of overrides) {
        const error = this.register(override, unit.name);
        if (error) {
          errors.push(error);
        }
      }
    }
    return errors;
  }

  /**
   * Register a single override. Returns the configuration error, if any;
   * a rejected override is not recorded.
   */
  register(override: Override, unitName: string): ConfigurationError | null {
    const duplicate = (): ConfigurationError => new ConfigurationError(
      `Multiple overrides defined for module path "${override.path}" in unit "${unitName}".`,
      { path: override.path, unit: unitName, kind: override.kind }
    );

    switch (override.kind) {
      case 'archive':
        if (this.archive.has(override.path) || this.patch.has(override.path)) {
          return duplicate();
        }
        this.archive.set(override.path, override);
        return null;

      case 'patch':
        if (this.patch.has(override.path) || this.archive.has(override.path)) {
          return duplicate();
        }
        this.patch.set(override.path, override);
        return null;

      case 'build': {
        if (this.build.has(override.path)) {
          return duplicate();
        }
        const invalid = override.directives.find(directive => !DIRECTIVE_PATTERN.test(directive));
        if (invalid !== undefined) {
          return new ConfigurationError(
            `Invalid build directive "${invalid}" for module path "${override.path}". Directives must be of the form "namespace:key value".`,
            { path: override.path, directive: invalid }
          );
        }
        this.build.set(override.path, override);
        return null;
      }

      default:
        return assertNever(override);
    }
  }

  /** True when any kind of override targets the path. */
  hasAny(path: string): boolean {
    return this.archive.has(path) || this.build.has(path) || this.patch.has(path);
  }

  archiveFor(path: string): ArchiveOverride | undefined {
    return this.archive.get(path);
  }

  buildFor(path: string): BuildOverride {
    return this.build.get(path) ?? defaultBuildOverride(path);
  }

  /**
   * Patches applied after the source is obtained, from whichever of the
   * archive or patch override the path carries.
   */
  patchesFor(path: string): { patches: string[]; patchArgs: string[] } {
    const override = this.archive.get(path) ?? this.patch.get(path);
    if (!override) {
      return { patches: [], patchArgs: [] };
    }
    return { patches: override.patches, patchArgs: [`-p${override.patchStrip}`] };
  }

  /**
   * Every override key must name a resolved module. Unmatched keys are
   * reported together, one error per kind.
   */
  findUnmatched(resolvedPaths: ReadonlySet<string>): ConfigurationError[] {
    const errors: ConfigurationError[] = [];
    const maps: Array<[OverrideKind, Map<string, Override>]> = [
      ['archive', this.archive],
      ['build', this.build],
      ['patch', this.patch]
    ];

    for (const [kind, overrides] of maps) {
      const unmatched = Array.from(overrides.keys()).filter(path => !resolvedPaths.has(path));
      if (unmatched.length > 0) {
        errors.push(new ConfigurationError(
          `Some ${OVERRIDE_LABELS[kind]} did not target a module with a matching path: ${unmatched.join(', ')}`,
          { kind, paths: unmatched }
        ));
      }
    }
    return errors;
  }
}
