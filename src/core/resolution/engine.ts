/**
 * Resolution engine.
 *
 * Applies a flat variant of minimal version selection: every module path
 * resolves to the highest version any configuration unit requires. This
 * relies on every version that is required somewhere having had its own
 * requirements declared as well, so no graph traversal is needed; modules
 * may end up at higher, but compatible, versions.
 *
 * Order of work:
 *   1. per unit: overrides, checksums, replace maps, providers and
 *      requirements (with the conflict policy), in declaration order
 *   2. replace directives
 *   3. modules provided by other units
 *   4. dangling overrides, root staleness
 *   5. table assembly with checksum lookup
 *
 * Only parse errors abort earlier; everything found here is collected and
 * the first fatal diagnostic is returned after the whole pass.
 */

import type {
  EvaluationInput,
  ModselError,
  Requirement,
  ResolvedTable,
  UnitInput
} from '../../types/index.js';
import { ConfigurationError, StalenessWarning } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { repoNameForModulePath } from '../../utils/repo-name.js';
import {
  canonicalizeRawVersion,
  formatVersion,
  HIGHEST_VERSION,
  isVersionGreater,
  parseRelaxedVersion,
  parseVersion,
  versionsEqual
} from '../../utils/version.js';
import { describeOrigin } from './conflict-policy.js';
import { ResolutionContext, type Diagnostic } from './context.js';
import { assembleResolvedTable } from './output.js';
import { UnitAccumulator } from './unit-accumulator.js';

export type ResolutionOutcome =
  | { success: true; data: ResolvedTable; diagnostics: Diagnostic[] }
  | { success: false; error: ModselError; diagnostics: Diagnostic[] };

export function resolveModules(input: EvaluationInput): ResolutionOutcome {
  // checkDirectDependencies is honored on the root unit only
  const root = input.units.find(unitInput => unitInput.unit.root);
  const explicit = root?.unit.checkDirectDependencies;
  const ctx = new ResolutionContext(input.configFile, input.isolated, explicit ?? 'warning', explicit);

  for (const unitInput of input.units) {
    accumulateUnit(ctx, unitInput);
  }

  applyReplaces(ctx);
  applyProviders(ctx);

  for (const error of ctx.overrides.findUnmatched(new Set(ctx.selections.keys()))) {
    ctx.report(error, 'error');
  }

  checkRootStaleness(ctx);

  const table = assembleResolvedTable(ctx);
  logger.debug('Resolved module table', {
    modules: table.modules.size,
    diagnostics: ctx.diagnostics.length
  });

  const fatal = ctx.firstFatal;
  if (fatal) {
    return { success: false, error: fatal, diagnostics: ctx.diagnostics };
  }
  return { success: true, data: table, diagnostics: ctx.diagnostics };
}

// ============================================================================
// Per-unit accumulation
// ============================================================================

function accumulateUnit(ctx: ResolutionContext, { unit, sources }: UnitInput): void {
  for (const error of ctx.overrides.registerUnit(unit, ctx.isolated)) {
    ctx.report(error, 'error');
  }

  const declarationSource = `${ctx.configFile} (unit "${unit.name}")`;
  const requirements: Requirement[] = [];

  for (const declaration of unit.modules) {
    const rawVersion = canonicalizeRawVersion(declaration.version);
    const version = parseVersion(rawVersion);
    if (!version) {
      ctx.report(new ConfigurationError(
        `Module "${declaration.path}" in unit "${unit.name}" has invalid version "${declaration.version}".`,
        { unit: unit.name, path: declaration.path, version: declaration.version }
      ), 'error');
      continue;
    }

    if (declaration.sum) {
      insertSum(ctx, { path: declaration.path, version: rawVersion, sum: declaration.sum }, declarationSource);
    }

    requirements.push({
      path: declaration.path,
      version,
      rawVersion,
      indirect: declaration.indirect,
      dev: declaration.dev,
      origin: { kind: 'declaration', file: ctx.configFile, unit: unit.name }
    });
  }

  for (const source of sources) {
    if (source.workspace) {
      const workspace = source.workspace;
      // Replacement targets take part in selection like any requirement
      for (const entry of workspace.replace.values()) {
        if (entry.target.kind !== 'module') {
          continue;
        }
        requirements.push({
          path: entry.target.path,
          version: entry.target.version,
          rawVersion: entry.target.rawVersion,
          indirect: false,
          dev: false,
          origin: { kind: 'workspace', file: workspace.file, unit: unit.name }
        });
      }
      ctx.mergeReplaceMap(workspace.replace);
    }

    for (const manifest of source.manifests) {
      for (const directive of manifest.require) {
        requirements.push({
          path: directive.path,
          version: directive.version,
          rawVersion: directive.rawVersion,
          indirect: directive.indirect,
          dev: source.declaration.dev,
          origin: { kind: 'manifest', file: manifest.file, unit: unit.name }
        });
      }

      if (unit.root || ctx.isolated) {
        ctx.mergeReplaceMap(manifest.replace);
      } else {
        registerProvider(ctx, unit.name, unit.version, manifest.module);
      }
    }

    for (const sumFile of source.sumFiles) {
      for (const entry of sumFile.entries) {
        insertSum(ctx, entry, sumFile.file);
      }
    }
  }

  const accumulator = new UnitAccumulator(unit.name);
  for (const requirement of requirements) {
    if (unit.root && !requirement.indirect) {
      ctx.rootRequests.set(requirement.path, { version: requirement.version, rawVersion: requirement.rawVersion });
      const repoName = repoNameForModulePath(requirement.path);
      if (requirement.dev) {
        ctx.rootDirectDevDeps.add(repoName);
      } else {
        ctx.rootDirectDeps.add(repoName);
      }
    }

    const conflict = accumulator.insertRequirement(requirement);
    if (conflict) {
      ctx.reportConflict(conflict, unit.failOnVersionConflict);
    }
    ctx.selectVersion(requirement);
  }

  logger.debug(`Accumulated unit "${unit.name}"`, { modules: accumulator.size, sources: sources.length });
}

function insertSum(ctx: ResolutionContext, entry: { path: string; version: string; sum: string }, source: string): void {
  const inserted = ctx.sums.insert(entry, source);
  if (!inserted.success) {
    ctx.report(inserted.error, 'error');
  }
}

/**
 * A non-root unit providing a module through its own manifest takes part
 * in resolution with its unit version. An empty version marks a locally
 * overridden unit, assumed newer than anything else.
 */
function registerProvider(ctx: ResolutionContext, unitName: string, unitVersion: string, modulePath: string): void {
  const rawVersion = canonicalizeRawVersion(unitVersion);
  const version = parseRelaxedVersion(rawVersion);
  if (!version) {
    ctx.report(new ConfigurationError(
      `Unit "${unitName}" has invalid version "${unitVersion}".`,
      { unit: unitName, version: unitVersion }
    ), 'error');
    return;
  }
  ctx.registerProvider(modulePath, { unitName, repoName: unitName, version, rawVersion });
}

// ============================================================================
// Replace directives
// ============================================================================

/**
 * Swap selected modules for their replacements. A version-qualified
 * replace only applies when it names exactly the selected version.
 */
function applyReplaces(ctx: ResolutionContext): void {
  for (const [path, entry] of ctx.replaceMap) {
    const selection = ctx.selections.get(path);
    if (!selection) {
      continue;
    }
    if (entry.fromVersion && !versionsEqual(entry.fromVersion.version, selection.version)) {
      logger.debug(`Skipping replace for ${path}: selected ${formatVersion(selection.version)}, replace names ${formatVersion(entry.fromVersion.version)}`);
      continue;
    }

    const { target } = entry;
    if (target.kind === 'local') {
      ctx.selections.set(path, {
        ...selection,
        version: HIGHEST_VERSION,
        rawVersion: '',
        source: 'local',
        replace: target,
        replaceFile: entry.file
      });
      ctx.rootRequests.delete(path);
      continue;
    }

    ctx.selections.set(path, {
      ...selection,
      version: target.version,
      rawVersion: target.rawVersion,
      source: 'replaced',
      replace: target,
      replaceFile: entry.file
    });

    if (target.path !== path) {
      // Comparing against the original request is meaningless for another module
      ctx.rootRequests.delete(path);
    } else if (ctx.rootRequests.has(path)) {
      ctx.rootRequests.set(path, { version: target.version, rawVersion: target.rawVersion });
    }
  }
}

// ============================================================================
// Modules provided by other units
// ============================================================================

function applyProviders(ctx: ResolutionContext): void {
  for (const [path, provider] of ctx.providers) {
    // Overrides and replacements cannot be applied to a provided module
    if (ctx.overrides.hasAny(path) || ctx.replaceMap.has(path)) {
      continue;
    }

    const selection = ctx.selections.get(path);
    if (selection && isVersionGreater(selection.version, provider.version)) {
      ctx.reportOutdated(new StalenessWarning(
        `Module "${path}" is provided by unit "${provider.unitName}" in version ${formatVersion(provider.version)}, ` +
          `but requested at higher version ${formatVersion(selection.version)} by ${selection.origin ? describeOrigin(selection.origin) : 'a requirement'}. ` +
          'Consider updating the providing unit so that it is used for this module.',
        { path, provider: provider.unitName, providedVersion: provider.rawVersion, requestedVersion: selection.rawVersion }
      ));
      continue;
    }

    ctx.selections.set(path, {
      path,
      version: provider.version,
      rawVersion: provider.rawVersion,
      source: 'provided',
      origin: selection?.origin,
      provider
    });
  }
}

// ============================================================================
// Staleness
// ============================================================================

/**
 * Report modules the root unit requires directly that resolved to a
 * higher version than requested.
 */
function checkRootStaleness(ctx: ResolutionContext): void {
  for (const [path, request] of ctx.rootRequests) {
    const selection = ctx.selections.get(path);
    if (!selection || selection.source === 'provided') {
      continue;
    }
    if (isVersionGreater(selection.version, request.version)) {
      ctx.reportOutdated(new StalenessWarning(
        `For module "${path}", the root unit requires version v${request.rawVersion}, ` +
          `but got v${selection.rawVersion} in the resolved dependency graph.`,
        { path, requestedVersion: request.rawVersion, resolvedVersion: selection.rawVersion }
      ));
    }
  }
}
