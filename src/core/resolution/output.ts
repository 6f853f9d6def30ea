/**
 * Assembly of the resolved module table handed to the fetch stage.
 */

import { isAbsolute, dirname, join } from 'path';
import { SHARED_MODULE_PATHS } from '../../constants/index.js';
import type { ResolvedModule, ResolvedTable } from '../../types/index.js';
import { IntegrityError } from '../../utils/errors.js';
import { repoNameForModulePath } from '../../utils/repo-name.js';
import { formatVersion } from '../../utils/version.js';
import type { ResolutionContext, Selection } from './context.js';

/**
 * Build the final table from the context's selections. Modules slated for
 * fetching must have a checksum; a missing one is reported as fatal and
 * the module is still listed so later diagnostics see the full picture.
 */
export function assembleResolvedTable(ctx: ResolutionContext): ResolvedTable {
  const modules = new Map<string, ResolvedModule>();

  for (const [path, selection] of ctx.selections) {
    const repoName = repoNameForModulePath(path);

    if (selection.source === 'provided') {
      ctx.rootDirectDeps.delete(repoName);
      ctx.rootDirectDevDeps.delete(repoName);
    } else if (ctx.isolated && SHARED_MODULE_PATHS.includes(path)) {
      continue;
    }

    modules.set(path, toResolvedModule(ctx, selection, repoName));
  }

  return {
    modules,
    rootDirectDeps: Array.from(ctx.rootDirectDeps),
    // A module that is both a dev and a non-dev dependency is only a non-dev one
    rootDirectDevDeps: Array.from(ctx.rootDirectDevDeps).filter(name => !ctx.rootDirectDeps.has(name))
  };
}

function toResolvedModule(ctx: ResolutionContext, selection: Selection, repoName: string): ResolvedModule {
  const { path, replace } = selection;
  const resolved: ResolvedModule = {
    path,
    version: selection.version,
    rawVersion: selection.rawVersion,
    source: selection.source,
    repoName,
    build: ctx.overrides.buildFor(path),
    ...ctx.overrides.patchesFor(path)
  };

  if (selection.source === 'provided') {
    resolved.provider = selection.provider;
    return resolved;
  }

  if (replace?.kind === 'local') {
    const { directory } = replace;
    resolved.localPath = isAbsolute(directory) || !selection.replaceFile
      ? directory
      : join(dirname(selection.replaceFile), directory);
    return resolved;
  }

  const archive = ctx.overrides.archiveFor(path);
  if (archive) {
    resolved.archive = archive;
    return resolved;
  }

  const sumPath = replace?.path ?? path;
  if (replace) {
    resolved.replace = replace.path;
  }
  resolved.sum = ctx.sums.lookup(sumPath, selection.rawVersion);
  if (resolved.sum === undefined) {
    ctx.report(
      new IntegrityError(
        `No sum for ${sumPath}@${formatVersion(selection.version)} found. ` +
          'The checksum data is stale; run \'go mod tidy\' to record it, or add a sum to the module declaration.',
        { path, sumPath, version: selection.rawVersion }
      ),
      'error'
    );
  }
  return resolved;
}
