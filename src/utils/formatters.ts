import { isAbsolute, relative } from 'path';
import type { ResolvedModule, ResolvedTable } from '../types/index.js';
import { formatVersion } from './version.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user: relative to `cwd`
 * when inside it, as given otherwise.
 *
 * @example
 * formatPathForDisplay('/work/app/go.mod', '/work/app') // => 'go.mod'
 * formatPathForDisplay('/elsewhere/go.mod', '/work/app') // => '/elsewhere/go.mod'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (!isAbsolute(path)) {
    return path;
  }
  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..')) {
    return relativePath;
  }
  return path;
}

/** Resolved modules ordered by module path. */
export function sortedModules(table: ResolvedTable): ResolvedModule[] {
  return Array.from(table.modules.values()).sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/**
 * Where a resolved module comes from, in one short column.
 */
export function describeModuleSource(module: ResolvedModule): string {
  switch (module.source) {
    case 'provided':
      return module.provider ? `unit ${module.provider.unitName}` : 'provided';
    case 'local':
      return module.localPath ?? 'local';
    case 'replaced':
      return module.replace && module.replace !== module.path ? `=> ${module.replace}` : 'replaced';
    case 'fetched':
      return module.archive ? 'archive' : 'fetched';
  }
}

/**
 * Generic table formatter for custom column layouts. Columns are as wide
 * as their widest cell plus two spaces.
 */
export function formatTable<T>(
  items: T[],
  columns: Array<{
    header: string;
    accessor: (item: T) => string;
  }>
): string[] {
  const rows = items.map(item => columns.map(col => col.accessor(item)));
  const widths = columns.map((col, index) =>
    Math.max(col.header.length, ...rows.map(row => row[index].length)) + 2
  );
  const render = (cells: string[]): string =>
    cells.map((cell, index) => (index === cells.length - 1 ? cell : cell.padEnd(widths[index]))).join('');

  return [
    render(columns.map(col => col.header)),
    render(columns.map(col => '-'.repeat(col.header.length))),
    ...rows.map(render)
  ];
}

/**
 * Table lines for the resolved modules, sorted by path.
 */
export function formatResolvedTable(table: ResolvedTable): string[] {
  return formatTable(sortedModules(table), [
    { header: 'MODULE', accessor: module => module.path },
    { header: 'VERSION', accessor: module => formatVersion(module.version) },
    { header: 'SOURCE', accessor: describeModuleSource }
  ]);
}

/**
 * Plain-object form of a resolved table for JSON output.
 */
export function toSerializableTable(table: ResolvedTable): Record<string, unknown> {
  return {
    modules: sortedModules(table).map(module => ({
      path: module.path,
      version: module.rawVersion === '' ? null : module.rawVersion,
      source: module.source,
      repoName: module.repoName,
      ...(module.replace !== undefined && { replace: module.replace }),
      ...(module.localPath !== undefined && { localPath: module.localPath }),
      ...(module.sum !== undefined && { sum: module.sum }),
      ...(module.archive !== undefined && { archive: module.archive }),
      ...(module.provider !== undefined && { provider: module.provider.unitName }),
      build: {
        directives: module.build.directives,
        buildFileGeneration: module.build.buildFileGeneration,
        buildExtraArgs: module.build.buildExtraArgs
      },
      patches: module.patches,
      patchArgs: module.patchArgs
    })),
    rootDirectDeps: [...table.rootDirectDeps].sort(),
    rootDirectDevDeps: [...table.rootDirectDevDeps].sort()
  };
}
