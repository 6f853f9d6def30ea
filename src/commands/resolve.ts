import { Command } from 'commander';
import pc from 'picocolors';

import { FILE_PATTERNS } from '../constants/index.js';
import { createExecutionContext } from '../core/execution-context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { runResolvePipeline } from '../core/resolve-pipeline.js';
import type { ExecutionOptions } from '../types/execution-context.js';
import type { CommandResult, ResolvedTable } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatResolvedTable, toSerializableTable } from '../utils/formatters.js';

interface ResolveOptions {
  json?: boolean;
}

async function resolveCommand(
  configPath: string,
  options: ResolveOptions,
  globals: ExecutionOptions
): Promise<CommandResult<ResolvedTable>> {
  const ctx = await createExecutionContext(globals);
  const out = resolveOutput(ctx);

  const result = await runResolvePipeline(configPath, ctx);
  if (!result.success || !result.data) {
    out.error(result.error ?? 'Resolution failed');
    return result;
  }

  const table = result.data;
  if (options.json) {
    out.message(JSON.stringify(toSerializableTable(table), null, 2));
    return result;
  }

  out.lines(formatResolvedTable(table));
  if (table.rootDirectDeps.length > 0) {
    out.note([...table.rootDirectDeps].sort().join('\n'), 'Direct dependencies');
  }
  if (table.rootDirectDevDeps.length > 0) {
    out.note([...table.rootDirectDevDeps].sort().join('\n'), 'Direct dev dependencies');
  }
  out.success(`Resolved ${table.modules.size} module(s)${result.warnings?.length ? pc.yellow(` with ${result.warnings.length} warning(s)`) : ''}`);
  return result;
}

export function setupResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve module versions for every unit of a configuration file')
    .argument('[config]', 'configuration file', FILE_PATTERNS.CONFIG_YML)
    .option('--json', 'print the resolved table as JSON')
    .action(withErrorHandling(async (configPath: string, options: ResolveOptions, command: Command) => {
      const result = await resolveCommand(configPath, options, command.optsWithGlobals<ExecutionOptions>());
      if (!result.success) {
        process.exitCode = 1;
      }
    }));
}
