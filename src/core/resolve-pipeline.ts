/**
 * Resolve pipeline: configuration → loaded sources → resolution engine.
 *
 * Warnings are printed through the context's OutputPort as they are
 * collected; the first fatal diagnostic becomes the command's error.
 */

import { resolve } from 'path';
import type { CommandResult, ExecutionContext, ResolvedTable } from '../types/index.js';
import { handleError } from '../utils/errors.js';
import { formatPathForDisplay } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';
import { loadEvaluationConfig, loadEvaluationInput } from './loader/source-loader.js';
import { resolveOutput } from './ports/resolve.js';
import { resolveModules } from './resolution/engine.js';

export async function runResolvePipeline(
  configPath: string,
  ctx: ExecutionContext
): Promise<CommandResult<ResolvedTable>> {
  const out = resolveOutput(ctx);
  const file = resolve(ctx.cwd, configPath);
  logger.debug(`Resolving modules for ${file}`);

  try {
    const config = await loadEvaluationConfig(file);
    const input = await loadEvaluationInput(config);
    const outcome = resolveModules(input);

    const warnings = outcome.diagnostics
      .filter(diagnostic => diagnostic.severity === 'warning')
      .map(diagnostic => diagnostic.error.message);
    for (const warning of warnings) {
      out.warn(warning);
    }

    if (!outcome.success) {
      logger.debug('Resolution failed', { code: outcome.error.code, details: outcome.error.details });
      return { success: false, error: outcome.error.message, warnings };
    }

    logger.debug(`Resolved ${outcome.data.modules.size} module(s) from ${formatPathForDisplay(file, ctx.cwd)}`);
    return { success: true, data: outcome.data, warnings };
  } catch (error) {
    return handleError<ResolvedTable>(error);
  }
}
