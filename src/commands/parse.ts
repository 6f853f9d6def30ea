import { Command } from 'commander';
import { basename, resolve } from 'path';

import { FILE_PATTERNS } from '../constants/index.js';
import { createExecutionContext } from '../core/execution-context.js';
import { parseManifest } from '../core/manifest/manifest-parser.js';
import { parseSumFile } from '../core/manifest/sum-parser.js';
import { parseWorkspace } from '../core/manifest/workspace-parser.js';
import { resolveOutput } from '../core/ports/resolve.js';
import type { ExecutionOptions } from '../types/execution-context.js';
import type { Outcome, Version } from '../types/index.js';
import { ConfigurationError, withErrorHandling } from '../utils/errors.js';
import { readTextFile } from '../utils/fs.js';

/**
 * Parse a manifest, workspace or checksum file, chosen by its file name.
 */
export function parseByFileName(content: string, file: string): Outcome<unknown> {
  switch (basename(file)) {
    case FILE_PATTERNS.MANIFEST:
      return parseManifest(content, file);
    case FILE_PATTERNS.WORKSPACE:
      return parseWorkspace(content, file);
    case FILE_PATTERNS.MANIFEST_SUM:
    case FILE_PATTERNS.WORKSPACE_SUM:
      return parseSumFile(content, file);
    default:
      return {
        success: false,
        error: new ConfigurationError(
          `Cannot tell the format of ${file}; expected one of ${FILE_PATTERNS.MANIFEST}, ${FILE_PATTERNS.WORKSPACE}, ` +
            `${FILE_PATTERNS.MANIFEST_SUM} or ${FILE_PATTERNS.WORKSPACE_SUM}`,
          { file }
        )
      };
  }
}

/** JSON replacer printing versions as strings and replace maps as lists. */
function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) {
    return Array.from(value.values());
  }
  if (isVersion(value)) {
    return value.kind === 'highest' ? null : value.raw;
  }
  return value;
}

function isVersion(value: unknown): value is Version {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }
  return value.kind === 'highest' || (value.kind === 'release' && 'raw' in value && 'parsed' in value);
}

async function parseCommand(file: string, globals: ExecutionOptions): Promise<void> {
  const ctx = await createExecutionContext(globals);
  const out = resolveOutput(ctx);
  const path = resolve(ctx.cwd, file);

  const parsed = parseByFileName(await readTextFile(path), path);
  if (!parsed.success) {
    throw parsed.error;
  }
  out.message(JSON.stringify(parsed.data, jsonReplacer, 2));
}

export function setupParseCommand(program: Command): void {
  program
    .command('parse')
    .description('Parse a go.mod, go.work or checksum file and print it as JSON')
    .argument('<file>', 'file to parse')
    .action(withErrorHandling(async (file: string, _options: Record<string, never>, command: Command) => {
      await parseCommand(file, command.optsWithGlobals<ExecutionOptions>());
    }));
}
