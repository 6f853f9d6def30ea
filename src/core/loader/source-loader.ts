/**
 * Source loading: reads the configuration file and every manifest,
 * workspace and checksum file it references, and returns the parsed inputs
 * of one evaluation in declaration order.
 *
 * Files are read whole and parsed concurrently. A parse error aborts the
 * load; nothing downstream runs on partially parsed input. When several
 * files fail, the first one in declaration order is reported, whatever
 * order the reads finish in.
 */

import { basename, dirname, isAbsolute, join, resolve } from 'path';
import { FILE_PATTERNS, GO_VERSIONS } from '../../constants/index.js';
import type {
  EvaluationConfig,
  EvaluationInput,
  FromFileDeclaration,
  LoadedSource,
  ParsedManifest,
  SumFile,
  UnitInput
} from '../../types/index.js';
import { ConfigurationError, ParseError } from '../../utils/errors.js';
import { readOptionalTextFile, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { parseEvaluationConfig } from '../config/evaluation-config.js';
import { compareGoVersions } from '../manifest/directives.js';
import { parseManifest } from '../manifest/manifest-parser.js';
import { parseSumFile } from '../manifest/sum-parser.js';
import { parseWorkspace } from '../manifest/workspace-parser.js';

/**
 * Read and validate a configuration file.
 *
 * @throws ConfigurationError when the file is invalid, FileSystemError when unreadable
 */
export async function loadEvaluationConfig(configPath: string): Promise<EvaluationConfig> {
  const file = resolve(configPath);
  const parsed = parseEvaluationConfig(await readTextFile(file), file);
  if (!parsed.success) {
    throw parsed.error;
  }
  logger.debug(`Loaded configuration ${file}`, { units: parsed.data.units.length, isolated: parsed.data.isolated });
  return parsed.data;
}

/**
 * Load every file the configuration references.
 *
 * @throws ParseError, ConfigurationError or FileSystemError on the first failure
 */
export async function loadEvaluationInput(config: EvaluationConfig): Promise<EvaluationInput> {
  const units = await settleInOrder(
    config.units.map(async (unit): Promise<UnitInput> => ({
      unit,
      sources: await settleInOrder(unit.fromFile.map(declaration => loadSource(config.baseDir, declaration)))
    }))
  );

  return { configFile: config.file, isolated: config.isolated, units };
}

/**
 * Wait for every load and rethrow the earliest failure by position, so the
 * reported error does not depend on I/O timing.
 */
async function settleInOrder<T>(loads: Promise<T>[]): Promise<T[]> {
  const settled = await Promise.allSettled(loads);
  const values: T[] = [];
  for (const result of settled) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
    values.push(result.value);
  }
  return values;
}

async function loadSource(baseDir: string, declaration: FromFileDeclaration): Promise<LoadedSource> {
  const file = isAbsolute(declaration.file) ? declaration.file : join(baseDir, declaration.file);
  return declaration.kind === 'manifest'
    ? loadManifestSource(declaration, file)
    : loadWorkspaceSource(declaration, file);
}

async function loadManifestSource(declaration: FromFileDeclaration, file: string): Promise<LoadedSource> {
  expectFileName(declaration, file, FILE_PATTERNS.MANIFEST);
  const manifest = await loadManifest(file);
  const sum = await loadManifestSum(manifest);
  return { declaration, manifests: [manifest], sumFiles: sum ? [sum] : [] };
}

async function loadWorkspaceSource(declaration: FromFileDeclaration, file: string): Promise<LoadedSource> {
  expectFileName(declaration, file, FILE_PATTERNS.WORKSPACE);

  const parsed = parseWorkspace(await readTextFile(file), file);
  if (!parsed.success) {
    throw parsed.error;
  }
  const workspace = parsed.data;
  logger.debug(`Parsed workspace ${file}`, { use: workspace.use, replace: workspace.replace.size });

  const manifests = await settleInOrder(workspace.manifests.map(loadManifest));
  const manifestSums = await settleInOrder(manifests.map(loadManifestSum));

  const sumFiles: SumFile[] = [];
  const workspaceSumFile = join(dirname(file), FILE_PATTERNS.WORKSPACE_SUM);
  const workspaceSum = await readOptionalTextFile(workspaceSumFile);
  if (workspaceSum !== null) {
    sumFiles.push(parseSum(workspaceSum, workspaceSumFile));
  }
  for (const sum of manifestSums) {
    if (sum) {
      sumFiles.push(sum);
    }
  }

  return { declaration, workspace, manifests, sumFiles };
}

function expectFileName(declaration: FromFileDeclaration, file: string, expected: string): void {
  if (basename(file) !== expected) {
    throw new ConfigurationError(
      `fromFile(${declaration.kind} = '${declaration.file}') must point to a file named '${expected}'`,
      { file, expected }
    );
  }
}

/**
 * Parse a manifest and make sure it lists its complete requirement set,
 * which only manifests for go 1.17 and later do.
 */
async function loadManifest(file: string): Promise<ParsedManifest> {
  const parsed = parseManifest(await readTextFile(file), file);
  if (!parsed.success) {
    throw parsed.error;
  }
  const manifest = parsed.data;

  const minimum = GO_VERSIONS.COMPLETE_REQUIREMENTS;
  if (compareGoVersions(manifest.go, minimum) < 0) {
    throw new ParseError(
      file,
      undefined,
      `go directive declares ${manifest.go.major}.${manifest.go.minor}, but ${minimum.major}.${minimum.minor} or later is required. ` +
        `Run 'go mod tidy -go=${minimum.major}.${minimum.minor}' to upgrade it.`
    );
  }

  logger.debug(`Parsed manifest ${file}`, { module: manifest.module, require: manifest.require.length });
  return manifest;
}

/** The checksum file beside a manifest, read only when something is required. */
async function loadManifestSum(manifest: ParsedManifest): Promise<SumFile | null> {
  if (manifest.require.length === 0) {
    return null;
  }
  return loadSumFile(join(dirname(manifest.file), FILE_PATTERNS.MANIFEST_SUM));
}

async function loadSumFile(file: string): Promise<SumFile> {
  return parseSum(await readTextFile(file), file);
}

function parseSum(content: string, file: string): SumFile {
  const parsed = parseSumFile(content, file);
  if (!parsed.success) {
    throw parsed.error;
  }
  return { file, entries: parsed.data };
}
