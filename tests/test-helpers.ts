import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { parseManifest } from '../src/core/manifest/manifest-parser.js';
import { parseWorkspace } from '../src/core/manifest/workspace-parser.js';
import type { OutputPort } from '../src/core/ports/output.js';
import type {
  EvaluationInput,
  LoadedSource,
  ParsedManifest,
  ParsedWorkspace,
  Requirement,
  RequirementOrigin,
  SumFileEntry,
  UnitConfig,
  UnitInput,
  Version
} from '../src/types/index.js';
import { parseVersion } from '../src/utils/version.js';

export const CONFIG_FILE = '/work/modsel.yml';

export function release(raw: string): Version {
  const version = parseVersion(raw);
  if (!version) {
    throw new Error(`test setup: invalid version ${raw}`);
  }
  return version;
}

export function requirement(
  path: string,
  raw: string,
  fields: Partial<Omit<Requirement, 'path' | 'version' | 'rawVersion'>> = {}
): Requirement {
  const origin: RequirementOrigin = { kind: 'manifest', file: '/work/go.mod', unit: 'app' };
  return {
    path,
    version: release(raw),
    rawVersion: raw.replace(/^v/, ''),
    indirect: false,
    dev: false,
    origin,
    ...fields
  };
}

export function unitConfig(name: string, fields: Partial<Omit<UnitConfig, 'name'>> = {}): UnitConfig {
  return {
    name,
    root: false,
    version: '',
    failOnVersionConflict: true,
    fromFile: [],
    modules: [],
    archiveOverrides: [],
    buildOverrides: [],
    patchOverrides: [],
    ...fields
  };
}

export function manifestOf(file: string, content: string): ParsedManifest {
  const parsed = parseManifest(content, file);
  if (!parsed.success) {
    throw parsed.error;
  }
  return parsed.data;
}

export function workspaceOf(file: string, content: string): ParsedWorkspace {
  const parsed = parseWorkspace(content, file);
  if (!parsed.success) {
    throw parsed.error;
  }
  return parsed.data;
}

export function manifestSource(
  manifest: ParsedManifest,
  options: { sums?: SumFileEntry[]; dev?: boolean; failOnVersionConflict?: boolean } = {}
): LoadedSource {
  return {
    declaration: {
      kind: 'manifest',
      file: manifest.file,
      failOnVersionConflict: options.failOnVersionConflict ?? true,
      dev: options.dev ?? false
    },
    manifests: [manifest],
    sumFiles: options.sums ? [{ file: path.join(path.dirname(manifest.file), 'go.sum'), entries: options.sums }] : []
  };
}

export function workspaceSource(
  workspace: ParsedWorkspace,
  manifests: ParsedManifest[],
  sums: SumFileEntry[] = []
): LoadedSource {
  return {
    declaration: { kind: 'workspace', file: workspace.file, failOnVersionConflict: true, dev: false },
    workspace,
    manifests,
    sumFiles: [{ file: path.join(path.dirname(workspace.file), 'go.work.sum'), entries: sums }]
  };
}

export function evaluationInput(units: UnitInput[], isolated = false): EvaluationInput {
  return { configFile: CONFIG_FILE, isolated, units };
}

export function sum(modulePath: string, version: string, hash = `h1:${modulePath}@${version}=`): SumFileEntry {
  return { path: modulePath, version, sum: hash };
}

/**
 * Create a temporary directory populated with the given files (paths
 * relative to the directory).
 */
export async function createFixtureDir(files: Record<string, string>): Promise<string> {
  const dir = realpathSync(await mkdtemp(path.join(tmpdir(), 'modsel-test-')));
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(dir, relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content, 'utf8');
  }
  return dir;
}

export interface RecordedOutput extends OutputPort {
  records: Array<{ level: string; message: string }>;
}

/** OutputPort test double that records every message. */
export function recordingOutput(): RecordedOutput {
  const records: Array<{ level: string; message: string }> = [];
  const record = (level: string) => (message: string): void => {
    records.push({ level, message });
  };
  return {
    records,
    message: record('message'),
    lines: (rows: readonly string[]): void => {
      for (const row of rows) {
        records.push({ level: 'line', message: row });
      }
    },
    success: record('success'),
    error: record('error'),
    warn: record('warn'),
    note: (content: string, title?: string): void => {
      records.push({ level: 'note', message: title ? `${title}\n${content}` : content });
    }
  };
}
