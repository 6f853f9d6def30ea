/**
 * Evaluation configuration (modsel.yml).
 *
 * The file lists configuration units in declaration order. Each unit may
 * point at one manifest or workspace file, pin modules explicitly and, on
 * the root unit, declare overrides.
 */

import * as yaml from 'js-yaml';
import { dirname } from 'path';
import { BUILD_FILE_GENERATION_MODES, STRICTNESS_LEVELS } from '../../constants/index.js';
import type {
  ArchiveOverride,
  BuildFileGeneration,
  BuildOverride,
  EvaluationConfig,
  FromFileDeclaration,
  ModuleDeclaration,
  Outcome,
  PatchOverride,
  Strictness,
  UnitConfig
} from '../../types/index.js';
import { ConfigurationError } from '../../utils/errors.js';

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Typed access to one mapping of the configuration file. Every accessor
 * throws a ConfigurationError naming the offending key.
 */
class FieldReader {
  constructor(private readonly fields: Fields, private readonly where: string) {}

  private fail(key: string, expected: string): never {
    throw new ConfigurationError(`${this.where}: '${key}' must be ${expected}`, { key });
  }

  has(key: string): boolean {
    return this.fields[key] !== undefined && this.fields[key] !== null;
  }

  string(key: string): string {
    const value = this.fields[key];
    if (typeof value !== 'string' || value.length === 0) {
      return this.fail(key, 'a non-empty string');
    }
    return value;
  }

  optionalString(key: string): string | undefined {
    return this.has(key) ? this.string(key) : undefined;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.fields[key];
    if (value === undefined || value === null) {
      return fallback;
    }
    if (typeof value !== 'boolean') {
      return this.fail(key, 'true or false');
    }
    return value;
  }

  integer(key: string, fallback: number): number {
    const value = this.fields[key];
    if (value === undefined || value === null) {
      return fallback;
    }
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      return this.fail(key, 'a non-negative integer');
    }
    return value;
  }

  stringList(key: string): string[] {
    const value = this.fields[key];
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value)) {
      return this.fail(key, 'a list of strings');
    }
    const strings: string[] = [];
    for (const item of value) {
      if (typeof item !== 'string') {
        return this.fail(key, 'a list of strings');
      }
      strings.push(item);
    }
    return strings;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[], fallback: T): T;
  oneOf<T extends string>(key: string, allowed: readonly T[]): T | undefined;
  oneOf<T extends string>(key: string, allowed: readonly T[], fallback?: T): T | undefined {
    const value = this.fields[key];
    if (value === undefined || value === null) {
      return fallback;
    }
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      return this.fail(key, `one of ${allowed.join(', ')}`);
    }
    return match;
  }

  records(key: string): FieldReader[] {
    const value = this.fields[key];
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value)) {
      return this.fail(key, 'a list of mappings');
    }
    return value.map((item: unknown, index: number) => {
      if (!isRecord(item)) {
        return this.fail(`${key}[${index}]`, 'a mapping');
      }
      return new FieldReader(item, `${this.where} ${key}[${index}]`);
    });
  }
}

/**
 * Parse and validate configuration text. `file` is the absolute path of
 * the configuration file; relative file references resolve against its
 * directory.
 */
export function parseEvaluationConfig(content: string, file: string): Outcome<EvaluationConfig, ConfigurationError> {
  try {
    let document: unknown;
    try {
      document = yaml.load(content, { filename: file });
    } catch (error) {
      throw new ConfigurationError(`Failed to parse ${file}: ${error instanceof Error ? error.message : String(error)}`, { file });
    }
    if (!isRecord(document)) {
      throw new ConfigurationError(`${file}: expected a mapping at the top level`, { file });
    }

    const top = new FieldReader(document, file);
    const units = top.records('units').map(readUnit);
    if (units.length === 0) {
      throw new ConfigurationError(`${file}: at least one unit must be declared under 'units'`, { file });
    }
    validateUnits(units, file);

    return {
      success: true,
      data: { file, baseDir: dirname(file), isolated: top.boolean('isolated', false), units }
    };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { success: false, error };
    }
    throw error;
  }
}

function readUnit(reader: FieldReader): UnitConfig {
  const name = reader.string('name');
  const root = reader.boolean('root', false);
  const fromFile = reader.records('fromFile').map(readFromFile);

  const failOnVersionConflict = reader.has('failOnVersionConflict')
    ? reader.boolean('failOnVersionConflict', true)
    : fromFile.length === 0 || fromFile.some(declaration => declaration.failOnVersionConflict);

  return {
    name,
    root,
    version: reader.optionalString('version') ?? '',
    checkDirectDependencies: reader.oneOf<Strictness>('checkDirectDependencies', STRICTNESS_LEVELS),
    failOnVersionConflict,
    fromFile,
    modules: reader.records('modules').map(readModule),
    archiveOverrides: reader.records('archiveOverrides').map(readArchiveOverride),
    buildOverrides: reader.records('buildOverrides').map(readBuildOverride),
    patchOverrides: reader.records('patchOverrides').map(readPatchOverride)
  };
}

function readFromFile(reader: FieldReader): FromFileDeclaration {
  const manifest = reader.optionalString('manifest');
  const workspace = reader.optionalString('workspace');
  const failOnVersionConflict = reader.boolean('failOnVersionConflict', true);
  const dev = reader.boolean('dev', false);

  if (manifest !== undefined && workspace === undefined) {
    return { kind: 'manifest', file: manifest, failOnVersionConflict, dev };
  }
  if (workspace !== undefined && manifest === undefined) {
    return { kind: 'workspace', file: workspace, failOnVersionConflict, dev };
  }
  throw new ConfigurationError(
    "fromFile declarations must name either 'manifest' or 'workspace', but not both",
    { manifest, workspace }
  );
}

function readModule(reader: FieldReader): ModuleDeclaration {
  return {
    path: reader.string('path'),
    version: reader.string('version'),
    sum: reader.optionalString('sum'),
    indirect: reader.boolean('indirect', false),
    dev: reader.boolean('dev', false)
  };
}

function readArchiveOverride(reader: FieldReader): ArchiveOverride {
  return {
    kind: 'archive',
    path: reader.string('path'),
    urls: reader.stringList('urls'),
    sha256: reader.optionalString('sha256'),
    stripPrefix: reader.optionalString('stripPrefix'),
    patches: reader.stringList('patches'),
    patchStrip: reader.integer('patchStrip', 0)
  };
}

function readBuildOverride(reader: FieldReader): BuildOverride {
  return {
    kind: 'build',
    path: reader.string('path'),
    directives: reader.stringList('directives'),
    buildFileGeneration: reader.oneOf<BuildFileGeneration>('buildFileGeneration', BUILD_FILE_GENERATION_MODES, 'auto'),
    buildExtraArgs: reader.stringList('buildExtraArgs')
  };
}

function readPatchOverride(reader: FieldReader): PatchOverride {
  return {
    kind: 'patch',
    path: reader.string('path'),
    patches: reader.stringList('patches'),
    patchStrip: reader.integer('patchStrip', 0)
  };
}

function validateUnits(units: UnitConfig[], file: string): void {
  const names = new Set<string>();
  for (const unit of units) {
    if (names.has(unit.name)) {
      throw new ConfigurationError(`${file}: unit "${unit.name}" is declared more than once`, { unit: unit.name });
    }
    names.add(unit.name);

    if (unit.fromFile.length > 1) {
      throw new ConfigurationError(
        `Multiple fromFile declarations in unit "${unit.name}": ${unit.fromFile.map(declaration => declaration.file).join(', ')}`,
        { unit: unit.name }
      );
    }
    const workspace = unit.fromFile.find(declaration => declaration.kind === 'workspace');
    if (workspace && !unit.root) {
      throw new ConfigurationError(
        `fromFile(workspace = '${workspace.file}') can only be used from the root unit, but "${unit.name}" is not the root unit`,
        { unit: unit.name, workspace: workspace.file }
      );
    }
  }

  const roots = units.filter(unit => unit.root);
  if (roots.length > 1) {
    throw new ConfigurationError(
      `${file}: only one unit may be the root unit, found ${roots.map(unit => `"${unit.name}"`).join(', ')}`,
      { roots: roots.map(unit => unit.name) }
    );
  }
}
