import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { resolveModules, type ResolutionOutcome } from '../../../src/core/resolution/engine.js';
import { ErrorCodes, type ResolvedTable, type UnitInput } from '../../../src/types/index.js';
import { HIGHEST_VERSION } from '../../../src/utils/version.js';
import {
  evaluationInput,
  manifestOf,
  manifestSource,
  sum,
  unitConfig,
  workspaceOf,
  workspaceSource
} from '../../test-helpers.js';

function resolved(outcome: ResolutionOutcome): ResolvedTable {
  if (!outcome.success) {
    throw outcome.error;
  }
  return outcome.data;
}

function failure(outcome: ResolutionOutcome): { code: ErrorCodes; message: string } {
  assert.ok(!outcome.success, 'expected resolution to fail');
  return { code: outcome.error.code, message: outcome.error.message };
}

function versions(table: ResolvedTable): Record<string, string> {
  return Object.fromEntries(Array.from(table.modules.values(), module => [module.path, module.rawVersion]));
}

const APP_MANIFEST = '/work/app/go.mod';

function rootUnit(manifest: string, options: Parameters<typeof unitConfig>[1] = {}, sums = [sum('example.com/x', '1.0.0')]): UnitInput {
  return {
    unit: unitConfig('app', { root: true, ...options }),
    sources: [manifestSource(manifestOf(APP_MANIFEST, manifest), { sums })]
  };
}

describe('resolveModules', () => {
  describe('selection across units', () => {
    const lib = (): UnitInput => ({
      unit: unitConfig('lib', { version: '0.3.0' }),
      sources: [manifestSource(
        manifestOf('/work/lib/go.mod', 'module example.com/lib\ngo 1.21\nrequire example.com/x v1.2.0 // indirect\n'),
        { sums: [sum('example.com/x', '1.2.0')] }
      )]
    });
    const app = (strictness?: 'off' | 'warning' | 'error'): UnitInput =>
      rootUnit('module example.com/app\ngo 1.21\nrequire example.com/x v1.0.0\n', { checkDirectDependencies: strictness });

    it('selects the highest version and warns about the stale root requirement', () => {
      const outcome = resolveModules(evaluationInput([app(), lib()]));
      const table = resolved(outcome);

      const x = table.modules.get('example.com/x');
      assert.ok(x);
      assert.equal(x.rawVersion, '1.2.0');
      assert.equal(x.source, 'fetched');
      assert.equal(x.sum, 'h1:example.com/x@1.2.0=');
      assert.deepEqual(table.rootDirectDeps, ['com_example_x']);

      assert.deepEqual(
        outcome.diagnostics.map(diagnostic => [diagnostic.severity, diagnostic.error.code, diagnostic.error.message]),
        [[
          'warning',
          ErrorCodes.STALE_DEPENDENCY,
          'For module "example.com/x", the root unit requires version v1.0.0, but got v1.2.0 in the resolved dependency graph.'
        ]]
      );
    });

    it('escalates staleness under strictness error', () => {
      assert.equal(failure(resolveModules(evaluationInput([app('error'), lib()]))).code, ErrorCodes.STALE_DEPENDENCY);
    });

    it('drops staleness findings under strictness off', () => {
      const outcome = resolveModules(evaluationInput([app('off'), lib()]));
      assert.ok(outcome.success);
      assert.deepEqual(outcome.diagnostics, []);
    });

    it('is independent of unit order', () => {
      const units = (): UnitInput[] => [
        {
          unit: unitConfig('one', {
            modules: [
              { path: 'example.com/x', version: 'v1.0.0', sum: 'h1:x100=', indirect: false, dev: false },
              { path: 'example.com/y', version: 'v2.1.0', sum: 'h1:y210=', indirect: false, dev: false }
            ]
          }),
          sources: []
        },
        {
          unit: unitConfig('two', {
            modules: [{ path: 'example.com/x', version: 'v1.4.0', sum: 'h1:x140=', indirect: true, dev: false }]
          }),
          sources: []
        },
        {
          unit: unitConfig('three', {
            modules: [
              { path: 'example.com/y', version: 'v2.0.5', sum: 'h1:y205=', indirect: false, dev: false },
              { path: 'example.com/z', version: '0.3.0', sum: 'h1:z030=', indirect: false, dev: false }
            ]
          }),
          sources: []
        }
      ];
      const orders = [[0, 1, 2], [0, 2, 1], [1, 0, 2], [1, 2, 0], [2, 0, 1], [2, 1, 0]];

      for (const order of orders) {
        const all = units();
        const table = resolved(resolveModules(evaluationInput(order.map(index => all[index]))));
        assert.deepEqual(versions(table), { 'example.com/x': '1.4.0', 'example.com/y': '2.1.0', 'example.com/z': '0.3.0' });
      }
    });
  });

  describe('conflicts within a unit', () => {
    const input = (failOnVersionConflict: boolean, checkDirectDependencies?: 'off' | 'warning' | 'error') => evaluationInput([{
      unit: unitConfig('app', {
        root: true,
        failOnVersionConflict,
        checkDirectDependencies,
        modules: [{ path: 'example.com/x', version: 'v1.0.0', indirect: false, dev: false }]
      }),
      sources: [manifestSource(
        manifestOf(APP_MANIFEST, 'module example.com/app\ngo 1.21\nrequire example.com/x v2.0.0\n'),
        { sums: [sum('example.com/x', '2.0.0')] }
      )]
    }]);

    it('fails naming both sources', () => {
      const error = failure(resolveModules(input(true)));
      assert.equal(error.code, ErrorCodes.CONFLICT_ERROR);
      assert.equal(error.message, [
        'Multiple versions of example.com/x found:',
        ' - /work/app/go.mod contains: v2.0.0',
        ' - /work/modsel.yml (unit "app") contains: v1.0.0',
        'To correct this:',
        " 1. manually update all go.mod files so that the versions of 'example.com/x' are the same.",
        " 2. run 'go mod tidy' in every folder you changed.",
        " 3. run 'go work sync'."
      ].join('\n'));
    });

    it('continues with the higher version when conflicts are not fatal', () => {
      const outcome = resolveModules(input(false));
      assert.equal(resolved(outcome).modules.get('example.com/x')?.rawVersion, '2.0.0');
      assert.deepEqual(
        outcome.diagnostics.map(diagnostic => [diagnostic.severity, diagnostic.error.code]),
        [['warning', ErrorCodes.CONFLICT_ERROR]]
      );
    });

    it('fails under strictness error', () => {
      assert.equal(failure(resolveModules(input(true, 'error'))).code, ErrorCodes.CONFLICT_ERROR);
    });

    for (const strictness of ['warning', 'off'] as const) {
      it(`prints the conflict and keeps the higher version under strictness ${strictness}`, () => {
        const outcome = resolveModules(input(true, strictness));
        assert.equal(resolved(outcome).modules.get('example.com/x')?.rawVersion, '2.0.0');
        assert.deepEqual(
          outcome.diagnostics.map(diagnostic => [diagnostic.severity, diagnostic.error.code]),
          [['warning', ErrorCodes.CONFLICT_ERROR]]
        );
      });
    }

    it('lets a unit demote conflicts even under strictness error', () => {
      const outcome = resolveModules(input(false, 'error'));
      assert.equal(resolved(outcome).modules.get('example.com/x')?.rawVersion, '2.0.0');
      assert.deepEqual(
        outcome.diagnostics.map(diagnostic => [diagnostic.severity, diagnostic.error.code]),
        [['warning', ErrorCodes.CONFLICT_ERROR]]
      );
    });
  });

  describe('replace directives', () => {
    const manifest = (guard: string) =>
      `module example.com/app\ngo 1.21\nrequire example.com/p v1.2.0\nreplace example.com/p ${guard} => example.com/q v2.0.0\n`;
    const sums = [sum('example.com/p', '1.2.0'), sum('example.com/q', '2.0.0')];

    it('skips a replace whose version guard does not match', () => {
      const outcome = resolveModules(evaluationInput([rootUnit(manifest('v1.3.0'), {}, sums)]));
      const p = resolved(outcome).modules.get('example.com/p');
      assert.ok(p);
      assert.equal(p.rawVersion, '1.2.0');
      assert.equal(p.source, 'fetched');
      assert.equal(p.replace, undefined);
      assert.equal(p.sum, 'h1:example.com/p@1.2.0=');
      assert.deepEqual(outcome.diagnostics, []);
    });

    it('applies a replace whose version guard matches', () => {
      const outcome = resolveModules(evaluationInput([rootUnit(manifest('v1.2.0'), {}, sums)]));
      const p = resolved(outcome).modules.get('example.com/p');
      assert.ok(p);
      assert.equal(p.rawVersion, '2.0.0');
      assert.equal(p.source, 'replaced');
      assert.equal(p.replace, 'example.com/q');
      assert.equal(p.sum, 'h1:example.com/q@2.0.0=');
      assert.deepEqual(outcome.diagnostics, []);
    });

    it('substitutes a local directory without a checksum', () => {
      const outcome = resolveModules(evaluationInput([
        rootUnit('module example.com/app\ngo 1.21\nrequire example.com/x v1.0.0\nreplace example.com/x => ../x\n', {}, [])
      ]));
      const x = resolved(outcome).modules.get('example.com/x');
      assert.ok(x);
      assert.equal(x.source, 'local');
      assert.equal(x.localPath, '/work/x');
      assert.deepEqual(x.version, HIGHEST_VERSION);
      assert.equal(x.sum, undefined);
      assert.deepEqual(outcome.diagnostics, []);
    });

    it('takes workspace replacement targets as requirements', () => {
      const workspace = workspaceOf('/work/go.work', 'go 1.21\nuse ./app\nreplace example.com/a => example.com/b v1.5.0\n');
      const app = manifestOf(APP_MANIFEST, 'module example.com/app\ngo 1.21\nrequire example.com/a v1.0.0\n');
      const outcome = resolveModules(evaluationInput([{
        unit: unitConfig('app', { root: true }),
        sources: [workspaceSource(workspace, [app], [sum('example.com/b', '1.5.0')])]
      }]));
      const table = resolved(outcome);

      assert.deepEqual(versions(table), { 'example.com/b': '1.5.0', 'example.com/a': '1.5.0' });
      assert.equal(table.modules.get('example.com/a')?.replace, 'example.com/b');
      assert.equal(table.modules.get('example.com/b')?.source, 'fetched');
      assert.deepEqual(outcome.diagnostics, []);
    });
  });

  describe('modules provided by other units', () => {
    const app = (overrides: Parameters<typeof unitConfig>[1] = {}): UnitInput => rootUnit(
      'module example.com/app\ngo 1.21\nrequire example.com/lib v1.1.0\n',
      overrides,
      [sum('example.com/lib', '1.1.0')]
    );
    const lib = (version: string): UnitInput => ({
      unit: unitConfig('lib', { version }),
      sources: [manifestSource(manifestOf('/work/lib/go.mod', 'module example.com/lib\ngo 1.21\n'))]
    });

    it('uses a providing unit that is at least as new', () => {
      const outcome = resolveModules(evaluationInput([app(), lib('1.2.0')]));
      const table = resolved(outcome);
      const module = table.modules.get('example.com/lib');

      assert.ok(module);
      assert.equal(module.source, 'provided');
      assert.equal(module.rawVersion, '1.2.0');
      assert.equal(module.provider?.unitName, 'lib');
      assert.equal(module.sum, undefined);
      assert.deepEqual(table.rootDirectDeps, []);
      assert.deepEqual(outcome.diagnostics, []);
    });

    it('treats an unversioned providing unit as the newest', () => {
      const table = resolved(resolveModules(evaluationInput([app(), lib('')])));
      assert.deepEqual(table.modules.get('example.com/lib')?.version, HIGHEST_VERSION);
    });

    it('keeps the fetched module when the providing unit is older', () => {
      const outcome = resolveModules(evaluationInput([app(), lib('1.0.0')]));
      const module = resolved(outcome).modules.get('example.com/lib');

      assert.equal(module?.source, 'fetched');
      assert.equal(module?.rawVersion, '1.1.0');
      assert.deepEqual(outcome.diagnostics.map(diagnostic => diagnostic.error.message), [
        'Module "example.com/lib" is provided by unit "lib" in version v1.0.0, but requested at higher version v1.1.0 by /work/app/go.mod. ' +
          'Consider updating the providing unit so that it is used for this module.'
      ]);
    });

    it('does not use a providing unit for an overridden module', () => {
      const build = { kind: 'build' as const, path: 'example.com/lib', directives: [], buildFileGeneration: 'off' as const, buildExtraArgs: [] };
      const table = resolved(resolveModules(evaluationInput([app({ buildOverrides: [build] }), lib('1.2.0')])));
      const module = table.modules.get('example.com/lib');

      assert.equal(module?.source, 'fetched');
      assert.equal(module?.build.buildFileGeneration, 'off');
    });
  });

  describe('overrides', () => {
    const manifest = 'module example.com/app\ngo 1.21\nrequire example.com/x v1.0.0\n';

    it('fails on an archive override for a module nobody requires', () => {
      const archive = { kind: 'archive' as const, path: 'example.com/never', urls: [], patches: [], patchStrip: 0 };
      const error = failure(resolveModules(evaluationInput([rootUnit(manifest, { archiveOverrides: [archive] })])));
      assert.equal(error.code, ErrorCodes.CONFIGURATION_ERROR);
      assert.equal(error.message, 'Some archive overrides did not target a module with a matching path: example.com/never');
    });

    it('fetches archive overridden modules without a checksum', () => {
      const archive = {
        kind: 'archive' as const,
        path: 'example.com/x',
        urls: ['https://archive.example/x.zip'],
        stripPrefix: 'x-1.0.0',
        patches: ['x.patch'],
        patchStrip: 1
      };
      const outcome = resolveModules(evaluationInput([rootUnit(manifest, { archiveOverrides: [archive] }, [])]));
      const x = resolved(outcome).modules.get('example.com/x');

      assert.ok(x);
      assert.deepEqual(x.archive, archive);
      assert.equal(x.sum, undefined);
      assert.deepEqual(x.patches, ['x.patch']);
      assert.deepEqual(x.patchArgs, ['-p1']);
    });

    it('rejects overrides in other units', () => {
      const patch = { kind: 'patch' as const, path: 'example.com/x', patches: ['x.patch'], patchStrip: 0 };
      const error = failure(resolveModules(evaluationInput([
        rootUnit(manifest),
        { unit: unitConfig('lib', { patchOverrides: [patch] }), sources: [] }
      ])));
      assert.equal(
        error.message,
        'Declaring patch overrides in non-root unit "lib" is forbidden. Move the override to the root unit, or evaluate this unit in isolation.'
      );
    });
  });

  describe('checksums', () => {
    it('fails when a fetched module has no checksum', () => {
      const error = failure(resolveModules(evaluationInput([
        rootUnit('module example.com/app\ngo 1.21\nrequire example.com/x v1.0.0\n', {}, [])
      ])));
      assert.equal(error.code, ErrorCodes.INTEGRITY_ERROR);
      assert.equal(
        error.message,
        "No sum for example.com/x@v1.0.0 found. The checksum data is stale; run 'go mod tidy' to record it, or add a sum to the module declaration."
      );
    });

    it('uses checksums from module declarations', () => {
      const table = resolved(resolveModules(evaluationInput([{
        unit: unitConfig('app', {
          root: true,
          modules: [{ path: 'example.com/y', version: '1.0.0', sum: 'h1:declared=', indirect: false, dev: false }]
        }),
        sources: []
      }])));
      assert.equal(table.modules.get('example.com/y')?.sum, 'h1:declared=');
    });

    it('fails on checksums that disagree between sources', () => {
      const error = failure(resolveModules(evaluationInput([{
        unit: unitConfig('app', {
          root: true,
          modules: [{ path: 'example.com/x', version: 'v1.0.0', sum: 'h1:declared=', indirect: false, dev: false }]
        }),
        sources: [manifestSource(
          manifestOf(APP_MANIFEST, 'module example.com/app\ngo 1.21\nrequire example.com/x v1.0.0\n'),
          { sums: [sum('example.com/x', '1.0.0', 'h1:file=')] }
        )]
      }])));
      assert.equal(
        error.message,
        'Multiple mismatching sums for example.com/x@v1.0.0 found: h1:file= (/work/app/go.sum) vs h1:declared= (/work/modsel.yml (unit "app")). ' +
          "The checksum files are inconsistent or were modified; regenerate them with 'go mod tidy'."
      );
    });
  });

  describe('output', () => {
    it('reports a dependency that is both dev and non-dev only as non-dev', () => {
      const manifest = manifestOf(APP_MANIFEST, 'module example.com/app\ngo 1.21\nrequire (\n\texample.com/x v1.0.0\n\texample.com/testonly v1.0.0\n)\n');
      const table = resolved(resolveModules(evaluationInput([{
        unit: unitConfig('app', {
          root: true,
          modules: [{ path: 'example.com/x', version: '1.0.0', indirect: false, dev: false }]
        }),
        sources: [manifestSource(manifest, {
          dev: true,
          sums: [sum('example.com/x', '1.0.0'), sum('example.com/testonly', '1.0.0')]
        })]
      }])));

      assert.deepEqual(table.rootDirectDeps, ['com_example_x']);
      assert.deepEqual(table.rootDirectDevDeps, ['com_example_testonly']);
    });

    it('leaves shared modules out of isolated evaluations', () => {
      const manifest = manifestOf(APP_MANIFEST, 'module example.com/app\ngo 1.21\nrequire (\n\texample.com/x v1.0.0\n\tgoogle.golang.org/protobuf v1.31.0\n)\n');
      const table = resolved(resolveModules(evaluationInput([{
        unit: unitConfig('app'),
        sources: [manifestSource(manifest, { sums: [sum('example.com/x', '1.0.0')] })]
      }], true)));

      assert.deepEqual(Array.from(table.modules.keys()), ['example.com/x']);
    });
  });
});
