import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { defaultBuildOverride, OverrideRegistry } from '../../../src/core/resolution/override-registry.js';
import type { ArchiveOverride, BuildOverride, PatchOverride } from '../../../src/types/index.js';
import { unitConfig } from '../../test-helpers.js';

function archive(path: string, fields: Partial<ArchiveOverride> = {}): ArchiveOverride {
  return { kind: 'archive', path, urls: [`https://archive.example/${path}.zip`], patches: [], patchStrip: 0, ...fields };
}

function build(path: string, directives: string[] = []): BuildOverride {
  return { kind: 'build', path, directives, buildFileGeneration: 'on', buildExtraArgs: [] };
}

function patch(path: string, fields: Partial<PatchOverride> = {}): PatchOverride {
  return { kind: 'patch', path, patches: ['fix.patch'], patchStrip: 1, ...fields };
}

describe('OverrideRegistry', () => {
  it('forbids overrides in non-root units', () => {
    const registry = new OverrideRegistry();
    const errors = registry.registerUnit(
      unitConfig('lib', { buildOverrides: [build('example.com/x')], archiveOverrides: [archive('example.com/y')] }),
      false
    );

    assert.deepEqual(errors.map(error => error.message), [
      'Declaring build overrides in non-root unit "lib" is forbidden. Move the override to the root unit, or evaluate this unit in isolation.',
      'Declaring archive overrides in non-root unit "lib" is forbidden. Move the override to the root unit, or evaluate this unit in isolation.'
    ]);
    assert.equal(registry.hasAny('example.com/x'), false);
  });

  it('accepts overrides in non-root units of an isolated evaluation', () => {
    const registry = new OverrideRegistry();
    const errors = registry.registerUnit(unitConfig('lib', { patchOverrides: [patch('example.com/x')] }), true);

    assert.deepEqual(errors, []);
    assert.ok(registry.hasAny('example.com/x'));
  });

  it('rejects duplicate overrides of one kind', () => {
    const registry = new OverrideRegistry();
    assert.equal(registry.register(build('example.com/x'), 'app'), null);
    assert.equal(
      registry.register(build('example.com/x'), 'app')?.message,
      'Multiple overrides defined for module path "example.com/x" in unit "app".'
    );
  });

  it('rejects archive and patch overrides for the same path', () => {
    const registry = new OverrideRegistry();
    assert.equal(registry.register(archive('example.com/x'), 'app'), null);
    assert.equal(
      registry.register(patch('example.com/x'), 'app')?.message,
      'Multiple overrides defined for module path "example.com/x" in unit "app".'
    );
    assert.equal(registry.archiveFor('example.com/x')?.kind, 'archive');
  });

  it('validates build directives', () => {
    const registry = new OverrideRegistry();
    assert.equal(registry.register(build('example.com/ok', ['gazelle:proto disable', 'gazelle:go_naming_convention import']), 'app'), null);
    assert.equal(
      registry.register(build('example.com/bad', ['gazelle:proto']), 'app')?.message,
      'Invalid build directive "gazelle:proto" for module path "example.com/bad". Directives must be of the form "namespace:key value".'
    );
    assert.equal(registry.hasAny('example.com/bad'), false);
  });

  it('falls back to the default build override', () => {
    const registry = new OverrideRegistry();
    assert.deepEqual(registry.buildFor('example.com/x'), defaultBuildOverride('example.com/x'));
    assert.deepEqual(registry.buildFor('example.com/x'), {
      kind: 'build',
      path: 'example.com/x',
      directives: [],
      buildFileGeneration: 'auto',
      buildExtraArgs: []
    });
  });

  it('derives patch arguments from archive and patch overrides', () => {
    const registry = new OverrideRegistry();
    registry.register(archive('example.com/a', { patches: ['a.patch'], patchStrip: 2 }), 'app');
    registry.register(patch('example.com/p'), 'app');

    assert.deepEqual(registry.patchesFor('example.com/a'), { patches: ['a.patch'], patchArgs: ['-p2'] });
    assert.deepEqual(registry.patchesFor('example.com/p'), { patches: ['fix.patch'], patchArgs: ['-p1'] });
    assert.deepEqual(registry.patchesFor('example.com/none'), { patches: [], patchArgs: [] });
  });

  it('reports unmatched overrides per kind', () => {
    const registry = new OverrideRegistry();
    registry.register(archive('example.com/never'), 'app');
    registry.register(build('example.com/x'), 'app');
    registry.register(build('example.com/y'), 'app');
    registry.register(build('example.com/z'), 'app');

    const errors = registry.findUnmatched(new Set(['example.com/x']));
    assert.deepEqual(errors.map(error => error.message), [
      'Some archive overrides did not target a module with a matching path: example.com/never',
      'Some build overrides did not target a module with a matching path: example.com/y, example.com/z'
    ]);
  });
});
