import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { repoNameForModulePath } from '../../src/utils/repo-name.js';

describe('repoNameForModulePath', () => {
  it('reverses host labels and joins path segments', () => {
    assert.equal(repoNameForModulePath('github.com/stretchr/testify'), 'com_github_stretchr_testify');
    assert.equal(repoNameForModulePath('golang.org/x/sys'), 'org_golang_x_sys');
  });

  it('replaces non-alphanumerics and lowercases', () => {
    assert.equal(repoNameForModulePath('gopkg.in/yaml.v3'), 'in_gopkg_yaml_v3');
    assert.equal(repoNameForModulePath('github.com/Foo-Bar/baz~qux'), 'com_github_foo_bar_baz_qux');
  });
});
