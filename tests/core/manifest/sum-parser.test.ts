import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { parseSumFile } from '../../../src/core/manifest/sum-parser.js';

describe('parseSumFile', () => {
  it('parses module checksums and drops go.mod checksums', () => {
    const result = parseSumFile('mod v1.2.3 h1:abc=\nmod v1.2.3/go.mod h1:def=\n', 'go.sum');
    assert.ok(result.success);
    assert.deepEqual(result.data, [{ path: 'mod', version: '1.2.3', sum: 'h1:abc=' }]);
  });

  it('skips blank lines and accepts any whitespace between fields', () => {
    const result = parseSumFile([
      'github.com/stretchr/testify v1.8.4 h1:test-sum-a=',
      '',
      'golang.org/x/sys\tv0.5.0\th1:test-sum-b=',
      '   '
    ].join('\n'), 'go.sum');
    assert.ok(result.success);
    assert.deepEqual(result.data, [
      { path: 'github.com/stretchr/testify', version: '1.8.4', sum: 'h1:test-sum-a=' },
      { path: 'golang.org/x/sys', version: '0.5.0', sum: 'h1:test-sum-b=' }
    ]);
  });

  it('rejects lines without exactly three fields', () => {
    const result = parseSumFile('mod v1.0.0 h1:abc=\nmod v1.1.0\n', 'go.sum');
    assert.equal(result.success, false);
    assert.equal(result.success ? '' : result.error.message, "go.sum:2: expected 'path version hash', found 2 field(s)");
  });
});
