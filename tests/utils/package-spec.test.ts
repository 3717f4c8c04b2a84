import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  deriveNameFromVcsUrl,
  isVcsUrl,
  normalizePackageName,
  parsePackageSpec,
  toInstallerArgument
} from '../../src/utils/package-spec.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('normalizePackageName', () => {
  it('lowercases and collapses separator runs', () => {
    assert.equal(normalizePackageName('Sample_Tool'), 'sample-tool');
    assert.equal(normalizePackageName('a.-_b'), 'a-b');
  });
});

describe('parsePackageSpec', () => {
  it('parses a bare index name', () => {
    assert.deepEqual(parsePackageSpec('Sample.Tool'), { kind: 'index', raw: 'Sample.Tool', name: 'sample-tool' });
  });

  it('parses a pinned version', () => {
    assert.deepEqual(parsePackageSpec('sample-tool==1.2.0'), {
      kind: 'index',
      raw: 'sample-tool==1.2.0',
      name: 'sample-tool',
      version: '1.2.0'
    });
  });

  it('derives the name of a VCS URL from its last segment', () => {
    const spec = parsePackageSpec('git+https://example.com/team/Sample_Tool.git@v1.0');
    assert.equal(spec.kind, 'vcs');
    assert.equal(spec.name, 'sample-tool');
  });

  it('prefers the egg fragment for the name', () => {
    const spec = parsePackageSpec('git+https://example.com/team/repo.git#egg=other_tool');
    assert.equal(spec.name, 'other-tool');
  });

  it('resolves local paths against cwd and names them after the directory', () => {
    assert.deepEqual(parsePackageSpec('./projects/My_Tool', '/work'), {
      kind: 'path',
      raw: './projects/My_Tool',
      name: 'my-tool',
      path: '/work/projects/My_Tool'
    });
    assert.equal(parsePackageSpec('.', '/work/cli-tool').name, 'cli-tool');
  });

  it('rejects empty and malformed input', () => {
    assert.throws(() => parsePackageSpec('   '), ValidationError);
    assert.throws(() => parsePackageSpec('bad name'), ValidationError);
    assert.throws(() => parsePackageSpec('tool>=1.0'), ValidationError);
  });
});

describe('isVcsUrl', () => {
  it('recognizes prefixed, scheme and scp-like forms', () => {
    assert.equal(isVcsUrl('hg+https://example.com/repo'), true);
    assert.equal(isVcsUrl('https://example.com/repo.git'), true);
    assert.equal(isVcsUrl('git@example.com:team/repo.git'), true);
    assert.equal(isVcsUrl('sample-tool'), false);
  });
});

describe('deriveNameFromVcsUrl', () => {
  it('handles scp-like URLs and trailing slashes', () => {
    assert.equal(deriveNameFromVcsUrl('git@example.com:team/repo.git'), 'repo');
    assert.equal(deriveNameFromVcsUrl('https://example.com/team/repo/'), 'repo');
  });
});

describe('toInstallerArgument', () => {
  it('renders each spec kind', () => {
    assert.equal(toInstallerArgument(parsePackageSpec('tool==2.0')), 'tool==2.0');
    assert.equal(toInstallerArgument(parsePackageSpec('tool')), 'tool');
    assert.equal(
      toInstallerArgument(parsePackageSpec('git+https://example.com/team/tool.git')),
      'git+https://example.com/team/tool.git'
    );
    assert.equal(toInstallerArgument(parsePackageSpec('../tool', '/work/here')), '/work/tool');
  });
});
