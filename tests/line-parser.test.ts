import { describe, it, expect } from 'vitest';
import { parsePackageLine, resolveConstraintVersion, shortCommit } from '../src/line-parser.js';

const HASH = '0123456789abcdef0123456789abcdef01234567';

describe('parsePackageLine', () => {
  describe('skipped lines', () => {
    it.each([
      ['empty', ''],
      ['whitespace only', '   \t'],
      ['comment', '# Common dependencies'],
      ['indented comment', '    # via torch'],
      ['long pip option', '--extra-index-url https://download.pytorch.org/whl/cu128'],
      ['short pip option', '-r common.txt'],
    ])('returns null for %s', (_label, line) => {
      expect(parsePackageLine(line)).toBeNull();
    });

    it('returns null for a line that is not a declaration', () => {
      expect(parsePackageLine('==1.0')).toBeNull();
    });
  });

  describe('constrained form', () => {
    it('reports latest when there is no constraint', () => {
      expect(parsePackageLine('protobuf')).toEqual({ name: 'protobuf', version: 'latest' });
    });

    it.each(['2.1.0', '0.21.1', '10.0.3', '4.56.0'])('reports X.Y.Z for name>=%s', (version) => {
      expect(parsePackageLine(`pkg-name>=${version}`)).toEqual({ name: 'pkg-name', version });
    });

    it('allows whitespace around the operator', () => {
      expect(parsePackageLine('transformers >= 4.56.0')).toEqual({ name: 'transformers', version: '4.56.0' });
    });

    it('reports an exact pin', () => {
      expect(parsePackageLine('torch==2.8.0')).toEqual({ name: 'torch', version: '2.8.0' });
    });

    it('keeps a local version label on an exact pin', () => {
      expect(parsePackageLine('torch==2.8.0+cu128')).toEqual({ name: 'torch', version: '2.8.0+cu128' });
    });

    it('keeps a dev suffix', () => {
      expect(parsePackageLine('nightly-pkg>=2.0.0.dev3')).toEqual({ name: 'nightly-pkg', version: '2.0.0.dev3' });
    });

    it('prefers the lower bound over an upper bound', () => {
      expect(parsePackageLine('numba>=0.60,<0.62')).toEqual({ name: 'numba', version: '0.60' });
    });

    it('treats a strict lower bound as a lower bound', () => {
      expect(parsePackageLine('pkg>1.5')).toEqual({ name: 'pkg', version: '1.5' });
    });

    it('reports the whole constraint when only an upper bound is given', () => {
      expect(parsePackageLine('numpy<2.0')).toEqual({ name: 'numpy', version: '<2.0' });
    });

    it('reports the whole constraint for an upper bound plus exclusion', () => {
      expect(parsePackageLine('pkg<=2.0,!=1.5')).toEqual({ name: 'pkg', version: '<=2.0,!=1.5' });
    });

    it('falls back to any number in the constraint', () => {
      expect(parsePackageLine('pkg!=1.5')).toEqual({ name: 'pkg', version: '1.5' });
    });

    it('skips extras and stops at environment markers', () => {
      expect(parsePackageLine('ray[cgraph]>=2.48.0; platform_system != "Darwin"')).toEqual({
        name: 'ray',
        version: '2.48.0',
      });
    });

    it('ignores a trailing comment', () => {
      expect(parsePackageLine('compressed-tensors == 0.11.0 # required for compressed-tensors')).toEqual({
        name: 'compressed-tensors',
        version: '0.11.0',
      });
    });

    it('preserves the name spelling', () => {
      expect(parsePackageLine('PyYAML>=6.0')?.name).toBe('PyYAML');
    });
  });

  describe('URL-pinned form', () => {
    it('reports the short commit of a 40-character hash', () => {
      const line = `deepgemm @ git+https://github.com/example/DeepGEMM.git@${HASH}`;
      expect(parsePackageLine(line)).toEqual({ name: 'deepgemm', version: '01234567' });
    });

    it('reports the first N.N.N in the URL', () => {
      const line = 'mypkg @ https://example.com/wheels/mypkg-1.4.2-py3-none-any.whl';
      expect(parsePackageLine(line)).toEqual({ name: 'mypkg', version: '1.4.2' });
    });

    it('keeps a dev suffix from the URL', () => {
      const line = 'torch_xla[tpu, pallas] @ https://example.com/wheels/torch_xla-2.9.0.dev20250716-cp312-linux_x86_64.whl';
      expect(parsePackageLine(line)).toEqual({ name: 'torch_xla', version: '2.9.0.dev20250716' });
    });

    it('reports unknown when the URL carries no version', () => {
      expect(parsePackageLine('foo @ https://example.com/foo.tar.gz')).toEqual({ name: 'foo', version: 'unknown' });
    });
  });
});

describe('resolveConstraintVersion', () => {
  it('returns the raw text when nothing numeric is present', () => {
    expect(resolveConstraintVersion(' >=abc ')).toBe('>=abc');
  });

  it.each([
    'pkg>=2.1.0',
    'pkg==2.8.0+cu128',
    'pkg<2.0',
    'pkg<=2.0,!=1.5',
    'pkg>=2.0.0.dev3',
    'pkg',
  ])('is stable when re-applied to the version reported for %s', (line) => {
    const decl = parsePackageLine(line);
    expect(decl).not.toBeNull();
    const version = decl?.version ?? '';
    expect(resolveConstraintVersion(version)).toBe(version);
  });
});

describe('shortCommit', () => {
  it('truncates a full hash to 8 characters', () => {
    expect(shortCommit(HASH)).toBe('01234567');
  });

  it('does not re-truncate a short hash', () => {
    expect(shortCommit(shortCommit(HASH))).toBe('01234567');
  });

  it('leaves branch names alone', () => {
    expect(shortCommit('release-branch-v1')).toBe('release-branch-v1');
  });

  it('leaves short hex refs alone', () => {
    expect(shortCommit('73b6ea4')).toBe('73b6ea4');
  });
});
