import { describe, it, expect } from 'vitest';

import { compareNames, createPathFilter, toPosix } from './path-filter.js';

describe('createPathFilter', () => {
  it('excludes nothing without entries', () => {
    const isExcluded = createPathFilter([]);
    expect(isExcluded('src/index.ts')).toBe(false);
  });

  it('matches bare segments anywhere in the path', () => {
    const isExcluded = createPathFilter(['fixtures']);
    expect(isExcluded('test/fixtures/a.ts')).toBe(true);
    expect(isExcluded('fixtures')).toBe(true);
    expect(isExcluded('src/fixtures-old.ts')).toBe(false);
  });

  it('matches globs with minimatch', () => {
    const isExcluded = createPathFilter(['src/generated/**']);
    expect(isExcluded('src/generated/api.ts')).toBe(true);
    expect(isExcluded('src/generated/deep/types.ts')).toBe(true);
    expect(isExcluded('src/gen.ts')).toBe(false);
  });

  it('matches slash-free globs against the basename', () => {
    const isExcluded = createPathFilter(['*.spec.ts']);
    expect(isExcluded('lib/deep/a.spec.ts')).toBe(true);
    expect(isExcluded('lib/a.ts')).toBe(false);
  });

  it('treats a relative path as a prefix', () => {
    const isExcluded = createPathFilter(['src/legacy']);
    expect(isExcluded('src/legacy')).toBe(true);
    expect(isExcluded('src/legacy/old.ts')).toBe(true);
    expect(isExcluded('src/legacy-new/a.ts')).toBe(false);
  });

  it('normalizes leading ./ and trailing slashes', () => {
    const isExcluded = createPathFilter(['./vendor/']);
    expect(isExcluded('lib/vendor/x.js')).toBe(true);
  });

  it('accepts backslash paths', () => {
    const isExcluded = createPathFilter(['src/legacy']);
    expect(isExcluded('src\\legacy\\old.ts')).toBe(true);
  });
});

describe('toPosix', () => {
  it('replaces backslashes', () => {
    expect(toPosix('a\\b\\c.ts')).toBe('a/b/c.ts');
  });
});

describe('compareNames', () => {
  it('orders by code unit', () => {
    expect(['b', 'a', 'B', '_z'].sort(compareNames)).toEqual(['B', '_z', 'a', 'b']);
  });
});
