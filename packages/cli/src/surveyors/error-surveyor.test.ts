import { describe, it, expect } from 'vitest';

import { formatRootBanner, formatSeverityTally } from './error-surveyor.js';

import type { AnalysisRoot } from 'surveyor-core';

function createRoot(overrides: Partial<AnalysisRoot> = {}): AnalysisRoot {
  return {
    path: '/work/app',
    name: 'app',
    parentName: null,
    isSubRoot: false,
    index: 0,
    hasManifest: true,
    nestedRoots: [],
    ...overrides,
  };
}

describe('formatRootBanner', () => {
  it('announces a root with its position', () => {
    expect(formatRootBanner(createRoot(), { isSubRoot: false, index: 0, position: 1, total: 3 })).toBe(
      "Analyzing 'app' • [1/3]..."
    );
  });

  it('qualifies sub-roots with their parent directory', () => {
    const root = createRoot({ name: 'core', parentName: 'packages', isSubRoot: true, index: 1 });

    expect(formatRootBanner(root, { isSubRoot: true, index: 1, position: 2, total: 3 })).toBe(
      "Analyzing 'packages/core' • [2/3]..."
    );
  });
});

describe('formatSeverityTally', () => {
  it('says so when nothing was reported', () => {
    expect(formatSeverityTally({ ERROR: 0, WARNING: 0, INFO: 0, HINT: 0 })).toBe('No issues found.');
  });

  it('names a single severity', () => {
    expect(formatSeverityTally({ ERROR: 1, WARNING: 0, INFO: 0, HINT: 0 })).toBe('1 error found.');
  });

  it('lists every severity with findings, most severe first', () => {
    expect(formatSeverityTally({ ERROR: 2, WARNING: 1, INFO: 0, HINT: 3 })).toBe(
      '2 errors, 1 warning and 3 hints found.'
    );
  });
});
