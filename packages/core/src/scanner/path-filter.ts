/**
 * Path Filter - excluded path matching
 *
 * An exclusion entry is either a bare segment ("test", "fixtures"), matched
 * against every segment of a relative path, or a glob/path
 * ("src/generated/**", "*.spec.ts"), matched with minimatch.
 */

import { minimatch } from 'minimatch';

export type PathPredicate = (relativePath: string) => boolean;

const GLOB_CHARS = /[*?[\]{}!]/;

/**
 * Convert a path to forward-slash form
 */
export function toPosix(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

/**
 * Build a predicate answering "is this relative path excluded?"
 */
export function createPathFilter(excludedPaths: readonly string[]): PathPredicate {
  const segments = new Set<string>();
  const patterns: string[] = [];

  for (const entry of excludedPaths) {
    const normalized = toPosix(entry).replace(/^\.\//, '').replace(/\/+$/, '');
    if (normalized.length === 0) {continue;}
    if (!normalized.includes('/') && !GLOB_CHARS.test(normalized)) {
      segments.add(normalized);
    } else {
      patterns.push(normalized);
    }
  }

  if (segments.size === 0 && patterns.length === 0) {
    return () => false;
  }

  return (relativePath: string): boolean => {
    const rel = toPosix(relativePath);
    if (rel.split('/').some((segment) => segments.has(segment))) {
      return true;
    }
    return patterns.some(
      (pattern) =>
        minimatch(rel, pattern, { dot: true, matchBase: !pattern.includes('/') }) ||
        rel.startsWith(`${pattern}/`)
    );
  };
}

/**
 * Code-unit ordering, independent of the host locale
 */
export function compareNames(a: string, b: string): number {
  if (a < b) {return -1;}
  if (a > b) {return 1;}
  return 0;
}
