/**
 * Discovery types
 */

import type { DiscoveryError } from '../errors.js';

/**
 * One self-contained project directory, analyzed as a unit
 */
export interface AnalysisRoot {
  /** Absolute directory path */
  readonly path: string;
  /** Directory basename */
  readonly name: string;
  /**
   * Basename of the enclosing directory, set for sub-roots and for the
   * children of an expanded container
   */
  readonly parentName: string | null;
  /** Nested project found inside another root */
  readonly isSubRoot: boolean;
  /** 0-based position in the run */
  readonly index: number;
  /** Whether the directory contains a package.json */
  readonly hasManifest: boolean;
  /** Absolute paths of sub-roots directly below this root; their files belong to them */
  readonly nestedRoots: readonly string[];
}

export interface DiscoveryResult {
  /** Ordered, frozen root list */
  readonly roots: readonly AnalysisRoot[];
  /** Number of roots, used for progress display */
  readonly total: number;
  /** Inputs that could not become roots */
  readonly errors: readonly DiscoveryError[];
  /** Whether a single container path was expanded into its subdirectories */
  readonly expanded: boolean;
}

/**
 * Name shown in progress output: sub-roots are qualified with their parent
 */
export function qualifiedName(root: AnalysisRoot): string {
  return root.isSubRoot && root.parentName ? `${root.parentName}/${root.name}` : root.name;
}
