/**
 * Context Discoverer - finds analysis roots in an unknown directory layout
 *
 * A single input path without a package.json is treated as a container and
 * expanded into its (non-hidden) subdirectories. Several paths, or a path that
 * is itself a project, are used as given. Optionally, nested directories with
 * their own package.json become sub-roots of the root that contains them.
 *
 * The root list is complete and frozen when discover() resolves.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { DEFAULT_IGNORED_DIRECTORIES, MANIFEST_FILE } from '../config/defaults.js';
import { DiscoveryError, toError } from '../errors.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { resolveEntryKind } from '../scanner/file-walker.js';
import { compareNames, createPathFilter, type PathPredicate } from '../scanner/path-filter.js';

import type { RunConfiguration } from '../config/types.js';
import type { AnalysisRoot, DiscoveryResult } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface ContextDiscovererOptions {
  /** Base for relative input paths (default: process.cwd()) */
  cwd?: string;
  /** Look for nested projects inside each root (default: true) */
  includeNestedRoots?: boolean;
  /** Directory names skipped while looking for nested projects */
  ignoredDirectories?: readonly string[];
  /** Excluded path segments or globs, relative to each root */
  excludedPaths?: readonly string[];
  /** Project marker file (default: package.json) */
  manifestFile?: string;
  logger?: Logger;
}

interface Candidate {
  path: string;
  parentName: string | null;
}

interface DraftRoot {
  path: string;
  parentName: string | null;
  isSubRoot: boolean;
  hasManifest: boolean;
  nestedRoots: string[];
}

// ============================================================================
// Helpers
// ============================================================================

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// Context Discoverer
// ============================================================================

export class ContextDiscoverer {
  private readonly cwd: string;
  private readonly includeNestedRoots: boolean;
  private readonly ignoredDirectories: Set<string>;
  private readonly isExcluded: PathPredicate;
  private readonly manifestFile: string;
  private readonly logger: Logger;

  constructor(options: ContextDiscovererOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.includeNestedRoots = options.includeNestedRoots ?? true;
    this.ignoredDirectories = new Set(options.ignoredDirectories ?? DEFAULT_IGNORED_DIRECTORIES);
    this.isExcluded = createPathFilter(options.excludedPaths ?? []);
    this.manifestFile = options.manifestFile ?? MANIFEST_FILE;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Create a discoverer honouring the run configuration
   */
  static fromConfig(
    config: RunConfiguration,
    options: Pick<ContextDiscovererOptions, 'cwd' | 'logger' | 'manifestFile'> = {}
  ): ContextDiscoverer {
    return new ContextDiscoverer({
      ...options,
      includeNestedRoots: config.includeNestedRoots,
      ignoredDirectories: config.ignoredDirectories,
      excludedPaths: config.excludedPaths,
    });
  }

  /**
   * Resolve input paths into the ordered root list
   */
  async discover(paths: readonly string[]): Promise<DiscoveryResult> {
    const errors: DiscoveryError[] = [];
    const inputs = paths.map((p) => path.resolve(this.cwd, p));
    const valid: string[] = [];

    for (const input of inputs) {
      const problem = await this.checkDirectory(input);
      if (problem) {
        const error = new DiscoveryError(`${problem}: ${input}`, input);
        this.logger.warn(error.message);
        errors.push(error);
      } else {
        valid.push(input);
      }
    }

    let candidates: Candidate[] = valid.map((p) => ({ path: p, parentName: null }));
    let expanded = false;

    const [single] = valid;
    if (inputs.length === 1 && single !== undefined && !(await this.hasManifest(single))) {
      this.logger.info(`Recursing into '${single}'...`);
      candidates = await this.expandContainer(single);
      expanded = true;
      this.logger.info(`(Found ${candidates.length} subdirectories.)`);
    }

    const drafts: DraftRoot[] = [];
    for (const candidate of candidates) {
      await this.collectRoot(candidate.path, candidate.parentName, false, drafts, new Set());
    }

    const roots: AnalysisRoot[] = drafts.map((draft, index) =>
      Object.freeze({
        path: draft.path,
        name: path.basename(draft.path),
        parentName: draft.parentName,
        isSubRoot: draft.isSubRoot,
        index,
        hasManifest: draft.hasManifest,
        nestedRoots: Object.freeze([...draft.nestedRoots]),
      })
    );

    return Object.freeze({
      roots: Object.freeze(roots),
      total: roots.length,
      errors: Object.freeze(errors),
      expanded,
    });
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async checkDirectory(dir: string): Promise<string | null> {
    try {
      const stat = await fs.stat(dir);
      return stat.isDirectory() ? null : 'Not a directory';
    } catch {
      return 'Path does not exist';
    }
  }

  private hasManifest(dir: string): Promise<boolean> {
    return pathExists(path.join(dir, this.manifestFile));
  }

  /**
   * Immediate, non-hidden subdirectories of a container (symbolic links
   * followed), in name order
   */
  private async expandContainer(container: string): Promise<Candidate[]> {
    const entries = await fs.readdir(container, { withFileTypes: true });
    const parentName = path.basename(container);
    const names: string[] = [];

    for (const entry of entries) {
      if (entry.name.startsWith('.')) {continue;}
      if ((await resolveEntryKind(entry, path.join(container, entry.name))) === 'directory') {
        names.push(entry.name);
      }
    }

    return names.sort(compareNames).map((name) => ({ path: path.join(container, name), parentName }));
  }

  /**
   * Add a root and, depth-first, the sub-roots nested inside it
   */
  private async collectRoot(
    dir: string,
    parentName: string | null,
    isSubRoot: boolean,
    out: DraftRoot[],
    ancestors: ReadonlySet<string>
  ): Promise<void> {
    const draft: DraftRoot = {
      path: dir,
      parentName,
      isSubRoot,
      hasManifest: await this.hasManifest(dir),
      nestedRoots: [],
    };
    out.push(draft);

    if (!this.includeNestedRoots) {
      return;
    }

    // Real paths of the enclosing roots; a link back to one of them is not a sub-root
    const enclosing = new Set(ancestors).add(await fs.realpath(dir));
    draft.nestedRoots = await this.findNestedRoots(dir, enclosing);
    for (const nested of draft.nestedRoots) {
      await this.collectRoot(nested, path.basename(path.dirname(nested)), true, out, enclosing);
    }
  }

  /**
   * Nearest directories below rootDir that carry their own manifest.
   * The search does not descend into a directory once it is a root.
   */
  private async findNestedRoots(rootDir: string, enclosing: ReadonlySet<string>): Promise<string[]> {
    const found: string[] = [];
    const visited = new Set<string>();

    const walk = async (dir: string, relativeDir: string): Promise<void> => {
      let entries;
      try {
        const realDir = await fs.realpath(dir);
        if (visited.has(realDir)) {return;}
        visited.add(realDir);
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        this.logger.debug(`Skipping unreadable directory ${dir}: ${toError(error).message}`);
        return;
      }
      entries.sort((a, b) => compareNames(a.name, b.name));

      for (const entry of entries) {
        if (entry.name.startsWith('.') || this.ignoredDirectories.has(entry.name)) {continue;}

        const fullPath = path.join(dir, entry.name);
        if ((await resolveEntryKind(entry, fullPath)) !== 'directory') {continue;}

        const relPath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
        if (this.isExcluded(relPath)) {continue;}

        if (await this.hasManifest(fullPath)) {
          if (enclosing.has(await fs.realpath(fullPath))) {
            this.logger.debug(`Skipping link to an enclosing root: ${fullPath}`);
            continue;
          }
          found.push(fullPath);
        } else {
          await walk(fullPath, relPath);
        }
      }
    };

    await walk(rootDir, '');
    return found;
  }
}
