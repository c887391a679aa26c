/**
 * File Walker - deterministic source file listing for one analysis root
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { Dirent } from 'node:fs';

import { compareNames, type PathPredicate } from './path-filter.js';

export interface FileWalkerOptions {
  /** Extensions to collect, with leading dot */
  extensions: readonly string[];
  /** Directory names never descended into */
  ignoredDirectories: readonly string[];
  /** Excluded relative paths (files and directories) */
  isExcluded: PathPredicate;
  /** Absolute directories skipped entirely (nested analysis roots) */
  skipDirectories?: readonly string[];
}

export type EntryKind = 'directory' | 'file' | 'other';

/**
 * Kind of a directory entry, following symbolic links. A dangling link is 'other'.
 */
export async function resolveEntryKind(entry: Dirent, fullPath: string): Promise<EntryKind> {
  if (entry.isDirectory()) {return 'directory';}
  if (entry.isFile()) {return 'file';}
  if (!entry.isSymbolicLink()) {return 'other';}

  try {
    const stat = await fs.stat(fullPath);
    if (stat.isDirectory()) {return 'directory';}
    return stat.isFile() ? 'file' : 'other';
  } catch {
    return 'other';
  }
}

/**
 * Walks a directory tree and lists source files.
 *
 * Hidden entries are skipped. Entries are visited in name order so the
 * resulting list is stable across runs. Symbolic links are followed; a
 * directory reached twice through links is walked once.
 */
export class FileWalker {
  private readonly extensions: Set<string>;
  private readonly ignoredDirectories: Set<string>;
  private readonly skipDirectories: Set<string>;

  constructor(private readonly options: FileWalkerOptions) {
    this.extensions = new Set(options.extensions.map((ext) => ext.toLowerCase()));
    this.ignoredDirectories = new Set(options.ignoredDirectories);
    this.skipDirectories = new Set((options.skipDirectories ?? []).map((dir) => path.resolve(dir)));
  }

  /**
   * List files below rootDir as forward-slash paths relative to rootDir
   */
  async walk(rootDir: string): Promise<string[]> {
    const files: string[] = [];
    await this.walkDirectory(path.resolve(rootDir), '', files, new Set());
    return files;
  }

  isSourceFile(fileName: string): boolean {
    const lower = fileName.toLowerCase();
    if (/\.d\.[mc]?ts$/.test(lower)) {
      return false;
    }
    return this.extensions.has(path.extname(lower));
  }

  private async walkDirectory(
    dir: string,
    relativeDir: string,
    files: string[],
    visited: Set<string>
  ): Promise<void> {
    const realDir = await fs.realpath(dir);
    if (visited.has(realDir)) {return;}
    visited.add(realDir);

    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => compareNames(a.name, b.name));

    for (const entry of entries) {
      if (entry.name.startsWith('.')) {continue;}

      const fullPath = path.join(dir, entry.name);
      const relPath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

      const kind = await resolveEntryKind(entry, fullPath);
      if (kind === 'directory') {
        if (this.ignoredDirectories.has(entry.name)) {continue;}
        if (this.skipDirectories.has(fullPath)) {continue;}
        if (this.options.isExcluded(relPath)) {continue;}
        await this.walkDirectory(fullPath, relPath, files, visited);
      } else if (kind === 'file' && this.isSourceFile(entry.name) && !this.options.isExcluded(relPath)) {
        files.push(relPath);
      }
    }
  }
}
