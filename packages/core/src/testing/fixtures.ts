/**
 * Test fixtures - temporary project trees and in-memory collaborators
 */

import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import type { AnalysisRoot } from '../discovery/types.js';
import type { Logger } from '../logging/logger.js';

export async function createTempDir(prefix = 'surveyor-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write files below `root`. Keys ending in `/` create empty directories.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relPath, content] of Object.entries(files)) {
    const fullPath = path.join(root, relPath);
    if (relPath.endsWith('/')) {
      await fs.mkdir(fullPath, { recursive: true });
      continue;
    }
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content, 'utf-8');
  }
}

export function createTestRoot(rootPath: string, overrides: Partial<AnalysisRoot> = {}): AnalysisRoot {
  return {
    path: rootPath,
    name: path.basename(rootPath),
    parentName: null,
    isSubRoot: false,
    index: 0,
    hasManifest: false,
    nestedRoots: [],
    ...overrides,
  };
}

export type LogLevel = keyof Logger;

export interface RecordingLogger extends Logger {
  readonly entries: Array<{ level: LogLevel; message: string }>;
  messages(level: LogLevel): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: Array<{ level: LogLevel; message: string }> = [];
  const record = (level: LogLevel) => (message: string): void => {
    entries.push({ level, message });
  };
  return {
    entries,
    error: record('error'),
    warn: record('warn'),
    info: record('info'),
    debug: record('debug'),
    messages: (level) => entries.filter((entry) => entry.level === level).map((entry) => entry.message),
  };
}
