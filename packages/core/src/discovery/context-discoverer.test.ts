/**
 * Context Discoverer Tests
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { DEFAULT_RUN_CONFIGURATION } from '../config/defaults.js';
import {
  createRecordingLogger,
  createTempDir,
  removeTempDir,
  writeTree,
} from '../testing/fixtures.js';
import { ContextDiscoverer } from './context-discoverer.js';
import { qualifiedName } from './types.js';

describe('ContextDiscoverer', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir('surveyor-discovery-');
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  // ===========================================================================
  // Container expansion
  // ===========================================================================

  describe('container expansion', () => {
    beforeEach(async () => {
      await writeTree(tempDir, {
        'b/index.ts': 'export {};\n',
        'a/index.ts': 'export {};\n',
        '.git/HEAD': 'ref\n',
        'notes.txt': 'not a directory\n',
      });
    });

    it('expands a single path without package.json into its visible subdirectories', async () => {
      const logger = createRecordingLogger();
      const discoverer = new ContextDiscoverer({ logger });

      const result = await discoverer.discover([tempDir]);

      expect(result.expanded).toBe(true);
      expect(result.total).toBe(2);
      expect(result.errors).toEqual([]);
      expect(result.roots.map((root) => root.name)).toEqual(['a', 'b']);
      expect(result.roots.map((root) => root.index)).toEqual([0, 1]);
      expect(result.roots[0]).toMatchObject({
        path: path.join(tempDir, 'a'),
        parentName: path.basename(tempDir),
        isSubRoot: false,
        hasManifest: false,
      });
      expect(logger.messages('info')).toEqual([`Recursing into '${tempDir}'...`, '(Found 2 subdirectories.)']);
    });

    it('returns the same roots for an unchanged tree', async () => {
      const discoverer = new ContextDiscoverer();

      const first = await discoverer.discover([tempDir]);
      const second = await discoverer.discover([tempDir]);

      expect(second).toEqual(first);
    });

    it('freezes the result', async () => {
      const result = await new ContextDiscoverer().discover([tempDir]);

      expect(Object.isFrozen(result.roots)).toBe(true);
      expect(Object.isFrozen(result.roots[0])).toBe(true);
    });

    it('resolves relative paths against cwd', async () => {
      const discoverer = new ContextDiscoverer({ cwd: path.dirname(tempDir) });

      const result = await discoverer.discover([path.basename(tempDir)]);

      expect(result.roots.map((root) => root.path)).toEqual([path.join(tempDir, 'a'), path.join(tempDir, 'b')]);
    });

    it('uses several paths as given, in order', async () => {
      const discoverer = new ContextDiscoverer();

      const result = await discoverer.discover([path.join(tempDir, 'b'), path.join(tempDir, 'a')]);

      expect(result.expanded).toBe(false);
      expect(result.roots.map((root) => root.name)).toEqual(['b', 'a']);
      expect(result.roots.map((root) => root.parentName)).toEqual([null, null]);
    });
  });

  it('does not expand a single project directory', async () => {
    await writeTree(tempDir, {
      'package.json': '{"name":"app"}\n',
      'src/index.ts': 'export {};\n',
    });

    const result = await new ContextDiscoverer().discover([tempDir]);

    expect(result.expanded).toBe(false);
    expect(result.roots).toHaveLength(1);
    expect(result.roots[0]).toMatchObject({ path: tempDir, hasManifest: true, isSubRoot: false });
  });

  it('yields an empty root list for an empty container', async () => {
    const result = await new ContextDiscoverer().discover([tempDir]);

    expect(result.roots).toEqual([]);
    expect(result.total).toBe(0);
  });

  // ===========================================================================
  // Invalid inputs
  // ===========================================================================

  describe('invalid inputs', () => {
    it('collects missing paths and files as errors and keeps the rest', async () => {
      await writeTree(tempDir, { 'a/index.ts': 'export {};\n', 'file.ts': 'export {};\n' });
      const logger = createRecordingLogger();
      const missing = path.join(tempDir, 'missing');
      const file = path.join(tempDir, 'file.ts');

      const result = await new ContextDiscoverer({ logger }).discover([missing, file, path.join(tempDir, 'a')]);

      expect(result.roots.map((root) => root.name)).toEqual(['a']);
      expect(result.roots[0]?.index).toBe(0);
      expect(result.errors.map((error) => error.message)).toEqual([
        `Path does not exist: ${missing}`,
        `Not a directory: ${file}`,
      ]);
      expect(result.errors[0]?.path).toBe(missing);
      expect(logger.messages('warn')).toEqual([`Path does not exist: ${missing}`, `Not a directory: ${file}`]);
    });

    it('does not expand when the only path is invalid', async () => {
      const result = await new ContextDiscoverer().discover([path.join(tempDir, 'missing')]);

      expect(result.expanded).toBe(false);
      expect(result.roots).toEqual([]);
      expect(result.errors).toHaveLength(1);
    });
  });

  // ===========================================================================
  // Nested roots
  // ===========================================================================

  describe('nested roots', () => {
    let app: string;

    beforeEach(async () => {
      app = path.join(tempDir, 'app');
      await writeTree(app, {
        'package.json': '{"name":"app"}\n',
        'src/index.ts': 'export {};\n',
        'packages/core/package.json': '{"name":"core"}\n',
        'packages/cli/package.json': '{"name":"cli"}\n',
        'packages/cli/tools/gen/package.json': '{"name":"gen"}\n',
        'node_modules/dep/package.json': '{"name":"dep"}\n',
        '.cache/tmp/package.json': '{"name":"tmp"}\n',
      });
    });

    it('places sub-roots depth-first after the root that contains them', async () => {
      const result = await new ContextDiscoverer().discover([app]);

      expect(result.roots.map((root) => path.relative(tempDir, root.path).split(path.sep).join('/'))).toEqual([
        'app',
        'app/packages/cli',
        'app/packages/cli/tools/gen',
        'app/packages/core',
      ]);
      expect(result.roots.map((root) => root.isSubRoot)).toEqual([false, true, true, true]);
      expect(result.roots.map((root) => root.parentName)).toEqual([null, 'packages', 'tools', 'packages']);
      expect(result.roots.map((root) => root.index)).toEqual([0, 1, 2, 3]);
      expect(result.roots[0]?.nestedRoots).toEqual([
        path.join(app, 'packages/cli'),
        path.join(app, 'packages/core'),
      ]);
      expect(result.roots[1]?.nestedRoots).toEqual([path.join(app, 'packages/cli/tools/gen')]);
    });

    it('qualifies sub-root names with their parent directory', async () => {
      const result = await new ContextDiscoverer().discover([app]);

      expect(result.roots.map(qualifiedName)).toEqual(['app', 'packages/cli', 'tools/gen', 'packages/core']);
    });

    it('skips nested roots when disabled', async () => {
      const discoverer = ContextDiscoverer.fromConfig({ ...DEFAULT_RUN_CONFIGURATION, includeNestedRoots: false });

      const result = await discoverer.discover([app]);

      expect(result.roots.map((root) => root.name)).toEqual(['app']);
      expect(result.roots[0]?.nestedRoots).toEqual([]);
    });

    it('does not look inside excluded paths', async () => {
      const discoverer = new ContextDiscoverer({ excludedPaths: ['packages/core'] });

      const result = await discoverer.discover([app]);

      expect(result.roots.map((root) => root.name)).toEqual(['app', 'cli', 'gen']);
    });
  });

  // ===========================================================================
  // Symbolic links
  // ===========================================================================

  describe('symbolic links', () => {
    it('expands linked directories of a container like real ones', async () => {
      const container = path.join(tempDir, 'container');
      await writeTree(tempDir, {
        'container/a/index.ts': 'export {};\n',
        'real/b/package.json': '{"name":"b"}\n',
        'real/b/index.ts': 'export {};\n',
      });
      await fs.symlink(path.join('..', 'real', 'b'), path.join(container, 'b'), 'dir');
      await fs.symlink(path.join(tempDir, 'missing'), path.join(container, 'dangling'), 'dir');

      const result = await new ContextDiscoverer().discover([container]);

      expect(result.roots.map((root) => root.name)).toEqual(['a', 'b']);
      expect(result.roots[1]).toMatchObject({ path: path.join(container, 'b'), hasManifest: true });
    });

    it('finds linked sub-roots but not links back to an enclosing root', async () => {
      const app = path.join(tempDir, 'app');
      await writeTree(tempDir, {
        'app/package.json': '{"name":"app"}\n',
        'app/packages/core/package.json': '{"name":"core"}\n',
        'shared/util/package.json': '{"name":"util"}\n',
      });
      await fs.symlink(path.join(tempDir, 'shared', 'util'), path.join(app, 'packages', 'util'), 'dir');
      await fs.symlink(app, path.join(app, 'packages', 'core', 'parent'), 'dir');

      const result = await new ContextDiscoverer().discover([app]);

      expect(result.roots.map(qualifiedName)).toEqual(['app', 'packages/core', 'packages/util']);
    });
  });
});
