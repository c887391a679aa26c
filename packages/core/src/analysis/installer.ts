/**
 * Dependency installer - prepares a root before it is analyzed
 */

import { execFile } from 'node:child_process';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { promisify } from 'node:util';

import { MANIFEST_FILE } from '../config/defaults.js';

import type { AnalysisRoot } from '../discovery/types.js';

const execFileAsync = promisify(execFile);

export type InstallOutcome = 'installed' | 'up-to-date' | 'no-manifest';

export interface DependencyInstaller {
  /**
   * Install the root's dependencies if needed
   *
   * @throws when the install command fails
   */
  install(root: AnalysisRoot): Promise<InstallOutcome>;
}

export interface NpmInstallerOptions {
  /** npm executable (default: npm, npm.cmd on Windows) */
  command?: string;
  /** Extra arguments after `install` */
  args?: readonly string[];
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Runs `npm install` in roots that have a package.json but no node_modules
 */
export class NpmInstaller implements DependencyInstaller {
  private readonly command: string;
  private readonly args: readonly string[];

  constructor(options: NpmInstallerOptions = {}) {
    this.command = options.command ?? (process.platform === 'win32' ? 'npm.cmd' : 'npm');
    this.args = options.args ?? ['--ignore-scripts', '--no-audit', '--no-fund'];
  }

  async install(root: AnalysisRoot): Promise<InstallOutcome> {
    if (!(await pathExists(path.join(root.path, MANIFEST_FILE)))) {
      return 'no-manifest';
    }
    if (await pathExists(path.join(root.path, 'node_modules'))) {
      return 'up-to-date';
    }

    await execFileAsync(this.command, ['install', ...this.args], { cwd: root.path });
    return 'installed';
  }
}
