import type { RunConfiguration, VisitorErrorPolicy } from './types.js';

/** Marker file identifying a project directory */
export const MANIFEST_FILE = 'package.json';

/** Default configuration file name, looked up in the working directory */
export const CONFIG_FILE = 'surveyor.config.json';

export const VISITOR_ERROR_POLICIES: readonly VisitorErrorPolicy[] = ['abort', 'isolate'];

export const DEFAULT_EXTENSIONS: readonly string[] = [
  '.ts',
  '.tsx',
  '.mts',
  '.cts',
  '.js',
  '.jsx',
  '.mjs',
  '.cjs',
];

export const DEFAULT_IGNORED_DIRECTORIES: readonly string[] = [
  'node_modules',
  'dist',
  'build',
  'coverage',
];

export const DEFAULT_RUN_CONFIGURATION: RunConfiguration = {
  paths: [],
  showErrors: false,
  resolveUnits: false,
  forceSkipInstall: false,
  excludedPaths: [],
  maxRoots: null,
  includeNestedRoots: true,
  visitorErrorPolicy: 'abort',
  extensions: DEFAULT_EXTENSIONS,
  ignoredDirectories: DEFAULT_IGNORED_DIRECTORIES,
};
