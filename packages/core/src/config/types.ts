/**
 * Run configuration types
 */

/**
 * What the driver does when a visitor hook throws
 *
 * - abort: stop the run and reject with a VisitorHookError
 * - isolate: log the failure and stop calling that visitor
 */
export type VisitorErrorPolicy = 'abort' | 'isolate';

/**
 * Immutable configuration resolved once at startup
 */
export interface RunConfiguration {
  /** Input paths: project directories, or a single container of projects */
  readonly paths: readonly string[];
  /** Hand per-file diagnostics to visitors that report errors */
  readonly showErrors: boolean;
  /** Build a fully resolved program (type checker, semantic diagnostics) */
  readonly resolveUnits: boolean;
  /** Never run the dependency install step */
  readonly forceSkipInstall: boolean;
  /** Path segments or glob patterns skipped during file iteration */
  readonly excludedPaths: readonly string[];
  /** Stop after this many roots (debugging aid); null means no limit */
  readonly maxRoots: number | null;
  /** Treat nested directories with their own manifest as separate roots */
  readonly includeNestedRoots: boolean;
  readonly visitorErrorPolicy: VisitorErrorPolicy;
  /** Source file extensions handed to the analysis engine */
  readonly extensions: readonly string[];
  /** Directory names never descended into */
  readonly ignoredDirectories: readonly string[];
}

/**
 * Partial configuration as read from a file, the environment or the CLI
 */
export type RunConfigurationOverrides = Partial<RunConfiguration>;
