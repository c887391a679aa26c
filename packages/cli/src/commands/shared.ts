/**
 * Options and run loop shared by the survey commands
 *
 * Exit codes: 0 = completed (including a visitor stop), 1 = no analysis
 * roots, 2 = configuration error or aborted run.
 */

import { InvalidArgumentError, Option, type Command } from 'commander';
import {
  ConfigValidationError,
  DiagnosticFormatter,
  Driver,
  StatsAggregator,
  VISITOR_ERROR_POLICIES,
  createConsoleLogger,
  createStreamSink,
  formatSummary,
  loadRunConfiguration,
  toError,
} from 'surveyor-core';

import { Spinner, trackDiscovery } from '../ui/spinner.js';

import type {
  AnalysisEngine,
  DependencyInstaller,
  LogStream,
  OutputSink,
  RunConfiguration,
  RunConfigurationOverrides,
  SurveyVisitor,
  VisitorErrorPolicy,
} from 'surveyor-core';

export const EXIT_CODES = {
  OK: 0,
  NO_ROOTS: 1,
  ERROR: 2,
} as const;

export interface SurveyCommandOptions {
  config?: string;
  resolve?: boolean;
  skipInstall?: boolean;
  exclude?: string[];
  limit?: number;
  /** false when --no-nested is given */
  nested?: boolean;
  onVisitorError?: string;
  verbose?: boolean;
}

/**
 * Process handles a run writes through; replaced in tests
 */
export interface SurveyIO {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Report output (default: stdout) */
  sink?: OutputSink;
  /** Log output (default: stderr) */
  logStream?: LogStream;
  engine?: AnalysisEngine;
  installer?: DependencyInstaller;
  /** Show the discovery spinner (default: when stderr is a terminal) */
  spinner?: boolean;
}

export interface SurveySetup {
  readonly config: RunConfiguration;
  readonly formatter: DiagnosticFormatter;
  readonly stats: StatsAggregator;
}

// ============================================================================
// Option Parsing
// ============================================================================

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function isVisitorErrorPolicy(value: string): value is VisitorErrorPolicy {
  return VISITOR_ERROR_POLICIES.some((policy) => policy === value);
}

export function addSurveyOptions(command: Command): Command {
  return command
    .argument('[paths...]', 'Project directories, or one directory containing projects')
    .option('-c, --config <file>', 'Configuration file (default: surveyor.config.json)')
    .option('--resolve', 'Resolve units with the type checker and report semantic diagnostics')
    .option('--skip-install', 'Do not install dependencies before analysis')
    .option('-x, --exclude <patterns...>', 'Path segments or globs to exclude')
    .option('--limit <n>', 'Stop after this many roots', parsePositiveInt)
    .option('--no-nested', 'Do not treat nested package.json directories as separate roots')
    .addOption(
      new Option('--on-visitor-error <policy>', 'What to do when a visitor throws').choices([
        ...VISITOR_ERROR_POLICIES,
      ])
    )
    .option('--verbose', 'Enable debug logging');
}

/**
 * Run configuration overrides given on the command line. Only options the
 * user actually passed are returned, so file and env values are kept.
 */
export function toOverrides(
  paths: readonly string[],
  options: SurveyCommandOptions
): RunConfigurationOverrides {
  const overrides: {
    -readonly [K in keyof RunConfiguration]?: RunConfiguration[K];
  } = {};

  if (paths.length > 0) {overrides.paths = [...paths];}
  if (options.resolve) {overrides.resolveUnits = true;}
  if (options.skipInstall) {overrides.forceSkipInstall = true;}
  if (options.exclude && options.exclude.length > 0) {overrides.excludedPaths = [...options.exclude];}
  if (options.limit !== undefined) {overrides.maxRoots = options.limit;}

  if (options.nested === false) {overrides.includeNestedRoots = false;}

  if (options.onVisitorError !== undefined) {
    if (!isVisitorErrorPolicy(options.onVisitorError)) {
      throw new InvalidArgumentError(`Unknown visitor error policy '${options.onVisitorError}'.`);
    }
    overrides.visitorErrorPolicy = options.onVisitorError;
  }

  return overrides;
}

// ============================================================================
// Run Loop
// ============================================================================

/**
 * Load configuration, register visitors, run the driver and print the summary.
 * `commandDefaults` sit under the config file, the environment and `overrides`.
 * Returns the process exit code.
 */
export async function runSurvey(
  overrides: RunConfigurationOverrides,
  options: SurveyCommandOptions,
  createVisitors: (setup: SurveySetup) => SurveyVisitor[],
  io: SurveyIO = {},
  commandDefaults: RunConfigurationOverrides = {}
): Promise<number> {
  const cwd = io.cwd ?? process.cwd();
  const verbose = options.verbose ?? false;
  const logger = createConsoleLogger({
    verbose,
    ...(io.logStream !== undefined ? { stream: io.logStream } : {}),
  });

  const stats = new StatsAggregator();
  const formatter = new DiagnosticFormatter({ sink: io.sink ?? createStreamSink(), stats, baseDir: cwd });
  const printSummary = async (): Promise<void> => {
    for (const line of formatSummary(stats.snapshot())) {
      formatter.writeLine(line);
    }
    await formatter.flush();
  };

  let config: RunConfiguration;
  try {
    const loaded = await loadRunConfiguration(overrides, {
      rootDir: cwd,
      configFile: options.config,
      env: io.env ?? process.env,
      defaults: commandDefaults,
    });
    config = loaded.paths.length > 0 ? loaded : Object.freeze({ ...loaded, paths: Object.freeze([cwd]) });
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      logger.error(`${error.message}\n${error.formatErrors()}`);
    } else {
      logger.error(toError(error).message);
    }
    await printSummary();
    return EXIT_CODES.ERROR;
  }

  const driver = new Driver({
    config,
    logger,
    stats,
    cwd,
    ...(io.engine !== undefined ? { engine: io.engine } : {}),
    ...(io.installer !== undefined ? { installer: io.installer } : {}),
  });

  for (const visitor of createVisitors({ config, formatter, stats })) {
    driver.register(visitor);
  }

  if (io.spinner ?? (process.stderr.isTTY && !verbose)) {
    trackDiscovery(driver, new Spinner());
  }

  let exitCode: number = EXIT_CODES.OK;
  try {
    const outcome = await driver.run();
    if (outcome.status === 'no-roots') {
      exitCode = EXIT_CODES.NO_ROOTS;
    }
  } catch (error) {
    logger.error(`Run aborted: ${toError(error).message}`);
    exitCode = EXIT_CODES.ERROR;
  } finally {
    await printSummary();
  }

  return exitCode;
}
