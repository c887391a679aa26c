/**
 * Config Loader - Configuration loading and merging
 *
 * Resolves the run configuration once, in increasing precedence:
 * built-in defaults, command defaults, surveyor.config.json, SURVEYOR_*
 * environment variables, then explicit overrides (CLI flags).
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { CONFIG_FILE, DEFAULT_RUN_CONFIGURATION } from './defaults.js';
import { ConfigValidationError, validateRunConfiguration } from './config-validator.js';

import type { RunConfiguration, RunConfigurationOverrides } from './types.js';

// ============================================================================
// Constants
// ============================================================================

const ENV_PREFIX = 'SURVEYOR_';

const ENV_VARS = {
  MAX_ROOTS: `${ENV_PREFIX}MAX_ROOTS`,
  SKIP_INSTALL: `${ENV_PREFIX}SKIP_INSTALL`,
  RESOLVE_UNITS: `${ENV_PREFIX}RESOLVE_UNITS`,
  SHOW_ERRORS: `${ENV_PREFIX}SHOW_ERRORS`,
  EXCLUDE: `${ENV_PREFIX}EXCLUDE`,
  VISITOR_ERROR_POLICY: `${ENV_PREFIX}VISITOR_ERROR_POLICY`,
} as const;

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Error thrown when the configuration file cannot be read
 */
export class ConfigLoadError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, filePath: string, errorCause?: Error) {
    super(message);
    this.name = 'ConfigLoadError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

/**
 * Error thrown when the configuration file is not a JSON object
 */
export class ConfigParseError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, filePath: string, errorCause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {return undefined;}
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') {return true;}
  if (lower === 'false' || lower === '0' || lower === 'no') {return false;}
  return undefined;
}

function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined) {return undefined;}
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

function parseEnvList(value: string | undefined): string[] | undefined {
  if (value === undefined) {return undefined;}
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

/**
 * Drop keys whose value is undefined so they do not shadow lower layers
 */
function definedEntries(source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

// ============================================================================
// Config Loader Class
// ============================================================================

export interface ConfigLoaderOptions {
  /** Directory searched for surveyor.config.json (default: process.cwd()) */
  rootDir?: string | undefined;
  /** Explicit configuration file; must exist when given */
  configFile?: string | undefined;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv | undefined;
  /** Whether to apply environment variable overrides (default: true) */
  applyEnvOverrides?: boolean | undefined;
  /** Defaults of the calling command; above the built-in defaults, below the file */
  defaults?: RunConfigurationOverrides | undefined;
}

export interface ConfigLoadResult {
  config: RunConfiguration;
  /** Path to the config file, if one was read */
  configPath?: string | undefined;
  configFileFound: boolean;
  envOverridesApplied: boolean;
}

/**
 * ConfigLoader - Loads the run configuration
 *
 * @example
 * ```typescript
 * const loader = new ConfigLoader({ rootDir: process.cwd() });
 * const { config } = await loader.load({ paths: ['./projects'], showErrors: true });
 * ```
 */
export class ConfigLoader {
  private readonly rootDir: string;
  private readonly explicitConfig: boolean;
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly applyEnvOverrides: boolean;
  private readonly defaults: RunConfigurationOverrides;

  constructor(options: ConfigLoaderOptions = {}) {
    this.rootDir = options.rootDir ?? process.cwd();
    this.explicitConfig = options.configFile !== undefined;
    this.configPath = options.configFile
      ? path.resolve(this.rootDir, options.configFile)
      : path.join(this.rootDir, CONFIG_FILE);
    this.env = options.env ?? process.env;
    this.applyEnvOverrides = options.applyEnvOverrides ?? true;
    this.defaults = options.defaults ?? {};
  }

  // ==========================================================================
  // Public Methods
  // ==========================================================================

  /**
   * Load, merge and validate the configuration
   *
   * @throws ConfigLoadError, ConfigParseError, ConfigValidationError
   */
  async load(overrides: RunConfigurationOverrides = {}): Promise<ConfigLoadResult> {
    let merged: Record<string, unknown> = { ...DEFAULT_RUN_CONFIGURATION, ...definedEntries({ ...this.defaults }) };
    let configFileFound = false;
    let envOverridesApplied = false;

    if (this.explicitConfig || (await fileExists(this.configPath))) {
      merged = { ...merged, ...(await this.loadFromFile(this.configPath)) };
      configFileFound = true;
    }

    if (this.applyEnvOverrides) {
      const envConfig = this.getEnvOverrides();
      if (Object.keys(envConfig).length > 0) {
        merged = { ...merged, ...envConfig };
        envOverridesApplied = true;
      }
    }

    merged = { ...merged, ...definedEntries({ ...overrides }) };

    const result = validateRunConfiguration(merged);
    if (!result.valid || !result.data) {
      const errors = result.errors ?? [];
      throw new ConfigValidationError(
        `Invalid configuration: ${errors.length} error(s) in ${errors.map((e) => e.path).join(', ')}`,
        errors
      );
    }

    return {
      config: result.data,
      configPath: configFileFound ? this.configPath : undefined,
      configFileFound,
      envOverridesApplied,
    };
  }

  getConfigPath(): string {
    return this.configPath;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * Read a JSON configuration file. Relative `paths` entries are resolved
   * against the file's directory.
   */
  private async loadFromFile(filePath: string): Promise<Record<string, unknown>> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new ConfigLoadError(
        `Failed to read configuration file: ${cause?.message ?? String(error)}`,
        filePath,
        cause
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new ConfigParseError(
        `Failed to parse configuration file: ${cause?.message ?? String(error)}`,
        filePath,
        cause
      );
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigParseError('Configuration must be a JSON object', filePath);
    }

    const paths = parsed['paths'];
    if (Array.isArray(paths)) {
      const baseDir = path.dirname(filePath);
      parsed['paths'] = paths.map((entry: unknown) =>
        typeof entry === 'string' ? path.resolve(baseDir, entry) : entry
      );
    }

    return parsed;
  }

  private getEnvOverrides(): Record<string, unknown> {
    return definedEntries({
      maxRoots: parseEnvInteger(this.env[ENV_VARS.MAX_ROOTS]),
      forceSkipInstall: parseEnvBoolean(this.env[ENV_VARS.SKIP_INSTALL]),
      resolveUnits: parseEnvBoolean(this.env[ENV_VARS.RESOLVE_UNITS]),
      showErrors: parseEnvBoolean(this.env[ENV_VARS.SHOW_ERRORS]),
      excludedPaths: parseEnvList(this.env[ENV_VARS.EXCLUDE]),
      visitorErrorPolicy: this.env[ENV_VARS.VISITOR_ERROR_POLICY],
    });
  }
}

/**
 * Convenience wrapper around ConfigLoader
 */
export async function loadRunConfiguration(
  overrides: RunConfigurationOverrides = {},
  options: ConfigLoaderOptions = {}
): Promise<RunConfiguration> {
  const result = await new ConfigLoader(options).load(overrides);
  return result.config;
}
