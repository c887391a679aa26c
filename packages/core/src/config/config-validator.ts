/**
 * Config Validator - Run configuration validation
 *
 * Checks a merged configuration object field by field and produces a typed,
 * frozen RunConfiguration, or a list of errors with the offending path.
 */

import { DEFAULT_RUN_CONFIGURATION, VISITOR_ERROR_POLICIES } from './defaults.js';

import type { RunConfiguration, VisitorErrorPolicy } from './types.js';

// ============================================================================
// Validation Error Types
// ============================================================================

/**
 * A single configuration validation error
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field (e.g. 'maxRoots', 'excludedPaths[2]') */
  path: string;
  message: string;
  expected?: string;
  actual?: unknown;
}

export interface ConfigValidationResult {
  valid: boolean;
  /** Only present if valid */
  data?: RunConfiguration;
  /** Only present if invalid */
  errors?: ConfigValidationIssue[];
}

/**
 * Thrown when a configuration fails validation
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: ConfigValidationIssue[]
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format errors as an indented list
   */
  formatErrors(): string {
    if (this.errors.length === 0) {return 'No errors';}

    return this.errors
      .map((e) => {
        let msg = `  - ${e.path}: ${e.message}`;
        if (e.expected) {msg += `\n    Expected: ${e.expected}`;}
        if (e.actual !== undefined) {msg += `\n    Got: ${JSON.stringify(e.actual)}`;}
        return msg;
      })
      .join('\n');
  }
}

// ============================================================================
// Field Readers
// ============================================================================

const KNOWN_KEYS = new Set<string>(Object.keys(DEFAULT_RUN_CONFIGURATION));

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T>(value: unknown, validValues: readonly T[]): value is T {
  return validValues.some((valid) => valid === value);
}

function readBoolean(
  input: Record<string, unknown>,
  key: keyof RunConfiguration,
  fallback: boolean,
  errors: ConfigValidationIssue[]
): boolean {
  const value = input[key];
  if (value === undefined) {return fallback;}
  if (typeof value !== 'boolean') {
    errors.push({ path: key, message: 'Must be a boolean', expected: 'true | false', actual: value });
    return fallback;
  }
  return value;
}

function readStringList(
  input: Record<string, unknown>,
  key: keyof RunConfiguration,
  fallback: readonly string[],
  errors: ConfigValidationIssue[],
  check?: (item: string) => string | null
): readonly string[] {
  const value = input[key];
  if (value === undefined) {return fallback;}
  if (!Array.isArray(value)) {
    errors.push({ path: key, message: 'Must be an array of strings', expected: 'string[]', actual: value });
    return fallback;
  }

  const items: string[] = [];
  value.forEach((item: unknown, i) => {
    if (typeof item !== 'string' || item.length === 0) {
      errors.push({ path: `${key}[${i}]`, message: 'Must be a non-empty string', expected: 'string', actual: item });
      return;
    }
    const problem = check?.(item) ?? null;
    if (problem) {
      errors.push({ path: `${key}[${i}]`, message: problem, actual: item });
      return;
    }
    items.push(item);
  });
  return Object.freeze(items);
}

function readMaxRoots(input: Record<string, unknown>, errors: ConfigValidationIssue[]): number | null {
  const value = input['maxRoots'];
  if (value === undefined || value === null) {return null;}
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    errors.push({
      path: 'maxRoots',
      message: 'Must be a positive integer or null',
      expected: 'integer >= 1 | null',
      actual: value,
    });
    return null;
  }
  return value;
}

function readPolicy(input: Record<string, unknown>, errors: ConfigValidationIssue[]): VisitorErrorPolicy {
  const value = input['visitorErrorPolicy'];
  if (value === undefined) {return DEFAULT_RUN_CONFIGURATION.visitorErrorPolicy;}
  if (!isOneOf(value, VISITOR_ERROR_POLICIES)) {
    errors.push({
      path: 'visitorErrorPolicy',
      message: 'Unknown visitor error policy',
      expected: VISITOR_ERROR_POLICIES.join(' | '),
      actual: value,
    });
    return DEFAULT_RUN_CONFIGURATION.visitorErrorPolicy;
  }
  return value;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Validate a merged configuration object.
 *
 * Missing fields take their default value; unknown fields are rejected.
 */
export function validateRunConfiguration(input: unknown): ConfigValidationResult {
  if (!isObject(input)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Configuration must be an object', expected: 'object', actual: input }],
    };
  }

  const errors: ConfigValidationIssue[] = [];
  const defaults = DEFAULT_RUN_CONFIGURATION;

  for (const key of Object.keys(input)) {
    if (!KNOWN_KEYS.has(key)) {
      errors.push({ path: key, message: 'Unknown configuration field' });
    }
  }

  const data: RunConfiguration = {
    paths: readStringList(input, 'paths', defaults.paths, errors),
    showErrors: readBoolean(input, 'showErrors', defaults.showErrors, errors),
    resolveUnits: readBoolean(input, 'resolveUnits', defaults.resolveUnits, errors),
    forceSkipInstall: readBoolean(input, 'forceSkipInstall', defaults.forceSkipInstall, errors),
    excludedPaths: readStringList(input, 'excludedPaths', defaults.excludedPaths, errors),
    maxRoots: readMaxRoots(input, errors),
    includeNestedRoots: readBoolean(input, 'includeNestedRoots', defaults.includeNestedRoots, errors),
    visitorErrorPolicy: readPolicy(input, errors),
    extensions: readStringList(input, 'extensions', defaults.extensions, errors, (ext) =>
      ext.startsWith('.') ? null : 'Extensions must start with a dot'
    ),
    ignoredDirectories: readStringList(input, 'ignoredDirectories', defaults.ignoredDirectories, errors, (dir) =>
      dir.includes('/') ? 'Must be a directory name, not a path' : null
    ),
  };

  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, data: Object.freeze(data) };
}
