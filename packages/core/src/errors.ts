/**
 * Errors - Error taxonomy for the surveyor engine
 *
 * Discovery and per-file errors are recoverable and are collected or logged.
 * Visitor hook errors abort the run unless the driver isolates them.
 */

// ============================================================================
// Helpers
// ============================================================================

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
}

// ============================================================================
// Discovery
// ============================================================================

/**
 * Raised for an input path that cannot become an analysis root.
 * Never thrown by the discoverer itself; collected and reported.
 */
export class DiscoveryError extends Error {
  public readonly path: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, path: string, cause?: Error) {
    super(message);
    this.name = 'DiscoveryError';
    this.path = path;
    this.errorCause = cause;
  }
}

// ============================================================================
// Analysis
// ============================================================================

/**
 * The analysis engine could not produce a unit for a single file
 */
export class FileAnalysisError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, filePath: string, cause?: Error) {
    super(message);
    this.name = 'FileAnalysisError';
    this.filePath = filePath;
    this.errorCause = cause;
  }
}

/**
 * The analysis engine could not open a context for a root
 */
export class RootOpenError extends Error {
  public readonly rootPath: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, rootPath: string, cause?: Error) {
    super(message);
    this.name = 'RootOpenError';
    this.rootPath = rootPath;
    this.errorCause = cause;
  }
}

// ============================================================================
// Driver
// ============================================================================

/**
 * A visitor hook threw or rejected
 */
export class VisitorHookError extends Error {
  public readonly visitorName: string;
  public readonly hook: string;
  public readonly errorCause: Error;

  constructor(visitorName: string, hook: string, cause: Error) {
    super(`Visitor '${visitorName}' failed in ${hook}: ${cause.message}`);
    this.name = 'VisitorHookError';
    this.visitorName = visitorName;
    this.hook = hook;
    this.errorCause = cause;
  }
}

/**
 * The driver was used outside of its lifecycle (e.g. run twice)
 */
export class DriverStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DriverStateError';
  }
}
