/**
 * surveyor-core
 *
 * Discovers analysis roots, runs the TypeScript compiler over each one and
 * drives registered visitors through a fixed hook protocol.
 */

// Errors
export {
  toError,
  DiscoveryError,
  FileAnalysisError,
  RootOpenError,
  VisitorHookError,
  DriverStateError,
} from './errors.js';

// Logging
export {
  createConsoleLogger,
  createSilentLogger,
  type Logger,
  type LogStream,
  type ConsoleLoggerOptions,
} from './logging/logger.js';

// Configuration
export {
  MANIFEST_FILE,
  CONFIG_FILE,
  VISITOR_ERROR_POLICIES,
  DEFAULT_EXTENSIONS,
  DEFAULT_IGNORED_DIRECTORIES,
  DEFAULT_RUN_CONFIGURATION,
} from './config/defaults.js';
export type { RunConfiguration, RunConfigurationOverrides, VisitorErrorPolicy } from './config/types.js';
export {
  ConfigLoader,
  ConfigLoadError,
  ConfigParseError,
  loadRunConfiguration,
  type ConfigLoaderOptions,
  type ConfigLoadResult,
} from './config/config-loader.js';
export {
  ConfigValidationError,
  validateRunConfiguration,
  type ConfigValidationIssue,
  type ConfigValidationResult,
} from './config/config-validator.js';

// Scanning and discovery
export { FileWalker, resolveEntryKind, type EntryKind, type FileWalkerOptions } from './scanner/file-walker.js';
export { createPathFilter, compareNames, toPosix, type PathPredicate } from './scanner/path-filter.js';
export { ContextDiscoverer, type ContextDiscovererOptions } from './discovery/context-discoverer.js';
export { qualifiedName, type AnalysisRoot, type DiscoveryResult } from './discovery/types.js';

// Analysis
export { LineInfo, type SourceLocation } from './analysis/line-info.js';
export {
  SEVERITIES,
  type Severity,
  type DiagnosticCategory,
  type DiagnosticRecord,
  type SourceUnit,
  type FileUnitResult,
  type FileFailureResult,
  type FileResult,
  type EngineConfiguration,
  type AnalysisContextHandle,
  type AnalysisEngine,
} from './analysis/types.js';
export {
  TypeScriptEngine,
  toSeverity,
  type TypeScriptEngineOptions,
  type TypeScriptContextHandle,
} from './analysis/typescript-engine.js';
export {
  NpmInstaller,
  type DependencyInstaller,
  type InstallOutcome,
  type NpmInstallerOptions,
} from './analysis/installer.js';

// Visitors
export type {
  SurveyControl,
  PreAnalysisInfo,
  NodeVisitContext,
  NodeVisitor,
  NodeVisitorMap,
  SurveyVisitor,
  VisitorCapabilities,
  RegisteredVisitor,
} from './visitors/types.js';
export {
  VisitorRegistry,
  VisitorRegistrationError,
  detectCapabilities,
  type NodeDispatchEntry,
  type NodeDispatchMap,
} from './visitors/visitor-registry.js';
export { traverseNodes, syntaxKindName, type NodeDispatchHandler } from './visitors/node-traversal.js';

// Driver
export { Driver, type DriverOptions } from './driver/driver.js';
export type {
  DriverState,
  RunStatus,
  RunOutcome,
  RootDiscoverer,
  AnalysisPass,
  DriverEvents,
} from './driver/types.js';

// Statistics and reporting
export { StatsAggregator, type RunStatistics } from './stats/stats-aggregator.js';
export {
  DiagnosticFormatter,
  MemorySink,
  createStreamSink,
  formatSummary,
  formatElapsed,
  type OutputSink,
  type DiagnosticFormatterOptions,
} from './reporting/diagnostic-formatter.js';
