/**
 * Driver types
 */

import type { AnalysisContextHandle, FileFailureResult } from '../analysis/types.js';
import type { AnalysisRoot, DiscoveryResult } from '../discovery/types.js';
import type { VisitorHookError } from '../errors.js';
import type { RunStatistics } from '../stats/stats-aggregator.js';
import type { PreAnalysisInfo, RegisteredVisitor } from '../visitors/types.js';

export type DriverState = 'idle' | 'discovering' | 'pre-root' | 'analyzing' | 'post-root' | 'finished';

/**
 * How a run ended
 * - completed: every root was entered (or skipped on open failure)
 * - stopped: a visitor returned 'stop' from postAnalysis
 * - limit-reached: maxRoots roots were processed
 * - no-roots: discovery found nothing to analyze
 */
export type RunStatus = 'completed' | 'stopped' | 'limit-reached' | 'no-roots';

export interface RunOutcome {
  readonly status: RunStatus;
  readonly stats: RunStatistics;
  readonly discovery: DiscoveryResult;
}

/**
 * Anything that turns input paths into an ordered root list
 */
export interface RootDiscoverer {
  discover(paths: readonly string[]): Promise<DiscoveryResult>;
}

/**
 * Work on one root between open and close
 */
export interface AnalysisPass {
  readonly root: AnalysisRoot;
  readonly handle: AnalysisContextHandle;
  /** Files consumed from the iterator so far */
  fileIndex: number;
  filesAnalyzed: number;
  fileFailures: number;
}

/**
 * Events emitted by the Driver
 */
export interface DriverEvents {
  state: (state: DriverState) => void;
  discovered: (result: DiscoveryResult) => void;
  rootStarted: (root: AnalysisRoot, info: PreAnalysisInfo) => void;
  rootFinished: (root: AnalysisRoot, pass: AnalysisPass) => void;
  rootSkipped: (root: AnalysisRoot, error: Error) => void;
  fileFailed: (root: AnalysisRoot, result: FileFailureResult) => void;
  visitorDisabled: (visitor: RegisteredVisitor, error: VisitorHookError) => void;
}
