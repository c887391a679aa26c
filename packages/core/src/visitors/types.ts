/**
 * Visitor protocol types
 *
 * A visitor implements any subset of the hooks below. Nothing is required:
 * a visitor with no hooks is valid and simply never called.
 */

import type ts from 'typescript';

import type { FileUnitResult } from '../analysis/types.js';
import type { LineInfo } from '../analysis/line-info.js';
import type { AnalysisRoot } from '../discovery/types.js';
import type { RunStatistics } from '../stats/stats-aggregator.js';

/**
 * Returned from postAnalysis; 'stop' ends the run after the current root
 */
export type SurveyControl = 'continue' | 'stop';

export interface PreAnalysisInfo {
  /** Root is a nested project (affects display only) */
  readonly isSubRoot: boolean;
  /** 0-based index of the root */
  readonly index: number;
  /** 1-based position among roots entered so far */
  readonly position: number;
  /** Total number of discovered roots */
  readonly total: number;
}

export interface NodeVisitContext {
  readonly root: AnalysisRoot;
  readonly file: FileUnitResult;
}

/**
 * A returned promise is awaited before the next node is visited
 */
export type NodeVisitor = (node: ts.Node, context: NodeVisitContext) => void | Promise<void>;

/**
 * Node callbacks keyed by syntax kind, e.g. `{ [ts.SyntaxKind.Identifier]: fn }`
 */
export type NodeVisitorMap = Partial<Record<ts.SyntaxKind, NodeVisitor>>;

export interface SurveyVisitor {
  /** Display name used in logs and errors */
  readonly name?: string;

  /** Once per root, before its files */
  preAnalysis?(root: AnalysisRoot, info: PreAnalysisInfo): void | Promise<void>;

  /** Once per file, before node visiting */
  setFileContext?(filePath: string, lineInfo: LineInfo): void | Promise<void>;

  /** Called for every matching node, depth-first, pre-order */
  readonly nodeVisitors?: NodeVisitorMap;

  /**
   * Once per file with all of its diagnostics, when error reporting is on.
   * Filtering is up to the visitor.
   */
  reportErrors?(result: FileUnitResult): void | Promise<void>;

  /** Once per root, after its files */
  postAnalysis?(root: AnalysisRoot): SurveyControl | void | Promise<SurveyControl | void>;

  /** Exactly once, after the last root */
  onRunFinished?(stats: RunStatistics): void | Promise<void>;
}

/**
 * Which hooks a visitor implements, detected once at registration
 */
export interface VisitorCapabilities {
  readonly preAnalysis: boolean;
  readonly fileContext: boolean;
  readonly nodeVisiting: boolean;
  readonly errorReporting: boolean;
  readonly postAnalysis: boolean;
  readonly runFinished: boolean;
}

export interface RegisteredVisitor {
  readonly visitor: SurveyVisitor;
  readonly name: string;
  readonly capabilities: VisitorCapabilities;
  /** Registration order */
  readonly order: number;
}
