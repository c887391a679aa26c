/**
 * Analysis engine contract
 *
 * The driver only talks to an AnalysisEngine: open a handle for a root,
 * iterate its files once, close it.
 */

import type ts from 'typescript';

import type { RunConfiguration } from '../config/types.js';
import type { AnalysisRoot } from '../discovery/types.js';
import type { FileAnalysisError } from '../errors.js';
import type { LineInfo } from './line-info.js';

// ============================================================================
// Diagnostics
// ============================================================================

export type Severity = 'ERROR' | 'WARNING' | 'INFO' | 'HINT';

export const SEVERITIES: readonly Severity[] = ['ERROR', 'WARNING', 'INFO', 'HINT'];

export type DiagnosticCategory = 'syntax' | 'semantic';

/**
 * One finding reported by the analysis engine for a file
 */
export interface DiagnosticRecord {
  /** Path of the file the finding belongs to */
  readonly filePath: string;
  readonly offset: number;
  readonly length: number;
  /** 1-based */
  readonly line: number;
  /** 1-based */
  readonly column: number;
  readonly severity: Severity;
  readonly category: DiagnosticCategory;
  /** Engine-specific numeric code */
  readonly code: number;
  readonly message: string;
  readonly lineInfo: LineInfo;
}

// ============================================================================
// Units and File Results
// ============================================================================

/**
 * Syntax (and, when resolved, semantic) model of one file
 */
export interface SourceUnit {
  readonly sourceFile: ts.SourceFile;
  readonly program: ts.Program;
  /** Present only when units are resolved */
  readonly checker: ts.TypeChecker | null;
}

export interface FileUnitResult {
  readonly kind: 'unit';
  /** Absolute path */
  readonly path: string;
  /** Forward-slash path relative to the root */
  readonly relativePath: string;
  readonly unit: SourceUnit;
  readonly lineInfo: LineInfo;
  readonly diagnostics: readonly DiagnosticRecord[];
}

export interface FileFailureResult {
  readonly kind: 'failure';
  readonly path: string;
  readonly relativePath: string;
  readonly error: FileAnalysisError;
}

export type FileResult = FileUnitResult | FileFailureResult;

// ============================================================================
// Engine
// ============================================================================

/**
 * The part of the run configuration an engine needs
 */
export type EngineConfiguration = Pick<
  RunConfiguration,
  'resolveUnits' | 'excludedPaths' | 'extensions' | 'ignoredDirectories'
>;

/**
 * Handle bound to one analysis root
 */
export interface AnalysisContextHandle {
  readonly root: AnalysisRoot;
  /** Files in iteration order, relative to the root */
  readonly files: readonly string[];
  readonly resolved: boolean;
}

export interface AnalysisEngine<THandle extends AnalysisContextHandle = AnalysisContextHandle> {
  /**
   * Open a context for a root
   *
   * @throws RootOpenError when no context can be built
   */
  open(root: AnalysisRoot, config: EngineConfiguration): Promise<THandle>;

  /**
   * Lazy, single-use sequence of per-file results, in `handle.files` order.
   * A failing file yields a failure result; iteration continues.
   */
  iterateFiles(handle: THandle): AsyncIterable<FileResult>;

  /** Release the handle */
  close(handle: THandle): Promise<void>;
}
