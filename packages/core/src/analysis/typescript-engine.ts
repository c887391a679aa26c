/**
 * TypeScript Engine - analysis engine backed by the TypeScript compiler API
 *
 * Syntax-only mode builds a program with noResolve/noLib and reports
 * syntactic diagnostics. Resolved mode reads the root's tsconfig.json (when
 * there is one), exposes the type checker and adds semantic diagnostics.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import ts from 'typescript';

import { FileAnalysisError, RootOpenError, toError } from '../errors.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { FileWalker } from '../scanner/file-walker.js';
import { createPathFilter, toPosix } from '../scanner/path-filter.js';
import { LineInfo } from './line-info.js';

import type { AnalysisRoot } from '../discovery/types.js';
import type {
  AnalysisContextHandle,
  AnalysisEngine,
  DiagnosticCategory,
  DiagnosticRecord,
  EngineConfiguration,
  FileResult,
  Severity,
  SourceUnit,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface TypeScriptEngineOptions {
  logger?: Logger;
  /** File reader, replaceable in tests (default: fs.readFile as utf-8) */
  readFile?: (filePath: string) => Promise<string>;
}

export interface TypeScriptContextHandle extends AnalysisContextHandle {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker | null;
  /** Files that could not be read, keyed by forward-slash absolute path */
  readonly readFailures: Map<string, Error>;
  /** Source text per forward-slash absolute path; emptied on close */
  readonly sources: Map<string, string>;
}

// ============================================================================
// Compiler Options
// ============================================================================

const SYNTAX_ONLY_OPTIONS: ts.CompilerOptions = {
  noResolve: true,
  noLib: true,
  allowJs: true,
  noEmit: true,
  types: [],
  target: ts.ScriptTarget.ESNext,
  jsx: ts.JsxEmit.Preserve,
};

const DEFAULT_RESOLVED_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  allowJs: true,
  noEmit: true,
  skipLibCheck: true,
  esModuleInterop: true,
  jsx: ts.JsxEmit.Preserve,
};

const TSCONFIG_FILE = 'tsconfig.json';

/**
 * Map a compiler diagnostic category onto a report severity
 */
export function toSeverity(category: ts.DiagnosticCategory): Severity {
  switch (category) {
    case ts.DiagnosticCategory.Error:
      return 'ERROR';
    case ts.DiagnosticCategory.Warning:
      return 'WARNING';
    case ts.DiagnosticCategory.Suggestion:
      return 'HINT';
    case ts.DiagnosticCategory.Message:
    default:
      return 'INFO';
  }
}

function getScriptKind(fileName: string): ts.ScriptKind {
  const ext = fileName.toLowerCase().split('.').pop();
  switch (ext) {
    case 'tsx':
      return ts.ScriptKind.TSX;
    case 'jsx':
      return ts.ScriptKind.JSX;
    case 'js':
    case 'mjs':
    case 'cjs':
      return ts.ScriptKind.JS;
    case 'ts':
    case 'mts':
    case 'cts':
    default:
      return ts.ScriptKind.TS;
  }
}

// ============================================================================
// TypeScript Engine
// ============================================================================

export class TypeScriptEngine implements AnalysisEngine<TypeScriptContextHandle> {
  private readonly logger: Logger;
  private readonly readFile: (filePath: string) => Promise<string>;

  constructor(options: TypeScriptEngineOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.readFile = options.readFile ?? ((filePath) => fs.readFile(filePath, 'utf-8'));
  }

  async open(root: AnalysisRoot, config: EngineConfiguration): Promise<TypeScriptContextHandle> {
    const walker = new FileWalker({
      extensions: config.extensions,
      ignoredDirectories: config.ignoredDirectories,
      isExcluded: createPathFilter(config.excludedPaths),
      skipDirectories: root.nestedRoots,
    });

    let files: string[];
    try {
      files = await walker.walk(root.path);
    } catch (error) {
      const cause = toError(error);
      throw new RootOpenError(`Cannot list files of ${root.path}: ${cause.message}`, root.path, cause);
    }

    const sources = new Map<string, string>();
    const readFailures = new Map<string, Error>();
    for (const rel of files) {
      const key = toPosix(path.join(root.path, rel));
      try {
        sources.set(key, await this.readFile(key));
      } catch (error) {
        readFailures.set(key, toError(error));
      }
    }

    const options = config.resolveUnits
      ? await this.loadCompilerOptions(root)
      : SYNTAX_ONLY_OPTIONS;

    let program: ts.Program;
    try {
      program = ts.createProgram({
        rootNames: [...sources.keys()],
        options,
        host: this.createHost(options, sources),
      });
    } catch (error) {
      const cause = toError(error);
      throw new RootOpenError(`Cannot create program for ${root.path}: ${cause.message}`, root.path, cause);
    }

    this.logger.debug(
      `Opened ${root.path}: ${files.length} files (${config.resolveUnits ? 'resolved' : 'syntax only'})`
    );

    return {
      root,
      files,
      resolved: config.resolveUnits,
      program,
      checker: config.resolveUnits ? program.getTypeChecker() : null,
      readFailures,
      sources,
    };
  }

  async *iterateFiles(handle: TypeScriptContextHandle): AsyncGenerator<FileResult> {
    for (const relativePath of handle.files) {
      yield this.analyzeFile(handle, relativePath);
    }
  }

  async close(handle: TypeScriptContextHandle): Promise<void> {
    handle.sources.clear();
    handle.readFailures.clear();
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private analyzeFile(handle: TypeScriptContextHandle, relativePath: string): FileResult {
    const filePath = toPosix(path.join(handle.root.path, relativePath));

    const readFailure = handle.readFailures.get(filePath);
    if (readFailure) {
      return {
        kind: 'failure',
        path: filePath,
        relativePath,
        error: new FileAnalysisError(`Cannot read ${filePath}: ${readFailure.message}`, filePath, readFailure),
      };
    }

    try {
      const sourceFile = handle.program.getSourceFile(filePath);
      if (!sourceFile) {
        throw new Error('file is not part of the program');
      }

      const lineInfo = new LineInfo(sourceFile.getLineStarts(), sourceFile.text.length);
      const unit: SourceUnit = { sourceFile, program: handle.program, checker: handle.checker };

      return {
        kind: 'unit',
        path: filePath,
        relativePath,
        unit,
        lineInfo,
        diagnostics: this.collectDiagnostics(handle, sourceFile, lineInfo),
      };
    } catch (error) {
      const cause = toError(error);
      return {
        kind: 'failure',
        path: filePath,
        relativePath,
        error: new FileAnalysisError(`Cannot analyze ${filePath}: ${cause.message}`, filePath, cause),
      };
    }
  }

  private collectDiagnostics(
    handle: TypeScriptContextHandle,
    sourceFile: ts.SourceFile,
    lineInfo: LineInfo
  ): DiagnosticRecord[] {
    const toRecord = (diagnostic: ts.Diagnostic, category: DiagnosticCategory): DiagnosticRecord => {
      const offset = diagnostic.start ?? 0;
      const { line, column } = lineInfo.getLocation(offset);
      return Object.freeze({
        filePath: sourceFile.fileName,
        offset,
        length: diagnostic.length ?? 0,
        line,
        column,
        severity: toSeverity(diagnostic.category),
        category,
        code: diagnostic.code,
        message: ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n'),
        lineInfo,
      });
    };

    const records = handle.program
      .getSyntacticDiagnostics(sourceFile)
      .map((d) => toRecord(d, 'syntax'));

    if (handle.resolved) {
      for (const diagnostic of handle.program.getSemanticDiagnostics(sourceFile)) {
        records.push(toRecord(diagnostic, 'semantic'));
      }
    }

    return records.sort((a, b) => a.offset - b.offset);
  }

  /**
   * Compiler options for resolved mode: the root's tsconfig.json when
   * present, otherwise defaults. A broken tsconfig falls back to defaults.
   */
  private async loadCompilerOptions(root: AnalysisRoot): Promise<ts.CompilerOptions> {
    const configPath = path.join(root.path, TSCONFIG_FILE);

    let text: string;
    try {
      text = await fs.readFile(configPath, 'utf-8');
    } catch {
      return DEFAULT_RESOLVED_OPTIONS;
    }

    const parsedJson = ts.parseConfigFileTextToJson(configPath, text);
    if (parsedJson.error) {
      this.logger.warn(
        `Ignoring ${configPath}: ${ts.flattenDiagnosticMessageText(parsedJson.error.messageText, '\n')}`
      );
      return DEFAULT_RESOLVED_OPTIONS;
    }

    const parsed = ts.parseJsonConfigFileContent(parsedJson.config, ts.sys, root.path);
    return { ...parsed.options, allowJs: true, noEmit: true };
  }

  private createHost(options: ts.CompilerOptions, sources: Map<string, string>): ts.CompilerHost {
    const host = ts.createCompilerHost(options, true);
    const fallbackGetSourceFile = host.getSourceFile.bind(host);
    const fallbackFileExists = host.fileExists.bind(host);
    const fallbackReadFile = host.readFile.bind(host);

    host.getSourceFile = (fileName, languageVersion, onError, shouldCreate) => {
      const text = sources.get(toPosix(fileName));
      if (text !== undefined) {
        return ts.createSourceFile(fileName, text, languageVersion, true, getScriptKind(fileName));
      }
      return fallbackGetSourceFile(fileName, languageVersion, onError, shouldCreate);
    };
    host.fileExists = (fileName) => sources.has(toPosix(fileName)) || fallbackFileExists(fileName);
    host.readFile = (fileName) => sources.get(toPosix(fileName)) ?? fallbackReadFile(fileName);

    return host;
  }
}
