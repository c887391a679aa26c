/**
 * Identifier Surveyor - finds identifiers spelled like contextual keywords
 *
 * Counts every identifier whose text is one of the watched names, split into
 * declarations (`const async = ...`, `import async from ...`) and references.
 */

import ts from 'typescript';

import { formatRootBanner } from './error-surveyor.js';

import type {
  AnalysisRoot,
  DiagnosticFormatter,
  LineInfo,
  NodeVisitContext,
  NodeVisitorMap,
  PreAnalysisInfo,
  RunStatistics,
  StatsAggregator,
  SurveyControl,
  SurveyVisitor,
} from 'surveyor-core';

export const DEFAULT_WATCHED_IDENTIFIERS: readonly string[] = ['async', 'await', 'yield'];

export interface IdentifierSurveyorOptions {
  formatter: DiagnosticFormatter;
  /** Identifier names to look for */
  ids?: readonly string[];
  /** Stop after the root in which this many occurrences have been seen */
  stopAfter?: number | null;
  /** Each occurrence is counted as a finding */
  stats?: StatsAggregator;
}

export interface Occurrences {
  declarations: number;
  references: number;
  /** Project names the identifier was seen in */
  projects: Set<string>;
}

/**
 * `left-pad-1.3.0` -> `left-pad`; names without a version suffix are kept
 */
export function projectName(rootName: string): string {
  const stripped = rootName.replace(/-v?\d+(\.\d+)*([-+][0-9A-Za-z.-]*)?$/, '');
  return stripped === '' ? rootName : stripped;
}

/**
 * Whether the identifier is the name being declared by its parent
 */
export function isDeclarationName(node: ts.Identifier): boolean {
  const parent = node.parent;
  if (
    ts.isVariableDeclaration(parent) ||
    ts.isParameter(parent) ||
    ts.isBindingElement(parent) ||
    ts.isFunctionLike(parent) ||
    ts.isClassLike(parent) ||
    ts.isInterfaceDeclaration(parent) ||
    ts.isTypeAliasDeclaration(parent) ||
    ts.isEnumDeclaration(parent) ||
    ts.isEnumMember(parent) ||
    ts.isPropertyDeclaration(parent) ||
    ts.isPropertySignature(parent) ||
    ts.isPropertyAssignment(parent) ||
    ts.isImportSpecifier(parent) ||
    ts.isImportClause(parent) ||
    ts.isNamespaceImport(parent) ||
    ts.isImportEqualsDeclaration(parent) ||
    ts.isTypeParameterDeclaration(parent) ||
    ts.isModuleDeclaration(parent)
  ) {
    return parent.name === node;
  }
  return false;
}

export class IdentifierSurveyor implements SurveyVisitor {
  readonly name = 'identifiers';
  readonly nodeVisitors: NodeVisitorMap;

  readonly occurrences = new Map<string, Occurrences>();
  readonly reports: string[] = [];
  /** Roots with at least one occurrence */
  private readonly rootsWithHits = new Set<string>();

  private readonly formatter: DiagnosticFormatter;
  private readonly stopAfter: number | null;
  private readonly stats: StatsAggregator | undefined;

  private currentRoot: AnalysisRoot | null = null;
  private filePath = '';
  private lineInfo: LineInfo | null = null;

  constructor(options: IdentifierSurveyorOptions) {
    this.formatter = options.formatter;
    this.stopAfter = options.stopAfter ?? null;
    this.stats = options.stats;

    for (const id of options.ids ?? DEFAULT_WATCHED_IDENTIFIERS) {
      this.occurrences.set(id, { declarations: 0, references: 0, projects: new Set() });
    }

    this.nodeVisitors = {
      [ts.SyntaxKind.Identifier]: (node, context) => this.visitIdentifier(node, context),
    };
  }

  get total(): number {
    return this.reports.length;
  }

  preAnalysis(root: AnalysisRoot, info: PreAnalysisInfo): void {
    this.currentRoot = root;
    this.formatter.writeLine(formatRootBanner(root, info));
  }

  /**
   * Lines written for the previous file are flushed before switching
   */
  async setFileContext(filePath: string, lineInfo: LineInfo): Promise<void> {
    await this.formatter.flush();
    this.filePath = filePath;
    this.lineInfo = lineInfo;
  }

  async postAnalysis(): Promise<SurveyControl> {
    await this.formatter.flush();
    return this.stopAfter !== null && this.total >= this.stopAfter ? 'stop' : 'continue';
  }

  async onRunFinished(_stats: RunStatistics): Promise<void> {
    this.formatter.writeLine(`Found ${this.total} occurrences in ${this.rootsWithHits.size} packages:`);
    for (const report of this.reports) {
      this.formatter.writeLine(report);
    }
    for (const [id, data] of this.occurrences) {
      this.formatter.writeLine(`${id}: [${data.declarations} decl, ${data.references} ref]`);
      for (const project of [...data.projects].sort()) {
        this.formatter.writeLine(`  ${project}`);
      }
    }
    await this.formatter.flush();
  }

  private visitIdentifier(node: ts.Node, context: NodeVisitContext): void {
    if (!ts.isIdentifier(node)) {return;}
    const data = this.occurrences.get(node.text);
    if (!data) {return;}

    const declaration = isDeclarationName(node);
    if (declaration) {
      data.declarations++;
    } else {
      data.references++;
    }

    const root = this.currentRoot ?? context.root;
    data.projects.add(projectName(root.name));
    this.rootsWithHits.add(root.path);

    const lineInfo = this.lineInfo ?? context.file.lineInfo;
    const location = lineInfo.getLocation(node.getStart(context.file.unit.sourceFile));
    const report = `${this.formatter.displayPath(this.filePath || context.file.path)}:${location.line}:${location.column}`;
    this.reports.push(report);
    this.stats?.recordFindings();

    this.formatter.writeLine(`found '${node.text}' ${declaration ? '(decl) ' : ''}• ${report}`);
  }
}
