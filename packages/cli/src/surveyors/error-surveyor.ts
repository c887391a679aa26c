/**
 * Error Surveyor - prints the diagnostics of every analyzed file
 */

import { SEVERITIES, qualifiedName } from 'surveyor-core';

import type {
  AnalysisRoot,
  DiagnosticFormatter,
  FileUnitResult,
  PreAnalysisInfo,
  RunStatistics,
  Severity,
  SurveyVisitor,
} from 'surveyor-core';

export const DEFAULT_REPORTED_SEVERITIES: readonly Severity[] = ['ERROR', 'WARNING'];

const SEVERITY_LABELS: Record<Severity, readonly [singular: string, plural: string]> = {
  ERROR: ['error', 'errors'],
  WARNING: ['warning', 'warnings'],
  INFO: ['info message', 'info messages'],
  HINT: ['hint', 'hints'],
};

export type SeverityCounts = Record<Severity, number>;

export interface ErrorSurveyorOptions {
  formatter: DiagnosticFormatter;
  /** Severities to print (default: ERROR and WARNING) */
  severities?: readonly Severity[];
}

/**
 * Announce line printed before each root
 */
export function formatRootBanner(root: AnalysisRoot, info: PreAnalysisInfo): string {
  return `Analyzing '${qualifiedName(root)}' • [${info.position}/${info.total}]...`;
}

/**
 * `1 error and 2 warnings found.`; severities with no findings are left out
 */
export function formatSeverityTally(counts: SeverityCounts): string {
  const parts = SEVERITIES.filter((severity) => counts[severity] > 0).map((severity) => {
    const [singular, plural] = SEVERITY_LABELS[severity];
    return `${counts[severity]} ${counts[severity] === 1 ? singular : plural}`;
  });

  const last = parts.pop();
  if (last === undefined) {
    return 'No issues found.';
  }
  return parts.length > 0 ? `${parts.join(', ')} and ${last} found.` : `${last} found.`;
}

export class ErrorSurveyor implements SurveyVisitor {
  readonly name = 'errors';
  readonly counts: SeverityCounts = { ERROR: 0, WARNING: 0, INFO: 0, HINT: 0 };

  private readonly formatter: DiagnosticFormatter;
  private readonly severities: ReadonlySet<Severity>;

  constructor(options: ErrorSurveyorOptions) {
    this.formatter = options.formatter;
    this.severities = new Set(options.severities ?? DEFAULT_REPORTED_SEVERITIES);
  }

  preAnalysis(root: AnalysisRoot, info: PreAnalysisInfo): void {
    this.formatter.writeLine(formatRootBanner(root, info));
  }

  async reportErrors(result: FileUnitResult): Promise<void> {
    const reported = result.diagnostics.filter((record) => this.severities.has(record.severity));
    for (const record of reported) {
      this.counts[record.severity]++;
    }
    this.formatter.formatErrors(reported);
    await this.formatter.flush();
  }

  async onRunFinished(_stats: RunStatistics): Promise<void> {
    this.formatter.writeLine(formatSeverityTally(this.counts));
    await this.formatter.flush();
  }
}
