/**
 * Diagnostic Formatter - one line per finding
 *
 * Line format: `<path>:<line>:<column>: <SEVERITY> <message>`
 */

import * as path from 'node:path';

import { toPosix } from '../scanner/path-filter.js';

import type { DiagnosticRecord } from '../analysis/types.js';
import type { RunStatistics, StatsAggregator } from '../stats/stats-aggregator.js';

// ============================================================================
// Output Sink
// ============================================================================

export interface OutputSink {
  write(line: string): void;
  flush(): void | Promise<void>;
}

/**
 * Line-buffered sink over a writable stream (stdout by default)
 */
export function createStreamSink(
  stream: { write(chunk: string): unknown } = process.stdout
): OutputSink {
  let buffer: string[] = [];
  return {
    write(line: string): void {
      buffer.push(line);
      if (buffer.length >= 64) {
        stream.write(buffer.join('\n') + '\n');
        buffer = [];
      }
    },
    flush(): void {
      if (buffer.length === 0) {return;}
      stream.write(buffer.join('\n') + '\n');
      buffer = [];
    },
  };
}

/**
 * Sink that keeps lines in memory
 */
export class MemorySink implements OutputSink {
  readonly lines: string[] = [];
  flushes = 0;

  write(line: string): void {
    this.lines.push(line);
  }

  flush(): void {
    this.flushes++;
  }
}

// ============================================================================
// Formatter
// ============================================================================

export interface DiagnosticFormatterOptions {
  sink: OutputSink;
  /** Every written record is counted as a finding */
  stats?: StatsAggregator;
  /** Paths are printed relative to this directory when set */
  baseDir?: string;
}

export class DiagnosticFormatter {
  private readonly sink: OutputSink;
  private readonly stats: StatsAggregator | undefined;
  private readonly baseDir: string | undefined;

  constructor(options: DiagnosticFormatterOptions) {
    this.sink = options.sink;
    this.stats = options.stats;
    this.baseDir = options.baseDir;
  }

  /**
   * Write records in the given order. Returns the number written.
   */
  formatErrors(records: readonly DiagnosticRecord[]): number {
    for (const record of records) {
      this.sink.write(this.formatRecord(record));
    }
    if (records.length > 0) {
      this.stats?.recordFindings(records.length);
    }
    return records.length;
  }

  formatRecord(record: DiagnosticRecord): string {
    return `${this.displayPath(record.filePath)}:${record.line}:${record.column}: ${record.severity} ${record.message}`;
  }

  /**
   * Write a free-form line; not counted as a finding
   */
  writeLine(line: string): void {
    this.sink.write(line);
  }

  async flush(): Promise<void> {
    await this.sink.flush();
  }

  /**
   * Path as printed: relative to baseDir when set, forward slashes
   */
  displayPath(filePath: string): string {
    if (this.baseDir === undefined) {
      return toPosix(filePath);
    }
    const relative = path.relative(this.baseDir, filePath);
    return toPosix(relative === '' ? filePath : relative);
  }
}

// ============================================================================
// Summary
// ============================================================================

export function formatElapsed(ms: number): string {
  return ms < 1000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/**
 * End-of-run summary lines
 */
export function formatSummary(stats: RunStatistics): string[] {
  const lines = [
    `Roots processed: ${stats.rootsProcessed}`,
    `Roots skipped: ${stats.rootsSkipped}`,
    `Files analyzed: ${stats.filesAnalyzed}`,
  ];
  if (stats.fileFailures > 0) {
    lines.push(`File failures: ${stats.fileFailures}`);
  }
  lines.push(`Findings: ${stats.findingsReported}`);
  lines.push(`Elapsed: ${formatElapsed(stats.elapsedMs)}`);
  return lines;
}
