/**
 * Stats Aggregator - per-run counters
 *
 * The only writer of RunStatistics. Reporting reads a frozen snapshot.
 */

export interface RunStatistics {
  readonly rootsDiscovered: number;
  readonly rootsProcessed: number;
  readonly rootsSkipped: number;
  readonly filesAnalyzed: number;
  readonly fileFailures: number;
  readonly findingsReported: number;
  readonly elapsedMs: number;
}

export class StatsAggregator {
  private rootsDiscovered = 0;
  private rootsProcessed = 0;
  private rootsSkipped = 0;
  private filesAnalyzed = 0;
  private fileFailures = 0;
  private findingsReported = 0;
  private startedAt: number | null = null;
  private finishedAt: number | null = null;

  constructor(private readonly now: () => number = () => performance.now()) {}

  start(): void {
    this.startedAt = this.now();
    this.finishedAt = null;
  }

  finish(): void {
    this.finishedAt = this.now();
  }

  recordDiscovered(count: number): void {
    this.rootsDiscovered += count;
  }

  recordRootProcessed(): void {
    this.rootsProcessed++;
  }

  recordRootsSkipped(count = 1): void {
    this.rootsSkipped += count;
  }

  recordFileAnalyzed(): void {
    this.filesAnalyzed++;
  }

  recordFileFailure(): void {
    this.fileFailures++;
  }

  recordFindings(count = 1): void {
    this.findingsReported += count;
  }

  snapshot(): RunStatistics {
    const end = this.finishedAt ?? this.now();
    return Object.freeze({
      rootsDiscovered: this.rootsDiscovered,
      rootsProcessed: this.rootsProcessed,
      rootsSkipped: this.rootsSkipped,
      filesAnalyzed: this.filesAnalyzed,
      fileFailures: this.fileFailures,
      findingsReported: this.findingsReported,
      elapsedMs: this.startedAt === null ? 0 : Math.max(0, end - this.startedAt),
    });
  }
}
