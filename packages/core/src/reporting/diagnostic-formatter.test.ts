import { describe, it, expect } from 'vitest';

import { LineInfo } from '../analysis/line-info.js';
import { StatsAggregator } from '../stats/stats-aggregator.js';
import {
  DiagnosticFormatter,
  MemorySink,
  createStreamSink,
  formatElapsed,
  formatSummary,
} from './diagnostic-formatter.js';

import type { DiagnosticRecord } from '../analysis/types.js';

function createRecord(overrides: Partial<DiagnosticRecord> = {}): DiagnosticRecord {
  return {
    filePath: 'lib/a.ts',
    offset: 0,
    length: 1,
    line: 10,
    column: 4,
    severity: 'ERROR',
    category: 'semantic',
    code: 6133,
    message: 'unused import',
    lineInfo: LineInfo.fromText(''),
    ...overrides,
  };
}

describe('DiagnosticFormatter', () => {
  it('renders path:line:column: SEVERITY message', () => {
    const sink = new MemorySink();
    const formatter = new DiagnosticFormatter({ sink });

    formatter.formatErrors([createRecord()]);

    expect(sink.lines).toEqual(['lib/a.ts:10:4: ERROR unused import']);
  });

  it('prints paths relative to baseDir', () => {
    const sink = new MemorySink();
    const formatter = new DiagnosticFormatter({ sink, baseDir: '/work/projects' });

    formatter.formatErrors([
      createRecord({ filePath: '/work/projects/app/src/x.ts', line: 2, column: 1, severity: 'WARNING', message: 'odd' }),
    ]);

    expect(sink.lines).toEqual(['app/src/x.ts:2:1: WARNING odd']);
  });

  it('counts each printed record as a finding', () => {
    const stats = new StatsAggregator(() => 0);
    const formatter = new DiagnosticFormatter({ sink: new MemorySink(), stats });

    expect(formatter.formatErrors([createRecord(), createRecord({ line: 11 })])).toBe(2);
    formatter.formatErrors([]);
    formatter.writeLine('not a finding');

    expect(stats.snapshot().findingsReported).toBe(2);
  });

  it('keeps record order', () => {
    const sink = new MemorySink();
    const formatter = new DiagnosticFormatter({ sink });

    formatter.formatErrors([createRecord({ line: 3 }), createRecord({ line: 1 })]);

    expect(sink.lines).toEqual(['lib/a.ts:3:4: ERROR unused import', 'lib/a.ts:1:4: ERROR unused import']);
  });

  it('flushes the sink', async () => {
    const sink = new MemorySink();
    await new DiagnosticFormatter({ sink }).flush();
    expect(sink.flushes).toBe(1);
  });
});

describe('createStreamSink', () => {
  it('buffers lines until flushed', () => {
    const chunks: string[] = [];
    const sink = createStreamSink({ write: (chunk: string) => chunks.push(chunk) });

    sink.write('one');
    sink.write('two');
    expect(chunks).toEqual([]);

    sink.flush();
    sink.flush();
    expect(chunks).toEqual(['one\ntwo\n']);
  });
});

describe('formatSummary', () => {
  it('always prints the root and finding counts', () => {
    const lines = formatSummary({
      rootsDiscovered: 0,
      rootsProcessed: 0,
      rootsSkipped: 0,
      filesAnalyzed: 0,
      fileFailures: 0,
      findingsReported: 0,
      elapsedMs: 12.4,
    });

    expect(lines).toEqual([
      'Roots processed: 0',
      'Roots skipped: 0',
      'Files analyzed: 0',
      'Findings: 0',
      'Elapsed: 12ms',
    ]);
  });

  it('adds file failures when there were any', () => {
    const lines = formatSummary({
      rootsDiscovered: 5,
      rootsProcessed: 2,
      rootsSkipped: 3,
      filesAnalyzed: 9,
      fileFailures: 1,
      findingsReported: 4,
      elapsedMs: 1500,
    });

    expect(lines).toEqual([
      'Roots processed: 2',
      'Roots skipped: 3',
      'Files analyzed: 9',
      'File failures: 1',
      'Findings: 4',
      'Elapsed: 1.5s',
    ]);
  });
});

describe('formatElapsed', () => {
  it('switches to seconds at one second', () => {
    expect(formatElapsed(999)).toBe('999ms');
    expect(formatElapsed(1000)).toBe('1.0s');
  });
});
