import { describe, it, expect } from 'vitest';

import { LineInfo } from './line-info.js';

describe('LineInfo', () => {
  // lines: "ab" | "cd" (\r\n) | "ef" (\r) | "g"
  const info = LineInfo.fromText('ab\ncd\r\nef\rg');

  it('records the start of every line', () => {
    expect(info.lineStarts).toEqual([0, 3, 7, 10]);
    expect(info.lineCount).toBe(4);
  });

  it('maps offsets to 1-based locations', () => {
    expect(info.getLocation(0)).toEqual({ line: 1, column: 1 });
    expect(info.getLocation(2)).toEqual({ line: 1, column: 3 });
    expect(info.getLocation(4)).toEqual({ line: 2, column: 2 });
    expect(info.getLocation(7)).toEqual({ line: 3, column: 1 });
    expect(info.getLocation(10)).toEqual({ line: 4, column: 1 });
  });

  it('clamps offsets outside the text', () => {
    expect(info.getLocation(-5)).toEqual({ line: 1, column: 1 });
    expect(info.getLocation(100)).toEqual({ line: 4, column: 2 });
  });

  it('maps locations back to offsets', () => {
    expect(info.getOffset(2, 2)).toBe(4);
    expect(info.getOffset(4, 1)).toBe(10);
    expect(info.getOffset(9, 1)).toBe(10);
  });

  it('handles empty text', () => {
    const empty = LineInfo.fromText('');
    expect(empty.lineCount).toBe(1);
    expect(empty.getLocation(0)).toEqual({ line: 1, column: 1 });
  });
});
