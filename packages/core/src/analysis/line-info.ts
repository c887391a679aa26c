/**
 * Line Info - offset to line/column conversion for one file
 */

export interface SourceLocation {
  /** 1-based line number */
  line: number;
  /** 1-based column number */
  column: number;
}

export class LineInfo {
  /**
   * @param lineStarts - offset of the first character of every line, ascending, starting with 0
   * @param length - total text length
   */
  constructor(
    public readonly lineStarts: readonly number[],
    public readonly length: number
  ) {}

  /**
   * Build the table from source text. Handles \n, \r\n and lone \r.
   */
  static fromText(text: string): LineInfo {
    const starts = [0];
    for (let i = 0; i < text.length; i++) {
      const ch = text.charCodeAt(i);
      if (ch === 13 /* \r */) {
        if (text.charCodeAt(i + 1) === 10 /* \n */) {
          i++;
        }
        starts.push(i + 1);
      } else if (ch === 10 /* \n */) {
        starts.push(i + 1);
      }
    }
    return new LineInfo(starts, text.length);
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  /**
   * Location of an offset; offsets outside the text are clamped
   */
  getLocation(offset: number): SourceLocation {
    const clamped = Math.max(0, Math.min(offset, this.length));

    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= clamped) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return { line: low + 1, column: clamped - (this.lineStarts[low] ?? 0) + 1 };
  }

  /**
   * Offset of a 1-based line/column pair, clamped to the text
   */
  getOffset(line: number, column: number): number {
    const index = Math.max(0, Math.min(line - 1, this.lineStarts.length - 1));
    const start = this.lineStarts[index] ?? 0;
    return Math.max(0, Math.min(start + column - 1, this.length));
  }
}
