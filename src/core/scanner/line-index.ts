/**
 * Offsets of line starts in a text, for offset -> line/column lookups.
 *
 * `\n`, `\r\n` and a lone `\r` each end a line, matching where line
 * comments stop.
 */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      const ch = text.charAt(i);
      if (ch === "\r" && text.charAt(i + 1) === "\n") {
        i++;
        this.starts.push(i + 1);
      } else if (ch === "\n" || ch === "\r") {
        this.starts.push(i + 1);
      }
    }
  }

  /**
   * 1-indexed line containing `offset`
   */
  lineOf(offset: number): number {
    let low = 0;
    let high = this.starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.starts[mid] ?? 0) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  }

  /**
   * 0-indexed column of `offset` within its line
   */
  columnOf(offset: number): number {
    return offset - (this.starts[this.lineOf(offset) - 1] ?? 0);
  }
}
