/**
 * Screen Buffer
 *
 * A fixed-size grid of single-column cells that widgets draw into. The
 * terminal adapter turns the finished buffer into screen output.
 *
 * A double-width glyph occupies its own cell plus a continuation cell to its
 * right, which holds the empty string so that rows join back to their
 * column width.
 */

import stringWidth from "string-width";

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function rect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width, height };
}

/** Placeholder for the right half of a double-width glyph */
export const CONTINUATION = "";

const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * Number of terminal columns a string occupies.
 */
export function displayWidth(text: string): number {
  return stringWidth(text);
}

export class Buffer {
  readonly area: Rect;
  private readonly cells: string[][];

  constructor(width: number, height: number) {
    this.area = rect(0, 0, Math.max(0, width), Math.max(0, height));
    this.cells = Array.from({ length: this.area.height }, () =>
      Array.from({ length: this.area.width }, () => " ")
    );
  }

  get width(): number {
    return this.area.width;
  }

  get height(): number {
    return this.area.height;
  }

  /**
   * Sets one cell. Writes outside the buffer are dropped.
   */
  setCell(x: number, y: number, symbol: string): void {
    if (y < 0 || y >= this.height || x < 0 || x >= this.width) {
      return;
    }
    const row = this.cells[y];
    // Overwriting either half of a wide glyph blanks the other half
    if (row[x] === CONTINUATION && x > 0) {
      row[x - 1] = " ";
    }
    if (row[x + 1] === CONTINUATION) {
      row[x + 1] = " ";
    }
    row[x] = symbol;
  }

  getCell(x: number, y: number): string | undefined {
    return this.cells[y]?.[x];
  }

  /**
   * Writes `text` left to right from (x, y), at most `maxWidth` columns.
   * A glyph that would not fit whole is left out, as is everything after it.
   * Returns the number of columns written.
   */
  setString(x: number, y: number, text: string, maxWidth: number = Number.POSITIVE_INFINITY): number {
    const limit = Math.min(maxWidth, this.width - x);
    let written = 0;
    for (const { segment } of graphemes.segment(text)) {
      const width = stringWidth(segment);
      if (width === 0) {
        continue;
      }
      if (written + width > limit) {
        break;
      }
      this.setCell(x + written, y, segment);
      if (width > 1) {
        this.setContinuation(x + written + 1, y);
      }
      written += width;
    }
    return written;
  }

  private setContinuation(x: number, y: number): void {
    if (y < 0 || y >= this.height || x < 0 || x >= this.width) {
      return;
    }
    const row = this.cells[y];
    if (row[x + 1] === CONTINUATION) {
      row[x + 1] = " ";
    }
    row[x] = CONTINUATION;
  }

  /**
   * The buffer contents, one string per row.
   */
  lines(): string[] {
    return this.cells.map((row) => row.join(""));
  }

  toString(): string {
    return this.lines().join("\n");
  }
}
