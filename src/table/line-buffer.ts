// ═══════════════════════════════════════════════════════════════════════════════
// LINE BUFFER — Rendered Rows with Bookmark and Search Metadata
// ═══════════════════════════════════════════════════════════════════════════════

import type { SearchMatcher } from './search.js';
import type { Line, LineInfo } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// LINE BUFFER
// ─────────────────────────────────────────────────────────────────────────────────

export class LineBuffer {
  private readonly rows: readonly string[];
  private readonly infos = new Map<number, LineInfo>();

  constructor(rows: readonly string[]) {
    this.rows = rows;
  }

  /**
   * Split rendered output into lines. A final newline does not open an
   * extra empty line.
   */
  static fromText(text: string): LineBuffer {
    const rows = text.split(/\r?\n/);
    if (rows.length > 0 && rows[rows.length - 1] === '') {
      rows.pop();
    }
    return new LineBuffer(rows);
  }

  get length(): number {
    return this.rows.length;
  }

  lines(): readonly string[] {
    return this.rows;
  }

  getLine(rowNumber: number): Line | null {
    const text = this.rows[rowNumber];
    if (text === undefined) return null;
    return { text, rowNumber, info: this.infos.get(rowNumber) ?? null };
  }

  getInfo(rowNumber: number): LineInfo | null {
    return this.infos.get(rowNumber) ?? null;
  }

  setBookmark(rowNumber: number, bookmark: boolean): void {
    this.ensureInfo(rowNumber).bookmark = bookmark;
  }

  toggleBookmark(rowNumber: number): boolean {
    const info = this.ensureInfo(rowNumber);
    info.bookmark = !info.bookmark;
    return info.bookmark;
  }

  cursor(startRow: number = 0): LineCursor {
    return new LineCursor(this, startRow);
  }

  /** @internal */
  ensureInfo(rowNumber: number): LineInfo {
    if (rowNumber < 0 || rowNumber >= this.rows.length) {
      throw new RangeError(`Line ${rowNumber} is outside the buffer (0..${this.rows.length - 1})`);
    }
    let info = this.infos.get(rowNumber);
    if (!info) {
      info = { bookmark: false };
      this.infos.set(rowNumber, info);
    }
    return info;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SEQUENTIAL ACCESS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Position of one line, handed out by LineCursor.setMarkNext().
 */
export class LineMark {
  constructor(
    private readonly buffer: LineBuffer,
    readonly rowNumber: number
  ) {}

  getLine(): Line {
    const line = this.buffer.getLine(this.rowNumber);
    if (!line) {
      throw new RangeError(`Mark points past the end of the buffer (${this.rowNumber})`);
    }
    return line;
  }

  /**
   * Run the search over this line, store the outcome in the line's metadata
   * and return it.
   */
  refreshInfo(matcher: SearchMatcher): LineInfo {
    const info = this.buffer.ensureInfo(this.rowNumber);
    info.foundStr = matcher.matches(this.getLine().text);
    return info;
  }
}

export class LineCursor {
  private position: number;

  constructor(
    private readonly buffer: LineBuffer,
    startRow: number
  ) {
    this.position = Math.max(0, startRow);
  }

  /**
   * Mark the current line and step to the next one; null once the buffer is
   * exhausted.
   */
  setMarkNext(): LineMark | null {
    if (this.position >= this.buffer.length) {
      return null;
    }
    const mark = new LineMark(this.buffer, this.position);
    this.position += 1;
    return mark;
  }
}
