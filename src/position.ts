/**
 * Source positions and the position table.
 *
 * A Position is a pair of absolute offsets into the concatenated model
 * text. The table maps those offsets back to a line in a named document
 * part (a template, the global declarations, a query) so diagnostics can
 * be reported where the user wrote them.
 */

export interface Position {
  start: number;
  end: number;
}

export const UNKNOWN_POSITION: Position = Object.freeze({ start: 0, end: 0 });

export function pos(start: number, end: number = start): Position {
  return { start, end };
}

/** One entry of the position table. */
export interface LineInfo {
  /** Absolute position where this line starts. */
  position: number;
  /** Offset of the line inside its document part. */
  offset: number;
  line: number;
  path: string;
}

export class Positions {
  private elements: LineInfo[] = [];

  /**
   * Register the start of a line. Entries may arrive out of order; the
   * table stays sorted by position.
   */
  add(position: number, offset: number, line: number, path: string): void {
    const entry: LineInfo = { position, offset, line, path };
    const last = this.elements[this.elements.length - 1];
    if (!last || last.position <= position) {
      this.elements.push(entry);
      return;
    }
    const idx = this.upperBound(position);
    this.elements.splice(idx, 0, entry);
  }

  /** Last entry at or before `position`, or undefined before the first one. */
  find(position: number): LineInfo | undefined {
    const idx = this.upperBound(position);
    return idx > 0 ? this.elements[idx - 1] : undefined;
  }

  get size(): number {
    return this.elements.length;
  }

  entries(): readonly LineInfo[] {
    return this.elements;
  }

  clone(): Positions {
    const copy = new Positions();
    copy.elements = this.elements.map(e => ({ ...e }));
    return copy;
  }

  // First index whose position is strictly greater than `position`.
  private upperBound(position: number): number {
    let lo = 0;
    let hi = this.elements.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.elements[mid].position <= position) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
