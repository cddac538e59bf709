export interface SelectionRange {
  readonly low: number;
  readonly high: number;
}

// Anchors are whole code-point offsets; NaN and -0 land on 0.
function toIndex(v: number, length: number): number {
  const i = Math.trunc(v) || 0;
  return i < 0 ? 0 : i > length ? length : i;
}

/**
 * Two selection anchors into the text. `selStart` stays put while the user
 * extends a selection, `selEnd` follows the pointer or arrow keys, so the two
 * are not ordered. The caret always sits on `selEnd`, the end that moved last.
 */
export default class SelectionModel {
  private selStart = 0;
  private selEnd = 0;

  getStart(): number {
    return this.selStart;
  }

  getEnd(): number {
    return this.selEnd;
  }

  getCaret(): number {
    return this.selEnd;
  }

  /** The anchors in ascending order. */
  range(): SelectionRange {
    return {
      low: Math.min(this.selStart, this.selEnd),
      high: Math.max(this.selStart, this.selEnd),
    };
  }

  isEmpty(): boolean {
    return this.selStart === this.selEnd;
  }

  set(start: number, end: number): void {
    this.selStart = start;
    this.selEnd = end;
  }

  /** Round both anchors to whole offsets inside `[0, length]`. */
  clampTo(length: number): void {
    this.selStart = toIndex(this.selStart, length);
    this.selEnd = toIndex(this.selEnd, length);
  }

  equals(start: number, end: number): boolean {
    return this.selStart === start && this.selEnd === end;
  }
}
