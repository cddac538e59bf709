/*
 * -------------------------------------------------------------------------
 *  Unicode‑aware helpers (work at the code‑point level rather than UTF‑16
 *  code units so that surrogate‑pair emoji count as one position.)
 * ---------------------------------------------------------------------- */

export function toCodePoints(str: string): Array<string> {
  // [...str] or Array.from both iterate by UTF‑32 code point, handling
  // surrogate pairs correctly.
  return Array.from(str);
}

export function cpLen(str: string): number {
  return toCodePoints(str).length;
}

export function cpSlice(str: string, start: number, end?: number): string {
  // Slice by code‑point indices and re‑join.
  return toCodePoints(str).slice(start, end).join("");
}

export function isWhitespace(ch: string | undefined): boolean {
  if (ch === undefined) {
    return false;
  }
  return /\s/u.test(ch);
}

function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}

/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Immutable sequence of code points. Every editing operation returns a new
 * buffer, which the session validates before it replaces its own; the
 * receiver is never modified.
 */
export default class TextBuffer {
  private readonly cps: ReadonlyArray<string>;

  constructor(text: string | ReadonlyArray<string> = "") {
    this.cps = typeof text === "string" ? toCodePoints(text) : text.slice();
  }

  /* =======================================================================
   *  Read‑only accessors
   * ===================================================================== */
  length(): number {
    return this.cps.length;
  }

  isEmpty(): boolean {
    return this.cps.length === 0;
  }

  toString(): string {
    return this.cps.join("");
  }

  /** Code point at `index`, or undefined outside `[0, length)`. */
  at(index: number): string | undefined {
    return index >= 0 ? this.cps[index] : undefined;
  }

  codePoints(): ReadonlyArray<string> {
    return this.cps;
  }

  /** Text of the half‑open range `[low, high)`; bounds are clamped. */
  substring(low: number, high: number = this.cps.length): string {
    const len = this.cps.length;
    return this.cps.slice(clamp(low, 0, len), clamp(high, 0, len)).join("");
  }

  equals(other: TextBuffer): boolean {
    if (other.cps.length !== this.cps.length) {
      return false;
    }
    return this.cps.every((cp, i) => cp === other.cps[i]);
  }

  /* =======================================================================
   *  Candidate construction
   * ===================================================================== */

  /** Insert a code point or a run of them before position `index`. */
  insertAt(index: number, run: string | ReadonlyArray<string>): TextBuffer {
    const inserted = typeof run === "string" ? toCodePoints(run) : run;
    if (inserted.length === 0) {
      return this;
    }
    const at = clamp(index, 0, this.cps.length);
    return new TextBuffer([
      ...this.cps.slice(0, at),
      ...inserted,
      ...this.cps.slice(at),
    ]);
  }

  /** Remove `[low, high)`. The bounds may be given in either order. */
  deleteRange(low: number, high: number): TextBuffer {
    const len = this.cps.length;
    const from = clamp(Math.min(low, high), 0, len);
    const to = clamp(Math.max(low, high), 0, len);
    if (from === to) {
      return this;
    }
    return new TextBuffer([...this.cps.slice(0, from), ...this.cps.slice(to)]);
  }

  /** Keep only the first `count` code points. */
  truncate(count: number): TextBuffer {
    if (count >= this.cps.length) {
      return this;
    }
    return new TextBuffer(this.cps.slice(0, Math.max(0, count)));
  }

  /* =======================================================================
   *  Word boundaries
   * ===================================================================== */

  /**
   * Start of the word left of `index`: skip the whitespace immediately to the
   * left, then the run of non‑whitespace before it.
   */
  wordBegin(index: number): number {
    let i = clamp(index, 0, this.cps.length);
    while (i > 0 && isWhitespace(this.cps[i - 1])) {
      i--;
    }
    while (i > 0 && !isWhitespace(this.cps[i - 1])) {
      i--;
    }
    return i;
  }

  /**
   * End of the word right of `index`: skip the whitespace immediately to the
   * right, then the run of non‑whitespace after it.
   */
  wordEnd(index: number): number {
    const len = this.cps.length;
    let i = clamp(index, 0, len);
    while (i < len && isWhitespace(this.cps[i])) {
      i++;
    }
    while (i < len && !isWhitespace(this.cps[i])) {
      i++;
    }
    return i;
  }
}
