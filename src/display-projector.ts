import type TextBuffer from "./text-buffer.js";
import type { TextMetrics } from "./text-metrics.js";

import { toCodePoints } from "./text-buffer.js";

/**
 * Derives what is drawn from what is stored. With a password character set
 * every code point is replaced by it, so the displayed text always has the
 * same length as the real one and indices carry over unchanged.
 */
export default class DisplayProjector {
  private passwordChar = "";

  constructor(
    private readonly metrics: TextMetrics,
    passwordChar = "",
  ) {
    this.setPasswordCharacter(passwordChar);
  }

  getPasswordCharacter(): string {
    return this.passwordChar;
  }

  /** Only the first code point of `ch` is used; "" turns masking off. */
  setPasswordCharacter(ch: string): void {
    this.passwordChar = toCodePoints(ch)[0] ?? "";
  }

  isMasked(): boolean {
    return this.passwordChar !== "";
  }

  /** Displayed code points for `text`. */
  project(text: TextBuffer): Array<string> {
    const cps = text.codePoints();
    if (!this.isMasked()) {
      return cps.slice();
    }
    return cps.map(() => this.passwordChar);
  }

  /**
   * Rendered width of the projection of `text`, summed per code point so it
   * agrees with {@link boundaryOffsets}.
   */
  textWidth(text: TextBuffer): number {
    let x = 0;
    for (const cp of this.project(text)) {
      x += this.metrics.width(cp);
    }
    return x;
  }

  /**
   * Cumulative advance widths: entry `i` is the x position of the boundary
   * before code point `i`, so the array has `length + 1` entries and starts
   * at 0.
   */
  boundaryOffsets(displayed: ReadonlyArray<string>): Array<number> {
    const offsets = [0];
    let x = 0;
    for (const cp of displayed) {
      x += this.metrics.width(cp);
      offsets.push(x);
    }
    return offsets;
  }
}
