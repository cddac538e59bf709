export type Alignment = "left" | "center" | "right";

export interface VisibleRange {
  /** First visible code point (the crop position). */
  readonly start: number;
  /** One past the last code point that still fits. */
  readonly end: number;
}

/**
 * Horizontal crop window over the displayed text. All methods take the
 * boundary offsets produced by `DisplayProjector.boundaryOffsets`: entry `i`
 * is the x position before code point `i`, the last entry is the full width.
 */
export default class ScrollWindow {
  private cropPosition = 0;

  getCropPosition(): number {
    return this.cropPosition;
  }

  reset(): void {
    this.cropPosition = 0;
  }

  /**
   * Where the first visible code point is drawn inside the text area. Only a
   * text narrower than the area is aligned; an overflowing one starts at 0.
   */
  textOffset(
    offsets: ReadonlyArray<number>,
    visibleWidth: number,
    alignment: Alignment,
  ): number {
    const total = offsets[offsets.length - 1] ?? 0;
    if (
      !Number.isFinite(visibleWidth) ||
      total >= visibleWidth ||
      this.cropPosition > 0
    ) {
      return 0;
    }
    switch (alignment) {
      case "left":
        return 0;
      case "center":
        return Math.floor((visibleWidth - total) / 2);
      case "right":
        return visibleWidth - total;
    }
  }

  /**
   * Shift the crop position by the least amount that puts the caret inside
   * `[0, visibleWidth]`, then pull it back left while the text after it
   * leaves room on the right.
   */
  ensureCaretVisible(
    offsets: ReadonlyArray<number>,
    caret: number,
    visibleWidth: number,
  ): void {
    const len = offsets.length - 1;
    const x = (i: number): number => offsets[i] ?? 0;
    const total = x(len);

    if (total <= visibleWidth) {
      this.cropPosition = 0;
      return;
    }

    let crop = Math.min(Math.max(this.cropPosition, 0), len);
    const caretX = x(caret);
    if (caretX < x(crop)) {
      crop = caret;
    } else {
      while (crop < caret && caretX - x(crop) > visibleWidth) {
        crop++;
      }
    }
    while (crop > 0 && total - x(crop - 1) <= visibleWidth) {
      crop--;
    }
    this.cropPosition = crop;
  }

  /** The code points of the displayed text that fit from the crop position. */
  visibleRange(
    offsets: ReadonlyArray<number>,
    visibleWidth: number,
  ): VisibleRange {
    const len = offsets.length - 1;
    const start = Math.min(this.cropPosition, len);
    const origin = offsets[start] ?? 0;
    let end = start;
    while (end < len && (offsets[end + 1] ?? 0) - origin <= visibleWidth) {
      end++;
    }
    return { start, end };
  }

  /**
   * Map an x position inside the text area to the nearest code point
   * boundary. A position left of a character's midpoint lands before it;
   * exactly on the midpoint also lands before it.
   */
  findCaretPosition(
    posX: number,
    offsets: ReadonlyArray<number>,
    visibleWidth: number,
    alignment: Alignment,
  ): number {
    const len = offsets.length - 1;
    const origin = offsets[Math.min(this.cropPosition, len)] ?? 0;
    const target =
      posX - this.textOffset(offsets, visibleWidth, alignment) + origin;

    for (let i = 0; i < len; i++) {
      const mid = ((offsets[i] ?? 0) + (offsets[i + 1] ?? 0)) / 2;
      if (target <= mid) {
        return i;
      }
    }
    return len;
  }
}
