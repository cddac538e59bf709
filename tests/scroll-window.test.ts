import ScrollWindow from "../src/scroll-window.js";
import { describe, it, expect } from "vitest";

// Boundary offsets for `count` characters of width 10.
function evenOffsets(count: number): Array<number> {
  return Array.from({ length: count + 1 }, (_, i) => i * 10);
}

describe("ScrollWindow – hit testing", () => {
  const abc = evenOffsets(3); // [0, 10, 20, 30]

  it("picks the boundary whose character midpoint is nearest", () => {
    const win = new ScrollWindow();
    // (x, expected boundary)
    const cases: Array<[number, number]> = [
      [-5, 0],
      [5, 0], // exactly on the midpoint of "a": earlier boundary wins
      [6, 1],
      [24, 2],
      [25, 2],
      [26, 3],
      [500, 3],
    ];
    for (const [x, want] of cases) {
      expect(win.findCaretPosition(x, abc, 100, "left")).toBe(want);
    }
  });

  it("accounts for alignment when the text is narrower than the area", () => {
    const win = new ScrollWindow();
    expect(win.textOffset(abc, 100, "left")).toBe(0);
    expect(win.textOffset(abc, 100, "center")).toBe(35);
    expect(win.textOffset(abc, 100, "right")).toBe(70);
    expect(win.findCaretPosition(59, abc, 100, "center")).toBe(2);
    expect(win.findCaretPosition(70, abc, 100, "right")).toBe(0);
  });

  it("ignores alignment for overflowing or unbounded text", () => {
    const win = new ScrollWindow();
    expect(win.textOffset(abc, 25, "right")).toBe(0);
    expect(win.textOffset(abc, Number.POSITIVE_INFINITY, "center")).toBe(0);
  });
});

describe("ScrollWindow – crop position", () => {
  const ten = evenOffsets(10); // 100 wide

  it("stays at 0 while the text fits", () => {
    const win = new ScrollWindow();
    win.ensureCaretVisible(evenOffsets(3), 3, 35);
    expect(win.getCropPosition()).toBe(0);
  });

  it("scrolls right just far enough to show the caret", () => {
    const win = new ScrollWindow();
    win.ensureCaretVisible(ten, 10, 35);
    expect(win.getCropPosition()).toBe(7);
    expect(win.visibleRange(ten, 35)).toEqual({ start: 7, end: 10 });
  });

  it("scrolls left to a caret before the window", () => {
    const win = new ScrollWindow();
    win.ensureCaretVisible(ten, 10, 35);
    win.ensureCaretVisible(ten, 2, 35);
    expect(win.getCropPosition()).toBe(2);
    expect(win.visibleRange(ten, 35)).toEqual({ start: 2, end: 5 });
  });

  it("pulls back when the text after the crop position gets shorter", () => {
    const win = new ScrollWindow();
    win.ensureCaretVisible(ten, 10, 35);
    win.ensureCaretVisible(evenOffsets(9), 9, 35);
    expect(win.getCropPosition()).toBe(6);
  });

  it("hit‑tests relative to the crop position", () => {
    const win = new ScrollWindow();
    win.ensureCaretVisible(ten, 10, 35);
    expect(win.findCaretPosition(0, ten, 35, "left")).toBe(7);
    expect(win.findCaretPosition(14, ten, 35, "left")).toBe(8);
  });
});
