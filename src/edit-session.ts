import type { Clipboard } from "./clipboard.js";
import type { Alignment, VisibleRange } from "./scroll-window.js";
import type { SelectionRange } from "./selection-model.js";
import type { TextMetrics } from "./text-metrics.js";

import { MemoryClipboard } from "./clipboard.js";
import DisplayProjector from "./display-projector.js";
import ScrollWindow from "./scroll-window.js";
import SelectionModel from "./selection-model.js";
import TextBuffer, { toCodePoints } from "./text-buffer.js";
import { terminalTextMetrics } from "./text-metrics.js";
import TextValidator, { Validators } from "./text-validator.js";
import { log } from "./utils/logger/log.js";

export type Direction =
  | "left"
  | "right"
  | "wordLeft"
  | "wordRight"
  | "home"
  | "end";

/** A single user intent, as produced by the key dispatcher. */
export type EditCommand =
  | { readonly type: "insert"; readonly text: string }
  | { readonly type: "backspace" }
  | { readonly type: "deleteForward" }
  | {
      readonly type: "move";
      readonly direction: Direction;
      readonly extend: boolean;
    }
  | { readonly type: "selectAll" }
  | { readonly type: "copy" }
  | { readonly type: "cut" }
  | { readonly type: "paste" }
  | { readonly type: "return" };

/**
 * Receives committed state transitions. Rejected edits never reach it.
 */
export interface EditSessionListener {
  onTextChange?: (text: string) => void;
  onCaretPositionChange?: (caret: number) => void;
  onReturnKeyPress?: (text: string) => void;
  onReturnOrUnfocus?: (text: string) => void;
}

export interface EditSessionOptions {
  /** Initial contents; subject to the same rules as `setText`. */
  text?: string;
  metrics?: TextMetrics;
  clipboard?: Clipboard;
  listener?: EditSessionListener;
  /** Inner width of the text area, suffix included. Unbounded by default. */
  visibleWidth?: number;
  /** 0 disables the limit. */
  maxChars?: number;
  inputValidator?: string;
  /** "" disables masking. */
  passwordChar?: string;
  limitWidth?: boolean;
  readOnly?: boolean;
  alignment?: Alignment;
  suffix?: string;
  defaultText?: string;
  /** Two presses closer than this (ms) select the whole text. */
  doubleClickTime?: number;
  /** Clock used for double‑click detection. */
  now?: () => number;
}

export interface MouseModifiers {
  shift?: boolean;
}

export const DEFAULT_DOUBLE_CLICK_TIME = 500;

/* -------------------------------------------------------------------------
 *  Debug helper – enable verbose tracing by setting env var LINEEDIT_DEBUG=1
 * ---------------------------------------------------------------------- */

const DEBUG =
  process.env["LINEEDIT_DEBUG"] === "1" ||
  process.env["LINEEDIT_DEBUG"] === "true";

function dbg(op: string, details: Record<string, unknown>): void {
  if (DEBUG) {
    log(`[EditSession] ${op} ${JSON.stringify(details)}`);
  }
}

function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}

function firstLine(text: string): string {
  return text.split(/\r\n|\r|\n/)[0] ?? "";
}

/* ────────────────────────────────────────────────────────────────────────── */

/**
 * Editing state of a single‑line input.
 *
 * Every mutating intent builds a candidate text without touching the
 * committed state, checks it against the character limit, the input
 * validator and (when enabled) the width limit, and then either commits
 * text, selection, displayed text and crop position together or leaves
 * everything as it was. Listeners only hear about committed transitions.
 */
export default class EditSession {
  private text = new TextBuffer();
  private displayed: Array<string> = [];
  private readonly selection = new SelectionModel();
  private readonly scroll = new ScrollWindow();
  private readonly validator = new TextValidator();
  private readonly projector: DisplayProjector;
  private readonly metrics: TextMetrics;
  private readonly clipboard: Clipboard;
  private readonly listeners = new Set<EditSessionListener>();

  private maxChars = 0;
  private limitWidth = false;
  private readOnly = false;
  private alignment: Alignment = "left";
  private suffix = "";
  private defaultText = "";
  private visibleWidth = Number.POSITIVE_INFINITY;
  private focused = false;

  private dragging = false;
  private lastPressTime: number | null = null;
  private readonly doubleClickTime: number;
  private readonly now: () => number;

  constructor(options: EditSessionOptions = {}) {
    this.metrics = options.metrics ?? terminalTextMetrics;
    this.clipboard = options.clipboard ?? new MemoryClipboard();
    this.projector = new DisplayProjector(
      this.metrics,
      options.passwordChar ?? "",
    );
    this.doubleClickTime = options.doubleClickTime ?? DEFAULT_DOUBLE_CLICK_TIME;
    this.now = options.now ?? Date.now;

    this.maxChars = Math.max(0, Math.floor(options.maxChars ?? 0));
    this.limitWidth = options.limitWidth ?? false;
    this.readOnly = options.readOnly ?? false;
    this.alignment = options.alignment ?? "left";
    this.suffix = options.suffix ?? "";
    this.defaultText = options.defaultText ?? "";
    if (options.visibleWidth !== undefined) {
      this.visibleWidth = Math.max(0, options.visibleWidth);
    }
    if (options.inputValidator !== undefined) {
      this.validator.setPattern(options.inputValidator);
    }

    this.recompute();
    if (options.text !== undefined) {
      this.setText(options.text);
    }
    if (options.listener) {
      this.listeners.add(options.listener);
    }
  }

  /* =======================================================================
   *  Notifications
   * ===================================================================== */

  /** Attach another sink. Returns a function that detaches it again. */
  subscribe(listener: EditSessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private forEachListener(fn: (listener: EditSessionListener) => void): void {
    for (const listener of [...this.listeners]) {
      fn(listener);
    }
  }

  /* =======================================================================
   *  Read‑only accessors
   * ===================================================================== */

  /** The real text, unaffected by the password character. */
  getText(): string {
    return this.text.toString();
  }

  getLength(): number {
    return this.text.length();
  }

  /** The text as drawn: masked when a password character is set. */
  getDisplayedText(): string {
    return this.displayed.join("");
  }

  /** Selected part of the real text, never masked. */
  getSelectedText(): string {
    const { low, high } = this.selection.range();
    return this.text.substring(low, high);
  }

  getSelection(): SelectionRange {
    return this.selection.range();
  }

  getSelectionStart(): number {
    return this.selection.getStart();
  }

  getSelectionEnd(): number {
    return this.selection.getEnd();
  }

  getCaretPosition(): number {
    return this.selection.getCaret();
  }

  getCropPosition(): number {
    return this.scroll.getCropPosition();
  }

  /** Code points of the displayed text that fit in the text area. */
  getVisibleRange(): VisibleRange {
    return this.scroll.visibleRange(this.offsets(), this.textAreaWidth());
  }

  /** Alignment offset of the first visible code point inside the text area. */
  getTextOffset(): number {
    return this.scroll.textOffset(
      this.offsets(),
      this.textAreaWidth(),
      this.alignment,
    );
  }

  /** Width available to the text: the visible width minus the suffix. */
  getTextAreaWidth(): number {
    return this.textAreaWidth();
  }

  getVisibleWidth(): number {
    return this.visibleWidth;
  }

  getInputValidator(): string {
    return this.validator.getPattern();
  }

  getMaximumCharacters(): number {
    return this.maxChars;
  }

  getPasswordCharacter(): string {
    return this.projector.getPasswordCharacter();
  }

  isTextWidthLimited(): boolean {
    return this.limitWidth;
  }

  isReadOnly(): boolean {
    return this.readOnly;
  }

  isFocused(): boolean {
    return this.focused;
  }

  getAlignment(): Alignment {
    return this.alignment;
  }

  getSuffix(): string {
    return this.suffix;
  }

  getDefaultText(): string {
    return this.defaultText;
  }

  /* =======================================================================
   *  Properties
   * ===================================================================== */

  /**
   * Replace the validator. Returns false and keeps the previous one when the
   * pattern does not compile. The current text is not re‑checked.
   */
  setInputValidator(pattern: string = Validators.All): boolean {
    return this.validator.setPattern(pattern);
  }

  /** 0 disables the limit; a longer current text loses its tail. */
  setMaximumCharacters(maxChars: number): void {
    this.maxChars = Math.max(0, Math.floor(maxChars));
    if (this.maxChars > 0 && this.text.length() > this.maxChars) {
      this.commit(
        this.text.truncate(this.maxChars),
        this.selection.getStart(),
        this.selection.getEnd(),
      );
    }
  }

  setPasswordCharacter(ch: string): void {
    this.projector.setPasswordCharacter(ch);
    this.refit();
  }

  limitTextWidth(limitWidth = true): void {
    this.limitWidth = limitWidth;
    if (limitWidth) {
      this.scroll.reset();
    }
    this.refit();
  }

  setReadOnly(readOnly = true): void {
    this.readOnly = readOnly;
  }

  setAlignment(alignment: Alignment): void {
    this.alignment = alignment;
  }

  setSuffix(suffix: string): void {
    this.suffix = suffix;
    this.refit();
  }

  setDefaultText(text: string): void {
    this.defaultText = text;
  }

  setVisibleWidth(width: number): void {
    this.visibleWidth = Math.max(0, width);
    this.refit();
  }

  /* =======================================================================
   *  Candidate / validate / commit
   * ===================================================================== */

  private textAreaWidth(): number {
    const suffixWidth =
      this.suffix === "" ? 0 : this.metrics.width(this.suffix);
    return Math.max(0, this.visibleWidth - suffixWidth);
  }

  private offsets(): Array<number> {
    return this.projector.boundaryOffsets(this.displayed);
  }

  /** Why `candidate` may not be committed, or null when it may. */
  private rejection(candidate: TextBuffer): string | null {
    if (this.maxChars > 0 && candidate.length() > this.maxChars) {
      return "maximum characters";
    }
    if (!this.validator.matches(candidate.toString())) {
      return "input validator";
    }
    if (
      this.limitWidth &&
      this.projector.textWidth(candidate) > this.textAreaWidth()
    ) {
      return "text width";
    }
    return null;
  }

  /** Longest prefix of `candidate` whose projection fits the text area. */
  private truncateToWidth(candidate: TextBuffer): TextBuffer {
    const offsets = this.projector.boundaryOffsets(
      this.projector.project(candidate),
    );
    const limit = this.textAreaWidth();
    let n = candidate.length();
    while (n > 0 && (offsets[n] ?? 0) > limit) {
      n--;
    }
    return candidate.truncate(n);
  }

  /**
   * Swap in a validated candidate together with its selection, then bring
   * the displayed text and crop position up to date and notify.
   */
  private commit(
    candidate: TextBuffer,
    selStart: number,
    selEnd: number,
  ): boolean {
    const previousStart = this.selection.getStart();
    const previousCaret = this.selection.getCaret();
    const textChanged = !candidate.equals(this.text);

    this.text = candidate;
    this.selection.set(selStart, selEnd);
    this.selection.clampTo(candidate.length());
    const selectionChanged = !this.selection.equals(
      previousStart,
      previousCaret,
    );
    this.recompute();

    if (textChanged) {
      const text = this.getText();
      this.forEachListener((l) => l.onTextChange?.(text));
    }
    if (this.selection.getCaret() !== previousCaret) {
      const caret = this.selection.getCaret();
      this.forEachListener((l) => l.onCaretPositionChange?.(caret));
    }
    return textChanged || selectionChanged;
  }

  private select(selStart: number, selEnd: number): boolean {
    return this.commit(this.text, selStart, selEnd);
  }

  private recompute(): void {
    this.displayed = this.projector.project(this.text);
    if (this.limitWidth) {
      this.scroll.reset();
      return;
    }
    this.scroll.ensureCaretVisible(
      this.offsets(),
      this.selection.getCaret(),
      this.textAreaWidth(),
    );
  }

  /** Re‑apply the width limit after something that affects widths changed. */
  private refit(): void {
    if (this.limitWidth) {
      const fitted = this.truncateToWidth(this.text);
      if (fitted.length() !== this.text.length()) {
        this.commit(fitted, this.selection.getStart(), this.selection.getEnd());
        return;
      }
    }
    this.recompute();
  }

  /** Deleting text always commits, even when the result fails validation. */
  private commitDeletion(
    candidate: TextBuffer,
    caret: number,
    op: string,
  ): boolean {
    const reason = this.rejection(candidate);
    if (reason) {
      log(`[lineedit] ${op}: shorter text fails ${reason}, committing anyway`);
    }
    return this.commit(candidate, caret, caret);
  }

  /* =======================================================================
   *  Editing intents
   * ===================================================================== */

  /**
   * Replace the whole text. Unlike typing, this never rejects: the tail is
   * cut to honour the character and width limits, and a text that still
   * fails the validator is replaced by the empty string. Works on read‑only
   * sessions. The caret goes to the end, or to `caretPosition` when given.
   */
  setText(text: string, caretPosition?: number): boolean {
    let candidate = new TextBuffer(text);
    if (this.maxChars > 0) {
      candidate = candidate.truncate(this.maxChars);
    }
    if (this.limitWidth) {
      candidate = this.truncateToWidth(candidate);
    }
    if (!this.validator.matches(candidate.toString())) {
      log(
        `[lineedit] setText: ${JSON.stringify(candidate.toString())} fails input validator, clearing`,
      );
      candidate = new TextBuffer();
    }
    const caret =
      caretPosition === undefined ? candidate.length() : caretPosition;
    dbg("setText", { text: candidate.toString(), caret });
    return this.commit(candidate, caret, caret);
  }

  /**
   * Type `ch` at the caret, replacing the selection if there is one. The
   * whole of `ch` is accepted or rejected as one unit.
   */
  insertCharacter(ch: string): boolean {
    if (this.readOnly) {
      return false;
    }
    const run = toCodePoints(ch);
    if (run.length === 0) {
      return false;
    }
    const { low, high } = this.selection.range();
    const candidate = this.text.deleteRange(low, high).insertAt(low, run);
    const reason = this.rejection(candidate);
    if (reason) {
      log(`[lineedit] rejected ${JSON.stringify(ch)}: ${reason}`);
      return false;
    }
    const caret = low + run.length;
    dbg("insertCharacter", { ch, caret });
    return this.commit(candidate, caret, caret);
  }

  deleteSelectedCharacters(): boolean {
    if (this.readOnly || this.selection.isEmpty()) {
      return false;
    }
    const { low, high } = this.selection.range();
    dbg("deleteSelectedCharacters", { low, high });
    return this.commitDeletion(
      this.text.deleteRange(low, high),
      low,
      "deleteSelectedCharacters",
    );
  }

  backspace(): boolean {
    if (this.readOnly) {
      return false;
    }
    if (!this.selection.isEmpty()) {
      return this.deleteSelectedCharacters();
    }
    const caret = this.selection.getCaret();
    if (caret === 0) {
      return false;
    }
    return this.commitDeletion(
      this.text.deleteRange(caret - 1, caret),
      caret - 1,
      "backspace",
    );
  }

  deleteForward(): boolean {
    if (this.readOnly) {
      return false;
    }
    if (!this.selection.isEmpty()) {
      return this.deleteSelectedCharacters();
    }
    const caret = this.selection.getCaret();
    if (caret >= this.text.length()) {
      return false;
    }
    return this.commitDeletion(
      this.text.deleteRange(caret, caret + 1),
      caret,
      "deleteForward",
    );
  }

  /* =======================================================================
   *  Caret movement & selection
   * ===================================================================== */

  private moveTo(target: number, extend: boolean): boolean {
    return extend
      ? this.select(this.selection.getStart(), target)
      : this.select(target, target);
  }

  /**
   * One code point left. Without `extend` an existing selection collapses to
   * its left edge instead.
   */
  moveCaretLeft(extend = false): boolean {
    if (!extend && !this.selection.isEmpty()) {
      const { low } = this.selection.range();
      return this.select(low, low);
    }
    return this.moveTo(Math.max(this.selection.getCaret() - 1, 0), extend);
  }

  /**
   * One code point right. Without `extend` an existing selection collapses to
   * its right edge instead.
   */
  moveCaretRight(extend = false): boolean {
    if (!extend && !this.selection.isEmpty()) {
      const { high } = this.selection.range();
      return this.select(high, high);
    }
    return this.moveTo(
      Math.min(this.selection.getCaret() + 1, this.text.length()),
      extend,
    );
  }

  moveCaretWordBegin(extend = false): boolean {
    return this.moveTo(this.text.wordBegin(this.selection.getCaret()), extend);
  }

  moveCaretWordEnd(extend = false): boolean {
    return this.moveTo(this.text.wordEnd(this.selection.getCaret()), extend);
  }

  moveCaretToStart(extend = false): boolean {
    return this.moveTo(0, extend);
  }

  moveCaretToEnd(extend = false): boolean {
    return this.moveTo(this.text.length(), extend);
  }

  move(direction: Direction, extend = false): boolean {
    switch (direction) {
      case "left":
        return this.moveCaretLeft(extend);
      case "right":
        return this.moveCaretRight(extend);
      case "wordLeft":
        return this.moveCaretWordBegin(extend);
      case "wordRight":
        return this.moveCaretWordEnd(extend);
      case "home":
        return this.moveCaretToStart(extend);
      case "end":
        return this.moveCaretToEnd(extend);
    }
  }

  /** Collapse the selection onto `position`, clamped to the text. */
  setCaretPosition(position: number): boolean {
    return this.select(position, position);
  }

  /**
   * Select `length` code points from `start`. Both are rounded down and
   * clamped to the text;
   * without arguments the whole text is selected. The caret ends up on the
   * far end of the selection.
   */
  selectText(start = 0, length = Number.POSITIVE_INFINITY): boolean {
    const len = this.text.length();
    const from = clamp(Math.floor(start), 0, len);
    const to = Math.min(from + Math.max(0, Math.floor(length)), len);
    return this.select(from, to);
  }

  selectAll(): boolean {
    return this.selectText();
  }

  /* =======================================================================
   *  Clipboard
   * ===================================================================== */

  /** Returns true when the selection was handed to the clipboard. */
  copy(): boolean {
    if (this.selection.isEmpty()) {
      return false;
    }
    try {
      this.clipboard.write(this.getSelectedText());
    } catch (err) {
      log(`[lineedit] clipboard write failed: ${describeError(err)}`);
      return false;
    }
    return true;
  }

  /**
   * Copy, then delete the selection. When the clipboard refuses the text the
   * selection is left in place. Read‑only sessions only copy.
   */
  cut(): boolean {
    if (!this.copy() || this.readOnly) {
      return false;
    }
    return this.deleteSelectedCharacters();
  }

  /**
   * Insert the first line of the clipboard as one unit, replacing the
   * selection. The run is cut to what still fits under the character limit
   * (and, with the width limit on, the width); the result must then pass the
   * validator or the whole paste is dropped.
   */
  paste(): boolean {
    if (this.readOnly) {
      return false;
    }
    let contents: string;
    try {
      contents = this.clipboard.read();
    } catch (err) {
      log(`[lineedit] clipboard read failed: ${describeError(err)}`);
      return false;
    }

    let run = toCodePoints(firstLine(contents));
    if (run.length === 0) {
      return false;
    }

    const { low, high } = this.selection.range();
    const base = this.text.deleteRange(low, high);
    if (this.maxChars > 0) {
      run = run.slice(0, Math.max(0, this.maxChars - base.length()));
    }
    if (this.limitWidth) {
      run = this.fitRunToWidth(base, run);
    }
    if (run.length === 0) {
      log("[lineedit] paste: no room left for clipboard text");
      return false;
    }

    const candidate = base.insertAt(low, run);
    const reason = this.rejection(candidate);
    if (reason) {
      log(`[lineedit] paste rejected: ${reason}`);
      return false;
    }
    const caret = low + run.length;
    dbg("paste", { inserted: run.join(""), caret });
    return this.commit(candidate, caret, caret);
  }

  private fitRunToWidth(base: TextBuffer, run: Array<string>): Array<string> {
    let remaining = this.textAreaWidth() - this.projector.textWidth(base);
    const projected = this.projector.project(new TextBuffer(run));
    let n = 0;
    while (n < projected.length) {
      const w = this.metrics.width(projected[n] ?? "");
      if (w > remaining) {
        break;
      }
      remaining -= w;
      n++;
    }
    return run.slice(0, n);
  }

  /* =======================================================================
   *  Mouse, focus & return
   * ===================================================================== */

  /** Nearest code‑point boundary to an x position inside the text area. */
  findCaretPosition(posX: number): number {
    return this.scroll.findCaretPosition(
      posX,
      this.offsets(),
      this.textAreaWidth(),
      this.alignment,
    );
  }

  leftMousePressed(posX: number, modifiers: MouseModifiers = {}): boolean {
    const time = this.now();
    if (
      this.lastPressTime !== null &&
      time - this.lastPressTime <= this.doubleClickTime
    ) {
      this.lastPressTime = null;
      this.dragging = false;
      return this.selectAll();
    }
    this.lastPressTime = time;
    this.dragging = true;

    const position = this.findCaretPosition(posX);
    return modifiers.shift
      ? this.select(this.selection.getStart(), position)
      : this.select(position, position);
  }

  /** While a press is held, drag the active anchor along. */
  mouseMoved(posX: number): boolean {
    if (!this.dragging) {
      return false;
    }
    return this.select(this.selection.getStart(), this.findCaretPosition(posX));
  }

  leftMouseReleased(): void {
    this.dragging = false;
  }

  setFocused(focused: boolean): void {
    const wasFocused = this.focused;
    this.focused = focused;
    if (wasFocused && !focused) {
      this.dragging = false;
      const text = this.getText();
      this.forEachListener((l) => l.onReturnOrUnfocus?.(text));
    }
  }

  pressReturn(): void {
    const text = this.getText();
    this.forEachListener((l) => l.onReturnKeyPress?.(text));
    this.forEachListener((l) => l.onReturnOrUnfocus?.(text));
  }

  /* =======================================================================
   *  Command dispatch
   * ===================================================================== */

  /** Run a dispatched key command. Returns true when state changed. */
  apply(command: EditCommand): boolean {
    switch (command.type) {
      case "insert": {
        let changed = false;
        for (const cp of toCodePoints(command.text)) {
          changed = this.insertCharacter(cp) || changed;
        }
        return changed;
      }
      case "backspace":
        return this.backspace();
      case "deleteForward":
        return this.deleteForward();
      case "move":
        return this.move(command.direction, command.extend);
      case "selectAll":
        return this.selectAll();
      case "copy":
        this.copy();
        return false;
      case "cut":
        return this.cut();
      case "paste":
        return this.paste();
      case "return":
        this.pressReturn();
        return false;
    }
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
