import type { Direction, EditCommand } from "./edit-session.js";

import { toCodePoints } from "./text-buffer.js";

/**
 * Key flags as Ink reports them to `useInput`. Ink's own `Key` type is
 * assignable to this; `home` / `end` are only set by hosts that parse them.
 */
export interface KeyInput {
  readonly upArrow?: boolean;
  readonly downArrow?: boolean;
  readonly leftArrow?: boolean;
  readonly rightArrow?: boolean;
  readonly pageUp?: boolean;
  readonly pageDown?: boolean;
  readonly home?: boolean;
  readonly end?: boolean;
  readonly return?: boolean;
  readonly escape?: boolean;
  readonly tab?: boolean;
  readonly backspace?: boolean;
  readonly delete?: boolean;
  readonly ctrl?: boolean;
  readonly shift?: boolean;
  readonly meta?: boolean;
}

// Ink strips the leading ESC of sequences it does not recognise, so Home/End
// from terminals that emit the VT or SS3 variants arrive as raw text.
const HOME_SEQUENCES = new Set(["[H", "[1~", "[7~", "OH"]);
const END_SEQUENCES = new Set(["[F", "[4~", "[8~", "OF"]);
const SHIFT_HOME_SEQUENCES = new Set(["[1;2H", "[1;2~"]);
const SHIFT_END_SEQUENCES = new Set(["[1;2F", "[4;2~"]);

function move(direction: Direction, extend: boolean): EditCommand {
  return { type: "move", direction, extend };
}

function isControlCharacter(cp: string): boolean {
  return /\p{Cc}/u.test(cp);
}

/**
 * Translate one Ink key event into an edit command, or null when the event
 * is not meant for a single‑line input (so the parent may handle it).
 */
export function resolveKeyCommand(
  input: string | undefined,
  key: KeyInput,
): EditCommand | null {
  const text = input ?? "";
  const shift = key.shift === true;

  if (key.return) {
    return { type: "return" };
  }
  if (
    key.escape ||
    key.tab ||
    key.upArrow ||
    key.downArrow ||
    key.pageUp ||
    key.pageDown
  ) {
    return null;
  }

  // Arrows: Ctrl/Meta jump by word, Shift extends the selection.
  if (key.leftArrow) {
    return move(key.ctrl || key.meta ? "wordLeft" : "left", shift);
  }
  if (key.rightArrow) {
    return move(key.ctrl || key.meta ? "wordRight" : "right", shift);
  }

  // macOS terminals translate ⌥← / ⌥→ into the readline ESC‑b / ESC‑f pair,
  // which Ink hands over as meta + "b" / "f".
  if (key.meta && (text === "b" || text === "B")) {
    return move("wordLeft", false);
  }
  if (key.meta && (text === "f" || text === "F")) {
    return move("wordRight", false);
  }

  if (key.home || HOME_SEQUENCES.has(text)) {
    return move("home", shift);
  }
  if (key.end || END_SEQUENCES.has(text)) {
    return move("end", shift);
  }
  if (SHIFT_HOME_SEQUENCES.has(text)) {
    return move("home", true);
  }
  if (SHIFT_END_SEQUENCES.has(text)) {
    return move("end", true);
  }

  // Most terminals send DEL (0x7f) for the backspace key and Ink reports it
  // as `delete`; the real forward‑delete key needs Shift (or Ctrl+D below).
  if (key.backspace || text === "\x7f" || (key.delete && !shift)) {
    return { type: "backspace" };
  }
  if (key.delete) {
    return { type: "deleteForward" };
  }

  if (key.ctrl) {
    switch (text.toLowerCase()) {
      case "a":
        return { type: "selectAll" };
      case "c":
        return { type: "copy" };
      case "x":
        return { type: "cut" };
      case "v":
        return { type: "paste" };
      case "d":
        return { type: "deleteForward" };
      default:
        return null;
    }
  }
  if (key.meta) {
    return null;
  }

  const printable = toCodePoints(text)
    .filter((cp) => !isControlCharacter(cp))
    .join("");
  return printable === "" ? null : { type: "insert", text: printable };
}

/** Would {@link resolveKeyCommand} act on this event? */
export function canHandleKeyPress(
  input: string | undefined,
  key: KeyInput,
): boolean {
  return resolveKeyCommand(input, key) !== null;
}
