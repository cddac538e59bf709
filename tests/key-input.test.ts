import type { KeyInput } from "../src/key-input.js";

import EditSession from "../src/edit-session.js";
import { canHandleKeyPress, resolveKeyCommand } from "../src/key-input.js";
import { Validators } from "../src/text-validator.js";
import { describe, it, expect } from "vitest";

describe("resolveKeyCommand", () => {
  it("inserts printable input", () => {
    expect(resolveKeyCommand("a", {})).toEqual({ type: "insert", text: "a" });
    expect(resolveKeyCommand("A", { shift: true })).toEqual({
      type: "insert",
      text: "A",
    });
    expect(resolveKeyCommand("ab\tc", {})).toEqual({
      type: "insert",
      text: "abc",
    });
  });

  it("ignores bare control characters", () => {
    expect(resolveKeyCommand("\x1b", {})).toBeNull();
    expect(resolveKeyCommand("", {})).toBeNull();
    expect(resolveKeyCommand(undefined, {})).toBeNull();
  });

  it("maps arrows, word jumps and selection extension", () => {
    expect(resolveKeyCommand("", { leftArrow: true })).toEqual({
      type: "move",
      direction: "left",
      extend: false,
    });
    expect(resolveKeyCommand("", { rightArrow: true, shift: true })).toEqual({
      type: "move",
      direction: "right",
      extend: true,
    });
    expect(resolveKeyCommand("", { leftArrow: true, ctrl: true })).toEqual({
      type: "move",
      direction: "wordLeft",
      extend: false,
    });
    expect(resolveKeyCommand("f", { meta: true })).toEqual({
      type: "move",
      direction: "wordRight",
      extend: false,
    });
  });

  it("recognises Home / End flags and raw sequences", () => {
    expect(resolveKeyCommand("", { home: true, shift: true })).toEqual({
      type: "move",
      direction: "home",
      extend: true,
    });
    expect(resolveKeyCommand("[H", {})).toEqual({
      type: "move",
      direction: "home",
      extend: false,
    });
    expect(resolveKeyCommand("[4~", {})).toEqual({
      type: "move",
      direction: "end",
      extend: false,
    });
    expect(resolveKeyCommand("[1;2F", {})).toEqual({
      type: "move",
      direction: "end",
      extend: true,
    });
  });

  it("maps the deletion keys", () => {
    expect(resolveKeyCommand("", { backspace: true })).toEqual({
      type: "backspace",
    });
    expect(resolveKeyCommand("", { delete: true })).toEqual({
      type: "backspace",
    });
    expect(resolveKeyCommand("", { delete: true, shift: true })).toEqual({
      type: "deleteForward",
    });
  });

  it("maps the Ctrl shortcuts and leaves the rest alone", () => {
    const cases: Array<[string, string | null]> = [
      ["a", "selectAll"],
      ["c", "copy"],
      ["x", "cut"],
      ["v", "paste"],
      ["d", "deleteForward"],
      ["z", null],
    ];
    for (const [input, want] of cases) {
      const command = resolveKeyCommand(input, { ctrl: true });
      expect(command === null ? null : command.type).toBe(want);
    }
  });

  it("leaves keys meant for the parent unhandled", () => {
    expect(resolveKeyCommand("", { return: true })).toEqual({ type: "return" });
    expect(canHandleKeyPress("", { escape: true })).toBe(false);
    expect(canHandleKeyPress("", { tab: true })).toBe(false);
    expect(canHandleKeyPress("", { upArrow: true })).toBe(false);
    expect(canHandleKeyPress("x", { meta: true })).toBe(false);
    expect(canHandleKeyPress("x", {})).toBe(true);
  });

  it("drives a session end to end", () => {
    const session = new EditSession({ inputValidator: Validators.UInt });
    const keys: Array<[string, KeyInput]> = [
      ["1", {}],
      ["a", {}],
      ["2", {}],
      ["", { leftArrow: true, shift: true }],
      ["9", {}],
    ];
    for (const [input, key] of keys) {
      const command = resolveKeyCommand(input, key);
      if (command) {
        session.apply(command);
      }
    }
    expect(session.getText()).toBe("19");
  });
});
