import LineInput, { renderLineInput } from "../src/components/line-input.js";
import EditSession from "../src/edit-session.js";
import { Validators } from "../src/text-validator.js";
import { renderTui } from "./ui-test-helpers.js";
import React from "react";
import stripAnsi from "strip-ansi";
import { describe, it, expect, vi } from "vitest";

describe("renderLineInput", () => {
  it("pads the text to the full width", () => {
    const session = new EditSession({ text: "hello", visibleWidth: 19 });
    expect(stripAnsi(renderLineInput(session, 20, false))).toBe(
      "hello" + " ".repeat(15),
    );
  });

  it("draws the caret cell after the text and the suffix at the edge", () => {
    const session = new EditSession({
      text: "12",
      suffix: "kg",
      visibleWidth: 9,
    });
    expect(stripAnsi(renderLineInput(session, 10, true))).toBe("12      kg");
  });

  it("shows the placeholder while empty", () => {
    const session = new EditSession({ defaultText: "name", visibleWidth: 9 });
    expect(stripAnsi(renderLineInput(session, 10, false))).toBe("name      ");
  });

  it("masks the text", () => {
    const session = new EditSession({
      text: "abc",
      passwordChar: "*",
      visibleWidth: 9,
    });
    expect(stripAnsi(renderLineInput(session, 10, false))).toBe(
      "***       ",
    );
  });

  it("shows only the window around the caret", () => {
    const session = new EditSession({ text: "abcdefghij", visibleWidth: 4 });
    expect(stripAnsi(renderLineInput(session, 5, true))).toBe("ghij ");
  });

  it("aligns a short text to the right", () => {
    const session = new EditSession({
      text: "ab",
      alignment: "right",
      visibleWidth: 9,
    });
    expect(stripAnsi(renderLineInput(session, 10, false))).toBe(
      "       ab ",
    );
  });
});

describe("<LineInput />", () => {
  it("echoes typed text and reports changes", async () => {
    const onChange = vi.fn();
    const { stdin, lastFrameStripped, flush, unmount } = renderTui(
      <LineInput width={20} onChange={onChange} />,
    );
    await flush();

    stdin.write("hello");
    await flush();

    expect(lastFrameStripped().trimEnd()).toBe("hello");
    expect(onChange).toHaveBeenLastCalledWith("hello");
    unmount();
  });

  it("filters input through the validator", async () => {
    const { stdin, lastFrameStripped, flush, unmount } = renderTui(
      <LineInput width={20} options={{ inputValidator: Validators.UInt }} />,
    );
    await flush();

    stdin.write("1a2");
    await flush();

    expect(lastFrameStripped().trimEnd()).toBe("12");
    unmount();
  });

  it("deletes with backspace and submits on enter", async () => {
    const onSubmit = vi.fn();
    const session = new EditSession({ text: "hix", visibleWidth: 19 });
    const { stdin, flush, unmount } = renderTui(
      <LineInput width={20} session={session} onSubmit={onSubmit} />,
    );
    await flush();

    stdin.write("\x7f");
    await flush();
    expect(session.getText()).toBe("hi");

    stdin.write("\r");
    await flush();
    expect(onSubmit).toHaveBeenCalledWith("hi");
    unmount();
  });

  it("ignores keys while unfocused", async () => {
    const session = new EditSession({ text: "a", visibleWidth: 19 });
    const { stdin, flush, unmount } = renderTui(
      <LineInput width={20} session={session} focus={false} />,
    );
    await flush();

    stdin.write("b");
    await flush();
    expect(session.getText()).toBe("a");
    unmount();
  });
});
