import type { EditSessionOptions } from "../edit-session.js";

import EditSession from "../edit-session.js";
import { resolveKeyCommand } from "../key-input.js";
import { toCodePoints } from "../text-buffer.js";
import chalk from "chalk";
import { Text, useInput } from "ink";
import React, { useEffect, useState } from "react";
import stringWidth from "string-width";

export interface LineInputProps {
  /** Columns taken by the whole row, suffix included. */
  readonly width: number;

  /** Capture keyboard input and draw the caret. */
  readonly focus?: boolean;

  /** Used to build the session when `session` is not given. */
  readonly options?: EditSessionOptions;

  /** Drive an existing session instead of creating one. */
  readonly session?: EditSession;

  /** Called with the new text after every committed change. */
  readonly onChange?: (text: string) => void;

  /** Called when <Enter> is pressed. */
  readonly onSubmit?: (text: string) => void;
}

// One column stays free to the right of the text so the block caret can sit
// after the last character without wrapping the row.
const CARET_COLUMNS = 1;

function fitColumns(text: string, columns: number): string {
  let out = "";
  let used = 0;
  for (const cp of toCodePoints(text)) {
    const w = stringWidth(cp);
    if (used + w > columns) {
      break;
    }
    out += cp;
    used += w;
  }
  return out;
}

/**
 * Draw the session as one terminal row of exactly `width` columns: the
 * visible window of the displayed text (or the grey placeholder when the
 * text is empty), then the suffix right‑aligned.
 */
export function renderLineInput(
  session: EditSession,
  width: number,
  showCursor: boolean,
): string {
  const suffix = session.getSuffix();
  const areaColumns = Math.max(0, width - stringWidth(suffix));
  let body = "";
  let bodyColumns = 0;

  const placeholder = session.getDefaultText();
  if (session.getLength() === 0 && placeholder !== "") {
    const shown = fitColumns(placeholder, areaColumns);
    const [first = "", ...rest] = toCodePoints(shown);
    body = showCursor
      ? chalk.inverse(first) + chalk.grey(rest.join(""))
      : chalk.grey(shown);
    bodyColumns = stringWidth(shown);
  } else {
    const displayed = toCodePoints(session.getDisplayedText());
    const { start, end } = session.getVisibleRange();
    const { low, high } = session.getSelection();
    const caret = session.getCaretPosition();
    const offset = session.getTextOffset();

    body = " ".repeat(offset);
    bodyColumns = offset;
    for (let i = start; i < end; i++) {
      const cp = displayed[i] ?? "";
      const selected = i >= low && i < high;
      const underCaret = showCursor && low === high && i === caret;
      body += selected || underCaret ? chalk.inverse(cp) : cp;
      bodyColumns += stringWidth(cp);
    }
    if (showCursor && low === high && caret === end) {
      body += chalk.inverse(" ");
      bodyColumns += CARET_COLUMNS;
    }
  }

  const padding = " ".repeat(Math.max(0, areaColumns - bodyColumns));
  return body + padding + (suffix === "" ? "" : chalk.grey(suffix));
}

/**
 * Single‑line text input for Ink. Owns an {@link EditSession} (or drives the
 * one it is given) and forwards every key event through the key dispatcher.
 */
export default function LineInput({
  width,
  focus = true,
  options,
  session: providedSession,
  onChange,
  onSubmit,
}: LineInputProps): React.ReactElement {
  const [session] = useState(
    () =>
      providedSession ??
      new EditSession({
        ...options,
        visibleWidth: Math.max(0, width - CARET_COLUMNS),
      }),
  );
  const [version, setVersion] = useState(0);

  useEffect(() => {
    const visibleWidth = Math.max(0, width - CARET_COLUMNS);
    if (session.getVisibleWidth() !== visibleWidth) {
      session.setVisibleWidth(visibleWidth);
      setVersion((v) => v + 1);
    }
  }, [session, width]);

  useEffect(() => {
    session.setFocused(focus);
  }, [session, focus]);

  useEffect(
    () =>
      session.subscribe({
        onTextChange: (text) => onChange?.(text),
        onReturnKeyPress: (text) => onSubmit?.(text),
      }),
    [session, onChange, onSubmit],
  );

  useInput(
    (input, key) => {
      const command = resolveKeyCommand(input, key);
      if (command && session.apply(command)) {
        setVersion((v) => v + 1);
      }
    },
    { isActive: focus },
  );

  return <Text key={version}>{renderLineInput(session, width, focus)}</Text>;
}
