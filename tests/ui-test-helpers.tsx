import type React from "react";

import { render } from "ink-testing-library";
import stripAnsi from "strip-ansi";

export type TuiHandle = ReturnType<typeof render> & {
  lastFrameStripped: () => string;
  flush: () => Promise<void>;
};

/**
 * Render an Ink component for testing.
 *
 * Returns the full testing‑library utils plus `lastFrameStripped()` which
 * yields the latest rendered frame with ANSI escape codes removed so that
 * assertions can be colour‑agnostic.
 */
export function renderTui(ui: React.ReactElement): TuiHandle {
  const utils = render(ui);

  const lastFrameStripped = () => stripAnsi(utils.lastFrame() ?? "");

  // A tiny helper that waits for Ink's internal promises / timers to settle
  // so the next `lastFrame()` call reflects the latest UI state.
  // React schedules passive effects (where Ink's `useInput` attaches its
  // listener) with `setImmediate`, so drain that queue after the timer too.
  const flush = async () => {
    await new Promise<void>((resolve) => setTimeout(resolve, 0));
    await new Promise<void>((resolve) => setImmediate(resolve));
  };

  return {
    ...utils,
    lastFrameStripped,
    flush,
  };
}
