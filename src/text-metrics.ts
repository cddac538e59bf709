import stringWidth from "string-width";

/**
 * Measures rendered text. Units are whatever the host draws in (pixels for a
 * graphical surface, columns in a terminal) but must be deterministic for a
 * given font configuration.
 */
export interface TextMetrics {
  width(text: string): number;
}

/** Terminal column widths: CJK and emoji take two cells, combining marks none. */
export const terminalTextMetrics: TextMetrics = {
  width: (text) => stringWidth(text),
};

/** Every code point advances by the same amount. */
export class MonospaceTextMetrics implements TextMetrics {
  constructor(private readonly advance: number = 1) {}

  width(text: string): number {
    return Array.from(text).length * this.advance;
  }
}
