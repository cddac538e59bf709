/**
 * External clipboard. Either call may fail: `read` by throwing or returning
 * an empty string, `write` by throwing or silently dropping the text. The
 * session treats every failure as an empty paste or a skipped copy.
 */
export interface Clipboard {
  read(): string;
  write(text: string): void;
}

/** Process‑local clipboard, the default when the host provides none. */
export class MemoryClipboard implements Clipboard {
  private contents = "";

  constructor(initial = "") {
    this.contents = initial;
  }

  read(): string {
    return this.contents;
  }

  write(text: string): void {
    this.contents = text;
  }
}
