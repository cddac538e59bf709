import * as fsSync from "fs";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

interface Logger {
  /** Checking this can be used to avoid constructing a large log message. */
  isLoggingEnabled(): boolean;

  log(message: string): void;
}

class AsyncLogger implements Logger {
  private queue: Array<string> = [];
  private isWriting: boolean = false;
  private writeError: Error | null = null;

  constructor(private filePath: string) {}

  isLoggingEnabled(): boolean {
    return this.writeError === null;
  }

  log(message: string): void {
    if (this.writeError) {
      return;
    }
    const entry = `[${now()}] ${message}\n`;
    this.queue.push(entry);
    this.maybeWrite().catch((err: unknown) => {
      // The log file went away (disk full, directory removed). Stop queueing
      // rather than retrying on every message.
      this.writeError = err instanceof Error ? err : new Error(String(err));
      this.queue = [];
    });
  }

  private async maybeWrite(): Promise<void> {
    if (this.isWriting || this.queue.length === 0) {
      return;
    }

    this.isWriting = true;
    const messages = this.queue.join("");
    this.queue = [];

    try {
      await fs.appendFile(this.filePath, messages);
    } finally {
      this.isWriting = false;
    }

    await this.maybeWrite();
  }
}

class EmptyLogger implements Logger {
  isLoggingEnabled(): boolean {
    return false;
  }

  log(_message: string): void {
    // No-op
  }
}

function now() {
  const date = new Date();
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hours = String(date.getHours()).padStart(2, "0");
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const seconds = String(date.getSeconds()).padStart(2, "0");
  return `${year}-${month}-${day}T${hours}:${minutes}:${seconds}`;
}

let logger: Logger | undefined;

/**
 * Creates a .log file for this session, but also symlinks lineedit-latest.log
 * to the current log file so you can reliably run:
 *
 * - Mac/Windows: `tail -F "$TMPDIR/lineedit/lineedit-latest.log"`
 * - Linux: `tail -F ~/.local/lineedit/lineedit-latest.log`
 */
export function initLogger(): Logger {
  if (logger) {
    return logger;
  } else if (!process.env["DEBUG"]) {
    logger = new EmptyLogger();
    return logger;
  }

  const isMac = process.platform === "darwin";
  const isWin = process.platform === "win32";

  // On Mac and Windows, os.tmpdir() returns a user-specific folder, so prefer
  // it there. On Linux, use ~/.local/lineedit so logs are not world-readable.
  const logDir =
    isMac || isWin
      ? path.join(os.tmpdir(), "lineedit")
      : path.join(os.homedir(), ".local", "lineedit");
  fsSync.mkdirSync(logDir, { recursive: true });
  const logFile = path.join(logDir, `lineedit-${now()}.log`);
  // Write the empty string so the file exists and can be tail'd.
  fsSync.writeFileSync(logFile, "");

  // Symlink to lineedit-latest.log on UNIX because Windows is funny about
  // symlinks.
  if (!isWin) {
    const latestLink = path.join(logDir, "lineedit-latest.log");
    try {
      fsSync.symlinkSync(logFile, latestLink, "file");
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "EEXIST") {
        fsSync.unlinkSync(latestLink);
        fsSync.symlinkSync(logFile, latestLink, "file");
      } else {
        throw err;
      }
    }
  }

  logger = new AsyncLogger(logFile);
  return logger;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export function log(message: string): void {
  (logger ?? initLogger()).log(message);
}

/**
 * USE SPARINGLY! This function should only be used to guard a call to log() if
 * the log message is large and you want to avoid constructing it if logging is
 * disabled.
 *
 * `log()` is already a no-op if DEBUG is not set, so an extra
 * `isLoggingEnabled()` check is unnecessary.
 */
export function isLoggingEnabled(): boolean {
  return (logger ?? initLogger()).isLoggingEnabled();
}
