import { closeSync, mkdirSync, openSync, writeSync } from "fs";
import path from "path";
import { LogFileError, StateError } from "@/utils/errors";

/**
 * Append-only handle on the log file.
 *
 * The file is opened with the `a` flag, so every write lands at the current
 * end of file even when another process truncates or appends to it. Other
 * processes may read or tail the file while it is open.
 *
 * @private
 */
export class AppendOnlyFileSink {
  readonly path: string;
  private fd: number | null;

  /**
   * @throws {LogFileError} When the file or its directory cannot be created
   */
  constructor(filePath: string) {
    this.path = path.resolve(filePath);
    try {
      mkdirSync(path.dirname(this.path), { recursive: true });
      this.fd = openSync(this.path, "a");
    } catch (error) {
      throw new LogFileError(
        "open-failed",
        `Unable to open log file ${this.path}`,
        { path: this.path, cause: error },
      );
    }
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  /**
   * Appends the text, looping until every byte is written.
   *
   * @throws {LogFileError} When the write fails
   * @throws {StateError} When the sink has been closed
   */
  write(text: string): void {
    if (this.fd === null) {
      throw new StateError("closed", `Log file ${this.path} is closed`);
    }
    const buffer = Buffer.from(text, "utf8");
    let offset = 0;
    try {
      while (offset < buffer.length) {
        offset += writeSync(this.fd, buffer, offset, buffer.length - offset);
      }
    } catch (error) {
      throw new LogFileError(
        "write-failed",
        `Unable to write to log file ${this.path}`,
        { path: this.path, cause: error },
      );
    }
  }

  /**
   * @throws {LogFileError} When the descriptor cannot be released; the sink
   * counts as closed either way
   */
  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
    } catch (error) {
      throw new LogFileError(
        "close-failed",
        `Unable to close log file ${this.path}`,
        { path: this.path, cause: error },
      );
    }
  }
}
