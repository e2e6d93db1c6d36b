import { EOL } from "os";
import path from "path";
import { describeError } from "@/format/error";
import { formatTemplate } from "@/format/template";
import {
  LogWriterConfig,
  LogWriterConfigInput,
  parseLogWriterConfig,
  Severity,
} from "@/log/config";
import { DiagnosticEcho, EchoOutput } from "@/log/echo";
import { renderEntry } from "@/log/entry";
import { AppendOnlyFileSink } from "@/log/sink";
import { StateError } from "@/utils/errors";

export type LogWriterState = "open" | "closed";

export interface LogWriterOptions {
  /** Replaces the console as the diagnostic echo target. */
  echoOutput?: EchoOutput;
  /** Clock used for entry timestamps. */
  now?: () => Date;
}

/**
 * Buffered writer for a single append-only log file.
 *
 * Entries are rendered as `<timestamp> <severity> | <message>`, queued in
 * call order and written in batches: whenever the queue reaches
 * `flushThreshold` entries, on {@link LogWriter.flush} and on
 * {@link LogWriter.shutdown}. Every queue or file operation runs to
 * completion synchronously, so concurrent callers on the event loop are
 * serialized and lines are never interleaved.
 *
 * Verbose entries are accepted and dropped before any formatting.
 *
 * @class
 * @example
 * ```typescript
 * const writer = new LogWriter({ path: "logs/app.log" });
 * writer.info("{0} items synced", 12);
 * writer.logException("Sync failed", error);
 * writer.shutdown();
 * ```
 *
 * @see {@link getLogWriter} for the process-wide instance
 */
export class LogWriter {
  private static readonly openPaths = new Set<string>();

  readonly config: LogWriterConfig;
  private readonly sink: AppendOnlyFileSink;
  private readonly echo: DiagnosticEcho;
  private readonly now: () => Date;
  private readonly pending: string[] = [];
  private _state: LogWriterState = "open";

  /**
   * @throws {ConfigError} When the configuration is invalid
   * @throws {StateError} When another live writer owns the same file
   * @throws {LogFileError} When the log file cannot be opened
   */
  constructor(config: LogWriterConfigInput, options: LogWriterOptions = {}) {
    this.config = parseLogWriterConfig(config);
    const filePath = path.resolve(this.config.path);
    if (LogWriter.openPaths.has(filePath)) {
      throw new StateError(
        "path-in-use",
        `Log file ${filePath} is already owned by a live writer`,
      );
    }
    this.sink = new AppendOnlyFileSink(filePath);
    LogWriter.openPaths.add(filePath);
    this.echo = new DiagnosticEcho(options.echoOutput, this.config.echo);
    this.now = options.now ?? (() => new Date());
  }

  get path(): string {
    return this.sink.path;
  }

  get state(): LogWriterState {
    return this._state;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /** Echo lines that could not be delivered. */
  get droppedEchoCount(): number {
    return this.echo.dropped;
  }

  /**
   * Renders and queues one entry. With arguments, `message` is a composite
   * template (`"{0} items"`); without, it is written as is.
   *
   * @throws {FormatError} When the template does not match the arguments;
   * nothing is queued
   * @throws {LogFileError} When a threshold flush fails to write
   * @throws {StateError} When the writer has been shut down
   */
  log(severity: Severity, message: string, ...args: unknown[]): void {
    if (severity === "verbose") return;
    this.assertOpen();

    const text = args.length > 0 ? formatTemplate(message, args) : message;
    const entry = renderEntry(severity, text, this.now());
    this.pending.push(entry);
    this.echo.emit(severity, entry);

    if (this.pending.length >= this.config.flushThreshold) {
      this.flush();
    }
  }

  verbose(message: string, ...args: unknown[]): void {
    this.log("verbose", message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log("debug", message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log("info", message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log("warn", message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log("error", message, ...args);
  }

  /**
   * Logs a thrown value at error severity, with its stack trace and chained
   * causes, optionally preceded by a message line.
   */
  logException(error: unknown): void;
  logException(message: string, error: unknown): void;
  logException(...args: [unknown] | [string, unknown]): void {
    const body =
      args.length === 1
        ? describeError(args[0])
        : `${args[0]}${EOL}${describeError(args[1])}`;
    this.log("error", body);
  }

  /**
   * Writes every queued entry, oldest first, in a single append. The queue
   * is only cleared once the write succeeds.
   *
   * @throws {LogFileError} When the write fails
   * @throws {StateError} When the writer has been shut down
   */
  flush(): void {
    this.assertOpen();
    if (this.pending.length === 0) return;

    this.sink.write(this.pending.map((entry) => entry + EOL).join(""));
    this.pending.length = 0;
  }

  /**
   * Flushes, appends one blank line terminator, closes the file and frees
   * its path for a new writer.
   *
   * @throws {StateError} When the writer was already shut down
   * @throws {LogFileError} When the final write or the close fails. The
   * writer is closed and its path released regardless; a write failure is
   * reported ahead of a close failure.
   */
  shutdown(): void {
    this.assertOpen();
    let written = false;
    try {
      this.flush();
      this.sink.write(EOL);
      written = true;
    } finally {
      this._state = "closed";
      LogWriter.openPaths.delete(this.sink.path);
      this.closeSink(written);
    }
  }

  private closeSink(reportFailure: boolean): void {
    try {
      this.sink.close();
    } catch (error) {
      // otherwise the write failure is already propagating
      if (reportFailure) throw error;
    }
  }

  private assertOpen(): void {
    if (this._state === "closed") {
      throw new StateError("closed", `Log writer for ${this.path} is closed`);
    }
  }
}
