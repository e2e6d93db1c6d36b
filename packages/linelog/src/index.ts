/**
 * Logging entry point: the process-wide {@link LogWriter} and a facade that
 * logs through it.
 *
 * @module
 *
 * @example
 * ```typescript
 * import { log, shutdownLogWriter } from "linelog";
 *
 * log.info("Started with {0} profiles", profiles.length);
 * log.exception("Could not load profile", error);
 * shutdownLogWriter();
 * ```
 */

import pc from "picocolors";
import { loadLogWriterConfig } from "@/config/locations";
import { LogWriterConfigInput } from "@/log/config";
import { LogWriter, LogWriterOptions } from "@/log/writer";
import { getErrorDetails, StateError } from "@/utils/errors";

export { LogWriter };
export type { LogWriterOptions, LogWriterState } from "@/log/writer";
export {
  DEFAULT_FLUSH_THRESHOLD,
  LogWriterConfigSchema,
  parseLogWriterConfig,
  SEVERITIES,
  SEVERITY_LABELS,
} from "@/log/config";
export type {
  LogWriterConfig,
  LogWriterConfigInput,
  Severity,
} from "@/log/config";
export type { EchoOutput } from "@/log/echo";
export { renderEntry, formatTimestamp } from "@/log/entry";
export { formatTemplate } from "@/format/template";
export { describeError } from "@/format/error";
export { loadLogWriterConfig, resolveLogFilePath } from "@/config/locations";
export {
  ConfigError,
  FormatError,
  LinelogError,
  LogFileError,
  StateError,
} from "@/utils/errors";

let instance: LogWriter | null = null;
let exitHandlerRegistered = false;

/**
 * Gets the live writer, opening a new one on first use or after
 * {@link shutdownLogWriter}.
 *
 * Configuration comes from `.env` files and `LINELOG_*` variables, with
 * `config` taking precedence. Both arguments are ignored while a writer is
 * live.
 *
 * @throws {LogFileError} When the log file cannot be opened
 * @throws {ConfigError} When the resolved configuration is invalid
 */
export const getLogWriter = (
  config?: Partial<LogWriterConfigInput>,
  options?: LogWriterOptions,
): LogWriter => {
  if (instance && instance.state === "open") {
    return instance;
  }
  instance = new LogWriter(loadLogWriterConfig({ overrides: config }), options);
  return instance;
};

/**
 * Flushes and closes the live writer; the next {@link getLogWriter} call
 * reopens the file in append mode.
 *
 * @throws {StateError} When there is no live writer
 */
export const shutdownLogWriter = (): void => {
  if (!instance || instance.state !== "open") {
    instance = null;
    throw new StateError("no-instance", "No live log writer to shut down");
  }
  const writer = instance;
  instance = null;
  writer.shutdown();
};

function exception(error: unknown): void;
function exception(message: string, error: unknown): void;
function exception(...args: [unknown] | [string, unknown]): void {
  const writer = getLogWriter();
  if (args.length === 1) {
    writer.logException(args[0]);
  } else {
    writer.logException(args[0], args[1]);
  }
}

/**
 * Logs through the live writer, creating it when needed.
 */
export const log = {
  verbose: (message: string, ...args: unknown[]) =>
    getLogWriter().verbose(message, ...args),
  debug: (message: string, ...args: unknown[]) =>
    getLogWriter().debug(message, ...args),
  info: (message: string, ...args: unknown[]) =>
    getLogWriter().info(message, ...args),
  warn: (message: string, ...args: unknown[]) =>
    getLogWriter().warn(message, ...args),
  error: (message: string, ...args: unknown[]) =>
    getLogWriter().error(message, ...args),
  exception,
};

/**
 * Shuts the live writer down when the process exits, so queued entries
 * reach the file. Registers the handler once.
 *
 * @returns Whether a handler was registered by this call
 */
export const flushOnExit = (): boolean => {
  if (exitHandlerRegistered) return false;

  process.on("exit", () => {
    if (!instance || instance.state !== "open") return;
    try {
      shutdownLogWriter();
    } catch (error) {
      console.error(pc.red("Failed to flush log on exit"), getErrorDetails(error));
    }
  });

  exitHandlerRegistered = true;
  return true;
};
