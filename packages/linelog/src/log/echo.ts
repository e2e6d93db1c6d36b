import pc from "picocolors";
import { Severity } from "@/log/config";

export type EchoOutput = (severity: Severity, line: string) => void;

const CONSOLE_METHODS = {
  verbose: "log",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
} as const;

const COLORS: Record<Severity, (text: string) => string> = {
  verbose: pc.gray,
  debug: pc.green,
  info: pc.cyan,
  warn: pc.yellow,
  error: pc.red,
};

export const consoleEchoOutput: EchoOutput = (severity, line) => {
  console[CONSOLE_METHODS[severity]](COLORS[severity](line));
};

/**
 * Best-effort copy of every rendered entry to a diagnostic output (the
 * console by default).
 *
 * Lines are handed over on a detached task after the caller returns. They
 * may arrive late, out of order relative to the file, or not at all; a
 * failing output only increments {@link DiagnosticEcho.dropped}.
 *
 * @private
 */
export class DiagnosticEcho {
  private _dropped = 0;

  constructor(
    private readonly output: EchoOutput = consoleEchoOutput,
    readonly enabled = true,
  ) {}

  get dropped(): number {
    return this._dropped;
  }

  emit(severity: Severity, line: string): void {
    if (!this.enabled) return;
    try {
      setImmediate(() => this.deliver(severity, line)).unref();
    } catch {
      this._dropped += 1;
    }
  }

  private deliver(severity: Severity, line: string): void {
    try {
      this.output(severity, line);
    } catch {
      this._dropped += 1;
    }
  }
}
