import pc from "picocolors";
import { z, ZodError } from "zod";

export class LinelogError extends Error {
  type?: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

const ConfigErrorTypeSchema = z.enum(["invalid-config", "invalid-env"]);
export type ConfigErrorType = z.infer<typeof ConfigErrorTypeSchema>;

export class ConfigError extends LinelogError {
  type: ConfigErrorType;

  constructor(type: ConfigErrorType, message: string) {
    super(message);
    this.type = ConfigErrorTypeSchema.parse(type);
  }
}

const FormatErrorTypeSchema = z.enum([
  "invalid-format",
  "invalid-template",
  "missing-argument",
]);
export type FormatErrorType = z.infer<typeof FormatErrorTypeSchema>;

export class FormatError extends LinelogError {
  type: FormatErrorType;
  template: string;

  constructor(type: FormatErrorType, message: string, template: string) {
    super(message);
    this.type = FormatErrorTypeSchema.parse(type);
    this.template = template;
  }
}

const LogFileErrorTypeSchema = z.enum([
  "close-failed",
  "open-failed",
  "write-failed",
]);
export type LogFileErrorType = z.infer<typeof LogFileErrorTypeSchema>;

export class LogFileError extends LinelogError {
  type: LogFileErrorType;
  path: string;

  constructor(
    type: LogFileErrorType,
    message: string,
    options: { path: string; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.type = LogFileErrorTypeSchema.parse(type);
    this.path = options.path;
  }
}

const StateErrorTypeSchema = z.enum(["closed", "no-instance", "path-in-use"]);
export type StateErrorType = z.infer<typeof StateErrorTypeSchema>;

export class StateError extends LinelogError {
  type: StateErrorType;

  constructor(type: StateErrorType, message: string) {
    super(message);
    this.type = StateErrorTypeSchema.parse(type);
  }
}

export const getErrorDetails = (error: unknown) => {
  const metadata = {
    message: error instanceof Error ? error.message : String(error),
    name: error instanceof Error ? error.name : "Unknown",
    type: error instanceof LinelogError ? error.type : undefined,
    code: isErrnoException(error) ? error.code : undefined,
    stack:
      error instanceof Error
        ? error.stack?.split("\n").slice(1, 4).join("\n")
        : undefined,
  };

  return Object.fromEntries(
    Object.entries(metadata).filter(
      ([_, value]) => value !== null && value !== undefined,
    ),
  );
};

export const isErrnoException = (
  error: unknown,
): error is NodeJS.ErrnoException =>
  error instanceof Error && typeof Reflect.get(error, "code") === "string";

export const formatZodError = <T>(
  error: ZodError<T>,
  label: string,
): string => {
  const errorsString = error.errors
    .map((err) => {
      const path = err.path.join(".");
      const prefix = path ? `${pc.cyan(path)}: ` : "";
      const receivedInfo =
        "received" in err ? ` (received: ${JSON.stringify(err.received)})` : "";
      return `${prefix}${err.message}${receivedInfo}`;
    })
    .join("\n");

  return `${label}\n${errorsString}`;
};
