import { z } from "zod";
import { ConfigError, formatZodError } from "@/utils/errors";

/**
 * Severity and writer configuration types and schema.
 *
 * @example
 * ```typescript
 * const config = parseLogWriterConfig({
 *   path: "/var/log/app/app.log",
 *   flushThreshold: 100,
 * });
 * ```
 *
 * @see {@link LogWriter} for usage
 */
export const SEVERITIES = [
  "verbose",
  "debug",
  "info",
  "warn",
  "error",
] as const;
export type Severity = (typeof SEVERITIES)[number];

export const SEVERITY_LABELS: Record<Severity, string> = {
  verbose: "Verbose",
  debug: "Debug",
  info: "Info",
  warn: "Warn",
  error: "Error",
};

export const DEFAULT_FLUSH_THRESHOLD = 100;

export const LogWriterConfigSchema = z
  .object({
    path: z.string().min(1, "must not be empty"),
    flushThreshold: z.number().int().positive().default(DEFAULT_FLUSH_THRESHOLD),
    echo: z.boolean().default(true),
  })
  .strict();

export type LogWriterConfig = z.infer<typeof LogWriterConfigSchema>;
export type LogWriterConfigInput = z.input<typeof LogWriterConfigSchema>;

/**
 * Validates writer configuration and fills in defaults.
 *
 * @throws {ConfigError} When the configuration does not match the schema
 */
export const parseLogWriterConfig = (input: unknown): LogWriterConfig => {
  const result = LogWriterConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      "invalid-config",
      formatZodError(result.error, "Invalid log writer config"),
    );
  }
  return result.data;
};
