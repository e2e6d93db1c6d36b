import { formatInvariantDate } from "@/format/date";
import { SEVERITY_LABELS, Severity } from "@/log/config";

export const SEVERITY_COLUMN_WIDTH = 7;

/** Timestamp column of a rendered entry, e.g. `03/14/2025 09:26:53`. */
export const formatTimestamp = (date: Date): string =>
  formatInvariantDate(date);

/**
 * Renders one log line: `<timestamp> <severity> | <message>`, with the
 * severity name padded to a fixed column.
 */
export const renderEntry = (
  severity: Severity,
  message: string,
  date: Date = new Date(),
): string =>
  `${formatTimestamp(date)} ${SEVERITY_LABELS[severity].padEnd(SEVERITY_COLUMN_WIDTH)} | ${message}`;
