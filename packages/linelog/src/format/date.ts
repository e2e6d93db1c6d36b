const pad = (value: number, width = 2) => String(value).padStart(width, "0");

const isInvalidDate = (date: Date) => Number.isNaN(date.getTime());

/** `MM/dd/yyyy`, local time. */
export const formatInvariantDay = (date: Date): string =>
  `${pad(date.getMonth() + 1)}/${pad(date.getDate())}/${pad(date.getFullYear(), 4)}`;

/** `HH:mm:ss`, local time, 24-hour clock. */
export const formatInvariantTime = (date: Date): string =>
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

/**
 * Renders a date the same way on every host, independent of locale
 * settings: `MM/dd/yyyy HH:mm:ss` in local time.
 */
export const formatInvariantDate = (date: Date): string => {
  if (isInvalidDate(date)) return "Invalid Date";
  return `${formatInvariantDay(date)} ${formatInvariantTime(date)}`;
};

/**
 * Applies a standard date format specifier.
 *
 * Supported: `G` (general, the default), `d`, `t`, `T`, `s`, `o`/`O`.
 *
 * @returns The rendered date, or `undefined` for an unsupported specifier
 */
export const formatDateWith = (
  date: Date,
  format: string,
): string | undefined => {
  if (isInvalidDate(date)) return "Invalid Date";

  switch (format) {
    case "G":
      return formatInvariantDate(date);
    case "d":
      return formatInvariantDay(date);
    case "t":
      return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
    case "T":
      return formatInvariantTime(date);
    case "s":
      return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}T${formatInvariantTime(date)}`;
    case "o":
    case "O":
      return date.toISOString();
    default:
      return undefined;
  }
};
