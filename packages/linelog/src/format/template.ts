import { formatDateWith, formatInvariantDate } from "@/format/date";
import { FormatError } from "@/utils/errors";

const PLACEHOLDER_PATTERN = /^(\d+)\s*(?:,\s*(-?\d+)\s*)?(?::([^{}]*))?$/;
const NUMBER_FORMAT_PATTERN = /^([DdEeFfGgNnPpRrXx])(\d{0,2})$/;
const CUSTOM_NUMBER_PATTERN = /^(?=.*[0#])[0#,]*(?:\.[0#]*)?$/;
const MAX_ALIGNMENT = 1_000_000;

const isPlainObject = (value: object): boolean => {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * Renders a single argument without a format specifier, independent of the
 * host locale.
 */
export const renderValue = (value: unknown): string => {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (value instanceof Date) return formatInvariantDate(value);
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (typeof value === "symbol") return value.toString();
  if (typeof value === "object" && (Array.isArray(value) || isPlainObject(value))) {
    try {
      return JSON.stringify(value, (_, v) =>
        typeof v === "bigint" ? v.toString() : v,
      );
    } catch {
      return String(value);
    }
  }
  return String(value);
};

const groupThousands = (digits: string) =>
  digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",");

const toFixed = (value: number | bigint, precision: number): string => {
  if (typeof value === "bigint") {
    return precision > 0 ? `${value}.${"0".repeat(precision)}` : `${value}`;
  }
  return value.toFixed(precision);
};

const withGrouping = (fixed: string): string => {
  const negative = fixed.startsWith("-");
  const unsigned = negative ? fixed.slice(1) : fixed;
  const [whole, fraction] = unsigned.split(".");
  const grouped = groupThousands(whole) + (fraction ? `.${fraction}` : "");
  return negative ? `-${grouped}` : grouped;
};

const isIntegral = (value: number | bigint) =>
  typeof value === "bigint" || Number.isInteger(value);

/**
 * Rewrites a JS exponent (`1.5e+3`) in the invariant form (`1.5E+003`).
 */
const withExponent = (
  text: string,
  marker: "E" | "e",
  minExponentDigits: number,
): string => {
  const [mantissa, exponent] = text.split("e");
  if (exponent === undefined) return mantissa;
  const sign = exponent.startsWith("-") ? "-" : "+";
  const digits = exponent.replace(/^[+-]/, "").padStart(minExponentDigits, "0");
  return `${mantissa}${marker}${sign}${digits}`;
};

const formatGeneral = (
  value: number | bigint,
  precision: number | undefined,
  marker: "E" | "e",
): string => {
  if (typeof value === "bigint" && !precision) return value.toString();
  const text = precision ? Number(value).toPrecision(precision) : String(value);
  const [mantissa, exponent] = text.split("e");
  const trimmed = mantissa.includes(".")
    ? mantissa.replace(/\.?0+$/, "")
    : mantissa;
  return withExponent(
    exponent === undefined ? trimmed : `${trimmed}e${exponent}`,
    marker,
    2,
  );
};

/**
 * Custom patterns built from `0` (required digit), `#` (optional digit),
 * `,` (thousands grouping) and `.` (decimal point), e.g. `#,##0.00`.
 */
const formatCustom = (value: number | bigint, format: string): string => {
  const [intPattern, fracPattern = ""] = format.split(".");
  const grouping = intPattern.includes(",");
  const minIntegerDigits = intPattern.replace(/[^0]/g, "").length;
  const minFractionDigits = /^0*/.exec(fracPattern)?.[0].length ?? 0;

  const fixed = toFixed(value, fracPattern.length);
  const negative = fixed.startsWith("-");
  const [rawWhole, rawFraction = ""] = (negative ? fixed.slice(1) : fixed).split(".");

  let fraction = rawFraction;
  while (fraction.length > minFractionDigits && fraction.endsWith("0")) {
    fraction = fraction.slice(0, -1);
  }
  let whole = rawWhole.replace(/^0+/, "").padStart(minIntegerDigits, "0");
  if (grouping) whole = groupThousands(whole);

  const body = whole + (fraction ? `.${fraction}` : "");
  return negative && /[1-9]/.test(body) ? `-${body}` : body;
};

const formatNumber = (
  value: number | bigint,
  format: string,
  template: string,
): string => {
  const match = NUMBER_FORMAT_PATTERN.exec(format);
  if (!match) {
    if (CUSTOM_NUMBER_PATTERN.test(format)) {
      if (typeof value === "number" && !Number.isFinite(value)) {
        return String(value);
      }
      return formatCustom(value, format);
    }
    throw new FormatError(
      "invalid-format",
      `Unsupported number format "${format}"`,
      template,
    );
  }
  const [, specifier, digits] = match;
  const precision = digits === "" ? undefined : Number(digits);

  if (typeof value === "number" && !Number.isFinite(value)) {
    return String(value);
  }

  switch (specifier) {
    case "D":
    case "d": {
      if (!isIntegral(value)) {
        throw new FormatError(
          "invalid-format",
          `Format "${format}" requires an integer (received: ${value})`,
          template,
        );
      }
      const text = value.toString();
      const negative = text.startsWith("-");
      const padded = (negative ? text.slice(1) : text).padStart(precision ?? 0, "0");
      return negative ? `-${padded}` : padded;
    }
    case "E":
    case "e":
      return withExponent(
        Number(value).toExponential(precision ?? 6),
        specifier === "e" ? "e" : "E",
        3,
      );
    case "F":
    case "f":
      return toFixed(value, precision ?? 2);
    case "G":
    case "g":
      return formatGeneral(value, precision, specifier === "g" ? "e" : "E");
    case "N":
    case "n":
      return withGrouping(toFixed(value, precision ?? 2));
    case "P":
    case "p":
      return `${withGrouping((Number(value) * 100).toFixed(precision ?? 2))} %`;
    case "R":
    case "r":
      return formatGeneral(value, undefined, "E");
    default: {
      if (!isIntegral(value) || value < 0) {
        throw new FormatError(
          "invalid-format",
          `Format "${format}" requires a non-negative integer (received: ${value})`,
          template,
        );
      }
      const hex = value.toString(16).padStart(precision ?? 0, "0");
      return specifier === "X" ? hex.toUpperCase() : hex;
    }
  }
};

const formatValue = (
  value: unknown,
  format: string | undefined,
  template: string,
): string => {
  if (!format) return renderValue(value);

  if (typeof value === "number" || typeof value === "bigint") {
    return formatNumber(value, format, template);
  }

  if (value instanceof Date) {
    const rendered = formatDateWith(value, format);
    if (rendered === undefined) {
      throw new FormatError(
        "invalid-format",
        `Unsupported date format "${format}"`,
        template,
      );
    }
    return rendered;
  }

  return renderValue(value);
};

const renderPlaceholder = (
  placeholder: string,
  args: readonly unknown[],
  template: string,
): string => {
  const match = PLACEHOLDER_PATTERN.exec(placeholder);
  if (!match) {
    throw new FormatError(
      "invalid-template",
      `Invalid placeholder "{${placeholder}}"`,
      template,
    );
  }
  const [, rawIndex, rawAlignment, format] = match;
  const index = Number(rawIndex);

  if (index >= args.length) {
    throw new FormatError(
      "missing-argument",
      `Placeholder {${index}} has no matching argument (${args.length} supplied)`,
      template,
    );
  }

  const text = formatValue(args[index], format, template);
  if (rawAlignment === undefined) return text;

  const width = Number(rawAlignment);
  if (Math.abs(width) >= MAX_ALIGNMENT) {
    throw new FormatError(
      "invalid-template",
      `Alignment ${width} in "{${placeholder}}" exceeds ${MAX_ALIGNMENT - 1}`,
      template,
    );
  }
  return width >= 0 ? text.padStart(width) : text.padEnd(-width);
};

/**
 * Interpolates a composite template such as `"{0} items in {1,-8}"`.
 *
 * Placeholders take the form `{index[,alignment][:format]}`; `{{` and `}}`
 * are literal braces. Rendering never depends on the host locale.
 *
 * @example
 * ```typescript
 * formatTemplate("{0} items", [5]); // "5 items"
 * formatTemplate("{0:N2}", [1234.5]); // "1,234.50"
 * ```
 *
 * @throws {FormatError} When the template is malformed or an argument is
 * missing. No partial output is returned.
 */
export const formatTemplate = (
  template: string,
  args: readonly unknown[],
): string => {
  let output = "";
  let position = 0;

  while (position < template.length) {
    const char = template[position];

    if (char === "}") {
      if (template[position + 1] === "}") {
        output += "}";
        position += 2;
        continue;
      }
      throw new FormatError(
        "invalid-template",
        `Unexpected "}" at position ${position}`,
        template,
      );
    }

    if (char !== "{") {
      output += char;
      position += 1;
      continue;
    }

    if (template[position + 1] === "{") {
      output += "{";
      position += 2;
      continue;
    }

    const close = template.indexOf("}", position + 1);
    if (close === -1) {
      throw new FormatError(
        "invalid-template",
        `Unclosed placeholder at position ${position}`,
        template,
      );
    }

    output += renderPlaceholder(template.slice(position + 1, close), args, template);
    position = close + 1;
  }

  return output;
};
