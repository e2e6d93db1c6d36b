import { EOL } from "os";

const MAX_CAUSE_DEPTH = 10;

const describeOne = (error: unknown): string => {
  if (!(error instanceof Error)) return String(error);
  return error.stack ?? `${error.name}: ${error.message}`;
};

/**
 * Full description of a thrown value: its stack trace (or `Name: message`
 * when none was captured) followed by each chained `cause`.
 *
 * @example
 * ```typescript
 * describeError(new Error("outer", { cause: new Error("inner") }));
 * // Error: outer
 * //     at ...
 * // Caused by: Error: inner
 * //     at ...
 * ```
 */
export const describeError = (error: unknown): string => {
  const parts = [describeOne(error)];
  const seen = new Set<unknown>([error]);
  let current = error;

  while (current instanceof Error && current.cause !== undefined) {
    const cause: unknown = current.cause;
    if (seen.has(cause) || seen.size > MAX_CAUSE_DEPTH) break;
    seen.add(cause);
    parts.push(`Caused by: ${describeOne(cause)}`);
    current = cause;
  }

  if (error instanceof AggregateError) {
    error.errors.forEach((inner: unknown, index) => {
      parts.push(`[${index}] ${describeError(inner)}`);
    });
  }

  return parts.join(EOL);
};
