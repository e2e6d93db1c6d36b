import { describe, expect, it } from "vitest";
import { formatTemplate, renderValue } from "@/format/template";
import { FormatError } from "@/utils/errors";

const expectFormatError = (fn: () => unknown, type: FormatError["type"]) => {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(FormatError);
    if (error instanceof FormatError) {
      expect(error.type).toBe(type);
    }
    return;
  }
  throw new Error("Expected a FormatError");
};

describe("formatTemplate", () => {
  describe("placeholders", () => {
    it("interpolates indexed arguments", () => {
      expect(formatTemplate("{0} items", [5])).toBe("5 items");
      expect(formatTemplate("{1} before {0}", ["a", "b"])).toBe("b before a");
    });

    it("reuses an argument and ignores unused ones", () => {
      expect(formatTemplate("{0}-{0}", [7, 8])).toBe("7-7");
    });

    it("leaves text without placeholders untouched", () => {
      expect(formatTemplate("plain text", [])).toBe("plain text");
    });

    it("unescapes doubled braces", () => {
      expect(formatTemplate("{{literal}} {0}", ["x"])).toBe("{literal} x");
    });

    it("tolerates whitespace after the index", () => {
      expect(formatTemplate("{0 }", ["x"])).toBe("x");
      expect(formatTemplate("{0 , 3}", ["x"])).toBe("  x");
    });

    it("pads to a positive alignment on the left", () => {
      expect(formatTemplate("[{0,5}]", ["ab"])).toBe("[   ab]");
    });

    it("pads to a negative alignment on the right", () => {
      expect(formatTemplate("[{0,-5}]", ["ab"])).toBe("[ab   ]");
    });
  });

  describe("errors", () => {
    it("rejects an index without an argument", () => {
      expectFormatError(() => formatTemplate("{0} and {1}", [5]), "missing-argument");
    });

    it("rejects a template with no arguments for its placeholder", () => {
      expectFormatError(() => formatTemplate("{0}", []), "missing-argument");
    });

    it.each([["{name}"], ["{0"], ["value }"], ["{-1}"], ["{}"], ["{ 0}"]])(
      "rejects malformed template %s",
      (template) => {
        expectFormatError(() => formatTemplate(template, [1]), "invalid-template");
      },
    );

    it.each([["{0,1000000}"], ["{0,-1000000}"], ["{0,2000000000}"]])(
      "rejects alignment %s beyond the supported width",
      (template) => {
        expectFormatError(() => formatTemplate(template, [1]), "invalid-template");
      },
    );

    it("accepts the widest supported alignment", () => {
      expect(formatTemplate("{0,999999}", ["x"])).toHaveLength(999999);
    });

    it("rejects an unknown number format", () => {
      expectFormatError(() => formatTemplate("{0:Q}", [1]), "invalid-format");
    });

    it("rejects an integer format applied to a fraction", () => {
      expectFormatError(() => formatTemplate("{0:D}", [1.5]), "invalid-format");
    });

    it("rejects an unknown date format", () => {
      expectFormatError(
        () => formatTemplate("{0:yyyy}", [new Date(2024, 0, 1)]),
        "invalid-format",
      );
    });

    it("keeps the template on the error", () => {
      try {
        formatTemplate("{3}", []);
        expect.unreachable();
      } catch (error) {
        expect(error instanceof FormatError && error.template).toBe("{3}");
      }
    });
  });

  describe("numbers", () => {
    it("renders without grouping or locale separators", () => {
      expect(formatTemplate("{0}", [1234567.5])).toBe("1234567.5");
      expect(formatTemplate("{0}", [-42])).toBe("-42");
    });

    it("pads integers with D", () => {
      expect(formatTemplate("{0:D4}", [42])).toBe("0042");
      expect(formatTemplate("{0:D4}", [-42])).toBe("-0042");
    });

    it("fixes decimals with F", () => {
      expect(formatTemplate("{0:F2}", [3.14159])).toBe("3.14");
      expect(formatTemplate("{0:F}", [3])).toBe("3.00");
    });

    it("groups thousands with N", () => {
      expect(formatTemplate("{0:N2}", [1234567.891])).toBe("1,234,567.89");
      expect(formatTemplate("{0:N0}", [-1234])).toBe("-1,234");
    });

    it("renders hexadecimal with X and x", () => {
      expect(formatTemplate("{0:X}", [255])).toBe("FF");
      expect(formatTemplate("{0:x4}", [255])).toBe("00ff");
    });

    it("renders the general form with G", () => {
      expect(formatTemplate("{0:G}", [1.5])).toBe("1.5");
      expect(formatTemplate("{0:G}", [1e21])).toBe("1E+21");
      expect(formatTemplate("{0:G3}", [1234.5])).toBe("1.23E+03");
      expect(formatTemplate("{0:g3}", [1234.5])).toBe("1.23e+03");
      expect(formatTemplate("{0:G5}", [0.5])).toBe("0.5");
    });

    it("renders scientific notation with E", () => {
      expect(formatTemplate("{0:E2}", [1234.5])).toBe("1.23E+003");
      expect(formatTemplate("{0:e2}", [1234.5])).toBe("1.23e+003");
      expect(formatTemplate("{0:E}", [0.00125])).toBe("1.250000E-003");
    });

    it("renders round-trip values with R", () => {
      expect(formatTemplate("{0:R}", [1234.5])).toBe("1234.5");
      expect(formatTemplate("{0:r}", [0.1])).toBe("0.1");
    });

    it.each([
      ["0.00", 1234.5, "1234.50"],
      ["#,##0", 1234.5, "1,235"],
      ["#,##0.00", -1234567.891, "-1,234,567.89"],
      ["000", 7, "007"],
      ["#.##", 0.5, ".5"],
      ["0.0#", 2, "2.0"],
      ["0.0#", 2.125, "2.13"],
    ] as const)("applies custom pattern %s to %s", (format, value, expected) => {
      expect(formatTemplate(`{0:${format}}`, [value])).toBe(expected);
    });

    it("renders percentages with P", () => {
      expect(formatTemplate("{0:P1}", [0.125])).toBe("12.5 %");
    });

    it("handles bigint arguments", () => {
      expect(formatTemplate("{0:N0}", [12345678901234567890n])).toBe(
        "12,345,678,901,234,567,890",
      );
    });

    it("renders non-finite numbers as their names", () => {
      expect(formatTemplate("{0:F2}", [Number.NaN])).toBe("NaN");
    });

    it("combines alignment and format", () => {
      expect(formatTemplate("[{0,6:F1}]", [2.5])).toBe("[   2.5]");
    });
  });

  describe("dates", () => {
    const date = new Date(2024, 2, 5, 7, 8, 9);

    it("renders dates in the invariant general format", () => {
      expect(formatTemplate("{0}", [date])).toBe("03/05/2024 07:08:09");
    });

    it.each([
      ["d", "03/05/2024"],
      ["t", "07:08"],
      ["T", "07:08:09"],
      ["s", "2024-03-05T07:08:09"],
      ["G", "03/05/2024 07:08:09"],
    ])("applies the %s specifier", (format, expected) => {
      expect(formatTemplate(`{0:${format}}`, [date])).toBe(expected);
    });

    it("renders o as ISO 8601", () => {
      expect(formatTemplate("{0:o}", [date])).toBe(date.toISOString());
    });
  });

  it("ignores format strings on other values", () => {
    expect(formatTemplate("{0:X}", ["abc"])).toBe("abc");
  });
});

describe("renderValue", () => {
  it("renders null and undefined as empty text", () => {
    expect(renderValue(null)).toBe("");
    expect(renderValue(undefined)).toBe("");
  });

  it("renders booleans", () => {
    expect(renderValue(true)).toBe("true");
  });

  it("renders plain objects and arrays as JSON", () => {
    expect(renderValue({ a: 1, b: "two" })).toBe('{"a":1,"b":"two"}');
    expect(renderValue([1, 2])).toBe("[1,2]");
  });

  it("renders bigint values inside objects", () => {
    expect(renderValue({ id: 10n })).toBe('{"id":"10"}');
  });

  it("falls back to String for cyclic objects", () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    expect(renderValue(cyclic)).toBe("[object Object]");
  });

  it("renders errors as name and message", () => {
    expect(renderValue(new TypeError("bad input"))).toBe("TypeError: bad input");
  });

  it("uses toString for class instances", () => {
    expect(renderValue(new URL("https://example.com/a"))).toBe(
      "https://example.com/a",
    );
  });
});
