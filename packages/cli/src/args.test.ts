import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { ABSORPTION_HINTS, createCarbohydrate } from "@glucolog/diabetes";
import {
  oneOf,
  parseEventType,
  parseInteger,
  parseNumber,
  parseRange,
  parseTimestamp,
  requireValue,
} from "./args.js";

describe("requireValue", () => {
  it("unwraps a valid value", () => {
    expect(requireValue(createCarbohydrate(45))).toEqual({ kind: "Carbohydrate", grams: 45 });
  });

  it("fails the option with the domain message", () => {
    expect(() => requireValue(createCarbohydrate(400))).toThrow(
      new InvalidArgumentError("Carbohydrates must be a whole number between 0 and 300 grams.")
    );
  });
});

describe("parseNumber / parseInteger", () => {
  it("parses numbers", () => {
    expect(parseNumber("10.5")).toBe(10.5);
    expect(parseInteger("45")).toBe(45);
  });

  it("rejects blanks, text and fractions where whole numbers are required", () => {
    expect(() => parseNumber("")).toThrow("Not a number.");
    expect(() => parseNumber("ten")).toThrow("Not a number.");
    expect(() => parseInteger("2.5")).toThrow("Not a whole number.");
  });
});

describe("parseTimestamp", () => {
  it("accepts ISO dates and Unix milliseconds", () => {
    expect(parseTimestamp("2024-02-08T12:00:00Z")).toBe(1707393600000);
    expect(parseTimestamp("1707393600000")).toBe(1707393600000);
  });

  it("rejects anything else", () => {
    expect(() => parseTimestamp("yesterday")).toThrow("Not a date or timestamp.");
  });
});

describe("parseRange", () => {
  it("accepts allowed ranges", () => {
    expect(parseRange("12")).toBe(12);
  });

  it("lists the allowed ranges on failure", () => {
    expect(() => parseRange("7")).toThrow("Range must be one of: 1, 3, 5, 8, 12, 24 hours.");
  });
});

describe("parseEventType", () => {
  it("accepts event types exactly", () => {
    expect(parseEventType("Insulin")).toBe("Insulin");
    expect(() => parseEventType("meal")).toThrow(
      "Type must be one of: Food, Insulin, Exercise, Note."
    );
  });
});

describe("oneOf", () => {
  it("matches case-insensitively and returns the canonical value", () => {
    const parse = oneOf(ABSORPTION_HINTS);
    expect(parse("slow")).toBe("Slow");
    expect(() => parse("medium")).toThrow("Must be one of: Rapid, Normal, Slow, Other.");
  });
});
