import { describe, it, expect } from "vitest";
import { STANDARD_TIR_RANGE, createTirRange, formatTirRange, isInRange } from "./tir-range.js";
import { DomainErrors } from "../errors.js";

describe("createTirRange", () => {
  it("accepts 70-180", () => {
    expect(createTirRange(70, 180)).toEqual({
      ok: true,
      value: { kind: "TirRange", lower: 70, upper: 180 },
    });
  });

  it("accepts the outer bounds", () => {
    expect(createTirRange(0, 1000).ok).toBe(true);
  });

  it.each([
    [100, 100],
    [180, 70],
    [-1, 180],
    [70, 1001],
    [70.5, 180],
  ])("rejects (%d, %d)", (lower, upper) => {
    expect(createTirRange(lower, upper)).toEqual({ ok: false, error: DomainErrors.invalidTirRange });
  });
});

describe("isInRange", () => {
  it("includes both bounds", () => {
    expect(isInRange(STANDARD_TIR_RANGE, 70)).toBe(true);
    expect(isInRange(STANDARD_TIR_RANGE, 180)).toBe(true);
    expect(isInRange(STANDARD_TIR_RANGE, 69)).toBe(false);
    expect(isInRange(STANDARD_TIR_RANGE, 181)).toBe(false);
  });
});

describe("formatTirRange", () => {
  it("formats bounds in mg/dL", () => {
    expect(formatTirRange(STANDARD_TIR_RANGE)).toBe("70-180 mg/dL");
  });
});
