/**
 * Tests for carbohydrate and exercise duration value objects
 */

import { describe, it, expect } from "vitest";
import { createCarbohydrate } from "./carbohydrate.js";
import { createExerciseDuration } from "./exercise-duration.js";
import { DomainErrors } from "../errors.js";

describe("createCarbohydrate", () => {
  it.each([0, 1, 45, 300])("accepts %d grams", (grams) => {
    const result = createCarbohydrate(grams);
    expect(result).toEqual({ ok: true, value: { kind: "Carbohydrate", grams } });
  });

  it.each([-1, 301, 12.5, Number.NaN])("rejects %d grams", (grams) => {
    expect(createCarbohydrate(grams)).toEqual({ ok: false, error: DomainErrors.invalidCarbohydrate });
  });

  it("returns a frozen value", () => {
    const result = createCarbohydrate(30);
    if (!result.ok) throw new Error("expected ok");
    expect(Object.isFrozen(result.value)).toBe(true);
  });
});

describe("createExerciseDuration", () => {
  it("accepts 1 to 300 minutes", () => {
    expect(createExerciseDuration(1).ok).toBe(true);
    expect(createExerciseDuration(300).ok).toBe(true);
  });

  it("rejects zero, too long, and fractional durations", () => {
    expect(createExerciseDuration(0)).toEqual({ ok: false, error: DomainErrors.invalidExerciseDuration });
    expect(createExerciseDuration(301).ok).toBe(false);
    expect(createExerciseDuration(30.5).ok).toBe(false);
  });
});
