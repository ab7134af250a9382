import { describe, it, expect } from "vitest";
import { createExerciseTypeId, createMealTagId, createUserId } from "./identifiers.js";
import { createCarbohydrate } from "./carbohydrate.js";
import { valueEquals } from "./equality.js";
import { DomainErrors } from "../errors.js";

describe("identifiers", () => {
  it("trims user ids and rejects blank ones", () => {
    expect(createUserId(" user-1 ")).toEqual({ ok: true, value: { kind: "UserId", value: "user-1" } });
    expect(createUserId("  ")).toEqual({ ok: false, error: DomainErrors.invalidUserId });
  });

  it("requires positive whole lookup ids", () => {
    expect(createMealTagId(1).ok).toBe(true);
    expect(createMealTagId(0)).toEqual({ ok: false, error: DomainErrors.invalidMealTagId });
    expect(createExerciseTypeId(2.5)).toEqual({
      ok: false,
      error: DomainErrors.invalidExerciseTypeId,
    });
  });
});

describe("valueEquals", () => {
  it("compares value objects by content", () => {
    const a = createCarbohydrate(45);
    const b = createCarbohydrate(45);
    const c = createCarbohydrate(46);
    if (!a.ok || !b.ok || !c.ok) throw new Error("expected ok");

    expect(a.value).not.toBe(b.value);
    expect(valueEquals(a.value, b.value)).toBe(true);
    expect(valueEquals(a.value, c.value)).toBe(false);
  });

  it("distinguishes user ids", () => {
    const a = createUserId("user-1");
    const b = createUserId("user-2");
    if (!a.ok || !b.ok) throw new Error("expected ok");

    expect(valueEquals(a.value, b.value)).toBe(false);
  });
});
