/**
 * Carbohydrate content of a meal, in whole grams
 */

import { DomainErrors, fail, ok, type Result } from "../errors.js";

export const CARBOHYDRATE_LIMITS = {
  MIN_GRAMS: 0,
  MAX_GRAMS: 300,
} as const;

export interface Carbohydrate {
  readonly kind: "Carbohydrate";
  readonly grams: number;
}

export function createCarbohydrate(grams: number): Result<Carbohydrate> {
  if (
    !Number.isInteger(grams) ||
    grams < CARBOHYDRATE_LIMITS.MIN_GRAMS ||
    grams > CARBOHYDRATE_LIMITS.MAX_GRAMS
  ) {
    return fail(DomainErrors.invalidCarbohydrate);
  }
  const value: Carbohydrate = { kind: "Carbohydrate", grams };
  return ok(Object.freeze(value));
}
