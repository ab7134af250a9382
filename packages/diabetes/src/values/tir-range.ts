/**
 * Time-in-range target bounds in mg/dL
 */

import { DomainErrors, fail, ok, type Result } from "../errors.js";

export const TIR_BOUND_LIMITS = {
  MIN: 0,
  MAX: 1000,
} as const;

export interface TirRange {
  readonly kind: "TirRange";
  readonly lower: number;
  readonly upper: number;
}

function isValidBound(value: number): boolean {
  return Number.isInteger(value) && value >= TIR_BOUND_LIMITS.MIN && value <= TIR_BOUND_LIMITS.MAX;
}

export function createTirRange(lower: number, upper: number): Result<TirRange> {
  if (!isValidBound(lower) || !isValidBound(upper)) {
    return fail(DomainErrors.invalidTirRange);
  }

  if (lower >= upper) {
    return fail(DomainErrors.invalidTirRange);
  }

  const value: TirRange = { kind: "TirRange", lower, upper };
  return ok(Object.freeze(value));
}

/**
 * Standard clinical target range (70-180 mg/dL)
 */
export const STANDARD_TIR_RANGE: TirRange = Object.freeze({
  kind: "TirRange",
  lower: 70,
  upper: 180,
});

/**
 * Inclusive on both bounds
 */
export function isInRange(range: TirRange, glucoseMgDl: number): boolean {
  return glucoseMgDl >= range.lower && glucoseMgDl <= range.upper;
}

export function formatTirRange(range: TirRange): string {
  return `${range.lower}-${range.upper} mg/dL`;
}
