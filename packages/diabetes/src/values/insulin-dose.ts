/**
 * Insulin dose in units, 0-100 in 0.5 unit steps
 */

import { DomainErrors, fail, ok, type Result } from "../errors.js";

export const INSULIN_DOSE_LIMITS = {
  MIN_UNITS: 0,
  MAX_UNITS: 100,
  STEP_UNITS: 0.5,
} as const;

export interface InsulinDose {
  readonly kind: "InsulinDose";
  readonly units: number;
}

/**
 * Doubling a binary float is exact, so `units * 2` being an integer is an
 * exact half-unit check: 10.5 passes, 10.25 and 10.1 do not.
 */
export function isHalfUnitStep(units: number): boolean {
  return Number.isInteger(units * 2);
}

export function createInsulinDose(units: number): Result<InsulinDose> {
  if (
    !Number.isFinite(units) ||
    units < INSULIN_DOSE_LIMITS.MIN_UNITS ||
    units > INSULIN_DOSE_LIMITS.MAX_UNITS
  ) {
    return fail(DomainErrors.invalidInsulinDose);
  }

  if (!isHalfUnitStep(units)) {
    return fail(DomainErrors.invalidInsulinDose);
  }

  const value: InsulinDose = { kind: "InsulinDose", units };
  return ok(Object.freeze(value));
}

/**
 * Display form used in summaries, e.g. "10.5U"
 */
export function formatInsulinDose(dose: InsulinDose): string {
  return `${dose.units}U`;
}
