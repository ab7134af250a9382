/**
 * Exercise duration in whole minutes (1-300)
 */

import { DomainErrors, fail, ok, type Result } from "../errors.js";

export const EXERCISE_DURATION_LIMITS = {
  MIN_MINUTES: 1,
  MAX_MINUTES: 300,
} as const;

export interface ExerciseDuration {
  readonly kind: "ExerciseDuration";
  readonly minutes: number;
}

export function createExerciseDuration(minutes: number): Result<ExerciseDuration> {
  if (
    !Number.isInteger(minutes) ||
    minutes < EXERCISE_DURATION_LIMITS.MIN_MINUTES ||
    minutes > EXERCISE_DURATION_LIMITS.MAX_MINUTES
  ) {
    return fail(DomainErrors.invalidExerciseDuration);
  }
  const value: ExerciseDuration = { kind: "ExerciseDuration", minutes };
  return ok(Object.freeze(value));
}
