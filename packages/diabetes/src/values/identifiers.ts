/**
 * Identifier value objects: the owning user and references to lookup tables
 */

import { DomainErrors, fail, ok, type Result } from "../errors.js";

/**
 * Opaque reference to an authenticated user
 */
export interface UserId {
  readonly kind: "UserId";
  readonly value: string;
}

export interface MealTagId {
  readonly kind: "MealTagId";
  readonly value: number;
}

export interface ExerciseTypeId {
  readonly kind: "ExerciseTypeId";
  readonly value: number;
}

export function createUserId(value: string): Result<UserId> {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return fail(DomainErrors.invalidUserId);
  }
  const id: UserId = { kind: "UserId", value: trimmed };
  return ok(Object.freeze(id));
}

export function createMealTagId(value: number): Result<MealTagId> {
  if (!Number.isInteger(value) || value < 1) {
    return fail(DomainErrors.invalidMealTagId);
  }
  const id: MealTagId = { kind: "MealTagId", value };
  return ok(Object.freeze(id));
}

export function createExerciseTypeId(value: number): Result<ExerciseTypeId> {
  if (!Number.isInteger(value) || value < 1) {
    return fail(DomainErrors.invalidExerciseTypeId);
  }
  const id: ExerciseTypeId = { kind: "ExerciseTypeId", value };
  return ok(Object.freeze(id));
}
