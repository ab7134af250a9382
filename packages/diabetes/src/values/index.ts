/**
 * @glucolog/diabetes - Value objects
 *
 * Immutable, self-validating scalars
 */

export { valueEquals, type ValueObject } from "./equality.js";
export { CARBOHYDRATE_LIMITS, createCarbohydrate, type Carbohydrate } from "./carbohydrate.js";
export {
  INSULIN_DOSE_LIMITS,
  createInsulinDose,
  formatInsulinDose,
  isHalfUnitStep,
  type InsulinDose,
} from "./insulin-dose.js";
export { INSULIN_DETAIL_MAX_LENGTH, createInsulinDetail } from "./insulin-detail.js";
export {
  EXERCISE_DURATION_LIMITS,
  createExerciseDuration,
  type ExerciseDuration,
} from "./exercise-duration.js";
export {
  NOTE_TEXT_MAX_LENGTH,
  createNoteText,
  createOptionalNoteText,
  type NoteText,
} from "./note-text.js";
export {
  TIR_BOUND_LIMITS,
  STANDARD_TIR_RANGE,
  createTirRange,
  formatTirRange,
  isInRange,
  type TirRange,
} from "./tir-range.js";
export {
  createUserId,
  createMealTagId,
  createExerciseTypeId,
  type UserId,
  type MealTagId,
  type ExerciseTypeId,
} from "./identifiers.js";
