/**
 * Exercise and note event types
 */

import type { ExerciseDuration, ExerciseTypeId, NoteText } from "../values/index.js";
import type { BaseEvent } from "./base.js";

/**
 * Exercise intensity levels
 */
export type IntensityType = "Light" | "Moderate" | "Vigorous";

export const INTENSITY_TYPES = ["Light", "Moderate", "Vigorous"] as const;

/**
 * Exercise session
 */
export interface ExerciseEvent extends BaseEvent {
  readonly eventType: "Exercise";
  /** Activity kind from the exercise type lookup */
  readonly exerciseTypeId: ExerciseTypeId;
  readonly duration: ExerciseDuration;
  readonly intensity: IntensityType;
}

/**
 * Standalone note. The text is the payload; the base note slot stays null.
 */
export interface NoteEvent extends BaseEvent {
  readonly eventType: "Note";
  readonly text: NoteText;
  readonly note: null;
}
