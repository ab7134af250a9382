/**
 * Frozen event construction shared by the creation factories and rehydration
 */

import type {
  BaseEvent,
  ExerciseEvent,
  FoodEvent,
  InsulinEvent,
  NoteEvent,
} from "../models/index.js";

type Fields<E extends BaseEvent> = Omit<E, "eventType">;

export function buildFoodEvent(fields: Fields<FoodEvent>): FoodEvent {
  const event: FoodEvent = { ...fields, eventType: "Food" };
  return Object.freeze(event);
}

export function buildInsulinEvent(fields: Fields<InsulinEvent>): InsulinEvent {
  const event: InsulinEvent = { ...fields, eventType: "Insulin" };
  return Object.freeze(event);
}

export function buildExerciseEvent(fields: Fields<ExerciseEvent>): ExerciseEvent {
  const event: ExerciseEvent = { ...fields, eventType: "Exercise" };
  return Object.freeze(event);
}

export function buildNoteEvent(fields: Fields<NoteEvent>): NoteEvent {
  const event: NoteEvent = { ...fields, eventType: "Note" };
  return Object.freeze(event);
}
