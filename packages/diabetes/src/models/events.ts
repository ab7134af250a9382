/**
 * Union types and helpers for all events
 */

import type { EventType, SourceType } from "./base.js";
import type { FoodEvent } from "./nutrition.js";
import type { InsulinEvent } from "./insulin.js";
import type { ExerciseEvent, NoteEvent } from "./activity.js";

/**
 * All possible events. Consumers switch on `eventType` and end with
 * `assertNever` so a new variant fails to compile until handled.
 */
export type DiabetesEvent = FoodEvent | InsulinEvent | ExerciseEvent | NoteEvent;

export type EventOfType<T extends EventType> = Extract<DiabetesEvent, { eventType: T }>;

/**
 * All event types as a const array for iteration
 */
export const EVENT_TYPES = ["Food", "Insulin", "Exercise", "Note"] as const;

export const SOURCE_TYPES = ["Manual", "Imported", "System"] as const;

export function isEventType(value: unknown): value is EventType {
  return EVENT_TYPES.some((type) => type === value);
}

export function isSourceType(value: unknown): value is SourceType {
  return SOURCE_TYPES.some((source) => source === value);
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled event variant: ${JSON.stringify(value)}`);
}
