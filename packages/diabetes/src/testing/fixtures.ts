/**
 * Shared builders for tests
 */

import type { Result } from "../errors.js";
import {
  createExerciseEvent,
  createFoodEvent,
  createInsulinEvent,
  createNoteEvent,
  fixedClock,
  type CreationContext,
  type IdGenerator,
} from "../events/index.js";
import type {
  ExerciseEvent,
  FoodEvent,
  GlucoseReading,
  InsulinEvent,
  InsulinType,
  NoteEvent,
} from "../models/index.js";
import {
  createCarbohydrate,
  createExerciseDuration,
  createExerciseTypeId,
  createInsulinDose,
  createMealTagId,
  createNoteText,
  createUserId,
  type UserId,
} from "../values/index.js";

export const NOW = 1707393600000; // 2024-02-08 12:00:00 UTC
export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(`${result.error.code}: ${result.error.message}`);
  return result.value;
}

export function userId(value: string): UserId {
  return unwrap(createUserId(value));
}

export const USER = userId("user-1");
export const OTHER_USER = userId("user-2");

export function sequentialIds(prefix = "id"): IdGenerator {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export function creationContext(now = NOW, generateId = sequentialIds()): CreationContext {
  return {
    clock: fixedClock(now),
    correlationId: "corr-1",
    causationId: "cmd-1",
    generateId,
  };
}

interface EventOptions {
  id?: string;
  user?: UserId;
}

function contextFor(options: EventOptions): CreationContext {
  const id = options.id;
  return creationContext(NOW, id ? () => id : sequentialIds());
}

export function foodEvent(eventTime: number, grams: number, options: EventOptions = {}): FoodEvent {
  return unwrap(
    createFoodEvent(
      {
        userId: options.user ?? USER,
        eventTime,
        carbohydrate: unwrap(createCarbohydrate(grams)),
        mealTagId: unwrap(createMealTagId(1)),
        absorptionHint: "Normal",
      },
      contextFor(options)
    )
  ).event;
}

export function insulinEvent(
  eventTime: number,
  units: number,
  insulinType: InsulinType,
  options: EventOptions = {}
): InsulinEvent {
  return unwrap(
    createInsulinEvent(
      {
        userId: options.user ?? USER,
        eventTime,
        insulinType,
        dose: unwrap(createInsulinDose(units)),
      },
      contextFor(options)
    )
  ).event;
}

export function exerciseEvent(
  eventTime: number,
  minutes: number,
  options: EventOptions = {}
): ExerciseEvent {
  return unwrap(
    createExerciseEvent(
      {
        userId: options.user ?? USER,
        eventTime,
        exerciseTypeId: unwrap(createExerciseTypeId(3)),
        duration: unwrap(createExerciseDuration(minutes)),
        intensity: "Moderate",
      },
      contextFor(options)
    )
  ).event;
}

export function noteEvent(eventTime: number, text: string, options: EventOptions = {}): NoteEvent {
  return unwrap(
    createNoteEvent(
      {
        userId: options.user ?? USER,
        eventTime,
        text: unwrap(createNoteText(text)),
      },
      contextFor(options)
    )
  ).event;
}

export function reading(timestamp: number, glucoseMgDl: number, trend: string | null = "Flat"): GlucoseReading {
  return { timestamp, glucoseMgDl, trend };
}
