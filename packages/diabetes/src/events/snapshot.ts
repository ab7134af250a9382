/**
 * Flatten events to scalar snapshots and rebuild them
 */

import { DomainErrors, fail, ok, type Result } from "../errors.js";
import {
  ABSORPTION_HINTS,
  INSULIN_TYPES,
  INTENSITY_TYPES,
  assertNever,
  isSourceType,
  type DiabetesEvent,
  type EventSnapshot,
  type ExerciseEvent,
  type ExerciseEventSnapshot,
  type FoodEvent,
  type FoodEventSnapshot,
  type InsulinEvent,
  type InsulinEventSnapshot,
  type NoteEvent,
  type NoteEventSnapshot,
} from "../models/index.js";
import {
  createCarbohydrate,
  createExerciseDuration,
  createExerciseTypeId,
  createInsulinDetail,
  createInsulinDose,
  createMealTagId,
  createNoteText,
  createOptionalNoteText,
  createUserId,
} from "../values/index.js";
import { buildExerciseEvent, buildFoodEvent, buildInsulinEvent, buildNoteEvent } from "./build.js";

function snapshotBase(event: DiabetesEvent) {
  return {
    eventId: event.id,
    userId: event.userId.value,
    eventTime: event.eventTime,
    createdAt: event.createdAt,
    source: event.source,
    note: event.note?.text ?? null,
  };
}

export function foodSnapshot(event: FoodEvent): FoodEventSnapshot {
  return {
    ...snapshotBase(event),
    eventType: "Food",
    carbohydrateGrams: event.carbohydrate.grams,
    mealTagId: event.mealTagId.value,
    absorptionHint: event.absorptionHint,
  };
}

export function insulinSnapshot(event: InsulinEvent): InsulinEventSnapshot {
  return {
    ...snapshotBase(event),
    eventType: "Insulin",
    insulinType: event.insulinType,
    insulinUnits: event.dose.units,
    preparation: event.preparation,
    delivery: event.delivery,
    timing: event.timing,
  };
}

export function exerciseSnapshot(event: ExerciseEvent): ExerciseEventSnapshot {
  return {
    ...snapshotBase(event),
    eventType: "Exercise",
    exerciseTypeId: event.exerciseTypeId.value,
    durationMinutes: event.duration.minutes,
    intensity: event.intensity,
  };
}

export function noteSnapshot(event: NoteEvent): NoteEventSnapshot {
  return {
    ...snapshotBase(event),
    eventType: "Note",
    text: event.text.text,
    note: null,
  };
}

/**
 * Flatten any event to its scalar snapshot
 */
export function toSnapshot(event: DiabetesEvent): EventSnapshot {
  switch (event.eventType) {
    case "Food":
      return foodSnapshot(event);
    case "Insulin":
      return insulinSnapshot(event);
    case "Exercise":
      return exerciseSnapshot(event);
    case "Note":
      return noteSnapshot(event);
    default:
      return assertNever(event);
  }
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((candidate) => candidate === value);
}

/**
 * Rebuild an event from a stored snapshot or an audit record.
 *
 * Every value object is validated again. The future-time rule is not:
 * it applies when an event is created, and stored events were created
 * in the past.
 */
export function rehydrateEvent(snapshot: EventSnapshot): Result<DiabetesEvent> {
  if (
    typeof snapshot.eventId !== "string" ||
    snapshot.eventId.length === 0 ||
    typeof snapshot.userId !== "string" ||
    !Number.isFinite(snapshot.eventTime) ||
    !Number.isFinite(snapshot.createdAt) ||
    !isSourceType(snapshot.source)
  ) {
    return fail(DomainErrors.invalidEventSnapshot);
  }

  const userId = createUserId(snapshot.userId);
  if (!userId.ok) return userId;

  const base = {
    id: snapshot.eventId,
    userId: userId.value,
    eventTime: snapshot.eventTime,
    createdAt: snapshot.createdAt,
    source: snapshot.source,
  };

  switch (snapshot.eventType) {
    case "Food": {
      if (!isOneOf(ABSORPTION_HINTS, snapshot.absorptionHint)) {
        return fail(DomainErrors.invalidEventSnapshot);
      }
      const carbohydrate = createCarbohydrate(snapshot.carbohydrateGrams);
      if (!carbohydrate.ok) return carbohydrate;
      const mealTagId = createMealTagId(snapshot.mealTagId);
      if (!mealTagId.ok) return mealTagId;
      const note = createOptionalNoteText(snapshot.note);
      if (!note.ok) return note;

      return ok(
        buildFoodEvent({
          ...base,
          note: note.value,
          carbohydrate: carbohydrate.value,
          mealTagId: mealTagId.value,
          absorptionHint: snapshot.absorptionHint,
        })
      );
    }

    case "Insulin": {
      if (!isOneOf(INSULIN_TYPES, snapshot.insulinType)) {
        return fail(DomainErrors.invalidEventSnapshot);
      }
      const dose = createInsulinDose(snapshot.insulinUnits);
      if (!dose.ok) return dose;
      const preparation = createInsulinDetail(snapshot.preparation);
      if (!preparation.ok) return preparation;
      const delivery = createInsulinDetail(snapshot.delivery);
      if (!delivery.ok) return delivery;
      const timing = createInsulinDetail(snapshot.timing);
      if (!timing.ok) return timing;
      const note = createOptionalNoteText(snapshot.note);
      if (!note.ok) return note;

      return ok(
        buildInsulinEvent({
          ...base,
          note: note.value,
          insulinType: snapshot.insulinType,
          dose: dose.value,
          preparation: preparation.value,
          delivery: delivery.value,
          timing: timing.value,
        })
      );
    }

    case "Exercise": {
      if (!isOneOf(INTENSITY_TYPES, snapshot.intensity)) {
        return fail(DomainErrors.invalidEventSnapshot);
      }
      const exerciseTypeId = createExerciseTypeId(snapshot.exerciseTypeId);
      if (!exerciseTypeId.ok) return exerciseTypeId;
      const duration = createExerciseDuration(snapshot.durationMinutes);
      if (!duration.ok) return duration;
      const note = createOptionalNoteText(snapshot.note);
      if (!note.ok) return note;

      return ok(
        buildExerciseEvent({
          ...base,
          note: note.value,
          exerciseTypeId: exerciseTypeId.value,
          duration: duration.value,
          intensity: snapshot.intensity,
        })
      );
    }

    case "Note": {
      const text = createNoteText(snapshot.text);
      if (!text.ok) return text;

      return ok(buildNoteEvent({ ...base, note: null, text: text.value }));
    }

    default:
      return fail(DomainErrors.invalidEventSnapshot);
  }
}
