/**
 * Event factories
 *
 * Each factory checks the event time against the injected clock, stamps a
 * fresh id and creation time, and returns the frozen event together with
 * its single creation audit record. Nothing is buffered on the event;
 * dispatching the record is the caller's job.
 */

import { DomainErrors, fail, ok, type Result } from "../errors.js";
import type {
  AbsorptionHint,
  AuditMetadata,
  ExerciseEvent,
  ExerciseEventCreated,
  FoodEvent,
  FoodEventCreated,
  InsulinEvent,
  InsulinEventCreated,
  InsulinType,
  IntensityType,
  NoteEvent,
  NoteEventCreated,
  SourceType,
} from "../models/index.js";
import {
  createInsulinDetail,
  type Carbohydrate,
  type ExerciseDuration,
  type ExerciseTypeId,
  type InsulinDose,
  type MealTagId,
  type NoteText,
  type UserId,
} from "../values/index.js";
import { buildExerciseEvent, buildFoodEvent, buildInsulinEvent, buildNoteEvent } from "./build.js";
import { randomId, type Clock, type IdGenerator } from "./clock.js";
import { exerciseSnapshot, foodSnapshot, insulinSnapshot, noteSnapshot } from "./snapshot.js";

/**
 * Per-call creation context
 */
export interface CreationContext {
  clock: Clock;
  /** Ties the audit record to the request that produced it */
  correlationId: string;
  /** Id of the command or message that caused the creation */
  causationId: string;
  /** Defaults to random UUIDs */
  generateId?: IdGenerator;
}

/**
 * A newly created event and the audit record it raised
 */
export interface Created<E, R> {
  event: E;
  audit: R;
}

interface CommonInput {
  userId: UserId;
  /** Unix timestamp in milliseconds; must not be after the clock's now */
  eventTime: number;
  /** Defaults to "Manual" */
  source?: SourceType;
}

export interface CreateFoodEventInput extends CommonInput {
  carbohydrate: Carbohydrate;
  mealTagId: MealTagId;
  absorptionHint: AbsorptionHint;
  note?: NoteText | null;
}

export interface CreateInsulinEventInput extends CommonInput {
  insulinType: InsulinType;
  dose: InsulinDose;
  preparation?: string | null;
  delivery?: string | null;
  timing?: string | null;
  note?: NoteText | null;
}

export interface CreateExerciseEventInput extends CommonInput {
  exerciseTypeId: ExerciseTypeId;
  duration: ExerciseDuration;
  intensity: IntensityType;
  note?: NoteText | null;
}

export interface CreateNoteEventInput extends CommonInput {
  text: NoteText;
}

interface Stamp {
  id: string;
  createdAt: number;
}

/**
 * Reject unusable and future-dated times. An event at exactly "now" is allowed.
 */
function stampEvent(eventTime: number, context: CreationContext): Result<Stamp> {
  if (!Number.isFinite(eventTime)) {
    return fail(DomainErrors.invalidEventTime);
  }
  const now = context.clock.now();
  if (eventTime > now) {
    return fail(DomainErrors.eventTimeInFuture);
  }
  const generateId = context.generateId ?? randomId;
  return ok({ id: generateId(), createdAt: now });
}

function auditMetadata(context: CreationContext, occurredAt: number): AuditMetadata {
  const generateId = context.generateId ?? randomId;
  return {
    auditId: generateId(),
    occurredAt,
    correlationId: context.correlationId,
    causationId: context.causationId,
  };
}

export function createFoodEvent(
  input: CreateFoodEventInput,
  context: CreationContext
): Result<Created<FoodEvent, FoodEventCreated>> {
  const stamp = stampEvent(input.eventTime, context);
  if (!stamp.ok) return stamp;

  const event = buildFoodEvent({
    id: stamp.value.id,
    userId: input.userId,
    eventTime: input.eventTime,
    createdAt: stamp.value.createdAt,
    source: input.source ?? "Manual",
    note: input.note ?? null,
    carbohydrate: input.carbohydrate,
    mealTagId: input.mealTagId,
    absorptionHint: input.absorptionHint,
  });

  const audit: FoodEventCreated = {
    ...auditMetadata(context, event.createdAt),
    ...foodSnapshot(event),
    name: "FoodEventCreated",
  };

  return ok({ event, audit: Object.freeze(audit) });
}

export function createInsulinEvent(
  input: CreateInsulinEventInput,
  context: CreationContext
): Result<Created<InsulinEvent, InsulinEventCreated>> {
  const stamp = stampEvent(input.eventTime, context);
  if (!stamp.ok) return stamp;

  const preparation = createInsulinDetail(input.preparation);
  if (!preparation.ok) return preparation;
  const delivery = createInsulinDetail(input.delivery);
  if (!delivery.ok) return delivery;
  const timing = createInsulinDetail(input.timing);
  if (!timing.ok) return timing;

  const event = buildInsulinEvent({
    id: stamp.value.id,
    userId: input.userId,
    eventTime: input.eventTime,
    createdAt: stamp.value.createdAt,
    source: input.source ?? "Manual",
    note: input.note ?? null,
    insulinType: input.insulinType,
    dose: input.dose,
    preparation: preparation.value,
    delivery: delivery.value,
    timing: timing.value,
  });

  const audit: InsulinEventCreated = {
    ...auditMetadata(context, event.createdAt),
    ...insulinSnapshot(event),
    name: "InsulinEventCreated",
  };

  return ok({ event, audit: Object.freeze(audit) });
}

export function createExerciseEvent(
  input: CreateExerciseEventInput,
  context: CreationContext
): Result<Created<ExerciseEvent, ExerciseEventCreated>> {
  const stamp = stampEvent(input.eventTime, context);
  if (!stamp.ok) return stamp;

  const event = buildExerciseEvent({
    id: stamp.value.id,
    userId: input.userId,
    eventTime: input.eventTime,
    createdAt: stamp.value.createdAt,
    source: input.source ?? "Manual",
    note: input.note ?? null,
    exerciseTypeId: input.exerciseTypeId,
    duration: input.duration,
    intensity: input.intensity,
  });

  const audit: ExerciseEventCreated = {
    ...auditMetadata(context, event.createdAt),
    ...exerciseSnapshot(event),
    name: "ExerciseEventCreated",
  };

  return ok({ event, audit: Object.freeze(audit) });
}

export function createNoteEvent(
  input: CreateNoteEventInput,
  context: CreationContext
): Result<Created<NoteEvent, NoteEventCreated>> {
  const stamp = stampEvent(input.eventTime, context);
  if (!stamp.ok) return stamp;

  const event = buildNoteEvent({
    id: stamp.value.id,
    userId: input.userId,
    eventTime: input.eventTime,
    createdAt: stamp.value.createdAt,
    source: input.source ?? "Manual",
    note: null,
    text: input.text,
  });

  const audit: NoteEventCreated = {
    ...auditMetadata(context, event.createdAt),
    ...noteSnapshot(event),
    name: "NoteEventCreated",
  };

  return ok({ event, audit: Object.freeze(audit) });
}
