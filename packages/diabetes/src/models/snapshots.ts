/**
 * Flattened event snapshots and creation audit records
 *
 * Snapshots hold scalars only (no value objects, no nested references),
 * which makes them safe to serialize, store, and emit.
 */

import type { SourceType } from "./base.js";
import type { AbsorptionHint } from "./nutrition.js";
import type { InsulinType } from "./insulin.js";
import type { IntensityType } from "./activity.js";

interface SnapshotBase {
  eventId: string;
  userId: string;
  /** Unix timestamp in milliseconds */
  eventTime: number;
  /** Unix timestamp in milliseconds */
  createdAt: number;
  source: SourceType;
  note: string | null;
}

export interface FoodEventSnapshot extends SnapshotBase {
  eventType: "Food";
  carbohydrateGrams: number;
  mealTagId: number;
  absorptionHint: AbsorptionHint;
}

export interface InsulinEventSnapshot extends SnapshotBase {
  eventType: "Insulin";
  insulinType: InsulinType;
  insulinUnits: number;
  preparation: string | null;
  delivery: string | null;
  timing: string | null;
}

export interface ExerciseEventSnapshot extends SnapshotBase {
  eventType: "Exercise";
  exerciseTypeId: number;
  durationMinutes: number;
  intensity: IntensityType;
}

export interface NoteEventSnapshot extends SnapshotBase {
  eventType: "Note";
  text: string;
  note: null;
}

export type EventSnapshot =
  | FoodEventSnapshot
  | InsulinEventSnapshot
  | ExerciseEventSnapshot
  | NoteEventSnapshot;

/**
 * Metadata every audit record carries
 */
export interface AuditMetadata {
  /** Unique id of the audit record itself */
  auditId: string;
  /** Unix timestamp in milliseconds, equal to the event's createdAt */
  occurredAt: number;
  correlationId: string;
  causationId: string;
}

export type FoodEventCreated = AuditMetadata & FoodEventSnapshot & { name: "FoodEventCreated" };
export type InsulinEventCreated = AuditMetadata &
  InsulinEventSnapshot & { name: "InsulinEventCreated" };
export type ExerciseEventCreated = AuditMetadata &
  ExerciseEventSnapshot & { name: "ExerciseEventCreated" };
export type NoteEventCreated = AuditMetadata & NoteEventSnapshot & { name: "NoteEventCreated" };

/**
 * Emitted exactly once, when an event is created
 */
export type EventCreatedRecord =
  | FoodEventCreated
  | InsulinEventCreated
  | ExerciseEventCreated
  | NoteEventCreated;
