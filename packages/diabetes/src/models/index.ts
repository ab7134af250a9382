/**
 * @glucolog/diabetes - Models
 *
 * Type definitions for events, readings, and audit records
 */

// Base types
export type { BaseEvent, EventType, SourceType } from "./base.js";

// Glucose types
export type { GlucoseReading } from "./glucose.js";

// Event variants
export type { AbsorptionHint, FoodEvent } from "./nutrition.js";
export { ABSORPTION_HINTS } from "./nutrition.js";
export type { InsulinType, InsulinEvent } from "./insulin.js";
export { INSULIN_TYPES } from "./insulin.js";
export type { IntensityType, ExerciseEvent, NoteEvent } from "./activity.js";
export { INTENSITY_TYPES } from "./activity.js";

// Union types
export type { DiabetesEvent, EventOfType } from "./events.js";
export { EVENT_TYPES, SOURCE_TYPES, isEventType, isSourceType, assertNever } from "./events.js";

// Snapshots and audit records
export type {
  FoodEventSnapshot,
  InsulinEventSnapshot,
  ExerciseEventSnapshot,
  NoteEventSnapshot,
  EventSnapshot,
  AuditMetadata,
  FoodEventCreated,
  InsulinEventCreated,
  ExerciseEventCreated,
  NoteEventCreated,
  EventCreatedRecord,
} from "./snapshots.js";
