/**
 * Base types shared by all logged events
 */

import type { NoteText, UserId } from "../values/index.js";

/**
 * Event variant discriminator
 */
export type EventType = "Food" | "Insulin" | "Exercise" | "Note";

/**
 * Where an event came from
 */
export type SourceType = "Manual" | "Imported" | "System";

/**
 * All events share these fields. Events are never updated after creation,
 * so every field is readonly and instances are frozen.
 */
export interface BaseEvent {
  /** Opaque identifier, generated at creation and never reused */
  readonly id: string;
  /** Owning user */
  readonly userId: UserId;
  /** When the event happened, Unix timestamp in milliseconds (UTC) */
  readonly eventTime: number;
  /** When the event was recorded, from the injected clock */
  readonly createdAt: number;
  readonly source: SourceType;
  /** Optional annotation. Always null for note events, which carry their text as payload */
  readonly note: NoteText | null;
}
