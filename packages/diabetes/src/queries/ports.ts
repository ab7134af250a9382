/**
 * Collaborators the query operations read from
 */

import type { Clock } from "../events/index.js";
import type { DiabetesEvent, EventType, GlucoseReading } from "../models/index.js";
import type { TirRange, UserId } from "../values/index.js";

/**
 * CGM readings for a user. Implementations throw on failure.
 */
export interface GlucoseSource {
  getReadingsInRange(
    userId: UserId,
    start: number,
    end: number,
    signal?: AbortSignal
  ): Promise<GlucoseReading[]>;
}

/**
 * Time bounds (inclusive, Unix ms) and optional type filter for event lookups
 */
export interface EventRangeQuery {
  start: number;
  end: number;
  type?: EventType;
  signal?: AbortSignal;
}

/**
 * Persistence for logged events. Events are only ever added.
 */
export interface EventStore {
  /** Every matching event in the window, ascending by event time */
  getByUserId(userId: UserId, query: EventRangeQuery): Promise<DiabetesEvent[]>;
  getById(eventId: string, signal?: AbortSignal): Promise<DiabetesEvent | null>;
  countByUserId(userId: UserId, query: EventRangeQuery): Promise<number>;
  /** One page of matching events, newest first; page is 1-based */
  getPaged(
    userId: UserId,
    query: EventRangeQuery,
    page: number,
    pageSize: number
  ): Promise<DiabetesEvent[]>;
  /** Store a new event. Rejects if the identifier already exists. */
  put(event: DiabetesEvent, signal?: AbortSignal): Promise<void>;
}

/**
 * Everything a query operation needs, passed explicitly on every call
 */
export interface QueryDependencies {
  clock: Clock;
  glucose: GlucoseSource;
  events: EventStore;
  /** Per-user target range; the standard 70-180 range when absent */
  tirRangeFor?: (userId: UserId) => TirRange | Promise<TirRange>;
}

export interface QueryOptions {
  signal?: AbortSignal;
}
