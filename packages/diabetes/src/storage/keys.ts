/**
 * DynamoDB key generation for logged events
 *
 * Key Design:
 * - PK: EVT#{eventId}, SK: _ - one item per event, looked up by id
 *
 * GSI1 (all events for a user by time):
 * - PK: USR#{userId}#EVENTS
 * - SK: {timestamp}#{eventId}
 *
 * GSI2 (events for a user of one type by time):
 * - PK: USR#{userId}#{TYPE}
 * - SK: {timestamp}#{eventId}
 *
 * Timestamps are zero-padded to 15 digits so string order is time order.
 * The event id suffix keeps sort keys unique when two events share a time.
 */

import type { DiabetesEvent, EventType } from "../models/index.js";

export interface EventKeys {
  pk: string;
  sk: string;
  gsi1pk: string;
  gsi1sk: string;
  gsi2pk: string;
  gsi2sk: string;
}

export function padTimestamp(timestampMs: number): string {
  return timestampMs.toString().padStart(15, "0");
}

export function eventPrimaryKey(eventId: string): { pk: string; sk: string } {
  return { pk: `EVT#${eventId}`, sk: "_" };
}

export function userEventsPartition(userId: string): string {
  return `USR#${userId}#EVENTS`;
}

export function userTypePartition(userId: string, type: EventType): string {
  return `USR#${userId}#${type.toUpperCase()}`;
}

/**
 * Sort key bounds covering [start, end] inclusive.
 * "~" sorts after every character an event id can contain.
 */
export function timeRangeBounds(start: number, end: number): { start: string; end: string } {
  return { start: padTimestamp(start), end: `${padTimestamp(end)}#~` };
}

export function generateEventKeys(event: DiabetesEvent): EventKeys {
  const timestamp = padTimestamp(event.eventTime);
  const userId = event.userId.value;

  return {
    ...eventPrimaryKey(event.id),
    gsi1pk: userEventsPartition(userId),
    gsi1sk: `${timestamp}#${event.id}`,
    gsi2pk: userTypePartition(userId, event.eventType),
    gsi2sk: `${timestamp}#${event.id}`,
  };
}
