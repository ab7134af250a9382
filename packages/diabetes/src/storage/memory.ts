/**
 * In-process EventStore for tests and local runs
 */

import type { DiabetesEvent } from "../models/index.js";
import type { EventRangeQuery, EventStore } from "../queries/index.js";
import type { UserId } from "../values/index.js";

function matches(event: DiabetesEvent, userId: UserId, query: EventRangeQuery): boolean {
  return (
    event.userId.value === userId.value &&
    event.eventTime >= query.start &&
    event.eventTime <= query.end &&
    (query.type === undefined || event.eventType === query.type)
  );
}

function byTimeAscending(a: DiabetesEvent, b: DiabetesEvent): number {
  return a.eventTime - b.eventTime || a.id.localeCompare(b.id);
}

export function createInMemoryEventStore(initial: readonly DiabetesEvent[] = []): EventStore {
  const events = new Map<string, DiabetesEvent>();
  for (const event of initial) events.set(event.id, event);

  const select = (userId: UserId, query: EventRangeQuery): DiabetesEvent[] => {
    query.signal?.throwIfAborted();
    return [...events.values()].filter((e) => matches(e, userId, query)).sort(byTimeAscending);
  };

  return {
    async getByUserId(userId, query) {
      return select(userId, query);
    },
    async getById(eventId, signal) {
      signal?.throwIfAborted();
      return events.get(eventId) ?? null;
    },
    async countByUserId(userId, query) {
      return select(userId, query).length;
    },
    async getPaged(userId, query, page, pageSize) {
      const newestFirst = select(userId, query).reverse();
      return newestFirst.slice((page - 1) * pageSize, page * pageSize);
    },
    async put(event, signal) {
      signal?.throwIfAborted();
      if (events.has(event.id)) {
        throw new Error(`Event ${event.id} already exists`);
      }
      events.set(event.id, event);
    },
  };
}
