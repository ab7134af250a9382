/**
 * Event history: paged summaries and single-event lookup
 */

import { DomainErrors, fail, ok, type Result } from "../errors.js";
import { historySummary, historyWindow } from "../analysis/index.js";
import type { DiabetesEvent, EventType, SourceType } from "../models/index.js";
import type { UserId } from "../values/index.js";
import type { QueryDependencies, QueryOptions } from "./ports.js";
import { fetchBoth, toQueryError } from "./join.js";

export const MAX_PAGE_SIZE = 100;

export interface ListEventsParams {
  userId: UserId;
  type?: EventType;
  /** Unix ms; defaults to 30 days before `to` */
  from?: number;
  /** Unix ms; defaults to now */
  to?: number;
  page: number;
  pageSize: number;
}

export interface EventSummary {
  eventId: string;
  eventType: EventType;
  eventTime: number;
  source: SourceType;
  summary: string;
}

export interface PagedResult<T> {
  items: T[];
  page: number;
  pageSize: number;
  totalCount: number;
  totalPages: number;
  hasNextPage: boolean;
  hasPreviousPage: boolean;
}

function isValidPaging(page: number, pageSize: number): boolean {
  return (
    Number.isInteger(page) &&
    page >= 1 &&
    Number.isInteger(pageSize) &&
    pageSize >= 1 &&
    pageSize <= MAX_PAGE_SIZE
  );
}

export function toEventSummary(event: DiabetesEvent): EventSummary {
  return {
    eventId: event.id,
    eventType: event.eventType,
    eventTime: event.eventTime,
    source: event.source,
    summary: historySummary(event),
  };
}

/**
 * One page of a user's events, newest first
 */
export async function listEvents(
  deps: QueryDependencies,
  params: ListEventsParams,
  options: QueryOptions = {}
): Promise<Result<PagedResult<EventSummary>>> {
  const { userId, type, page, pageSize } = params;
  if (!isValidPaging(page, pageSize)) return fail(DomainErrors.invalidPaging);

  const { start, end } = historyWindow(params.from, params.to, deps.clock.now());
  if (start > end) return fail(DomainErrors.invalidDateRange);

  const { signal } = options;

  try {
    const [totalCount, events] = await fetchBoth(
      (shared) => deps.events.countByUserId(userId, { start, end, type, signal: shared }),
      (shared) => deps.events.getPaged(userId, { start, end, type, signal: shared }, page, pageSize),
      signal
    );

    const totalPages = Math.ceil(totalCount / pageSize);

    return ok({
      items: events.map(toEventSummary),
      page,
      pageSize,
      totalCount,
      totalPages,
      hasNextPage: page < totalPages,
      hasPreviousPage: page > 1,
    });
  } catch (error: unknown) {
    const failure = toQueryError(error, signal);
    console.error(`Event history query failed for ${userId.value}:`, failure.message);
    return fail(failure);
  }
}

/**
 * A single event, visible only to its owner
 */
export async function getEvent(
  deps: QueryDependencies,
  eventId: string,
  callerUserId: UserId,
  options: QueryOptions = {}
): Promise<Result<DiabetesEvent>> {
  const { signal } = options;

  try {
    signal?.throwIfAborted();

    const event = await deps.events.getById(eventId, signal);
    if (!event) return fail(DomainErrors.eventNotFound);
    if (event.userId.value !== callerUserId.value) return fail(DomainErrors.forbidden);

    return ok(event);
  } catch (error: unknown) {
    const failure = toQueryError(error, signal);
    console.error(`Event lookup failed for ${eventId}:`, failure.message);
    return fail(failure);
  }
}
