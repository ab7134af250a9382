/**
 * Post-meal outcome query
 */

import { DomainErrors, fail, ok, type Result } from "../errors.js";
import {
  findNearestReading,
  outcomeSearchWindow,
  outcomeTargetTime,
} from "../analysis/index.js";
import type { UserId } from "../values/index.js";
import type { QueryDependencies, QueryOptions } from "./ports.js";
import { toQueryError } from "./join.js";

export interface OutcomeResult {
  eventId: string;
  /** Event time + 2 hours */
  targetTime: number;
  /** Timestamp of the chosen reading, or the target time when none was found */
  readingTime: number;
  glucoseMgDl: number | null;
  /** True iff no reading was found in the window */
  isApproximate: boolean;
  message: string;
}

export const OUTCOME_MESSAGES = {
  recorded: "Outcome recorded",
  unavailable: "No reading available",
} as const;

/**
 * Find the glucose reading nearest to two hours after a food event.
 * No reading in the window is a successful result flagged as approximate.
 */
export async function computeOutcome(
  deps: QueryDependencies,
  eventId: string,
  callerUserId: UserId,
  options: QueryOptions = {}
): Promise<Result<OutcomeResult>> {
  const { signal } = options;

  try {
    signal?.throwIfAborted();

    const event = await deps.events.getById(eventId, signal);
    if (!event) return fail(DomainErrors.eventNotFound);
    if (event.userId.value !== callerUserId.value) return fail(DomainErrors.forbidden);
    if (event.eventType !== "Food") return fail(DomainErrors.eventInvalidType);

    const targetTime = outcomeTargetTime(event.eventTime);
    const { start, end } = outcomeSearchWindow(targetTime);
    const readings = await deps.glucose.getReadingsInRange(event.userId, start, end, signal);

    const nearest = findNearestReading(readings, targetTime);
    if (!nearest) {
      console.log(`No outcome reading for event ${eventId} (${readings.length} readings in window)`);
      return ok({
        eventId,
        targetTime,
        readingTime: targetTime,
        glucoseMgDl: null,
        isApproximate: true,
        message: OUTCOME_MESSAGES.unavailable,
      });
    }

    return ok({
      eventId,
      targetTime,
      readingTime: nearest.timestamp,
      glucoseMgDl: nearest.glucoseMgDl,
      isApproximate: false,
      message: OUTCOME_MESSAGES.recorded,
    });
  } catch (error: unknown) {
    const failure = toQueryError(error, signal);
    console.error(`Outcome query failed for event ${eventId}:`, failure.message);
    return fail(failure);
  }
}
