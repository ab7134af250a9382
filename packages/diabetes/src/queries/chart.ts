/**
 * Glucose chart with event overlays
 */

import { fail, ok, type Result } from "../errors.js";
import {
  chartTooltip,
  chartWindow,
  parseChartRange,
  type ChartRangeHours,
} from "../analysis/index.js";
import type { EventType } from "../models/index.js";
import type { UserId } from "../values/index.js";
import type { QueryDependencies, QueryOptions } from "./ports.js";
import { fetchBoth, toQueryError } from "./join.js";

export interface ChartPoint {
  timestamp: number;
  glucoseMgDl: number;
  trend: string | null;
}

export interface ChartOverlay {
  eventId: string;
  eventType: EventType;
  eventTime: number;
  tooltip: string;
}

export interface ChartResult {
  rangeHours: ChartRangeHours;
  start: number;
  end: number;
  /** Ascending by timestamp */
  glucose: ChartPoint[];
  /** Ascending by event time */
  events: ChartOverlay[];
}

/**
 * Fetch readings and events for the last `range` hours concurrently and
 * combine them. An unsupported range fails before either source is called.
 */
export async function assembleChart(
  deps: QueryDependencies,
  userId: UserId,
  range: string | number,
  options: QueryOptions = {}
): Promise<Result<ChartResult>> {
  const parsed = parseChartRange(range);
  if (!parsed.ok) return parsed;

  const rangeHours = parsed.value;
  const { start, end } = chartWindow(rangeHours, deps.clock.now());
  const { signal } = options;

  try {
    const [readings, events] = await fetchBoth(
      (shared) => deps.glucose.getReadingsInRange(userId, start, end, shared),
      (shared) => deps.events.getByUserId(userId, { start, end, signal: shared }),
      signal
    );
    console.log(
      `Chart for ${userId.value}: ${readings.length} readings, ${events.length} events over ${rangeHours}h`
    );

    const glucose = readings
      .map((r) => ({ timestamp: r.timestamp, glucoseMgDl: r.glucoseMgDl, trend: r.trend }))
      .sort((a, b) => a.timestamp - b.timestamp);

    const overlays = [...events]
      .sort((a, b) => a.eventTime - b.eventTime)
      .map((event) => ({
        eventId: event.id,
        eventType: event.eventType,
        eventTime: event.eventTime,
        tooltip: chartTooltip(event),
      }));

    return ok({ rangeHours, start, end, glucose, events: overlays });
  } catch (error: unknown) {
    const failure = toQueryError(error, signal);
    console.error(`Chart query failed for ${userId.value}:`, failure.message);
    return fail(failure);
  }
}
