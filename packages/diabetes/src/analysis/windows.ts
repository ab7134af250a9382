/**
 * Time windows for chart and history queries
 */

import { DomainErrors, fail, ok, type Result } from "../errors.js";

/**
 * The only chart durations accepted, in hours
 */
export const CHART_RANGE_HOURS = [1, 3, 5, 8, 12, 24] as const;

export type ChartRangeHours = (typeof CHART_RANGE_HOURS)[number];

/** History queries without bounds cover the last 30 days */
export const HISTORY_DEFAULT_DAYS = 30;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface TimeWindow {
  /** Unix timestamp in milliseconds, inclusive */
  start: number;
  /** Unix timestamp in milliseconds, inclusive */
  end: number;
}

function isChartRange(hours: number): hours is ChartRangeHours {
  return CHART_RANGE_HOURS.some((allowed) => allowed === hours);
}

/**
 * Validate a duration selector against the allow-list.
 * Accepts the number of hours or its decimal string form ("12").
 */
export function parseChartRange(range: string | number): Result<ChartRangeHours> {
  let hours: number;
  if (typeof range === "number") {
    hours = range;
  } else {
    if (!/^\s*\d+\s*$/.test(range)) return fail(DomainErrors.invalidRange);
    hours = parseInt(range, 10);
  }

  if (!isChartRange(hours)) return fail(DomainErrors.invalidRange);
  return ok(hours);
}

/**
 * Window ending now and reaching back the given number of hours
 */
export function chartWindow(hours: ChartRangeHours, now: number): TimeWindow {
  return { start: now - hours * HOUR_MS, end: now };
}

/**
 * Resolve optional history bounds: to defaults to now, from to 30 days before to
 */
export function historyWindow(
  from: number | undefined,
  to: number | undefined,
  now: number
): TimeWindow {
  const end = to ?? now;
  const start = from ?? end - HISTORY_DEFAULT_DAYS * DAY_MS;
  return { start, end };
}
