/**
 * Time-in-range query over a chart window
 */

import { fail, ok, type Result } from "../errors.js";
import {
  calculateGlucoseStats,
  calculateTimeInRange,
  chartWindow,
  parseChartRange,
  type ChartRangeHours,
  type GlucoseStats,
  type TimeInRangeSummary,
} from "../analysis/index.js";
import { STANDARD_TIR_RANGE, type UserId } from "../values/index.js";
import type { QueryDependencies, QueryOptions } from "./ports.js";
import { toQueryError } from "./join.js";

export interface TirResult extends TimeInRangeSummary {
  rangeHours: ChartRangeHours;
  start: number;
  end: number;
  /** Target range the readings were counted against */
  lower: number;
  upper: number;
  stats: GlucoseStats;
}

export async function computeTimeInRange(
  deps: QueryDependencies,
  userId: UserId,
  range: string | number,
  options: QueryOptions = {}
): Promise<Result<TirResult>> {
  const parsed = parseChartRange(range);
  if (!parsed.ok) return parsed;

  const rangeHours = parsed.value;
  const { start, end } = chartWindow(rangeHours, deps.clock.now());
  const { signal } = options;

  try {
    signal?.throwIfAborted();

    const target = deps.tirRangeFor ? await deps.tirRangeFor(userId) : STANDARD_TIR_RANGE;
    const readings = await deps.glucose.getReadingsInRange(userId, start, end, signal);
    console.log(`Found ${readings.length} readings for ${userId.value} over ${rangeHours}h`);

    return ok({
      rangeHours,
      start,
      end,
      lower: target.lower,
      upper: target.upper,
      ...calculateTimeInRange(readings, target),
      stats: calculateGlucoseStats(readings),
    });
  } catch (error: unknown) {
    const failure = toQueryError(error, signal);
    console.error(`Time in range query failed for ${userId.value}:`, failure.message);
    return fail(failure);
  }
}
